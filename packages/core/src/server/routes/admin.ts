import type { EditorUser } from '@lectern/types';
import { SYSTEM_CONTEXT_ID } from '../../db/index.js';
import { PermissionError } from '../../errors.js';
import type { RouteContext } from './types.js';

export const MANAGE_CAPABILITY = 'editor:manageplugins';

/** Administration is a site-level right, checked in the system context. */
export function requireManager(ctx: RouteContext, user: EditorUser): void {
  const system = ctx.db.contexts.get(SYSTEM_CONTEXT_ID);
  if (!system || !ctx.services.permissions.userHasCapability(user, MANAGE_CAPABILITY, system)) {
    throw new PermissionError(`User ${user.id} cannot manage editor settings`);
  }
}
