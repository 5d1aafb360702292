import { z } from 'zod';
import type { Context, EditorUser, PermissionChecker } from '@lectern/types';
import roles from './roles.json' with { type: 'json' };

export const ROLE_CAPABILITIES: Record<string, string[]> = z
  .record(z.string(), z.array(z.string()))
  .parse(roles);

export interface ContextAncestry {
  ancestry(context: Context): Context[];
}

export interface RoleLookup {
  rolesFor(userId: number, contextIds: number[]): string[];
}

/**
 * A user holds a capability in a context when a role assigned to them in that
 * context, or in any parent context, grants it. There is no prohibit/override layer.
 */
export class RolePermissionChecker implements PermissionChecker {
  constructor(
    private contexts: ContextAncestry,
    private assignments: RoleLookup,
    private roleCapabilities: Record<string, string[]> = ROLE_CAPABILITIES,
  ) {}

  userHasCapability(user: EditorUser, capability: string, context: Context): boolean {
    const contextIds = this.contexts.ancestry(context).map((c) => c.id);
    const roles = this.assignments.rolesFor(user.id, contextIds);
    return roles.some((role) => this.roleCapabilities[role]?.includes(capability) ?? false);
  }
}
