import type { IncomingHttpHeaders } from 'node:http';
import type { EditorUser } from '@lectern/types';
import { UnauthenticatedError } from '../../errors.js';
import { UserIdHeader, validate } from './schemas.js';

export const USER_HEADER = 'x-user-id';

/**
 * Session handling lives in front of this daemon; it forwards the signed-in
 * user's id in `X-User-Id`.
 */
export function userFromHeaders(headers: IncomingHttpHeaders): EditorUser {
  const raw = headers[USER_HEADER];
  const parsed = validate(UserIdHeader, Array.isArray(raw) ? raw[0] : raw);
  if (!parsed.success) throw new UnauthenticatedError();
  return { id: parsed.data };
}
