import type { EditorErrorKind } from '@lectern/types';

/** Failures the configuration surface reports to callers; each carries a machine-readable kind. */
export abstract class EditorConfigError extends Error {
  abstract readonly kind: EditorErrorKind;
  abstract readonly status: number;
}

export class InvalidContextError extends EditorConfigError {
  readonly kind = 'invalid_context';
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidContextError';
  }
}

export class NotFoundError extends EditorConfigError {
  readonly kind = 'not_found';
  readonly status = 404;

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class PermissionError extends EditorConfigError {
  readonly kind = 'permission_denied';
  readonly status = 403;

  constructor(message: string) {
    super(message);
    this.name = 'PermissionError';
  }
}

export class UnauthenticatedError extends EditorConfigError {
  readonly kind = 'unauthenticated';
  readonly status = 401;

  constructor(message = 'X-User-Id header with a positive user id is required') {
    super(message);
    this.name = 'UnauthenticatedError';
  }
}

export function isEditorConfigError(err: unknown): err is EditorConfigError {
  return err instanceof EditorConfigError;
}
