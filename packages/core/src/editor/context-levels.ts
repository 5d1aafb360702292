import type { ContextLevel } from '@lectern/types';

export const CONTEXT_LEVELS: readonly ContextLevel[] = ['system', 'course', 'module'];

export function isContextLevel(value: string): value is ContextLevel {
  return (CONTEXT_LEVELS as readonly string[]).includes(value);
}
