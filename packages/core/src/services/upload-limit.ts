import type { ConfigStore, Context, UploadLimitService } from '@lectern/types';
import type { ContextAncestry } from './permissions.js';

function positiveInt(value: string | null): number | null {
  if (value === null) return null;
  const n = Number.parseInt(value, 10);
  return Number.isFinite(n) && n > 0 ? n : null;
}

/**
 * Smallest positive limit among the server ceiling, the site `core/maxbytes`
 * setting and any `core/maxbytes.<contextId>` set along the context's ancestry.
 * Zero or unset values mean "no extra limit"; 0 is returned when nothing limits uploads.
 */
export class SettingsUploadLimitService implements UploadLimitService {
  constructor(
    private config: ConfigStore,
    private contexts: ContextAncestry,
    private serverLimitBytes: number,
  ) {}

  maxUploadSize(context: Context): number {
    const limits = [
      this.serverLimitBytes,
      positiveInt(this.config.get('core', 'maxbytes')),
      ...this.contexts.ancestry(context).map((c) => positiveInt(this.config.get('core', `maxbytes.${c.id}`))),
    ].filter((n): n is number => n !== null && n > 0);
    return limits.length > 0 ? Math.min(...limits) : 0;
  }
}
