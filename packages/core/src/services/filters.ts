import type { ConfigStore, Context, FilterService } from '@lectern/types';
import { isTruthySetting } from '../editor/config-store.js';
import type { ContextAncestry } from './permissions.js';

export class SettingsFilterService implements FilterService {
  constructor(
    private config: ConfigStore,
    private contexts: ContextAncestry,
  ) {}

  isFilterActive(filter: string, context: Context): boolean {
    for (const c of this.contexts.ancestry(context)) {
      const local = this.config.get('filters', `${filter}.active.${c.id}`);
      if (local !== null) return isTruthySetting(local);
    }
    return isTruthySetting(this.config.get('filters', `${filter}.active`));
  }
}
