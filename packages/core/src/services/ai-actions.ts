import type { AiActionName, AiActionService, ConfigStore } from '@lectern/types';
import { isTruthySetting } from '../editor/config-store.js';

/** Provider setup happens elsewhere; this only reads the resulting action switches and policy acceptances. */
export class SettingsAiActionService implements AiActionService {
  constructor(private config: ConfigStore) {}

  isActionAvailable(action: AiActionName): boolean {
    return isTruthySetting(this.config.get('ai', `${action}.enabled`));
  }

  hasUserAgreedToPolicy(userId: number): boolean {
    return isTruthySetting(this.config.get('ai_policy', String(userId)));
  }
}
