import type { ConfigStore, EditorServices } from '@lectern/types';
import type { DatabaseManager } from '../db/index.js';
import type { LecternConfig } from '../config.js';
import { RolePermissionChecker } from './permissions.js';
import { SettingsUploadLimitService } from './upload-limit.js';
import { JsonStringResolver } from './strings.js';
import { ConfigDocsLinker } from './docs.js';
import { SettingsAiActionService } from './ai-actions.js';
import { SettingsFilterService } from './filters.js';

export function createEditorServices(
  db: DatabaseManager,
  config: ConfigStore,
  daemonConfig: Pick<LecternConfig, 'docsRoot' | 'docsLang' | 'uploadLimitBytes'>,
): EditorServices {
  return {
    permissions: new RolePermissionChecker(db.contexts, db.roleAssignments),
    uploadLimits: new SettingsUploadLimitService(config, db.contexts, daemonConfig.uploadLimitBytes),
    strings: new JsonStringResolver(),
    docs: new ConfigDocsLinker(daemonConfig.docsRoot, daemonConfig.docsLang),
    ai: new SettingsAiActionService(config),
    filters: new SettingsFilterService(config, db.contexts),
  };
}

export { RolePermissionChecker, ROLE_CAPABILITIES } from './permissions.js';
export type { ContextAncestry, RoleLookup } from './permissions.js';
export { StaticLanguageCatalog } from './languages.js';
export { SettingsUploadLimitService } from './upload-limit.js';
export { JsonStringResolver } from './strings.js';
export { ConfigDocsLinker } from './docs.js';
export { SettingsAiActionService } from './ai-actions.js';
export { SettingsFilterService } from './filters.js';
