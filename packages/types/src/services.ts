import type { Context, ContextLevel, EditorUser } from './context.js';

export interface ContextResolver {
  /** Returns null when no context of that level wraps the instance. */
  resolve(level: ContextLevel, instanceId: number): Context | null;
}

export interface PermissionChecker {
  userHasCapability(user: EditorUser, capability: string, context: Context): boolean;
}

export interface Translation {
  code: string;
  name: string;
}

export interface LanguageCatalog {
  listInstalledTranslations(): Translation[];
}

export interface UploadLimitService {
  /** Largest upload accepted in the context, in bytes. */
  maxUploadSize(context: Context): number;
}

export interface StringResolver {
  getString(identifier: string, component: string): string;
}

export interface DocsLinker {
  getDocsUrl(path: string): string;
}

export type AiActionName = 'generate_text' | 'generate_image';

export interface AiActionService {
  isActionAvailable(action: AiActionName): boolean;
  hasUserAgreedToPolicy(userId: number): boolean;
}

export interface FilterService {
  isFilterActive(filter: string, context: Context): boolean;
}

/** Everything a plugin settings builder may consult besides the config store. */
export interface EditorServices {
  permissions: PermissionChecker;
  uploadLimits: UploadLimitService;
  strings: StringResolver;
  docs: DocsLinker;
  ai: AiActionService;
  filters: FilterService;
}
