import type { PluginBlock } from './plugin.js';

export interface InstalledLanguage {
  lang: string;
  name: string;
}

export interface ConfigurationResponse {
  contextId: number;
  branding: boolean;
  extendedValidElements: string;
  installedLanguages: InstalledLanguage[];
  plugins: PluginBlock[];
}

export type EditorErrorKind =
  | 'invalid_context'
  | 'invalid_request'
  | 'not_found'
  | 'permission_denied'
  | 'unauthenticated';
