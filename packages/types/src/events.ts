import type { ConfigurationResponse, EditorErrorKind } from './configuration.js';

export type DaemonEvent =
  | { type: 'editor.configuration'; requestId: string; data: ConfigurationResponse }
  | { type: 'editor.plugin.toggled'; name: string; enabled: boolean }
  | { type: 'error'; requestId?: string; kind?: EditorErrorKind; error: string };

export type ClientEvent = {
  type: 'editor.getConfiguration';
  requestId: string;
  contextType: string;
  contextId: number;
};
