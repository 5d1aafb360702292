import type { EditorServices } from '@lectern/types';
import type { DatabaseManager } from '../db/index.js';
import type { LecternConfig } from '../config.js';
import { createEditorServices, StaticLanguageCatalog } from '../services/index.js';
import { ConfigurationAggregator } from './aggregator.js';
import { DefaultedConfigStore } from './config-store.js';
import { createPluginRegistry, type PluginRegistry } from './registry.js';
import { EDITOR_PLUGINS } from './plugins/index.js';

export interface EditorStack {
  db: DatabaseManager;
  config: DefaultedConfigStore;
  registry: PluginRegistry;
  services: EditorServices;
  aggregator: ConfigurationAggregator;
}

export type EditorStackConfig = Pick<LecternConfig, 'docsRoot' | 'docsLang' | 'uploadLimitBytes' | 'languages'>;

/** Wires the builtin registry and the database-backed collaborators into one aggregator. */
export function createEditorStack(db: DatabaseManager, daemonConfig: EditorStackConfig): EditorStack {
  const config = new DefaultedConfigStore(db.settings);
  const registry = createPluginRegistry(EDITOR_PLUGINS);
  const services = createEditorServices(db, config, daemonConfig);
  const aggregator = new ConfigurationAggregator({
    contexts: db.contexts,
    config,
    languages: new StaticLanguageCatalog(daemonConfig.languages),
    services,
    registry,
  });
  return { db, config, registry, services, aggregator };
}

export { ConfigurationAggregator, GLOBAL_NAMESPACE, VIEW_CAPABILITY } from './aggregator.js';
export type { ConfigurationAggregatorDeps } from './aggregator.js';
export { DefaultedConfigStore, CONFIG_DEFAULTS, isTruthySetting } from './config-store.js';
export { createPluginRegistry, PluginRegistry, PLUGIN_STATE_NAMESPACE } from './registry.js';
export type { EditorPluginDescriptor, PluginBuildContext } from './registry.js';
export { EDITOR_PLUGINS, PREMIUM_PLUGINS, parseScreenSize } from './plugins/index.js';
