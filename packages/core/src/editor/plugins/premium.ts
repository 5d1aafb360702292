import type { EditorPluginDescriptor } from '../registry.js';
import { pluginConfig, setting } from './shared.js';
import { isTruthySetting } from '../config-store.js';

/** Commercial editor add-ons, in the order the client loads them. */
export const PREMIUM_PLUGINS = [
  'advtable',
  'autocorrect',
  'casechange',
  'checklist',
  'editimage',
  'footnotes',
  'formatpainter',
  'linkchecker',
  'pageembed',
  'permanentpen',
  'powerpaste',
  'tableofcontents',
  'typography',
] as const;

export const premiumPlugin: EditorPluginDescriptor = {
  name: 'premium',
  requiredCapabilities: ['premium:access'],
  isAvailable: (ctx) => pluginConfig(ctx, 'premium', 'apikey').trim() !== '',
  buildSettings: (ctx) => {
    const enabled = PREMIUM_PLUGINS.filter((p) => isTruthySetting(ctx.config.get('editor_premium', `${p}.enabled`)));
    return [setting('premiumplugins', enabled.join(','))];
  },
};
