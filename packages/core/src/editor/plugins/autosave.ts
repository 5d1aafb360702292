import type { EditorPluginDescriptor } from '../registry.js';

export const autosavePlugin: EditorPluginDescriptor = {
  name: 'autosave',
  buildSettings: () => [],
};
