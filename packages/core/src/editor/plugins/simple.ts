import type { EditorPluginDescriptor } from '../registry.js';

// Plugins the client configures entirely on its own side.

export const htmlPlugin: EditorPluginDescriptor = {
  name: 'html',
  buildSettings: () => [],
};

export const linkPlugin: EditorPluginDescriptor = {
  name: 'link',
  buildSettings: () => [],
};

export const mediaPlugin: EditorPluginDescriptor = {
  name: 'media',
  buildSettings: () => [],
};
