import type { EditorPluginDescriptor } from '../registry.js';

export const accessibilityCheckerPlugin: EditorPluginDescriptor = {
  name: 'accessibilitychecker',
  buildSettings: () => [],
};
