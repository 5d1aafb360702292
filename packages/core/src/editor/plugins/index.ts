import type { EditorPluginDescriptor } from '../registry.js';
import { accessibilityCheckerPlugin } from './accessibilitychecker.js';
import { aiPlacementPlugin } from './aiplacement.js';
import { autosavePlugin } from './autosave.js';
import { equationPlugin } from './equation.js';
import { h5pPlugin } from './h5p.js';
import { htmlPlugin, linkPlugin, mediaPlugin } from './simple.js';
import { premiumPlugin } from './premium.js';
import { recordRtcPlugin } from './recordrtc.js';

/** Builtin plugins in the order their blocks appear in a configuration response. */
export const EDITOR_PLUGINS: readonly EditorPluginDescriptor[] = [
  accessibilityCheckerPlugin,
  aiPlacementPlugin,
  autosavePlugin,
  equationPlugin,
  h5pPlugin,
  htmlPlugin,
  linkPlugin,
  mediaPlugin,
  premiumPlugin,
  recordRtcPlugin,
];

export { PREMIUM_PLUGINS } from './premium.js';
export { parseScreenSize } from './recordrtc.js';
