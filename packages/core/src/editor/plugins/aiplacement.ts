import { isTruthySetting } from '../config-store.js';
import type { EditorPluginDescriptor } from '../registry.js';
import { can, flag, setting } from './shared.js';

const GENERATE_TEXT = 'aiplacement:generatetext';
const GENERATE_IMAGE = 'aiplacement:generateimage';

export const aiPlacementPlugin: EditorPluginDescriptor = {
  name: 'aiplacement',
  requiredCapabilities: [GENERATE_TEXT, GENERATE_IMAGE],
  isAvailable: (ctx) => isTruthySetting(ctx.config.get('aiplacement_editor', 'enabled')),
  buildSettings: (ctx) => {
    const { ai } = ctx.services;
    return [
      setting('policyagreed', flag(ai.hasUserAgreedToPolicy(ctx.user.id))),
      setting('generate_text', flag(ai.isActionAvailable('generate_text') && can(ctx, GENERATE_TEXT))),
      setting('generate_image', flag(ai.isActionAvailable('generate_image') && can(ctx, GENERATE_IMAGE))),
    ];
  },
};
