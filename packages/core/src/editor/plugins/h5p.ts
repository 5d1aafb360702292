import type { EditorPluginDescriptor } from '../registry.js';
import { can, flag, setting } from './shared.js';

export const h5pPlugin: EditorPluginDescriptor = {
  name: 'h5p',
  requiredCapabilities: ['h5p:addembed'],
  buildSettings: (ctx) => [
    setting('embedallowed', flag(can(ctx, 'h5p:addembed'))),
    setting('uploadallowed', flag(can(ctx, 'h5p:deploy'))),
  ],
};
