import type { EditorPluginDescriptor, PluginBuildContext } from '../registry.js';
import { can, flag, pluginConfig, setting } from './shared.js';
import { CONFIG_DEFAULTS } from '../config-store.js';

type RecordingType = 'audio' | 'video' | 'screen';

function splitScreenSize(raw: string): { width: string; height: string } | null {
  const [width, height] = raw.split(',').map((part) => part.trim());
  return width && height ? { width, height } : null;
}

const DEFAULT_SCREEN_SIZE = splitScreenSize(CONFIG_DEFAULTS['editor_recordrtc']?.['screensize'] ?? '') ?? {
  width: '1280',
  height: '720',
};

function allowed(ctx: PluginBuildContext, types: string[], type: RecordingType): string {
  return flag(types.includes(type) && can(ctx, `recordrtc:record${type}`));
}

/** Splits a stored "width,height"; anything without two non-empty parts yields the shipped default. */
export function parseScreenSize(raw: string): { width: string; height: string } {
  return splitScreenSize(raw) ?? DEFAULT_SCREEN_SIZE;
}

export const recordRtcPlugin: EditorPluginDescriptor = {
  name: 'recordrtc',
  requiredCapabilities: ['recordrtc:recordaudio', 'recordrtc:recordvideo', 'recordrtc:recordscreen'],
  buildSettings: (ctx) => {
    const read = (key: string) => pluginConfig(ctx, 'recordrtc', key);
    const allowedTypes = read('allowedtypes');
    const types = allowedTypes.split(',').map((t) => t.trim());
    const screen = parseScreenSize(read('screensize'));

    return [
      setting('videoallowed', allowed(ctx, types, 'video')),
      setting('audioallowed', allowed(ctx, types, 'audio')),
      setting('screenallowed', allowed(ctx, types, 'screen')),
      setting('pausingallowed', read('allowedpausing')),
      setting('allowedtypes', allowedTypes),
      setting('audiobitrate', read('audiobitrate')),
      setting('videobitrate', read('videobitrate')),
      setting('screenbitrate', read('screenbitrate')),
      setting('audiotimelimit', read('audiotimelimit')),
      setting('videotimelimit', read('videotimelimit')),
      setting('screentimelimit', read('screentimelimit')),
      setting('maxrecsize', String(ctx.services.uploadLimits.maxUploadSize(ctx.context))),
      setting('videoscreenwidth', screen.width),
      setting('videoscreenheight', screen.height),
    ];
  },
};
