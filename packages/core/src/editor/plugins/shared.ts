import type { SettingEntry } from '@lectern/types';
import type { PluginBuildContext } from '../registry.js';

export function flag(value: boolean): string {
  return value ? '1' : '0';
}

export function setting(name: string, value: string): SettingEntry {
  return { name, value };
}

/** Reads `editor_<plugin>/<key>`; defaults make a missing value an empty string rather than an error. */
export function pluginConfig(ctx: PluginBuildContext, plugin: string, key: string): string {
  return ctx.config.get(`editor_${plugin}`, key) ?? '';
}

export function can(ctx: PluginBuildContext, capability: string): boolean {
  return ctx.services.permissions.userHasCapability(ctx.user, capability, ctx.context);
}
