import { z } from 'zod';
import type { ConfigStore, Context, EditorServices, EditorUser, PluginStateSummary, SettingEntry } from '@lectern/types';

/** Namespace holding the per-plugin enabled flags, keyed by plugin name. */
export const PLUGIN_STATE_NAMESPACE = 'editor_plugins';

export interface PluginBuildContext {
  context: Context;
  user: EditorUser;
  config: ConfigStore;
  services: EditorServices;
}

export interface EditorPluginDescriptor {
  name: string;
  /** Used when no enabled flag has been stored. Defaults to true. */
  enabledByDefault?: boolean;
  /** The user needs any one of these in the context; none listed means everyone sees the plugin. */
  requiredCapabilities?: readonly string[];
  /** Site-level switches beyond the enabled flag, such as a missing API key. */
  isAvailable?(ctx: PluginBuildContext): boolean;
  buildSettings(ctx: PluginBuildContext): SettingEntry[];
}

const DescriptorSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9]*$/, 'plugin name must be lowercase alphanumeric'),
  enabledByDefault: z.boolean().optional(),
  requiredCapabilities: z
    .array(z.string().regex(/^[a-z0-9]+:[a-z0-9]+$/, 'capability must look like "area:action"'))
    .optional(),
});

export class PluginRegistry {
  private byName: ReadonlyMap<string, EditorPluginDescriptor>;

  constructor(private readonly ordered: readonly EditorPluginDescriptor[]) {
    this.byName = new Map(ordered.map((d) => [d.name, d]));
  }

  /** Descriptors in registration order. */
  entries(): readonly EditorPluginDescriptor[] {
    return this.ordered;
  }

  get(name: string): EditorPluginDescriptor | undefined {
    return this.byName.get(name);
  }

  isEnabled(name: string, config: ConfigStore): boolean {
    const descriptor = this.byName.get(name);
    if (!descriptor) return false;
    const stored = config.get(PLUGIN_STATE_NAMESPACE, name);
    if (stored === null) return descriptor.enabledByDefault ?? true;
    return stored !== '0';
  }

  summarize(config: ConfigStore): PluginStateSummary[] {
    return this.ordered.map((d) => ({
      name: d.name,
      enabled: this.isEnabled(d.name, config),
      requiredCapabilities: [...(d.requiredCapabilities ?? [])],
    }));
  }
}

export function createPluginRegistry(descriptors: readonly EditorPluginDescriptor[]): PluginRegistry {
  const seen = new Set<string>();
  for (const descriptor of descriptors) {
    const result = DescriptorSchema.safeParse(descriptor);
    if (!result.success) {
      throw new Error(
        `Invalid editor plugin "${descriptor.name}": ${result.error.issues.map((i) => i.message).join('; ')}`,
      );
    }
    if (seen.has(descriptor.name)) {
      throw new Error(`Duplicate editor plugin "${descriptor.name}"`);
    }
    seen.add(descriptor.name);
  }
  return new PluginRegistry(Object.freeze([...descriptors]));
}
