import { z } from 'zod';
import type { ConfigStore } from '@lectern/types';
import defaults from './defaults.json' with { type: 'json' };

const ConfigDefaultsSchema = z.record(z.string(), z.record(z.string(), z.string()));

export type ConfigDefaults = z.infer<typeof ConfigDefaultsSchema>;

export const CONFIG_DEFAULTS: ConfigDefaults = ConfigDefaultsSchema.parse(defaults);

/**
 * Reads through to the backing store and falls back to the shipped defaults,
 * so optional settings that were never saved still resolve to a value.
 */
export class DefaultedConfigStore implements ConfigStore {
  constructor(
    private store: ConfigStore,
    private defaults: ConfigDefaults = CONFIG_DEFAULTS,
  ) {}

  get(namespace: string, key: string): string | null {
    return this.store.get(namespace, key) ?? this.defaults[namespace]?.[key] ?? null;
  }
}

/** Interprets stored flags: "1" and "true" are on, anything else is off. */
export function isTruthySetting(value: string | null): boolean {
  return value === '1' || value === 'true';
}
