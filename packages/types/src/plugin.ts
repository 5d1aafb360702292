export interface SettingEntry {
  name: string;
  /** Always text: booleans are "1"/"0", structured values are JSON-encoded. */
  value: string;
}

export interface PluginBlock {
  name: string;
  settings: SettingEntry[];
}

export interface PluginStateSummary {
  name: string;
  enabled: boolean;
  requiredCapabilities: string[];
}
