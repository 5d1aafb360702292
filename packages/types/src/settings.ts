/** Key-value configuration, grouped by namespace (e.g. `editor`, `editor_recordrtc`). */
export interface ConfigStore {
  get(namespace: string, key: string): string | null;
}

export interface ConfigWriter {
  set(namespace: string, key: string, value: string): void;
}
