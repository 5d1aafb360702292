export type ContextLevel = 'system' | 'course' | 'module';

/** A scope under which capabilities and settings are evaluated. */
export interface Context {
  id: number;
  level: ContextLevel;
  /** Id of the course/module this context wraps; 0 for the system context. */
  instanceId: number;
  parentId: number | null;
}

/** The caller a configuration is computed for. */
export interface EditorUser {
  id: number;
}
