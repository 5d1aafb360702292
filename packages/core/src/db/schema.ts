import type Database from 'better-sqlite3';

export const SYSTEM_CONTEXT_ID = 1;

export function initializeSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS settings (
      id TEXT PRIMARY KEY,
      category TEXT NOT NULL,
      key TEXT NOT NULL,
      value TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      UNIQUE(category, key)
    );

    CREATE TABLE IF NOT EXISTS contexts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      level TEXT NOT NULL CHECK (level IN ('system', 'course', 'module')),
      instance_id INTEGER NOT NULL,
      parent_id INTEGER,
      FOREIGN KEY (parent_id) REFERENCES contexts(id),
      UNIQUE(level, instance_id)
    );

    -- Users are owned by the host system; only their numeric id is stored here.
    CREATE TABLE IF NOT EXISTS role_assignments (
      user_id INTEGER NOT NULL,
      context_id INTEGER NOT NULL,
      role TEXT NOT NULL,
      assigned_at TEXT NOT NULL,
      PRIMARY KEY (user_id, context_id, role),
      FOREIGN KEY (context_id) REFERENCES contexts(id)
    );

    CREATE INDEX IF NOT EXISTS idx_settings_category ON settings(category);
    CREATE INDEX IF NOT EXISTS idx_settings_composite ON settings(category, key);
    CREATE INDEX IF NOT EXISTS idx_contexts_parent ON contexts(parent_id);
    CREATE INDEX IF NOT EXISTS idx_role_assignments_context ON role_assignments(context_id);
  `);

  db.prepare(
    `INSERT OR IGNORE INTO contexts (id, level, instance_id, parent_id) VALUES (?, 'system', 0, NULL)`,
  ).run(SYSTEM_CONTEXT_ID);
}
