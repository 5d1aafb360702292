import Database from 'better-sqlite3';
import { join } from 'node:path';
import { getDataDir } from '../config.js';
import { initializeSchema } from './schema.js';
import { SettingsRepository } from './settings.js';
import { ContextsRepository } from './contexts.js';
import { RoleAssignmentsRepository } from './role-assignments.js';

export class DatabaseManager {
  private db: Database.Database;
  public settings: SettingsRepository;
  public contexts: ContextsRepository;
  public roleAssignments: RoleAssignmentsRepository;

  /** Pass ':memory:' for a throwaway database. */
  constructor(dbPath: string = join(getDataDir(), 'lectern.db')) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');

    initializeSchema(this.db);

    this.settings = new SettingsRepository(this.db);
    this.contexts = new ContextsRepository(this.db);
    this.roleAssignments = new RoleAssignmentsRepository(this.db);
  }

  close(): void {
    this.db.close();
  }
}

export { SettingsRepository } from './settings.js';
export { ContextsRepository } from './contexts.js';
export { RoleAssignmentsRepository } from './role-assignments.js';
export { SYSTEM_CONTEXT_ID } from './schema.js';
