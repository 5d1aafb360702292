import type Database from 'better-sqlite3';
import type { Context, ContextLevel, ContextResolver } from '@lectern/types';
import { isContextLevel } from '../editor/context-levels.js';

interface ContextRow {
  id: number;
  level: string;
  instanceId: number;
  parentId: number | null;
}

const SELECT_COLUMNS = 'id, level, instance_id as instanceId, parent_id as parentId';

function toContext(row: ContextRow | undefined): Context | null {
  if (!row || !isContextLevel(row.level)) return null;
  return { id: row.id, level: row.level, instanceId: row.instanceId, parentId: row.parentId };
}

export class ContextsRepository implements ContextResolver {
  constructor(private db: Database.Database) {}

  resolve(level: ContextLevel, instanceId: number): Context | null {
    const stmt = this.db.prepare<[string, number], ContextRow>(
      `SELECT ${SELECT_COLUMNS} FROM contexts WHERE level = ? AND instance_id = ?`,
    );
    return toContext(stmt.get(level, instanceId));
  }

  get(id: number): Context | null {
    const stmt = this.db.prepare<[number], ContextRow>(`SELECT ${SELECT_COLUMNS} FROM contexts WHERE id = ?`);
    return toContext(stmt.get(id));
  }

  /** The context itself followed by its parents, nearest first, ending at the system context. */
  ancestry(context: Context): Context[] {
    const chain: Context[] = [context];
    const seen = new Set<number>([context.id]);
    let parentId = context.parentId;
    while (parentId !== null && !seen.has(parentId)) {
      const parent = this.get(parentId);
      if (!parent) break;
      chain.push(parent);
      seen.add(parent.id);
      parentId = parent.parentId;
    }
    return chain;
  }

  create(level: ContextLevel, instanceId: number, parentId: number | null): Context {
    const result = this.db
      .prepare('INSERT INTO contexts (level, instance_id, parent_id) VALUES (?, ?, ?)')
      .run(level, instanceId, parentId);
    return { id: Number(result.lastInsertRowid), level, instanceId, parentId };
  }
}
