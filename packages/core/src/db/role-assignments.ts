import type Database from 'better-sqlite3';

export class RoleAssignmentsRepository {
  constructor(private db: Database.Database) {}

  assign(userId: number, contextId: number, role: string): void {
    this.db
      .prepare(
        `INSERT OR IGNORE INTO role_assignments (user_id, context_id, role, assigned_at) VALUES (?, ?, ?, ?)`,
      )
      .run(userId, contextId, role, new Date().toISOString());
  }

  unassign(userId: number, contextId: number, role: string): void {
    this.db
      .prepare('DELETE FROM role_assignments WHERE user_id = ? AND context_id = ? AND role = ?')
      .run(userId, contextId, role);
  }

  /** Distinct roles the user holds in any of the given contexts. */
  rolesFor(userId: number, contextIds: number[]): string[] {
    if (contextIds.length === 0) return [];
    const placeholders = contextIds.map(() => '?').join(', ');
    const stmt = this.db.prepare<number[], { role: string }>(
      `SELECT DISTINCT role FROM role_assignments WHERE user_id = ? AND context_id IN (${placeholders}) ORDER BY role`,
    );
    return stmt.all(userId, ...contextIds).map((r) => r.role);
  }
}
