/**
 * Grant Store
 *
 * Persistence boundary for role -> permission name grants. This is the only
 * place grants are written. Every successful mutation notifies change
 * listeners with the affected role id so caches can drop that role.
 */

import type Database from 'better-sqlite3';
import { getDatabase } from '../core/db.js';
import { BackingStoreUnavailableError } from '../core/errors.js';

// ============================================================================
// Types
// ============================================================================

export interface RoleGrant {
  id: number;
  roleId: number;
  permissionName: string;
  grantedAt: string;
}

export type GrantChangeListener = (roleId: number) => void;

export interface GrantStore {
  /** Grants of a role in grant order; empty for unknown roles */
  listByRole(roleId: number): Promise<RoleGrant[]>;
  /** Idempotent. Resolves true when a new grant was written. */
  add(roleId: number, permissionName: string): Promise<boolean>;
  /** Skips names already granted. Resolves the number of grants written. */
  addMany(roleId: number, permissionNames: readonly string[]): Promise<number>;
  /** Idempotent. Resolves true when a grant was removed. */
  remove(roleId: number, permissionName: string): Promise<boolean>;
  /** Clear every grant of the role, then grant the given names */
  replaceAll(roleId: number, permissionNames: readonly string[]): Promise<number>;
  /** Subscribe to successful mutations; returns an unsubscribe function */
  onChange(listener: GrantChangeListener): () => void;
}

// ============================================================================
// Change notification
// ============================================================================

export class GrantChangeNotifier {
  private listeners = new Set<GrantChangeListener>();

  onChange(listener: GrantChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  protected notifyChange(roleId: number): void {
    for (const listener of this.listeners) {
      listener(roleId);
    }
  }
}

// ============================================================================
// SQLite Grant Store
// ============================================================================

export class SqliteGrantStore extends GrantChangeNotifier implements GrantStore {
  private now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    super();
    this.now = options.now ?? (() => new Date());
  }

  async listByRole(roleId: number): Promise<RoleGrant[]> {
    const rows = this.run('listByRole', (db) =>
      db
        .prepare(
          `
          SELECT * FROM role_grants
          WHERE role_id = ?
          ORDER BY id ASC
        `
        )
        .all(roleId) as RoleGrantRow[]
    );
    return rows.map((row) => this.rowToGrant(row));
  }

  async add(roleId: number, permissionName: string): Promise<boolean> {
    const inserted = this.run('add', (db) => {
      const result = db
        .prepare(
          'INSERT OR IGNORE INTO role_grants (role_id, permission_name, granted_at) VALUES (?, ?, ?)'
        )
        .run(roleId, permissionName, this.now().toISOString());
      return result.changes > 0;
    });
    this.notifyChange(roleId);
    return inserted;
  }

  async addMany(roleId: number, permissionNames: readonly string[]): Promise<number> {
    const written = this.run('addMany', (db) =>
      db.transaction(() => {
        const existing = new Set(
          (
            db
              .prepare('SELECT permission_name FROM role_grants WHERE role_id = ?')
              .all(roleId) as { permission_name: string }[]
          ).map((row) => row.permission_name)
        );
        const pending = unique(permissionNames).filter((name) => !existing.has(name));
        return this.insertAll(db, roleId, pending);
      })()
    );
    this.notifyChange(roleId);
    return written;
  }

  async remove(roleId: number, permissionName: string): Promise<boolean> {
    const removed = this.run('remove', (db) => {
      const result = db
        .prepare('DELETE FROM role_grants WHERE role_id = ? AND permission_name = ?')
        .run(roleId, permissionName);
      return result.changes > 0;
    });
    this.notifyChange(roleId);
    return removed;
  }

  /**
   * Delete and insert run in one transaction: a failed insert rolls the
   * delete back as well, so old and new grants never mix.
   */
  async replaceAll(roleId: number, permissionNames: readonly string[]): Promise<number> {
    const written = this.run('replaceAll', (db) =>
      db.transaction(() => {
        db.prepare('DELETE FROM role_grants WHERE role_id = ?').run(roleId);
        return this.insertAll(db, roleId, unique(permissionNames));
      })()
    );
    this.notifyChange(roleId);
    return written;
  }

  private insertAll(db: Database.Database, roleId: number, names: readonly string[]): number {
    const stmt = db.prepare(
      'INSERT OR IGNORE INTO role_grants (role_id, permission_name, granted_at) VALUES (?, ?, ?)'
    );
    const grantedAt = this.now().toISOString();
    let written = 0;
    for (const name of names) {
      written += stmt.run(roleId, name, grantedAt).changes;
    }
    return written;
  }

  private run<T>(operation: string, fn: (db: Database.Database) => T): T {
    try {
      return fn(getDatabase());
    } catch (error) {
      throw new BackingStoreUnavailableError(`grants.${operation}`, error);
    }
  }

  /**
   * Convert database row to RoleGrant
   */
  private rowToGrant(row: RoleGrantRow): RoleGrant {
    return {
      id: row.id,
      roleId: row.role_id,
      permissionName: row.permission_name,
      grantedAt: row.granted_at,
    };
  }
}

function unique(names: readonly string[]): string[] {
  return Array.from(new Set(names));
}

// ============================================================================
// Database Row Type
// ============================================================================

interface RoleGrantRow {
  id: number;
  role_id: number;
  permission_name: string;
  granted_at: string;
}
