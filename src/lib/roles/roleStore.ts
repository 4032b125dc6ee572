/**
 * Role Store
 *
 * SQLite-backed persistence for roles. Roles are created by administrators or
 * from templates; deleting them is left to the surrounding application.
 */

import type Database from 'better-sqlite3';
import { getDatabase } from '../core/db.js';
import { BackingStoreUnavailableError, RoleAlreadyExistsError } from '../core/errors.js';

export interface Role {
  id: number;
  name: string;
  description: string;
}

export interface RoleStore {
  create(name: string, description: string): Promise<Role>;
  get(id: number): Promise<Role | null>;
  /** Case-insensitive name lookup */
  getByName(name: string): Promise<Role | null>;
  /** All roles ordered by name */
  list(): Promise<Role[]>;
}

export class SqliteRoleStore implements RoleStore {
  async create(name: string, description: string): Promise<Role> {
    const existing = await this.getByName(name);
    if (existing) {
      throw new RoleAlreadyExistsError(name);
    }

    const id = this.run('create', (db) => {
      const result = db
        .prepare('INSERT INTO roles (name, description, created_at) VALUES (?, ?, ?)')
        .run(name, description, new Date().toISOString());
      return Number(result.lastInsertRowid);
    });

    return { id, name, description };
  }

  async get(id: number): Promise<Role | null> {
    const row = this.run('get', (db) =>
      db.prepare('SELECT * FROM roles WHERE id = ?').get(id) as RoleRow | undefined
    );
    return row ? this.rowToRole(row) : null;
  }

  async getByName(name: string): Promise<Role | null> {
    const row = this.run('getByName', (db) =>
      db
        .prepare('SELECT * FROM roles WHERE name = ? COLLATE NOCASE ORDER BY id LIMIT 1')
        .get(name) as RoleRow | undefined
    );
    return row ? this.rowToRole(row) : null;
  }

  async list(): Promise<Role[]> {
    const rows = this.run('list', (db) =>
      db.prepare('SELECT * FROM roles ORDER BY name ASC').all() as RoleRow[]
    );
    return rows.map((row) => this.rowToRole(row));
  }

  private run<T>(operation: string, fn: (db: Database.Database) => T): T {
    try {
      return fn(getDatabase());
    } catch (error) {
      throw new BackingStoreUnavailableError(`roles.${operation}`, error);
    }
  }

  private rowToRole(row: RoleRow): Role {
    return {
      id: row.id,
      name: row.name,
      description: row.description || '',
    };
  }
}

interface RoleRow {
  id: number;
  name: string;
  description: string | null;
  created_at: string;
}
