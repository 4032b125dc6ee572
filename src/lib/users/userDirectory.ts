/**
 * User Directory
 *
 * Resolves a user id to the user's role. User records are owned by the
 * surrounding application; this service only reads them.
 */

import { getDatabase } from '../core/db.js';
import { BackingStoreUnavailableError, NotFoundError } from '../core/errors.js';

export interface DirectoryUser {
  id: number;
  username: string;
  roleId: number | null;
}

export interface UserDirectory {
  /** Rejects with NotFoundError for unknown users */
  lookupUser(userId: number): Promise<DirectoryUser>;
}

export class SqliteUserDirectory implements UserDirectory {
  async lookupUser(userId: number): Promise<DirectoryUser> {
    let row: UserRow | undefined;
    try {
      row = getDatabase()
        .prepare('SELECT id, username, role_id FROM users WHERE id = ?')
        .get(userId) as UserRow | undefined;
    } catch (error) {
      throw new BackingStoreUnavailableError('users.lookupUser', error);
    }

    if (!row) {
      throw new NotFoundError('user', userId);
    }

    return {
      id: row.id,
      username: row.username,
      roleId: row.role_id ?? null,
    };
  }
}

interface UserRow {
  id: number;
  username: string;
  role_id: number | null;
}
