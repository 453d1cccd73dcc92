import type { Db } from '../db/db.js';
import type { Account } from './model.js';
import { ValidationError } from '../shared/errors.js';
import { toStoredTime } from '../shared/utils.js';

const USERNAME_RE = /^[a-z0-9_]{1,15}$/;

/**
 * `@Jack ` → `jack`. Handles are compared case-insensitively upstream,
 * so the lower-cased form is the primary key.
 */
export function normalizeUsername(raw: string): string {
  const username = raw.trim().replace(/^@+/, '').trim().toLowerCase();
  if (!USERNAME_RE.test(username)) {
    throw new ValidationError(`Invalid username: ${raw}`, { username: raw });
  }
  return username;
}

export function addAccount(
  db: Db,
  opts: {
    username: string;
    user_id?: string | null;
    display_name?: string | null;
    description?: string | null;
  },
): { account: Account; created: boolean } {
  const username = normalizeUsername(opts.username);
  const result = db
    .prepare(
      `INSERT OR IGNORE INTO accounts (username, user_id, display_name, description, added_at)
       VALUES (?, ?, ?, ?, ?)`,
    )
    .run(
      username,
      opts.user_id ?? null,
      opts.display_name ?? null,
      opts.description ?? null,
      toStoredTime(new Date()),
    );

  const account = getAccount(db, username);
  if (!account) {
    throw new ValidationError(`Account vanished after insert: ${username}`);
  }
  return { account, created: result.changes > 0 };
}

export function getAccount(db: Db, username: string): Account | undefined {
  return db.prepare('SELECT * FROM accounts WHERE username = ?').get(username) as
    | Account
    | undefined;
}

/** Registration order. */
export function listAccounts(db: Db): Account[] {
  return db.prepare('SELECT * FROM accounts ORDER BY added_at ASC, rowid ASC').all() as Account[];
}

export function removeAccount(db: Db, username: string): boolean {
  const result = db.prepare('DELETE FROM accounts WHERE username = ?').run(username);
  return result.changes > 0;
}

/**
 * Backfill identity metadata. A cached user_id is never replaced; display
 * name and description take the freshest non-null value.
 */
export function updateAccountInfo(
  db: Db,
  username: string,
  info: { user_id: string; display_name?: string | null; description?: string | null },
): boolean {
  const result = db
    .prepare(
      `UPDATE accounts
       SET user_id = COALESCE(user_id, ?),
           display_name = COALESCE(?, display_name),
           description = COALESCE(?, description)
       WHERE username = ?`,
    )
    .run(info.user_id, info.display_name ?? null, info.description ?? null, username);
  return result.changes > 0;
}

/** Returns the new consecutive failure count (0 if the account is gone). */
export function recordAccountFailure(db: Db, username: string, at: Date = new Date()): number {
  db.prepare(
    `UPDATE accounts
     SET consecutive_failures = consecutive_failures + 1, last_failure_at = ?
     WHERE username = ?`,
  ).run(toStoredTime(at), username);
  return getAccount(db, username)?.consecutive_failures ?? 0;
}

export function clearAccountFailures(db: Db, username: string): void {
  db.prepare(
    'UPDATE accounts SET consecutive_failures = 0 WHERE username = ? AND consecutive_failures > 0',
  ).run(username);
}

/** Accounts whose failure streak has reached `threshold`. */
export function listStarvedAccounts(db: Db, threshold: number): Account[] {
  return db
    .prepare(
      'SELECT * FROM accounts WHERE consecutive_failures >= ? ORDER BY added_at ASC, rowid ASC',
    )
    .all(threshold) as Account[];
}
