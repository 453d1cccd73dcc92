import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../migrate.js';

let db: Database.Database;

beforeEach(() => {
  db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
});

afterEach(() => {
  db.close();
});

describe('runMigrations', () => {
  it('creates the accounts, posts and summaries tables', () => {
    const { applied } = runMigrations(db);
    expect(applied).toContain('001_init.sql');

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all() as Array<{ name: string }>;

    const tableNames = tables.map((t) => t.name);
    expect(tableNames).toEqual(['_migrations', 'accounts', 'posts', 'summaries']);
  });

  it('is idempotent (second run applies nothing)', () => {
    const first = runMigrations(db);
    expect(first.applied.length).toBeGreaterThan(0);

    const second = runMigrations(db);
    expect(second.applied.length).toBe(0);
    expect(second.skipped.length).toBeGreaterThan(0);
  });

  it('defaults the failure streak to zero', () => {
    runMigrations(db);
    db.prepare("INSERT INTO accounts (username, added_at) VALUES ('jack', '2025-03-01T00:00:00.000Z')").run();
    const row = db.prepare('SELECT consecutive_failures FROM accounts').get() as {
      consecutive_failures: number;
    };
    expect(row.consecutive_failures).toBe(0);
  });

  it('rejects a second row for the same post id', () => {
    runMigrations(db);
    const insert = db.prepare(
      "INSERT INTO posts (id, author_username, content, created_at, fetched_at) VALUES (?, 'jack', 'hi', '2025-03-01T00:00:00.000Z', '2025-03-01T00:00:00.000Z')",
    );
    insert.run('100');
    expect(() => insert.run('100')).toThrow(/UNIQUE constraint failed: posts.id/);
  });

  it('records the migration name in _migrations', () => {
    runMigrations(db);

    const rows = db.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>;
    expect(rows.map((r) => r.name)).toEqual(['001_init.sql']);
  });

  it('indexes posts by author and creation time', () => {
    runMigrations(db);

    const indexes = db
      .prepare("SELECT name FROM sqlite_master WHERE type='index' AND name LIKE 'idx_%'")
      .all() as Array<{ name: string }>;

    const indexNames = indexes.map((i) => i.name).sort();
    expect(indexNames).toEqual(['idx_posts_author', 'idx_posts_created']);
  });
});
