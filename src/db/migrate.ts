import fs from 'node:fs';
import path from 'node:path';
import type { Db } from './db.js';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export function getMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

function ensureMigrationsTable(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

function getAppliedMigrations(db: Db): Set<string> {
  const rows = db.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>;
  return new Set(rows.map((r) => r.name));
}

function listMigrationFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`);
  }
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
}

export function runMigrations(
  db: Db,
  dir: string = getMigrationsDir(),
): { applied: string[]; skipped: string[] } {
  ensureMigrationsTable(db);

  const alreadyApplied = getAppliedMigrations(db);
  const pending = listMigrationFiles(dir).filter((f) => !alreadyApplied.has(f));

  const applied: string[] = [];
  const skipped = [...alreadyApplied];

  for (const migration of pending) {
    const sql = fs.readFileSync(path.join(dir, migration), 'utf-8');

    const runInTransaction = db.transaction(() => {
      db.exec(sql);
      db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration);
    });

    try {
      runInTransaction();
      applied.push(migration);
      logger.info({ migration }, 'Migration applied');
    } catch (err) {
      throw new DbError(`Migration failed: ${migration}`, {
        migration,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }

  return { applied, skipped };
}
