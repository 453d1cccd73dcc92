import { fileURLToPath } from 'node:url';
import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';
import { nanoid } from 'nanoid';

export function generateId(size = 21): string {
  return nanoid(size);
}

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

export function nowISO(): string {
  return new Date().toISOString().replace('T', ' ').slice(0, 19);
}

export const HOUR_MS = 3600 * 1000;

export function hoursBefore(now: Date, hours: number): Date {
  return new Date(now.getTime() - hours * HOUR_MS);
}

/**
 * Canonical timestamp form used in the store: UTC, millisecond precision,
 * so that string comparison in SQL is chronological.
 */
export function toStoredTime(date: Date): string {
  return date.toISOString();
}

/** UTC calendar day, `YYYY-MM-DD`. */
export function dayKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Parse a `YYYY-MM-DD` string as midnight UTC. Returns null for anything else,
 * including impossible dates such as 2025-02-30.
 */
export function parseDayKey(value: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return null;
  const date = new Date(`${value}T00:00:00.000Z`);
  if (Number.isNaN(date.getTime()) || dayKey(date) !== value) return null;
  return date;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function getPackageRoot(): string {
  // Walk up from the current file to find the directory containing package.json.
  // Works for both vitest (src/shared/utils.ts) and the tsc build (dist/shared/utils.js).
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
}

export function getPostwatchDir(): string {
  return resolvePath('~/.postwatch');
}
