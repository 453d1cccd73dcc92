import type { Db } from '../db/db.js';
import type { Account } from './model.js';
import { getLastPostTime } from './postDb.js';
import { hoursBefore } from '../shared/utils.js';

export interface WatermarkOptions {
  now: Date;
  /** Lookback used when nothing has been stored for the account yet. */
  bootstrapHours: number;
}

/**
 * Lower bound for the next fetch of an account: the newest stored post time,
 * or `now - bootstrapHours` when the account has never been fetched.
 */
export function resolveWatermark(db: Db, username: string, opts: WatermarkOptions): Date {
  return getLastPostTime(db, username) ?? hoursBefore(opts.now, opts.bootstrapHours);
}

export function buildSinceMap(
  db: Db,
  accounts: Account[],
  opts: WatermarkOptions,
): Map<string, Date> {
  const sinceMap = new Map<string, Date>();
  for (const account of accounts) {
    sinceMap.set(account.username, resolveWatermark(db, account.username, opts));
  }
  return sinceMap;
}
