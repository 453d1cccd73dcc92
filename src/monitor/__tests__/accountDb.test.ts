import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Db } from '../../db/db.js';
import {
  addAccount,
  clearAccountFailures,
  getAccount,
  listAccounts,
  listStarvedAccounts,
  normalizeUsername,
  recordAccountFailure,
  removeAccount,
  updateAccountInfo,
} from '../accountDb.js';
import { ValidationError } from '../../shared/errors.js';
import { createTestDb } from './helpers.js';

let db: Db;

beforeEach(() => {
  db = createTestDb();
});

afterEach(() => {
  db.close();
});

describe('normalizeUsername', () => {
  it('strips @ and whitespace and lower-cases', () => {
    expect(normalizeUsername('  @Jack_Dorsey ')).toBe('jack_dorsey');
  });

  it('rejects characters X does not allow', () => {
    expect(() => normalizeUsername('bad name')).toThrow(ValidationError);
    expect(() => normalizeUsername('@')).toThrow(ValidationError);
  });

  it('rejects handles longer than 15 characters', () => {
    expect(() => normalizeUsername('a'.repeat(16))).toThrow(ValidationError);
    expect(normalizeUsername('a'.repeat(15))).toBe('a'.repeat(15));
  });
});

describe('addAccount', () => {
  it('inserts once and reports whether it created the row', () => {
    const first = addAccount(db, { username: '@Alice' });
    expect(first.created).toBe(true);
    expect(first.account.username).toBe('alice');
    expect(first.account.user_id).toBeNull();
    expect(first.account.consecutive_failures).toBe(0);

    const second = addAccount(db, { username: 'alice', user_id: '99' });
    expect(second.created).toBe(false);
    expect(second.account.user_id).toBeNull();
  });

  it('lists accounts in registration order', () => {
    addAccount(db, { username: 'zed' });
    addAccount(db, { username: 'amy' });
    addAccount(db, { username: 'bob' });
    expect(listAccounts(db).map((a) => a.username)).toEqual(['zed', 'amy', 'bob']);
  });
});

describe('removeAccount', () => {
  it('returns false for unknown accounts', () => {
    addAccount(db, { username: 'alice' });
    expect(removeAccount(db, 'alice')).toBe(true);
    expect(removeAccount(db, 'alice')).toBe(false);
    expect(getAccount(db, 'alice')).toBeUndefined();
  });
});

describe('updateAccountInfo', () => {
  it('caches the first user id and never replaces it', () => {
    addAccount(db, { username: 'alice' });
    updateAccountInfo(db, 'alice', { user_id: '111', display_name: 'Alice' });
    updateAccountInfo(db, 'alice', { user_id: '222', display_name: null, description: 'bio' });

    const account = getAccount(db, 'alice');
    expect(account?.user_id).toBe('111');
    expect(account?.display_name).toBe('Alice');
    expect(account?.description).toBe('bio');
  });
});

describe('failure streaks', () => {
  it('counts consecutive failures and resets on success', () => {
    addAccount(db, { username: 'alice' });
    addAccount(db, { username: 'bob' });

    expect(recordAccountFailure(db, 'alice', new Date('2025-03-01T00:00:00Z'))).toBe(1);
    expect(recordAccountFailure(db, 'alice', new Date('2025-03-02T00:00:00Z'))).toBe(2);
    expect(getAccount(db, 'alice')?.last_failure_at).toBe('2025-03-02T00:00:00.000Z');
    expect(listStarvedAccounts(db, 2).map((a) => a.username)).toEqual(['alice']);

    clearAccountFailures(db, 'alice');
    expect(getAccount(db, 'alice')?.consecutive_failures).toBe(0);
    expect(listStarvedAccounts(db, 2)).toEqual([]);
  });

  it('returns 0 for an account that no longer exists', () => {
    expect(recordAccountFailure(db, 'ghost')).toBe(0);
  });
});
