import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Db } from '../../db/db.js';
import { getRecentSummaries, getSummary, saveSummary } from '../summaryDb.js';
import { createTestDb } from '../../monitor/__tests__/helpers.js';

let db: Db;

function draft(date: string, summary_text = `summary ${date}`) {
  return {
    date,
    accounts_monitored: 2,
    total_posts: 5,
    summary_text,
    analysis: 'analysis',
    key_insights: ['one', 'two'],
  };
}

beforeEach(() => {
  db = createTestDb();
});

afterEach(() => {
  db.close();
});

describe('saveSummary', () => {
  it('stores and reads back a summary', () => {
    saveSummary(db, { ...draft('2025-03-01'), generated_at: '2025-03-01 08:00:00' });
    expect(getSummary(db, '2025-03-01')).toEqual({
      ...draft('2025-03-01'),
      generated_at: '2025-03-01 08:00:00',
    });
  });

  it('replaces the summary for the same day', () => {
    saveSummary(db, draft('2025-03-01', 'first'));
    saveSummary(db, draft('2025-03-01', 'second'));
    expect(getSummary(db, '2025-03-01')?.summary_text).toBe('second');
    expect(getRecentSummaries(db, 10)).toHaveLength(1);
  });

  it('returns null for a day without a summary', () => {
    expect(getSummary(db, '2025-01-01')).toBeNull();
  });
});

describe('getRecentSummaries', () => {
  it('returns the newest days first, limited', () => {
    for (const date of ['2025-03-01', '2025-03-03', '2025-03-02']) saveSummary(db, draft(date));
    expect(getRecentSummaries(db, 2).map((s) => s.date)).toEqual(['2025-03-03', '2025-03-02']);
  });
});
