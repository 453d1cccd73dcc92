import { z } from 'zod';
import type { Db } from '../db/db.js';
import { nowISO } from '../shared/utils.js';

export interface DailySummary {
  date: string;
  accounts_monitored: number;
  total_posts: number;
  summary_text: string;
  analysis: string;
  key_insights: string[];
  generated_at: string;
}

interface SummaryRow {
  date: string;
  accounts_monitored: number;
  total_posts: number;
  summary_text: string;
  analysis: string;
  key_insights: string;
  generated_at: string;
}

const InsightsSchema = z.array(z.string());

function rowToSummary(row: SummaryRow): DailySummary {
  let insights: string[] = [];
  try {
    const parsed = InsightsSchema.safeParse(JSON.parse(row.key_insights));
    if (parsed.success) insights = parsed.data;
  } catch {
    insights = [];
  }
  return { ...row, key_insights: insights };
}

/**
 * Insert or replace the summary for its date. Regenerating a day overwrites it.
 */
export function saveSummary(
  db: Db,
  summary: Omit<DailySummary, 'generated_at'> & { generated_at?: string },
): DailySummary {
  const generatedAt = summary.generated_at ?? nowISO();
  db.prepare(
    `INSERT INTO summaries
     (date, accounts_monitored, total_posts, summary_text, analysis, key_insights, generated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(date) DO UPDATE SET
       accounts_monitored = excluded.accounts_monitored,
       total_posts = excluded.total_posts,
       summary_text = excluded.summary_text,
       analysis = excluded.analysis,
       key_insights = excluded.key_insights,
       generated_at = excluded.generated_at`,
  ).run(
    summary.date,
    summary.accounts_monitored,
    summary.total_posts,
    summary.summary_text,
    summary.analysis,
    JSON.stringify(summary.key_insights),
    generatedAt,
  );
  return { ...summary, generated_at: generatedAt };
}

export function getSummary(db: Db, date: string): DailySummary | null {
  const row = db.prepare('SELECT * FROM summaries WHERE date = ?').get(date) as
    | SummaryRow
    | undefined;
  return row ? rowToSummary(row) : null;
}

/** The most recent `days` summaries, newest first. */
export function getRecentSummaries(db: Db, days = 7): DailySummary[] {
  const rows = db
    .prepare('SELECT * FROM summaries ORDER BY date DESC LIMIT ?')
    .all(days) as SummaryRow[];
  return rows.map(rowToSummary);
}
