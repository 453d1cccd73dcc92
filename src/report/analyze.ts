import type { Post } from '../monitor/model.js';
import type { ChatClient } from '../llm/client.js';
import type { DailySummary } from './summaryDb.js';
import { buildReportMessages, groupPostsByAuthor, REPORT_SYSTEM_PROMPT } from '../llm/prompts.js';
import { parseWithRetry, ReportOutputSchema } from '../llm/parse.js';
import { PostwatchError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type SummaryDraft = Omit<DailySummary, 'generated_at'>;

export interface AnalyzeInput {
  date: string;
  posts: Post[];
  accountsMonitored: number;
  maxPostsPerAccount: number;
}

export const NO_POSTS_SUMMARY = 'No new posts from monitored accounts in this period.';

/**
 * Summarize a window of posts. An empty window never reaches the model, and
 * a model failure yields a summary that says so instead of throwing.
 */
export async function analyzePosts(client: ChatClient, input: AnalyzeInput): Promise<SummaryDraft> {
  const base = {
    date: input.date,
    accounts_monitored: input.accountsMonitored,
    total_posts: input.posts.length,
  };

  if (input.posts.length === 0) {
    return { ...base, summary_text: NO_POSTS_SUMMARY, analysis: '', key_insights: [] };
  }

  const groups = groupPostsByAuthor(input.posts, input.maxPostsPerAccount);

  try {
    const response = await client.chat(
      buildReportMessages({ date: input.date, groups, totalPosts: input.posts.length }),
    );
    const output = await parseWithRetry(
      ReportOutputSchema,
      response.content,
      client,
      REPORT_SYSTEM_PROMPT,
    );
    logger.info(
      { date: input.date, posts: input.posts.length, authors: groups.length, tokens: response.token_count },
      'Report analysis complete',
    );
    return {
      ...base,
      summary_text: output.summary,
      analysis: output.analysis,
      key_insights: output.key_insights,
    };
  } catch (err) {
    if (!(err instanceof PostwatchError)) throw err;
    logger.error({ date: input.date, error: err.message, code: err.code }, 'Report analysis failed');
    return {
      ...base,
      summary_text: `Analysis failed: ${err.message}`,
      analysis: '',
      key_insights: [],
    };
  }
}
