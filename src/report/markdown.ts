import fs from 'node:fs';
import path from 'node:path';
import type { Post } from '../monitor/model.js';
import type { DailySummary } from './summaryDb.js';
import { engagementScore, postKind } from '../monitor/model.js';
import { resolvePath } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export interface ReportContent {
  summary: DailySummary;
  /** Highest-engagement posts of the window. */
  topPosts: Post[];
  /** Accounts that have failed too many cycles in a row. */
  starved: string[];
}

export function selectTopPosts(posts: Post[], limit = 5): Post[] {
  return [...posts]
    .sort((a, b) => engagementScore(b) - engagementScore(a) || (a.created_at < b.created_at ? 1 : -1))
    .slice(0, limit);
}

function oneLine(text: string, max = 200): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max - 1)}…` : flat;
}

export function renderReportMarkdown(content: ReportContent): string {
  const { summary } = content;
  const lines: string[] = [
    `# Daily X Report ${summary.date}`,
    '',
    `> ${summary.accounts_monitored} accounts monitored · ${summary.total_posts} posts`,
    '',
    '## Summary',
    '',
    summary.summary_text,
    '',
  ];

  if (summary.key_insights.length > 0) {
    lines.push('## Key insights', '');
    for (const insight of summary.key_insights) lines.push(`- ${insight}`);
    lines.push('');
  }

  if (summary.analysis) {
    lines.push('## Analysis', '', summary.analysis, '');
  }

  if (content.topPosts.length > 0) {
    lines.push('## Top posts', '');
    for (const post of content.topPosts) {
      const kind = postKind(post);
      const tag = kind === 'original' ? '' : ` (${kind})`;
      lines.push(`- **@${post.author_username}**${tag}: ${oneLine(post.content)}`);
      lines.push(
        `  ${post.likes} likes · ${post.reposts} reposts · ${post.replies} replies · [link](${post.url})`,
      );
    }
    lines.push('');
  }

  if (content.starved.length > 0) {
    lines.push('---', '');
    lines.push(
      `Not ingested for several cycles: ${content.starved.map((u) => `@${u}`).join(', ')}`,
    );
    lines.push('');
  }

  return lines.join('\n');
}

export function reportFileName(date: string): string {
  return `report_${date}.md`;
}

/**
 * Write the markdown report into `outputDir`, replacing any report for the same day.
 */
export function writeReportFile(outputDir: string, content: ReportContent): string {
  const dir = resolvePath(outputDir);
  fs.mkdirSync(dir, { recursive: true });
  const filePath = path.join(dir, reportFileName(content.summary.date));
  fs.writeFileSync(filePath, renderReportMarkdown(content), 'utf-8');
  logger.info({ path: filePath }, 'Report written');
  return filePath;
}
