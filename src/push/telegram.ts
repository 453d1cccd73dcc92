import type { Config } from '../shared/config.js';
import type { ReportContent } from '../report/markdown.js';
import type { Notifier } from './notifier.js';
import { NotifyError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type TelegramConfig = Config['delivery']['telegram'];

/** Bot API limit is 4096; leave room for the continuation header. */
export const TELEGRAM_MAX_LENGTH = 4000;
const CONT_HEADER_RESERVE = 16;

function hardSplit(line: string, limit: number): string[] {
  const pieces: string[] = [];
  for (let i = 0; i < line.length; i += limit) pieces.push(line.slice(i, i + limit));
  return pieces;
}

/**
 * Split on line boundaries into chunks no longer than `maxLength`. Every chunk
 * after the first starts with a `(cont i/n)` line. Lines longer than a chunk
 * are cut.
 */
export function splitMessage(text: string, maxLength = TELEGRAM_MAX_LENGTH): string[] {
  if (text.length <= maxLength) return [text];

  const limit = maxLength - CONT_HEADER_RESERVE;
  const chunks: string[] = [];
  let current = '';
  for (const line of text.split('\n')) {
    const pieces = line.length > limit ? hardSplit(line, limit) : [line];
    for (const piece of pieces) {
      const candidate = current ? `${current}\n${piece}` : piece;
      if (candidate.length > limit && current) {
        chunks.push(current);
        current = piece;
      } else {
        current = candidate;
      }
    }
  }
  if (current) chunks.push(current);

  return chunks.map((chunk, i) => (i === 0 ? chunk : `(cont ${i + 1}/${chunks.length})\n${chunk}`));
}

export function renderReportText(content: ReportContent): string {
  const { summary } = content;
  const lines = [
    `Daily X Report ${summary.date}`,
    `${summary.accounts_monitored} accounts · ${summary.total_posts} posts`,
    '',
    summary.summary_text,
  ];

  if (summary.key_insights.length > 0) {
    lines.push('', 'Key insights:');
    for (const insight of summary.key_insights) lines.push(`• ${insight}`);
  }
  if (summary.analysis) lines.push('', summary.analysis);

  if (content.topPosts.length > 0) {
    lines.push('', 'Top posts:');
    for (const post of content.topPosts) {
      lines.push(`• @${post.author_username}: ${post.content.replace(/\s+/g, ' ').trim()}`, `  ${post.url}`);
    }
  }

  if (content.starved.length > 0) {
    lines.push('', `Not ingested for several cycles: ${content.starved.map((u) => `@${u}`).join(', ')}`);
  }
  return lines.join('\n');
}

export class TelegramNotifier implements Notifier {
  readonly name = 'telegram';

  constructor(private readonly telegramConfig: TelegramConfig) {}

  async send(content: ReportContent): Promise<void> {
    const { bot_token: token, chat_id: chatId, api_base_url: baseUrl } = this.telegramConfig;
    if (!token || !chatId) {
      throw new NotifyError('Telegram bot_token and chat_id must be configured');
    }

    const chunks = splitMessage(renderReportText(content));
    const url = `${baseUrl.replace(/\/+$/, '')}/bot${token}/sendMessage`;

    for (const text of chunks) {
      let response: Response;
      try {
        response = await fetch(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ chat_id: chatId, text, disable_web_page_preview: true }),
        });
      } catch (err) {
        throw new NotifyError(`Telegram request failed: ${errorMessage(err)}`);
      }

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        throw new NotifyError(`Telegram API error: ${response.status}`, {
          status: response.status,
          body: body.slice(0, 300),
        });
      }
    }

    logger.info({ chatId, messages: chunks.length, date: content.summary.date }, 'Report sent to Telegram');
  }
}
