/**
 * Email delivery: renders the daily report to MJML HTML and sends it via nodemailer.
 * Only used when config.delivery.email.enabled = true.
 */

import nodemailer from 'nodemailer';
import mjml2html from 'mjml';
import type { Config } from '../shared/config.js';
import type { Post } from '../monitor/model.js';
import type { ReportContent } from '../report/markdown.js';
import type { Notifier } from './notifier.js';
import { postKind } from '../monitor/model.js';
import { NotifyError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type EmailConfig = Config['delivery']['email'];

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function renderPostRow(post: Post): string {
  const kind = postKind(post);
  return `
    <mj-section padding="8px 24px 0">
      <mj-column>
        <mj-text padding="0 0 4px" font-size="13px" font-weight="bold">
          <a href="${escapeHtml(post.url)}" style="color:#1a1a1a;text-decoration:none;">
            @${escapeHtml(post.author_username)}${kind === 'original' ? '' : ` · ${kind}`}
          </a>
        </mj-text>
        <mj-text padding="0 0 4px" font-size="13px" color="#444444" line-height="1.6">
          ${escapeHtml(post.content)}
        </mj-text>
        <mj-text padding="0 0 8px" font-size="12px" color="#888888">
          ${post.likes} likes &nbsp;·&nbsp; ${post.reposts} reposts &nbsp;·&nbsp; ${post.replies} replies
        </mj-text>
        <mj-divider border-color="#eeeeee" border-width="1px" padding="0" />
      </mj-column>
    </mj-section>`;
}

export function buildMjml(content: ReportContent): string {
  const { summary } = content;
  const insights = summary.key_insights
    .map((i) => `<li>${escapeHtml(i)}</li>`)
    .join('');

  return `
<mjml>
  <mj-head>
    <mj-title>Daily X Report ${summary.date}</mj-title>
    <mj-attributes>
      <mj-all font-family="-apple-system, BlinkMacSystemFont, 'Segoe UI', sans-serif" />
      <mj-text color="#1a1a1a" font-size="14px" line-height="1.6" />
    </mj-attributes>
  </mj-head>
  <mj-body background-color="#ffffff">
    <mj-section background-color="#1a1a1a" padding="20px 24px">
      <mj-column>
        <mj-text color="#ffffff" font-size="22px" font-weight="bold">Daily X Report</mj-text>
        <mj-text color="#aaaaaa" font-size="13px" padding-top="4px">
          ${summary.date} · ${summary.accounts_monitored} accounts · ${summary.total_posts} posts
        </mj-text>
      </mj-column>
    </mj-section>

    <mj-section padding="16px 24px 0">
      <mj-column>
        <mj-text font-size="18px" font-weight="bold">Summary</mj-text>
        <mj-text>${escapeHtml(summary.summary_text)}</mj-text>
        ${insights ? `<mj-text><ul>${insights}</ul></mj-text>` : ''}
        ${summary.analysis ? `<mj-text color="#444444">${escapeHtml(summary.analysis)}</mj-text>` : ''}
      </mj-column>
    </mj-section>

    ${content.topPosts.map(renderPostRow).join('\n')}

    <mj-section background-color="#f8f9fa" padding="16px 24px">
      <mj-column>
        <mj-text font-size="11px" color="#aaaaaa" align="center">
          ${
            content.starved.length > 0
              ? `Not ingested for several cycles: ${content.starved.map((u) => `@${escapeHtml(u)}`).join(', ')}<br/>`
              : ''
          }
          Generated automatically by postwatch.
        </mj-text>
      </mj-column>
    </mj-section>
  </mj-body>
</mjml>`;
}

function createTransport(emailConfig: EmailConfig) {
  return nodemailer.createTransport({
    host: emailConfig.smtp_host,
    port: emailConfig.smtp_port,
    secure: emailConfig.smtp_port === 465,
    auth: {
      user: emailConfig.smtp_user,
      pass: emailConfig.smtp_pass,
    },
  });
}

export class EmailNotifier implements Notifier {
  readonly name = 'email';

  constructor(private readonly emailConfig: EmailConfig) {}

  async send(content: ReportContent): Promise<void> {
    if (this.emailConfig.to.length === 0) {
      throw new NotifyError('No email recipients configured (delivery.email.to)');
    }

    const { html, errors } = mjml2html(buildMjml(content), { validationLevel: 'soft' });
    if (errors.length > 0) {
      logger.warn({ errors }, 'MJML compilation warnings');
    }

    try {
      await createTransport(this.emailConfig).sendMail({
        from: this.emailConfig.from,
        to: this.emailConfig.to.join(', '),
        subject: `Daily X Report ${content.summary.date} · ${content.summary.total_posts} posts`,
        html,
      });
    } catch (err) {
      throw new NotifyError(`Email delivery failed: ${errorMessage(err)}`);
    }

    logger.info({ to: this.emailConfig.to, date: content.summary.date }, 'Report email sent');
  }
}

/**
 * Verify SMTP connection without sending.
 */
export async function verifySmtp(emailConfig: EmailConfig): Promise<boolean> {
  try {
    await createTransport(emailConfig).verify();
    return true;
  } catch (err) {
    logger.debug({ error: errorMessage(err) }, 'SMTP verify failed');
    return false;
  }
}
