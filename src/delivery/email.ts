/**
 * EconDigest — Email Delivery
 *
 * Sends the digest via email using configurable providers.
 * Supports Resend, SendGrid, or a console provider for local runs.
 */

import { logger, errorMessage } from '../lib/logger';
import type { CanonicalRecord, Digest } from '../types';
import {
  DEFAULT_RENDER_OPTIONS,
  RELEVANCE_TIERS,
  entriesInTier,
  excerpt,
  formatCompactDate,
  formatLongDate,
  formatShortDate,
  truncate,
  windowLabel,
  type RenderOptions,
} from './markdown';

// ============================================================
// TYPES
// ============================================================

export type EmailProvider = 'resend' | 'sendgrid' | 'console' | 'none';

export interface EmailConfig {
  provider: EmailProvider;
  /** Sender identity */
  from: string;
  replyTo?: string;
  // Sender secret, per provider
  resendApiKey?: string;
  sendgridApiKey?: string;
}

export interface EmailMessage {
  to: string[];
  subject: string;
  text: string;
  html?: string;
  attachments?: EmailAttachment[];
}

export interface EmailAttachment {
  filename: string;
  content: string;
  contentType: string;
}

export interface EmailResult {
  success: boolean;
  messageId?: string;
  error?: string;
  recipients: string[];
  sentAt: string;
}

const log = logger.child({ module: 'email' });

// ============================================================
// EMAIL PROVIDERS
// ============================================================

async function sendViaResend(
  config: EmailConfig,
  message: EmailMessage
): Promise<EmailResult> {
  if (!config.resendApiKey) {
    throw new Error('RESEND_API_KEY not configured');
  }

  const res = await fetch('https://api.resend.com/emails', {
    method: 'POST',
    headers: {
      'Authorization': `Bearer ${config.resendApiKey}`,
      'Content-Type': 'application/json',
    },
    body: JSON.stringify({
      from: config.from,
      to: message.to,
      subject: message.subject,
      text: message.text,
      html: message.html,
      reply_to: config.replyTo,
      attachments: message.attachments?.map(a => ({
        filename: a.filename,
        content: Buffer.from(a.content).toString('base64'),
      })),
    }),
  });

  if (!res.ok) {
    const error = await res.text();
    throw new Error(`Resend API error: ${res.status} - ${error}`);
  }

  const data = (await res.json()) as { id?: string };

  return {
    success: true,
    messageId: data.id,
    recipients: message.to,
    sentAt: new Date().toISOString(),
  };
}

async function sendViaSendGrid(
  config: EmailConfig,
  message: EmailMessage
): Promise<EmailResult> {
  if (!config.sendgridApiKey) {
    throw new Error('SENDGRID_API_KEY not configured');
  }

  const res = await fetch('https://api.sendgrid.com/v3/mail/send', {
    method: 'POST',
    headers: {
      'Authorization': `Bearer ${config.sendgridApiKey}`,
      'Content-Type': 'application/json',
    },
    body: JSON.stringify({
      personalizations: [{
        to: message.to.map(email => ({ email })),
      }],
      from: { email: config.from },
      reply_to: config.replyTo ? { email: config.replyTo } : undefined,
      subject: message.subject,
      content: [
        { type: 'text/plain', value: message.text },
        ...(message.html ? [{ type: 'text/html', value: message.html }] : []),
      ],
      attachments: message.attachments?.map(a => ({
        filename: a.filename,
        content: Buffer.from(a.content).toString('base64'),
        type: a.contentType,
      })),
    }),
  });

  if (!res.ok) {
    const error = await res.text();
    throw new Error(`SendGrid API error: ${res.status} - ${error}`);
  }

  return {
    success: true,
    messageId: res.headers.get('x-message-id') ?? undefined,
    recipients: message.to,
    sentAt: new Date().toISOString(),
  };
}

async function sendViaConsole(
  _config: EmailConfig,
  message: EmailMessage
): Promise<EmailResult> {
  console.log('='.repeat(60));
  console.log('EMAIL (Console Provider)');
  console.log('='.repeat(60));
  console.log(`To: ${message.to.join(', ') || '(no recipients)'}`);
  console.log(`Subject: ${message.subject}`);
  console.log('-'.repeat(40));
  console.log(message.text);
  console.log('='.repeat(60));

  return {
    success: true,
    messageId: `console-${Date.now()}`,
    recipients: message.to,
    sentAt: new Date().toISOString(),
  };
}

// ============================================================
// SEND FUNCTION
// ============================================================

/**
 * Send an email message. Failures come back as a result, never thrown.
 */
export async function sendEmail(
  message: EmailMessage,
  config: EmailConfig
): Promise<EmailResult> {
  log.info('Sending email', {
    provider: config.provider,
    recipients: message.to.length,
    subject: message.subject,
  });

  try {
    let result: EmailResult;

    switch (config.provider) {
      case 'resend':
        result = await sendViaResend(config, message);
        break;
      case 'sendgrid':
        result = await sendViaSendGrid(config, message);
        break;
      case 'console':
        result = await sendViaConsole(config, message);
        break;
      case 'none':
        throw new Error('Email delivery is disabled (EMAIL_PROVIDER=none)');
      default:
        throw new Error(`Unknown email provider: ${String(config.provider)}`);
    }

    log.info('Email sent successfully', {
      messageId: result.messageId,
      recipients: result.recipients.length,
    });

    return result;
  } catch (error) {
    const errorMsg = errorMessage(error);
    log.error('Email send failed', { error: errorMsg });

    return {
      success: false,
      error: errorMsg,
      recipients: message.to,
      sentAt: new Date().toISOString(),
    };
  }
}

// ============================================================
// DIGEST EMAIL BUILDER
// ============================================================

export function digestSubject(digest: Digest): string {
  const count = digest.entries.length;
  const high = entriesInTier(digest.entries, RELEVANCE_TIERS[0]).length;
  return (
    `[Econ Digest] Week of ${formatLongDate(digest.generatedAt)}: ` +
    `${count} relevant paper${count === 1 ? '' : 's'}` +
    (high > 0 ? ` (${high} high priority)` : '')
  );
}

/**
 * Build the digest email: markdown as plain text, HTML body,
 * markdown attached.
 */
export function buildDigestEmail(
  digest: Digest,
  markdown: string,
  recipients: string[],
  options: RenderOptions = {}
): EmailMessage {
  return {
    to: recipients,
    subject: digestSubject(digest),
    text: markdown,
    html: renderDigestHtml(digest, options),
    attachments: [
      {
        filename: `econ_digest_${formatCompactDate(digest.generatedAt)}.md`,
        content: markdown,
        contentType: 'text/markdown',
      },
    ],
  };
}

// ============================================================
// HTML TEMPLATE
// ============================================================

const EMAIL_STYLES = `
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, 'Helvetica Neue', Arial, sans-serif; line-height: 1.6; color: #333; max-width: 700px; margin: 0 auto; padding: 20px; }
  .header { background: #1e3a5f; color: white; padding: 30px; border-radius: 8px 8px 0 0; }
  .header h1 { margin: 0; font-size: 24px; }
  .header .subtitle { opacity: 0.9; margin-top: 5px; }
  .content { background: #fff; border: 1px solid #e1e5eb; border-top: none; padding: 30px; border-radius: 0 0 8px 8px; }
  .badge { display: inline-block; padding: 2px 10px; border-radius: 20px; font-size: 12px; font-weight: 600; background: #e0e7ff; color: #4338ca; }
  .stat-grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(120px, 1fr)); gap: 15px; margin: 20px 0; }
  .stat-card { background: #f8fafc; border-radius: 8px; padding: 15px; text-align: center; }
  .stat-value { font-size: 28px; font-weight: 700; color: #1e293b; }
  .stat-label { font-size: 12px; color: #64748b; text-transform: uppercase; }
  .paper { background: #f8fafc; border-left: 4px solid #1e3a5f; padding: 15px; margin: 15px 0; border-radius: 0 8px 8px 0; }
  .paper h3 { margin: 0 0 6px 0; font-size: 16px; }
  .paper h3 a { color: #1e293b; }
  .paper .meta { font-size: 13px; color: #64748b; }
  .paper p { margin: 8px 0 0 0; color: #475569; }
  .alert-box { padding: 15px 20px; border-radius: 8px; margin: 20px 0; background: #fffbeb; border: 1px solid #fde68a; }
  .footer { text-align: center; padding: 20px; color: #64748b; font-size: 12px; }
`;

function renderPaperHtml(entry: CanonicalRecord): string {
  const meta = [escapeHtml(entry.sourceLabel)];
  if (entry.authors) meta.push(escapeHtml(truncate(entry.authors, 60)));
  meta.push(entry.publishedAt ? formatShortDate(entry.publishedAt) : 'Recent');

  return `
    <div class="paper">
      <h3><a href="${escapeHtml(entry.link)}">${escapeHtml(entry.title)}</a></h3>
      <div class="meta">${meta.join(' | ')}</div>
      ${entry.summary ? `<p>${escapeHtml(excerpt(entry.summary, 300))}</p>` : ''}
      <p>${entry.matchedKeywords.slice(0, 5).map(k => `<span class="badge">${escapeHtml(k)}</span>`).join(' ')}</p>
    </div>`;
}

/**
 * Render digest as HTML email.
 */
export function renderDigestHtml(digest: Digest, options: RenderOptions = {}): string {
  const { maxPerTier } = { ...DEFAULT_RENDER_OPTIONS, ...options };
  const highCount = entriesInTier(digest.entries, RELEVANCE_TIERS[0]).length;

  const tiersHtml = RELEVANCE_TIERS.map(tier => {
    const tierEntries = entriesInTier(digest.entries, tier);
    if (tierEntries.length === 0) return '';
    const more = tierEntries.length - maxPerTier;
    return `
    <h2>${tier.heading}</h2>
    ${tierEntries.slice(0, maxPerTier).map(renderPaperHtml).join('')}
    ${more > 0 ? `<p style="text-align: center; color: #64748b;">+ ${more} more in this tier</p>` : ''}`;
  }).join('');

  const failuresHtml = digest.failures.length > 0 ? `
    <div class="alert-box">
      <strong>Sources unavailable this run:</strong>
      <ul style="margin: 10px 0 0 0; padding-left: 20px;">
        ${digest.failures.map(f => `<li>${escapeHtml(f.sourceLabel)}: ${escapeHtml(f.error)}</li>`).join('')}
      </ul>
    </div>` : '';

  return `
<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Economics Research Digest</title>
  <style>${EMAIL_STYLES}</style>
</head>
<body>
  <div class="header">
    <h1>Economics Research Digest</h1>
    <div class="subtitle">Week of ${formatLongDate(digest.generatedAt)} | ${windowLabel(digest.windowDays)}</div>
  </div>

  <div class="content">
    <div class="stat-grid">
      <div class="stat-card">
        <div class="stat-value">${digest.totalConsidered}</div>
        <div class="stat-label">Scanned</div>
      </div>
      <div class="stat-card">
        <div class="stat-value">${digest.entries.length}</div>
        <div class="stat-label">Relevant</div>
      </div>
      <div class="stat-card">
        <div class="stat-value" style="color: #dc2626;">${highCount}</div>
        <div class="stat-label">High Priority</div>
      </div>
    </div>
    ${failuresHtml}
    ${digest.entries.length === 0 ? '<p><em>No relevant papers found this period.</em></p>' : tiersHtml}
  </div>

  <div class="footer">
    <p>Generated ${digest.generatedAt.toISOString()} from ${digest.sourcesChecked} sources</p>
  </div>
</body>
</html>
`;
}

/**
 * Escape HTML special characters.
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}
