/**
 * EconDigest — Delivery Module
 *
 * Writes the rendered digest to disk and emails it.
 * Delivery problems are reported, never thrown: the Digest
 * is already complete by the time it gets here.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { Digest } from '../types';
import { logger, errorMessage } from '../lib/logger';
import { renderDigestMarkdown, formatCompactDate, type RenderOptions } from './markdown';
import { buildDigestEmail, sendEmail, type EmailConfig, type EmailResult } from './email';

export {
  renderDigestMarkdown,
  formatLongDate,
  formatShortDate,
  formatCompactDate,
  excerpt,
  truncate,
  RELEVANCE_TIERS,
  DEFAULT_RENDER_OPTIONS,
  type RenderOptions,
  type RelevanceTier,
} from './markdown';

export {
  sendEmail,
  buildDigestEmail,
  renderDigestHtml,
  digestSubject,
  escapeHtml,
  type EmailProvider,
  type EmailConfig,
  type EmailMessage,
  type EmailResult,
} from './email';

// ============================================================
// TYPES
// ============================================================

export interface DeliveryOptions {
  email: EmailConfig;
  recipients: string[];
  /** Markdown destination; omit to skip writing a file */
  outputPath?: string;
  render?: RenderOptions;
}

export interface DeliveryReport {
  markdown: string;
  filePath?: string;
  fileError?: string;
  email?: EmailResult;
}

const log = logger.child({ module: 'delivery' });

/**
 * Default markdown file name for a digest: econ_digest_YYYYMMDD.md
 */
export function digestFileName(generatedAt: Date): string {
  return `econ_digest_${formatCompactDate(generatedAt)}.md`;
}

export function defaultOutputPath(outputDir: string, generatedAt: Date): string {
  return join(outputDir, digestFileName(generatedAt));
}

async function writeDigestFile(path: string, markdown: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, markdown, 'utf-8');
}

// ============================================================
// DELIVER
// ============================================================

/**
 * Render and deliver a digest through every configured channel.
 */
export async function deliverDigest(
  digest: Digest,
  options: DeliveryOptions
): Promise<DeliveryReport> {
  const markdown = renderDigestMarkdown(digest, options.render);
  const report: DeliveryReport = { markdown };

  if (options.outputPath) {
    try {
      await writeDigestFile(options.outputPath, markdown);
      report.filePath = options.outputPath;
      log.info('Digest written', { path: options.outputPath, bytes: Buffer.byteLength(markdown) });
    } catch (error) {
      report.fileError = errorMessage(error);
      log.error('Failed to write digest file', { path: options.outputPath, error: report.fileError });
    }
  }

  if (options.email.provider !== 'none') {
    const message = buildDigestEmail(digest, markdown, options.recipients, options.render);
    report.email = await sendEmail(message, options.email);
  } else {
    log.info('Email delivery disabled');
  }

  return report;
}
