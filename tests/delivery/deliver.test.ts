/**
 * Tests for Digest Delivery
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { deliverDigest, defaultOutputPath, digestFileName } from '../../src/delivery';
import { renderDigestMarkdown } from '../../src/delivery/markdown';
import { buildDigest } from '../../src/matching/ranker';
import type { Digest } from '../../src/types';

const digest: Digest = buildDigest({
  generatedAt: new Date('2026-10-12T08:00:00Z'),
  records: [],
  totalConsidered: 0,
  totalMatched: 0,
  sourcesChecked: 1,
  windowDays: 7,
});

describe('Digest Delivery', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'econ-digest-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should name digest files by date', () => {
    expect(digestFileName(digest.generatedAt)).toBe('econ_digest_20261012.md');
    expect(defaultOutputPath('out', digest.generatedAt)).toBe(join('out', 'econ_digest_20261012.md'));
  });

  it('should write the markdown file, creating directories', async () => {
    const outputPath = join(dir, 'nested', 'digest.md');

    const report = await deliverDigest(digest, {
      email: { provider: 'none', from: 'digest@example.org' },
      recipients: [],
      outputPath,
    });

    expect(report.filePath).toBe(outputPath);
    expect(report.email).toBeUndefined();
    expect(readFileSync(outputPath, 'utf-8')).toBe(renderDigestMarkdown(digest));
  });

  it('should skip the file when no path is given', async () => {
    const report = await deliverDigest(digest, {
      email: { provider: 'none', from: 'digest@example.org' },
      recipients: [],
    });

    expect(report.filePath).toBeUndefined();
    expect(report.fileError).toBeUndefined();
    expect(report.markdown).toBe(renderDigestMarkdown(digest));
  });

  it('should report a write failure and still send the email', async () => {
    // A regular file where a directory is needed
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, 'x');

    const report = await deliverDigest(digest, {
      email: { provider: 'console', from: 'digest@example.org' },
      recipients: ['team@example.org'],
      outputPath: join(blocker, 'digest.md'),
    });

    expect(report.filePath).toBeUndefined();
    expect(report.fileError).toBeDefined();
    expect(report.email?.success).toBe(true);
    expect(report.email?.recipients).toEqual(['team@example.org']);
  });
});
