/**
 * EconDigest — Configuration
 *
 * Environment settings (validated with zod) plus the source and keyword
 * lists from JSON. Every problem here is a ConfigError, raised before
 * any source is fetched.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z, type ZodError } from 'zod';
import { KeywordsFileSchema, type KeywordSet } from '../types';
import { createSourceRegistry, DEFAULT_FETCHER_OPTIONS, type FetcherOptions, type SourceRegistry } from '../feeds';
import { createKeywordSet } from '../matching';
import type { EmailConfig } from '../delivery';
import type { RenderOptions } from '../delivery/markdown';
import { ConfigError } from '../lib/errors';
import { errorMessage } from '../lib/logger';

export const DEFAULT_SOURCES_FILE = fileURLToPath(new URL('../../config/sources.json', import.meta.url));
export const DEFAULT_KEYWORDS_FILE = fileURLToPath(new URL('../../config/keywords.json', import.meta.url));

const DEFAULT_SENDER = 'econ-digest@localhost';

// ============================================================
// ENVIRONMENT
// ============================================================

const EnvSchema = z.object({
  DIGEST_WINDOW_DAYS: z.coerce.number().int().positive().default(7),
  DIGEST_MIN_SCORE: z.coerce.number().int().min(1).default(1),
  DIGEST_FETCH_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(60_000).default(DEFAULT_FETCHER_OPTIONS.timeoutMs),
  DIGEST_FETCH_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(DEFAULT_FETCHER_OPTIONS.concurrency),
  DIGEST_MAX_PER_TIER: z.coerce.number().int().positive().default(10),
  DIGEST_OUTPUT_DIR: z.string().default('.'),
  DIGEST_SOURCES_FILE: z.string().optional(),
  DIGEST_KEYWORDS_FILE: z.string().optional(),
  DIGEST_USER_AGENT: z.string().default(DEFAULT_FETCHER_OPTIONS.userAgent),
  EMAIL_PROVIDER: z.enum(['console', 'resend', 'sendgrid', 'none']).default('console'),
  EMAIL_FROM: z.string().email().optional(),
  EMAIL_REPLY_TO: z.string().email().optional(),
  RESEND_API_KEY: z.string().optional(),
  SENDGRID_API_KEY: z.string().optional(),
  DIGEST_RECIPIENT: z
    .string()
    .optional()
    .transform(value => (value ? value.split(',').map(r => r.trim()).filter(Boolean) : []))
    .pipe(z.array(z.string().email('DIGEST_RECIPIENT must contain email addresses'))),
});

export type DigestEnv = z.infer<typeof EnvSchema>;

function zodIssues(error: ZodError, prefix = ''): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return `${prefix}${path ? `${path}: ` : ''}${issue.message}`;
  });
}

/**
 * Validate process environment. Empty values count as unset.
 */
export function parseEnv(env: Record<string, string | undefined>): DigestEnv {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError('Invalid environment', zodIssues(parsed.error));
  }
  return parsed.data;
}

// ============================================================
// FILES
// ============================================================

function readJson(path: string, what: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read ${what} file ${path}`, [errorMessage(error)]);
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`${what} file ${path} is not valid JSON`, [errorMessage(error)]);
  }
}

/**
 * Load the source registry from a JSON file shaped { sources: [...] }.
 */
export function loadSources(path: string = DEFAULT_SOURCES_FILE): SourceRegistry {
  const parsed = z.object({ sources: z.array(z.unknown()) }).safeParse(readJson(path, 'Sources'));
  if (!parsed.success) {
    throw new ConfigError(`Sources file ${path} is malformed`, zodIssues(parsed.error));
  }
  // Descriptors are validated one by one in the registry
  return createSourceRegistry(parsed.data.sources);
}

/**
 * Load the keyword set from a JSON file shaped { keywords: [...] }.
 */
export function loadKeywords(path: string = DEFAULT_KEYWORDS_FILE): KeywordSet {
  const parsed = KeywordsFileSchema.safeParse(readJson(path, 'Keywords'));
  if (!parsed.success) {
    throw new ConfigError(`Keywords file ${path} is malformed`, zodIssues(parsed.error));
  }
  return createKeywordSet(parsed.data.keywords);
}

// ============================================================
// APP CONFIG
// ============================================================

export interface AppConfig {
  registry: SourceRegistry;
  keywords: KeywordSet;
  windowDays: number;
  minScore: number;
  fetcher: FetcherOptions;
  render: Required<RenderOptions>;
  outputDir: string;
  email: EmailConfig;
  recipients: string[];
}

export interface ConfigOverrides {
  windowDays?: number;
  minScore?: number;
  sourcesFile?: string;
  keywordsFile?: string;
  /** Skip delivery entirely; credentials are then not required */
  dryRun?: boolean;
}

/**
 * Credentials a sending provider cannot work without.
 */
function deliveryIssues(env: DigestEnv): string[] {
  const issues: string[] = [];
  const provider = env.EMAIL_PROVIDER;

  if (provider !== 'resend' && provider !== 'sendgrid') return issues;

  if (!env.EMAIL_FROM) {
    issues.push(`EMAIL_FROM is required when EMAIL_PROVIDER=${provider}`);
  }
  if (provider === 'resend' && !env.RESEND_API_KEY) {
    issues.push('RESEND_API_KEY is required when EMAIL_PROVIDER=resend');
  }
  if (provider === 'sendgrid' && !env.SENDGRID_API_KEY) {
    issues.push('SENDGRID_API_KEY is required when EMAIL_PROVIDER=sendgrid');
  }
  if (env.DIGEST_RECIPIENT.length === 0) {
    issues.push(`DIGEST_RECIPIENT is required when EMAIL_PROVIDER=${provider}`);
  }

  return issues;
}

/**
 * Resolve the full run configuration. CLI overrides win over environment.
 */
export function loadConfig(
  env: Record<string, string | undefined>,
  overrides: ConfigOverrides = {}
): AppConfig {
  const parsed = parseEnv(env);

  if (!overrides.dryRun) {
    const issues = deliveryIssues(parsed);
    if (issues.length > 0) {
      throw new ConfigError('Missing delivery credentials', issues);
    }
  }

  const windowDays = overrides.windowDays ?? parsed.DIGEST_WINDOW_DAYS;
  const minScore = overrides.minScore ?? parsed.DIGEST_MIN_SCORE;

  if (!Number.isInteger(windowDays) || windowDays < 1) {
    throw new ConfigError(`Window must be a positive number of days, got ${windowDays}`);
  }
  if (!Number.isInteger(minScore) || minScore < 1) {
    throw new ConfigError(`Minimum score must be an integer >= 1, got ${minScore}`);
  }

  return {
    registry: loadSources(overrides.sourcesFile ?? parsed.DIGEST_SOURCES_FILE ?? DEFAULT_SOURCES_FILE),
    keywords: loadKeywords(overrides.keywordsFile ?? parsed.DIGEST_KEYWORDS_FILE ?? DEFAULT_KEYWORDS_FILE),
    windowDays,
    minScore,
    fetcher: {
      timeoutMs: parsed.DIGEST_FETCH_TIMEOUT_MS,
      concurrency: parsed.DIGEST_FETCH_CONCURRENCY,
      userAgent: parsed.DIGEST_USER_AGENT,
    },
    render: {
      maxPerTier: parsed.DIGEST_MAX_PER_TIER,
      maxKeywords: 15,
    },
    outputDir: parsed.DIGEST_OUTPUT_DIR,
    email: {
      provider: overrides.dryRun ? 'none' : parsed.EMAIL_PROVIDER,
      from: parsed.EMAIL_FROM ?? DEFAULT_SENDER,
      replyTo: parsed.EMAIL_REPLY_TO,
      resendApiKey: parsed.RESEND_API_KEY,
      sendgridApiKey: parsed.SENDGRID_API_KEY,
    },
    recipients: parsed.DIGEST_RECIPIENT,
  };
}
