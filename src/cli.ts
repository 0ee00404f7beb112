/**
 * EconDigest — Command Line
 *
 * Argument parsing and the run entry point used by scripts/run-digest.ts.
 * main() resolves to the process exit code instead of exiting, so a whole
 * run can be driven from tests.
 */

import { loadConfig, type ConfigOverrides } from './config';
import { runDigestPipeline } from './pipeline';
import { deliverDigest, defaultOutputPath } from './delivery';
import type { FetchImpl } from './feeds';
import { ConfigError, isConfigError } from './lib/errors';
import { logger, errorMessage } from './lib/logger';

// ============================================================
// ARGUMENTS
// ============================================================

export interface CliArgs extends ConfigOverrides {
  output?: string;
  dryRun: boolean;
  help: boolean;
  listSources: boolean;
}

export const USAGE = `Usage: npm run digest -- [options]

Options:
  --days N          Only include papers from the last N days (default 7)
  --min-score N     Lowest keyword score shown (default 1)
  --output PATH     Write the markdown digest to PATH
  --sources PATH    Source list JSON (default config/sources.json)
  --keywords PATH   Keyword list JSON (default config/keywords.json)
  --dry-run         Print the digest; no file, no email
  --list-sources    Print the configured sources and exit
  --help            Show this message`;

function integerFlag(flag: string, value: string | undefined, min: number): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new ConfigError(`${flag} expects an integer, got ${value === undefined ? 'nothing' : `"${value}"`}`);
  }
  const parsed = parseInt(value, 10);
  if (parsed < min) {
    throw new ConfigError(`${flag} must be >= ${min}, got ${parsed}`);
  }
  return parsed;
}

function pathFlag(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(`${flag} expects a path`);
  }
  return value;
}

/**
 * Parse command line flags. Bad flags are a ConfigError.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { dryRun: false, help: false, listSources: false };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    const value = argv[i + 1];

    switch (flag) {
      case '--days':
        args.windowDays = integerFlag(flag, value, 1);
        i++;
        break;
      case '--min-score':
        args.minScore = integerFlag(flag, value, 1);
        i++;
        break;
      case '--output':
        args.output = pathFlag(flag, value);
        i++;
        break;
      case '--sources':
        args.sourcesFile = pathFlag(flag, value);
        i++;
        break;
      case '--keywords':
        args.keywordsFile = pathFlag(flag, value);
        i++;
        break;
      case '--dry-run':
        args.dryRun = true;
        break;
      case '--list-sources':
        args.listSources = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        throw new ConfigError(`Unknown option: ${flag}`);
    }
  }

  return args;
}

// ============================================================
// MAIN
// ============================================================

export interface CliDeps {
  fetchImpl?: FetchImpl;
  now?: Date;
}

/**
 * Run one digest. Resolves to 0 for a completed run, delivery problems
 * included, and 1 for a configuration error.
 */
export async function main(
  argv: readonly string[],
  env: Record<string, string | undefined>,
  deps: CliDeps = {}
): Promise<number> {
  try {
    const args = parseArgs(argv);

    if (args.help) {
      console.log(USAGE);
      return 0;
    }

    const config = loadConfig(env, args);

    if (args.listSources) {
      for (const source of config.registry.sources) {
        const tags = source.focusTags.length > 0 ? ` [${source.focusTags.join(', ')}]` : '';
        console.log(`${source.id}\t${source.parser}\t${source.label}${tags}`);
      }
      return 0;
    }

    const { digest } = await runDigestPipeline({
      registry: config.registry,
      keywords: config.keywords,
      minScore: config.minScore,
      windowDays: config.windowDays,
      fetcher: { ...config.fetcher, fetchImpl: deps.fetchImpl },
      now: deps.now,
    });

    const report = await deliverDigest(digest, {
      email: config.email,
      recipients: config.recipients,
      outputPath: args.dryRun
        ? undefined
        : args.output ?? defaultOutputPath(config.outputDir, digest.generatedAt),
      render: config.render,
    });

    if (args.dryRun) {
      console.log(report.markdown);
    }

    if (report.email && !report.email.success) {
      logger.warn('Digest email was not delivered', { error: report.email.error });
    }

    logger.info('Digest run complete', {
      entries: digest.entries.length,
      failedSources: digest.failures.length,
      file: report.filePath ?? 'none',
    });

    return 0;
  } catch (error) {
    if (isConfigError(error)) {
      logger.error('Configuration error', { error: error.message });
      return 1;
    }
    logger.error('Digest run failed', { error: errorMessage(error) });
    throw error;
  }
}
