/**
 * EconDigest — Scheduled Digest Script
 *
 * Builds this week's economics research digest, writes it to disk and
 * emails it. Designed to be called by cron or run by hand.
 *
 * Usage:
 *   npm run digest                        # Last 7 days, deliver
 *   npm run digest -- --days 14           # Wider window
 *   npm run digest -- --dry-run           # Print only
 *   npm run digest -- --help
 *
 * Cron Setup (Mondays at 7 AM):
 *   0 7 * * 1 cd /path/to/econ-research-digest && npm run digest >> /var/log/econ-digest.log 2>&1
 */

import 'dotenv/config';
import { main } from '../src/cli';
import { logger, errorMessage } from '../src/lib/logger';

main(process.argv.slice(2), process.env)
  .then(code => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    const errorMsg = errorMessage(error);
    logger.error('Digest run failed', { error: errorMsg });
    console.error('\nDigest run failed:', errorMsg);
    process.exit(1);
  });
