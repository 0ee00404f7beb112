/**
 * EconDigest — Feed Parsers Index
 *
 * Imports and registers all feed parsers.
 * Import this file to ensure all parsers are registered.
 */

import './rss';
import './ssrn';

// Re-export the base for convenience
export * from '../base';
