/**
 * EconDigest — Source Registry
 *
 * Validated, ordered, frozen set of source descriptors for one run.
 * Declaration order matters: it is the last tie-break when duplicates
 * from different sources score the same.
 */

import { SourceDescriptorSchema, type SourceDescriptor } from '../types';
import { ConfigError } from '../lib/errors';
import { getParser } from './parsers';

export interface SourceRegistry {
  readonly sources: readonly SourceDescriptor[];
  get(id: string): SourceDescriptor | undefined;
  /** Position in declaration order; unknown ids sort last */
  orderOf(id: string): number;
}

/**
 * Build a registry from raw descriptor input (SourceDescriptorInput, or
 * anything read from a config file).
 * Throws ConfigError when the list is empty or any descriptor is invalid.
 */
export function createSourceRegistry(inputs: readonly unknown[]): SourceRegistry {
  if (inputs.length === 0) {
    throw new ConfigError('No sources configured');
  }

  const issues: string[] = [];
  const descriptors: SourceDescriptor[] = [];
  const seen = new Set<string>();

  inputs.forEach((input, index) => {
    const parsed = SourceDescriptorSchema.safeParse(input);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        const field = issue.path.join('.') || 'source';
        issues.push(`sources[${index}].${field}: ${issue.message}`);
      }
      return;
    }

    const { id, label, endpoint, parser, focusTags } = parsed.data;

    if (seen.has(id)) {
      issues.push(`sources[${index}].id: duplicate source id "${id}"`);
      return;
    }
    seen.add(id);

    if (!getParser(parser)) {
      issues.push(`sources[${index}].parser: no parser registered for "${parser}"`);
      return;
    }

    descriptors.push(Object.freeze({
      id,
      label,
      endpoint: new URL(endpoint),
      parser,
      focusTags: Object.freeze([...focusTags]),
    }));
  });

  if (issues.length > 0) {
    throw new ConfigError('Invalid source configuration', issues);
  }

  const byId = new Map(descriptors.map((d, i) => [d.id, { descriptor: d, order: i }]));
  const sources = Object.freeze(descriptors);

  return Object.freeze({
    sources,
    get: (id: string) => byId.get(id)?.descriptor,
    orderOf: (id: string) => byId.get(id)?.order ?? Number.MAX_SAFE_INTEGER,
  });
}
