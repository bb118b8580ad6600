import { defaultRegistry } from '../registry/registry.js';
import type { HashTypeRegistry } from '../registry/types.js';
import { findMatches } from '../matcher/matcher.js';
import { CONFIDENCE_RANK, resolveConfidence } from '../matcher/confidence.js';
import type { HashResult, Match } from '../matcher/types.js';
import { logger } from '../utils/logger.js';

export const UNKNOWN_MATCH: Match = Object.freeze({
  name: 'Unknown',
  confidence: 'unknown',
  description: 'could not identify this hash type'
});

/**
 * Classifies a single input string.
 *
 * @example
 * identifyHash('*2470C0C06DEE42FD1618BB99005ADCA2EC9D1E19')
 * // { hash: '*2470C0...', matches: [{ name: 'MySQL4.1+', confidence: 'medium', ... }] }
 */
export function identifyHash(input: string, registry: HashTypeRegistry = defaultRegistry): HashResult {
  const hash = input.trim();
  const candidates = findMatches(hash, registry);

  if (candidates.length === 0) {
    return freezeResult(hash, [UNKNOWN_MATCH]);
  }

  // Array.prototype.sort is stable, so ties keep registry order
  const matches = candidates
    .map((entry): Match => ({
      name: entry.definition.name,
      confidence: resolveConfidence(entry),
      description: entry.definition.description
    }))
    .sort((a, b) => CONFIDENCE_RANK[a.confidence] - CONFIDENCE_RANK[b.confidence]);

  return freezeResult(hash, matches);
}

/**
 * Classifies each input independently, keeping input order. A failure on one
 * input is logged and reported as Unknown; the rest of the batch carries on.
 */
export function identifyHashes(
  inputs: readonly string[],
  registry: HashTypeRegistry = defaultRegistry
): HashResult[] {
  return inputs.map((input, position) => {
    try {
      return identifyHash(input, registry);
    } catch (error) {
      logger.warn(
        `Could not classify input #${position + 1}: ${error instanceof Error ? error.message : String(error)}`
      );
      return freezeResult(input.trim(), [UNKNOWN_MATCH]);
    }
  });
}

function freezeResult(hash: string, matches: Match[]): HashResult {
  return Object.freeze({
    hash,
    matches: Object.freeze(matches.map(match => Object.freeze(match)))
  });
}
