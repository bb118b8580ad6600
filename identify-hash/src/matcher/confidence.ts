import type { RegistryEntry } from '../registry/types.js';
import type { Confidence } from './types.js';

/** Sort rank per confidence tier, lowest first */
export const CONFIDENCE_RANK: Readonly<Record<Confidence, number>> = {
  high: 1,
  medium: 2,
  low: 3,
  unknown: 4
};

/**
 * Confidence for a matched entry.
 *
 * A common type is only `high` when no other entry uses the same pattern text.
 */
export function resolveConfidence(entry: RegistryEntry): Confidence {
  const rarity = entry.definition.rarity;

  switch (rarity) {
    case 'common':
      return entry.sharesPattern ? 'medium' : 'high';
    case 'uncommon':
      return 'medium';
    case 'rare':
      return 'low';
    default: {
      const unhandled: never = rarity;
      throw new Error(`Unhandled rarity: ${String(unhandled)}`);
    }
  }
}
