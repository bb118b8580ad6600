import type { HashTypeRegistry, RegistryEntry } from '../registry/types.js';
import { logger } from '../utils/logger.js';

/**
 * Returns every registry entry whose pattern accepts the whole input, in
 * registry order. Structurally identical types all come back together; picking
 * between them is left to confidence.
 */
export function findMatches(input: string, registry: HashTypeRegistry): RegistryEntry[] {
  const matched: RegistryEntry[] = [];

  for (const entry of registry.entries) {
    if (entry.regex === null) {
      continue;
    }

    try {
      if (entry.regex.test(input)) {
        matched.push(entry);
      }
    } catch (error) {
      // Only this entry is skipped for this input
      logger.debug(
        `Pattern for ${entry.definition.name} failed on input: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  return matched;
}
