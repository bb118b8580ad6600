import { BUILTIN_HASH_TYPES } from './definitions.js';
import { RARITIES } from './types.js';
import type { HashTypeDefinition, HashTypeRegistry, RegistryEntry } from './types.js';
import { logger } from '../utils/logger.js';

/**
 * Builds an immutable registry from an ordered list of definitions.
 *
 * Pattern sharing is worked out once here by grouping identical pattern text,
 * so confidence resolution never has to rescan the registry. A pattern that
 * does not compile leaves its entry in place (it still counts towards
 * sharing) but the matcher skips it.
 *
 * @throws Error if a definition is malformed or two definitions share a name
 */
export function createRegistry(definitions: readonly HashTypeDefinition[]): HashTypeRegistry {
  const seenNames = new Set<string>();
  const patternCounts = new Map<string, number>();

  for (const definition of definitions) {
    validateDefinition(definition);

    if (seenNames.has(definition.name)) {
      throw new Error(`Duplicate hash type name: ${definition.name}`);
    }
    seenNames.add(definition.name);

    patternCounts.set(definition.pattern, (patternCounts.get(definition.pattern) ?? 0) + 1);
  }

  const entries = definitions.map((definition, index): RegistryEntry => Object.freeze({
    definition: Object.freeze({ ...definition }),
    index,
    sharesPattern: (patternCounts.get(definition.pattern) ?? 0) > 1,
    regex: compilePattern(definition)
  }));

  return Object.freeze({ entries: Object.freeze(entries) });
}

/**
 * Returns a new registry with extra definitions appended after the base ones
 */
export function extendRegistry(
  base: HashTypeRegistry,
  extra: readonly HashTypeDefinition[]
): HashTypeRegistry {
  if (extra.length === 0) {
    return base;
  }

  return createRegistry([...base.entries.map(entry => entry.definition), ...extra]);
}

function validateDefinition(definition: HashTypeDefinition): void {
  if (typeof definition.name !== 'string' || definition.name.trim().length === 0) {
    throw new Error('Hash type definition is missing a name');
  }

  if (typeof definition.pattern !== 'string' || definition.pattern.length === 0) {
    throw new Error(`Hash type "${definition.name}" is missing a pattern`);
  }

  if (!RARITIES.includes(definition.rarity)) {
    throw new Error(
      `Hash type "${definition.name}" has invalid rarity "${String(definition.rarity)}" (expected ${RARITIES.join(', ')})`
    );
  }

  if (typeof definition.description !== 'string') {
    throw new Error(`Hash type "${definition.name}" is missing a description`);
  }
}

function compilePattern(definition: HashTypeDefinition): RegExp | null {
  try {
    return new RegExp(`^(?:${definition.pattern})$`, 'i');
  } catch (error) {
    logger.warn(
      `Skipping hash type "${definition.name}": pattern does not compile (${error instanceof Error ? error.message : String(error)})`
    );
    return null;
  }
}

/** Registry over the built-in hash types */
export const defaultRegistry: HashTypeRegistry = createRegistry(BUILTIN_HASH_TYPES);
