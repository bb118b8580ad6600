/**
 * How often a hash family turns up in practice. Drives confidence.
 */
export type Rarity = 'common' | 'uncommon' | 'rare';

export const RARITIES: readonly Rarity[] = ['common', 'uncommon', 'rare'];

/**
 * A known hash type: a named structural signature
 */
export interface HashTypeDefinition {
  /** Unique identifier, e.g. 'SHA256' */
  readonly name: string;

  /**
   * Regular expression source describing the whole string. Anchors are added
   * when the registry compiles it, and matching ignores case.
   */
  readonly pattern: string;

  readonly rarity: Rarity;

  readonly description: string;
}

/**
 * A definition as held by a built registry
 */
export interface RegistryEntry {
  readonly definition: HashTypeDefinition;

  /** Position in the registry; the tie-break key when sorting matches */
  readonly index: number;

  /** True when another entry uses byte-identical pattern text */
  readonly sharesPattern: boolean;

  /** Compiled, anchored pattern (null when the source failed to compile) */
  readonly regex: RegExp | null;
}

export interface HashTypeRegistry {
  readonly entries: readonly RegistryEntry[];
}
