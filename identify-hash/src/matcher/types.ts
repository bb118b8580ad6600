/**
 * Qualitative certainty attached to a single candidate
 */
export type Confidence = 'high' | 'medium' | 'low' | 'unknown';

/**
 * One candidate hash type for an input
 */
export interface Match {
  readonly name: string;
  readonly confidence: Confidence;
  readonly description: string;
}

/**
 * Classification of one input, matches ordered most to least confident
 */
export interface HashResult {
  /** The input after trimming */
  readonly hash: string;

  /** Never empty: an unrecognized input gets a single Unknown match */
  readonly matches: readonly Match[];
}
