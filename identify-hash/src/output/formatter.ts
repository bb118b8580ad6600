import { inspect } from 'node:util';
import chalk, { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';
import type { Confidence, HashResult } from '../matcher/types.js';

export type OutputFormat = 'Text' | 'Object' | 'Json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['Text', 'Object', 'Json'];

export interface FormatOptions {
  /** Colorize Text (and inspected Object) output */
  color?: boolean;
}

export const CONFIDENCE_LABELS: Readonly<Record<Confidence, string>> = {
  high: 'Most Likely',
  medium: 'Possible',
  low: 'Least Likely',
  unknown: 'Unknown'
};

/**
 * Parses an output format selector, ignoring case
 * @throws Error if the value is not Text, Object or Json
 */
export function parseOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find(candidate => candidate.toLowerCase() === value.trim().toLowerCase());
  if (!format) {
    throw new Error(`Unknown output format "${value}" (expected one of: ${OUTPUT_FORMATS.join(', ')})`);
  }
  return format;
}

/**
 * Projects results into the requested representation. `Object` hands the
 * results back unchanged; `Json` and `Text` produce strings.
 */
export function formatResults(results: readonly HashResult[], format: 'Object'): readonly HashResult[];
export function formatResults(results: readonly HashResult[], format: 'Text' | 'Json', options?: FormatOptions): string;
export function formatResults(
  results: readonly HashResult[],
  format: OutputFormat,
  options?: FormatOptions
): readonly HashResult[] | string;
export function formatResults(
  results: readonly HashResult[],
  format: OutputFormat,
  options: FormatOptions = {}
): readonly HashResult[] | string {
  switch (format) {
    case 'Object':
      return results;
    case 'Json':
      return formatJsonOutput(results);
    case 'Text':
      return formatTextOutput(results, options);
    default: {
      const unhandled: never = format;
      throw new Error(`Unknown output format "${String(unhandled)}"`);
    }
  }
}

/**
 * Printable form of any format. Object output is shown the way Node inspects it.
 */
export function renderResults(
  results: readonly HashResult[],
  format: OutputFormat,
  options: FormatOptions = {}
): string {
  if (format === 'Object') {
    return inspect(results, { depth: null, colors: options.color ?? false });
  }
  return formatResults(results, format, options);
}

function formatJsonOutput(results: readonly HashResult[]): string {
  return JSON.stringify(results, null, 2);
}

function formatTextOutput(results: readonly HashResult[], options: FormatOptions): string {
  const c: ChalkInstance = options.color ? chalk : new Chalk({ level: 0 });
  const colorFor: Record<Confidence, ChalkInstance> = {
    high: c.green,
    medium: c.yellow,
    low: c.red,
    unknown: c.gray
  };

  const blocks = results.map(result => {
    const lines: string[] = [c.bold.cyan(`Hash: ${result.hash}`)];

    for (const match of result.matches) {
      const label = colorFor[match.confidence](CONFIDENCE_LABELS[match.confidence]);
      lines.push(`  ${label}: ${c.bold(match.name)} - ${match.description}`);
    }

    return lines.join('\n');
  });

  return blocks.join('\n\n');
}
