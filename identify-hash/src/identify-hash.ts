import fs from 'fs/promises';
import type { Readable } from 'node:stream';
import { loadConfig } from './config/config.js';
import type { IdentifyConfig } from './config/types.js';
import { defaultRegistry, extendRegistry } from './registry/registry.js';
import { identifyHashes } from './aggregator/aggregator.js';
import { parseOutputFormat, renderResults } from './output/formatter.js';
import type { HashResult } from './matcher/types.js';
import { readHashFile, readHashStream } from './utils/input-reader.js';
import { logger } from './utils/logger.js';

export { identifyHash, identifyHashes, UNKNOWN_MATCH } from './aggregator/aggregator.js';
export { createRegistry, extendRegistry, defaultRegistry } from './registry/registry.js';
export { BUILTIN_HASH_TYPES } from './registry/definitions.js';
export { resolveConfidence, CONFIDENCE_RANK } from './matcher/confidence.js';
export {
  formatResults,
  renderResults,
  parseOutputFormat,
  CONFIDENCE_LABELS,
  OUTPUT_FORMATS
} from './output/formatter.js';
export type { OutputFormat, FormatOptions } from './output/formatter.js';
export type { Confidence, Match, HashResult } from './matcher/types.js';
export type { Rarity, HashTypeDefinition, HashTypeRegistry, RegistryEntry } from './registry/types.js';

export interface IdentifyHashOptions {
  /** Hashes given directly (e.g. positional arguments) */
  hashes?: string[];
  /** File with one hash per line */
  inputFile?: string;
  /** Read when no hashes or file are given and it is not a terminal */
  stdin?: Readable & { isTTY?: boolean };
  configPath?: string;
  outputOverride?: string;
  formatOverride?: string;
  colorOverride?: boolean;
  debug?: boolean;
}

/**
 * Main entry point for the command line: gathers inputs, classifies them and
 * writes the rendered results to stdout or the configured output file.
 */
export async function runIdentify(options: IdentifyHashOptions = {}): Promise<HashResult[]> {
  if (options.debug) {
    logger.setDebug(true);
  }

  const config = await loadConfig(options.configPath);
  if (config.debug) {
    logger.setDebug(true);
  }
  applyOverrides(config, options);

  const registry = extendRegistry(defaultRegistry, config.customTypes);
  logger.debug(`Registry has ${registry.entries.length} hash types (${config.customTypes.length} custom)`);

  const inputs = await collectInputs(options);
  if (inputs.length === 0) {
    throw new Error('No hashes given: pass them as arguments, with --file, or pipe them on stdin');
  }
  logger.debug(`Classifying ${inputs.length} input${inputs.length === 1 ? '' : 's'}`);

  const results = identifyHashes(inputs, registry);
  await outputResults(results, config);

  return results;
}

function applyOverrides(config: IdentifyConfig, options: IdentifyHashOptions): void {
  if (options.outputOverride) {
    config.output.outputFile = options.outputOverride;
  }
  if (options.formatOverride) {
    config.output.format = parseOutputFormat(options.formatOverride);
  }
  if (options.colorOverride !== undefined) {
    config.output.color = options.colorOverride;
  }
}

/**
 * Positional hashes first, then the input file; stdin only when neither is given
 */
async function collectInputs(options: IdentifyHashOptions): Promise<string[]> {
  const inputs = [...(options.hashes ?? [])];

  if (options.inputFile) {
    logger.debug(`Reading hashes from: ${options.inputFile}`);
    inputs.push(...(await readHashFile(options.inputFile)));
  }

  const stdin = options.stdin ?? process.stdin;
  if (inputs.length === 0 && !options.inputFile && !stdin.isTTY) {
    logger.debug('Reading hashes from stdin');
    inputs.push(...(await readHashStream(stdin)));
  }

  return inputs;
}

async function outputResults(results: HashResult[], config: IdentifyConfig): Promise<void> {
  const { format, outputFile } = config.output;

  if (outputFile) {
    const output = renderResults(results, format, { color: false });
    logger.info(`Writing results to: ${outputFile}`);
    await fs.writeFile(outputFile, output + '\n', 'utf-8');
  } else {
    console.log(renderResults(results, format, { color: config.output.color }));
  }
}
