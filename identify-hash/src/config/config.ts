import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import type { IdentifyConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { parseOutputFormat } from '../output/formatter.js';
import { RARITIES } from '../registry/types.js';
import type { HashTypeDefinition } from '../registry/types.js';
import { logger } from '../utils/logger.js';

/**
 * Config file locations searched when no --config path is given:
 * 1. ~/.config/identify-hash/config.json
 * 2. ./identify-hash.json
 */
export function resolveConfigCandidates(): string[] {
  return [
    path.join(os.homedir(), '.config', 'identify-hash', 'config.json'),
    path.resolve('identify-hash.json')
  ];
}

/**
 * Loads configuration from the first config file found, merged with defaults.
 * An explicit path must exist and be valid; the implicit locations are
 * optional and fall back to the defaults.
 *
 * @param explicitPath - Path given on the command line
 * @param candidates - Implicit locations to search (overridable for tests)
 */
export async function loadConfig(
  explicitPath?: string,
  candidates: string[] = resolveConfigCandidates()
): Promise<IdentifyConfig> {
  if (explicitPath) {
    const configPath = path.resolve(explicitPath);
    const userConfig = await readConfigFile(configPath);
    if (userConfig === null) {
      throw new Error(`Configuration file not found: ${configPath}`);
    }
    logger.debug(`Loaded config from: ${configPath}`);
    return mergeConfig(userConfig);
  }

  for (const candidate of candidates) {
    try {
      const userConfig = await readConfigFile(candidate);
      if (userConfig !== null) {
        logger.debug(`Loaded config from: ${candidate}`);
        return mergeConfig(userConfig);
      }
    } catch (error) {
      logger.warn(`Ignoring config file ${candidate}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  logger.debug('No config file found, using defaults');
  return mergeConfig({});
}

/**
 * Reads and parses a config file; null when it does not exist
 */
async function readConfigFile(configPath: string): Promise<Partial<IdentifyConfig> | null> {
  let configContent: string;
  try {
    configContent = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(configContent);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Configuration error: ${configPath} must contain a JSON object`);
  }

  return parsed as Partial<IdentifyConfig>;
}

/**
 * Deep-merges a partial config over the defaults and validates the result
 * @throws Error if the merged configuration is invalid
 */
export function mergeConfig(userConfig: Partial<IdentifyConfig>): IdentifyConfig {
  const output: unknown = userConfig.output;
  if (output !== undefined && (typeof output !== 'object' || output === null || Array.isArray(output))) {
    throw new Error('Configuration error: output must be an object');
  }

  const customTypes: unknown = userConfig.customTypes;
  if (customTypes !== undefined && !Array.isArray(customTypes)) {
    throw new Error('Configuration error: customTypes must be an array');
  }

  const config: IdentifyConfig = {
    ...defaultConfig,
    ...userConfig,
    output: {
      ...defaultConfig.output,
      ...userConfig.output
    },
    customTypes: [...(userConfig.customTypes ?? defaultConfig.customTypes)]
  };

  validateConfig(config);

  return config;
}

/**
 * Validates the configuration, normalizing the output format's case
 * @throws Error if configuration is invalid
 */
function validateConfig(config: IdentifyConfig): void {
  try {
    config.output.format = parseOutputFormat(String(config.output.format));
  } catch (error) {
    throw new Error(`Configuration error: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (typeof config.output.color !== 'boolean') {
    throw new Error('Configuration error: output color must be true or false');
  }

  if (config.output.outputFile !== null && typeof config.output.outputFile !== 'string') {
    throw new Error('Configuration error: output outputFile must be a path or null');
  }

  if (typeof config.debug !== 'boolean') {
    throw new Error('Configuration error: debug must be true or false');
  }

  config.customTypes.forEach((definition: unknown, index) => {
    if (!isHashTypeDefinition(definition)) {
      throw new Error(
        `Configuration error: customTypes[${index}] needs string "name", "pattern" and "description" and a rarity of ${RARITIES.join(', ')}`
      );
    }
  });
}

function isHashTypeDefinition(value: unknown): value is HashTypeDefinition {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate.name === 'string' &&
    candidate.name.trim().length > 0 &&
    typeof candidate.pattern === 'string' &&
    candidate.pattern.length > 0 &&
    typeof candidate.description === 'string' &&
    RARITIES.some(rarity => rarity === candidate.rarity)
  );
}
