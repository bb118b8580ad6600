import type { IdentifyConfig } from './types.js';

/**
 * Default configuration values
 */
export const defaultConfig: IdentifyConfig = {
  output: {
    format: 'Text',
    color: true,
    outputFile: null
  },
  customTypes: [],
  debug: false
};
