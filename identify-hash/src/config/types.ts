import type { OutputFormat } from '../output/formatter.js';
import type { HashTypeDefinition } from '../registry/types.js';

/**
 * Configuration for identify-hash
 */
export interface IdentifyConfig {
  /** Output configuration */
  output: {
    /** Output format: 'Text', 'Object' or 'Json' (case-insensitive in the file) */
    format: OutputFormat;

    /** Colorize Text output */
    color: boolean;

    /** Optional file path to write output to (null = stdout) */
    outputFile: string | null;
  };

  /** Extra hash types appended after the built-in registry */
  customTypes: HashTypeDefinition[];

  /** Enable debug logging */
  debug: boolean;
}
