#!/usr/bin/env node

import { buildApplication, buildCommand, run } from '@stricli/core';
import type { CommandContext } from '@stricli/core';
import { runIdentify } from './identify-hash.js';
import { parseOutputFormat } from './output/formatter.js';
import type { OutputFormat } from './output/formatter.js';
import { logger } from './utils/logger.js';

interface IdentifyFlags {
  file?: string;
  format?: OutputFormat;
  output?: string;
  config?: string;
  color?: boolean;
  debug: boolean;
}

const identifyCommand = buildCommand({
  docs: {
    brief: 'Identify likely hash and checksum types by their shape'
  },
  parameters: {
    positional: {
      kind: 'array',
      parameter: {
        brief: 'Hash strings to identify (read from stdin when omitted)',
        parse: String,
        placeholder: 'hash'
      }
    },
    flags: {
      file: {
        kind: 'parsed',
        brief: 'Read hashes from a file, one per line',
        parse: String,
        optional: true
      },
      format: {
        kind: 'parsed',
        brief: 'Output format: Text, Object or Json',
        parse: parseOutputFormat,
        optional: true
      },
      output: {
        kind: 'parsed',
        brief: 'Write results to a file instead of stdout',
        parse: String,
        optional: true
      },
      config: {
        kind: 'parsed',
        brief: 'Path to configuration file',
        parse: String,
        optional: true
      },
      color: {
        kind: 'boolean',
        brief: 'Colorize text output (--noColor to disable)',
        optional: true
      },
      debug: {
        kind: 'boolean',
        brief: 'Enable debug logging',
        default: false
      }
    },
    aliases: {
      i: 'file',
      f: 'format',
      o: 'output',
      c: 'config',
      d: 'debug'
    }
  },
  async func(this: CommandContext, flags: IdentifyFlags, ...hashes: string[]): Promise<void> {
    try {
      await runIdentify({
        hashes,
        inputFile: flags.file,
        configPath: flags.config,
        outputOverride: flags.output,
        formatOverride: flags.format,
        colorOverride: flags.color,
        debug: flags.debug
      });
    } catch (error) {
      logger.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    }
  }
});

const app = buildApplication(identifyCommand, {
  name: 'identify-hash',
  versionInfo: {
    currentVersion: '1.0.0'
  }
});

await run(app, process.argv.slice(2), { process });
