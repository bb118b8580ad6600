import fs from 'fs/promises';
import * as readline from 'node:readline';
import type { Readable } from 'node:stream';

/**
 * Splits text into hash inputs, one per line. Blank lines are dropped so a
 * trailing newline does not turn into an extra Unknown result.
 */
export function splitHashLines(content: string): string[] {
  return content.split(/\r?\n/).filter(line => line.trim().length > 0);
}

/**
 * Reads hash inputs from a file, one per line
 * @throws Error if the file cannot be read
 */
export async function readHashFile(filePath: string): Promise<string[]> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return splitHashLines(content);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`Input file not found: ${filePath}`);
    }
    throw error;
  }
}

/**
 * Reads hash inputs line by line from a stream (typically piped stdin)
 */
export async function readHashStream(input: Readable): Promise<string[]> {
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  const lines: string[] = [];

  for await (const line of rl) {
    if (line.trim().length > 0) {
      lines.push(line);
    }
  }

  return lines;
}
