import { describe, it, expect, vi, afterEach } from 'vitest';
import { findMatches } from './matcher.js';
import { resolveConfidence } from './confidence.js';
import { createRegistry, defaultRegistry } from '../registry/registry.js';
import type { HashTypeRegistry } from '../registry/types.js';
import { logger } from '../utils/logger.js';

const MD5_INPUT = '5f4dcc3b5aa765d61d8327deb882cf99';

function names(input: string, registry: HashTypeRegistry = defaultRegistry): string[] {
  return findMatches(input, registry).map(entry => entry.definition.name);
}

function confidenceOf(name: string): string {
  const entry = defaultRegistry.entries.find(e => e.definition.name === name);
  if (!entry) {
    throw new Error(`No entry named ${name}`);
  }
  return resolveConfidence(entry);
}

class ExplodingRegExp extends RegExp {
  override test(): boolean {
    throw new Error('boom');
  }
}

describe('findMatches', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return every type sharing the 32 hex character shape in registry order', () => {
    expect(names(MD5_INPUT)).toEqual(['MD5', 'NTLM', 'MD4', 'LM']);
  });

  it('should ignore the case of hex digits', () => {
    expect(names(MD5_INPUT.toUpperCase())).toEqual(['MD5', 'NTLM', 'MD4', 'LM']);
  });

  it('should require the whole input to match', () => {
    expect(names(`${MD5_INPUT}0`)).toEqual([]);
    expect(names(`x${MD5_INPUT}`)).toEqual([]);
  });

  it('should match modular crypt formats', () => {
    expect(names('$1$saltsalt$qjXMvbEw8oaL.CzflDugX/')).toEqual(['MD5 Crypt']);
    expect(names('$apr1$saltsalt$qjXMvbEw8oaL.CzflDugX/')).toEqual(['Apache APR1']);
    expect(names('$argon2id$v=19$m=65536,t=3,p=4$c29tZXNhbHQ$RdescudvJCsgt3ub+b+dWRWJTmaaJObG')).toEqual(['Argon2']);
  });

  it('should match NetNTLMv2 responses', () => {
    const response = `admin::WORKGROUP:1122334455667788:${'ab'.repeat(16)}:0101000000000000`;
    expect(names(response)).toEqual(['NetNTLMv2']);
  });

  it('should match domain cached credentials as both DCC and DCC2', () => {
    expect(names(`${MD5_INPUT}:administrator`)).toEqual(['DCC', 'DCC2']);
  });

  it('should return nothing for an empty input', () => {
    expect(names('')).toEqual([]);
  });

  it('should skip an entry whose pattern throws and keep checking the others', () => {
    vi.spyOn(logger, 'debug').mockImplementation(() => {});
    const base = createRegistry([
      { name: 'Exploding', pattern: '[a-f]+', rarity: 'common', description: 'throws' },
      { name: 'Letters', pattern: '[a-f]+', rarity: 'common', description: 'letters' }
    ]);
    const registry: HashTypeRegistry = {
      entries: [{ ...base.entries[0], regex: new ExplodingRegExp('x') }, base.entries[1]]
    };

    expect(names('abc', registry)).toEqual(['Letters']);
    expect(logger.debug).toHaveBeenCalledWith('Pattern for Exploding failed on input: boom');
  });

  it('should skip entries whose pattern did not compile', () => {
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const registry = createRegistry([
      { name: 'Broken', pattern: '[a-f', rarity: 'common', description: 'broken' },
      { name: 'Letters', pattern: '[a-f]+', rarity: 'common', description: 'letters' }
    ]);

    expect(names('abc', registry)).toEqual(['Letters']);
  });
});

describe('resolveConfidence', () => {
  it('should rate a common type with a unique pattern as high', () => {
    expect(confidenceOf('SHA256')).toBe('high');
    expect(confidenceOf('BCrypt')).toBe('high');
  });

  it('should rate a common type with a shared pattern as medium', () => {
    expect(confidenceOf('MD5')).toBe('medium');
    expect(confidenceOf('NTLM')).toBe('medium');
    expect(confidenceOf('CRC32')).toBe('medium');
  });

  it('should rate uncommon types as medium regardless of sharing', () => {
    expect(confidenceOf('MySQL4.1+')).toBe('medium');
    expect(confidenceOf('SHA224')).toBe('medium');
  });

  it('should rate rare types as low regardless of sharing', () => {
    expect(confidenceOf('SHA3-224')).toBe('low');
    expect(confidenceOf('DES Crypt')).toBe('low');
  });
});
