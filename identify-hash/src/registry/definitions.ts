import type { HashTypeDefinition } from './types.js';

// Pattern text doubles as the sharing key: families that cannot be told apart
// by shape alone use the exact same string on purpose.
const HEX_8 = '[a-f0-9]{8}';
const HEX_32 = '[a-f0-9]{32}';
const HEX_56 = '[a-f0-9]{56}';
const HEX_96 = '[a-f0-9]{96}';
const DCC_PATTERN = '[a-f0-9]{32}:[^:\\s]+';

/**
 * Built-in hash types, in registry order
 */
export const BUILTIN_HASH_TYPES: readonly HashTypeDefinition[] = [
  // Raw digests
  {
    name: 'MD5',
    pattern: HEX_32,
    rarity: 'common',
    description: 'MD5 message digest (128-bit)'
  },
  {
    name: 'NTLM',
    pattern: HEX_32,
    rarity: 'common',
    description: 'Windows NT password hash (MD4 of UTF-16LE password)'
  },
  {
    name: 'MD4',
    pattern: HEX_32,
    rarity: 'uncommon',
    description: 'MD4 message digest (128-bit)'
  },
  {
    name: 'LM',
    pattern: HEX_32,
    rarity: 'uncommon',
    description: 'LAN Manager password hash (legacy Windows)'
  },
  {
    name: 'SHA1',
    pattern: '[a-f0-9]{40}',
    rarity: 'common',
    description: 'SHA-1 digest (160-bit)'
  },
  {
    name: 'SHA224',
    pattern: HEX_56,
    rarity: 'uncommon',
    description: 'SHA-224 digest (SHA-2 family, 224-bit)'
  },
  {
    name: 'SHA3-224',
    pattern: HEX_56,
    rarity: 'rare',
    description: 'SHA3-224 digest (Keccak, 224-bit)'
  },
  {
    name: 'SHA256',
    pattern: '[a-f0-9]{64}',
    rarity: 'common',
    description: 'SHA-256 digest (SHA-2 family, 256-bit)'
  },
  {
    name: 'SHA384',
    pattern: HEX_96,
    rarity: 'uncommon',
    description: 'SHA-384 digest (SHA-2 family, 384-bit)'
  },
  {
    name: 'SHA3-384',
    pattern: HEX_96,
    rarity: 'rare',
    description: 'SHA3-384 digest (Keccak, 384-bit)'
  },
  {
    name: 'SHA512',
    pattern: '[a-f0-9]{128}',
    rarity: 'common',
    description: 'SHA-512 digest (SHA-2 family, 512-bit)'
  },

  // Network authentication
  {
    name: 'NetNTLMv1',
    pattern: '[^\\\\/:*?"<>|]{1,20}::[^\\\\/:*?"<>|]{1,20}:[a-f0-9]{48}:[a-f0-9]{48}:[a-f0-9]{16}',
    rarity: 'uncommon',
    description: 'NetNTLMv1 challenge/response (user::domain:lm:nt:challenge)'
  },
  {
    name: 'NetNTLMv2',
    pattern: '[^\\\\/:*?"<>|]{1,20}::[^\\\\/:*?"<>|]{1,20}:[a-f0-9]{16}:[a-f0-9]{32}:[a-f0-9]+',
    rarity: 'uncommon',
    description: 'NetNTLMv2 challenge/response (user::domain:challenge:hmac:blob)'
  },
  {
    name: 'DCC',
    pattern: DCC_PATTERN,
    rarity: 'uncommon',
    description: 'Domain Cached Credentials (mscash, hash:username)'
  },
  {
    name: 'DCC2',
    pattern: DCC_PATTERN,
    rarity: 'uncommon',
    description: 'Domain Cached Credentials 2 (mscash2, hash:username)'
  },

  // Password hashing schemes
  {
    name: 'BCrypt',
    pattern: '\\$2[abxy]?\\$\\d{2}\\$[./a-z0-9]{53}',
    rarity: 'common',
    description: 'Blowfish-based adaptive password hash'
  },
  {
    name: 'Argon2',
    pattern: '\\$argon2(?:id|i|d)\\$v=\\d+\\$m=\\d+,t=\\d+,p=\\d+\\$[a-z0-9+/]+\\$[a-z0-9+/]+',
    rarity: 'common',
    description: 'Argon2 memory-hard password hash (PHC string format)'
  },
  {
    name: 'PBKDF2-SHA256',
    pattern: '\\$pbkdf2-sha256\\$\\d+\\$[./a-z0-9]+\\$[./a-z0-9]+',
    rarity: 'uncommon',
    description: 'PBKDF2 with HMAC-SHA256 (modular crypt format)'
  },
  {
    name: 'Django PBKDF2-SHA256',
    pattern: 'pbkdf2_sha256\\$\\d+\\$[a-z0-9+/=]+\\$[a-z0-9+/=]+',
    rarity: 'uncommon',
    description: 'Django PBKDF2 with HMAC-SHA256 password hash'
  },
  {
    name: 'Scrypt',
    pattern: '\\$scrypt\\$ln=\\d+,r=\\d+,p=\\d+\\$[a-z0-9+/]+\\$[a-z0-9+/]+',
    rarity: 'uncommon',
    description: 'scrypt memory-hard password hash (PHC string format)'
  },
  {
    name: 'Yescrypt',
    pattern: '\\$y\\$[./a-z0-9]+\\$[./a-z0-9]+\\$[./a-z0-9]{43}',
    rarity: 'rare',
    description: 'yescrypt password hash (modern Linux shadow)'
  },
  {
    name: 'MD5 Crypt',
    pattern: '\\$1\\$[./a-z0-9]{1,8}\\$[./a-z0-9]{22}',
    rarity: 'common',
    description: 'MD5-based UNIX crypt ($1$)'
  },
  {
    name: 'Apache APR1',
    pattern: '\\$apr1\\$[./a-z0-9]{1,8}\\$[./a-z0-9]{22}',
    rarity: 'uncommon',
    description: 'Apache htpasswd MD5 variant ($apr1$)'
  },
  {
    name: 'SHA256 Crypt',
    pattern: '\\$5\\$(?:rounds=\\d+\\$)?[./a-z0-9]{1,16}\\$[./a-z0-9]{43}',
    rarity: 'common',
    description: 'SHA-256-based UNIX crypt ($5$)'
  },
  {
    name: 'SHA512 Crypt',
    pattern: '\\$6\\$(?:rounds=\\d+\\$)?[./a-z0-9]{1,16}\\$[./a-z0-9]{86}',
    rarity: 'common',
    description: 'SHA-512-based UNIX crypt ($6$)'
  },
  {
    name: 'DES Crypt',
    pattern: '[./a-z0-9]{13}',
    rarity: 'rare',
    description: 'Traditional DES-based UNIX crypt'
  },

  // Databases
  {
    name: 'MySQL323',
    pattern: '[a-f0-9]{16}',
    rarity: 'uncommon',
    description: 'MySQL OLD_PASSWORD() hash (pre-4.1)'
  },
  {
    name: 'MySQL4.1+',
    pattern: '\\*[a-f0-9]{40}',
    rarity: 'uncommon',
    description: 'MySQL PASSWORD() hash (double SHA-1, 4.1 and later)'
  },

  // Checksums
  {
    name: 'CRC32',
    pattern: HEX_8,
    rarity: 'common',
    description: 'CRC-32 checksum'
  },
  {
    name: 'CRC32B',
    pattern: HEX_8,
    rarity: 'uncommon',
    description: 'CRC-32B checksum (bzip2 polynomial ordering)'
  },
  {
    name: 'ADLER32',
    pattern: HEX_8,
    rarity: 'rare',
    description: 'Adler-32 checksum'
  }
];
