import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '../src/errors';
import {
  buildAliasIndex,
  canonicalKey,
  defaultAliasIndex,
  loadAliasTable,
  normalizeName,
  parseKeySize,
  resolveAlgorithm,
  resolvePrimitive
} from '../src/normalizer/aliases';

describe('algorithm alias resolution', () => {
  const index = defaultAliasIndex();

  it('normalizes separators and case', () => {
    expect(normalizeName('  AES_128/GCM ')).toBe('aes-128-gcm');
    expect(normalizeName('TLSv1.2')).toBe('tlsv1-2');
    expect(normalizeName('x|y')).toBe('x-y');
  });

  it('resolves key sizes embedded in names', () => {
    expect(resolveAlgorithm(index, 'aes128')).toMatchObject({ family: 'aes', keySize: 128, recognized: true });
    expect(resolveAlgorithm(index, 'AES-256-GCM')).toMatchObject({ family: 'aes', keySize: 256 });
    expect(resolveAlgorithm(index, 'rsa2048')).toMatchObject({ family: 'rsa', keySize: 2048, defaultPrimitive: 'pke' });
    expect(resolveAlgorithm(index, 'Kyber768')).toMatchObject({ family: 'ml-kem', keySize: 768 });
    expect(resolveAlgorithm(index, 'ML-KEM-1024')).toMatchObject({ family: 'ml-kem', keySize: 1024 });
  });

  it('treats digits of unkeyed families as part of the name', () => {
    const sha = resolveAlgorithm(index, 'SHA-256');
    expect(sha.family).toBe('sha-256');
    expect(sha.keySize).toBeUndefined();
    expect(resolveAlgorithm(index, 'sha2-512').family).toBe('sha-512');
    expect(resolveAlgorithm(index, 'HmacSHA256')).toMatchObject({ family: 'hmac-sha-256', defaultPrimitive: 'mac' });
    expect(resolveAlgorithm(index, 'TLSv1.3').family).toBe('tls-1.3');
  });

  it('keeps digest, version and variant apart', () => {
    const family = (name: string) => resolveAlgorithm(index, name).family;
    expect(['HmacSHA1', 'HMAC-SHA-256', 'hmac-sha512', 'HmacMD5', 'HMAC'].map(family))
      .toEqual(['hmac-sha-1', 'hmac-sha-256', 'hmac-sha-512', 'hmac-md5', 'hmac']);
    expect(['TLSv1', 'TLS 1.2', 'TLSv1.3', 'SSLv3', 'TLS'].map(family))
      .toEqual(['tls-1.0', 'tls-1.2', 'tls-1.3', 'ssl-3.0', 'tls']);
    expect(['Argon2id', 'argon2i', 'BLAKE2b', 'blake2s'].map(family)).toEqual(['argon2id', 'argon2i', 'blake2b', 'blake2s']);
  });

  it('falls back to the leading segment', () => {
    expect(resolveAlgorithm(index, 'RSA/ECB/OAEPPadding')).toMatchObject({ family: 'rsa', recognized: true });
    expect(resolveAlgorithm(index, 'RSA/ECB/OAEPPadding').keySize).toBeUndefined();
    expect(resolveAlgorithm(index, 'DESede').family).toBe('3des');
  });

  it('passes unknown names through lower-cased and unrecognized', () => {
    const r = resolveAlgorithm(index, 'FooCipher512');
    expect(r).toEqual({ family: 'foocipher512', keyed: false, recognized: false });
  });

  it('parses key sizes from numbers and strings', () => {
    expect(parseKeySize(2048)).toBe(2048);
    expect(parseKeySize('4096')).toBe(4096);
    expect(parseKeySize('2048 bits')).toBe(2048);
    expect(parseKeySize('256-bit')).toBe(256);
    expect(parseKeySize('P-256')).toBeUndefined();
    expect(parseKeySize(0)).toBeUndefined();
    expect(parseKeySize(12.5)).toBeUndefined();
    expect(parseKeySize(undefined)).toBeUndefined();
  });

  it('maps primitive spellings onto canonical kinds', () => {
    expect(resolvePrimitive(index, 'block-cipher')).toBe('block-cipher');
    expect(resolvePrimitive(index, 'AEAD')).toBe('ae');
    expect(resolvePrimitive(index, 'related-crypto-material')).toBe('key-material');
    expect(resolvePrimitive(index, 'xof')).toBe('xof');
    expect(resolvePrimitive(index, undefined)).toBeUndefined();
  });

  it('cannot build the same key from different fields', () => {
    const a = { algorithmFamily: normalizeName('x|y'), primitiveKind: normalizeName('z') };
    const b = { algorithmFamily: normalizeName('x'), primitiveKind: normalizeName('y|z') };
    expect(canonicalKey(a)).toBe('x-y|z|-');
    expect(canonicalKey(b)).toBe('x|y-z|-');
  });

  it('keeps key size in the canonical key', () => {
    expect(canonicalKey({ algorithmFamily: 'rsa', primitiveKind: 'pke', keySize: 2048 })).toBe('rsa|pke|2048');
    expect(canonicalKey({ algorithmFamily: 'rsa', primitiveKind: 'pke' })).toBe('rsa|pke|-');
    expect(canonicalKey({ algorithmFamily: 'rsa', primitiveKind: 'pke', keySize: 4096 }))
      .not.toBe(canonicalKey({ algorithmFamily: 'rsa', primitiveKind: 'pke', keySize: 2048 }));
  });

  it('rejects an alias claimed by two families', () => {
    expect(() => buildAliasIndex({
      families: {
        a: { primitive: 'hash', keyed: false, aliases: ['dup'] },
        b: { primitive: 'hash', keyed: false, aliases: ['dup'] }
      },
      primitives: {}
    })).toThrow(ConfigError);
  });

  it('rejects an invalid table file', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cbombench-aliases-'));
    const file = path.join(dir, 'aliases.json');
    await fs.writeJson(file, { families: { aes: { keyed: 'yes' } } });
    expect(() => loadAliasTable(file)).toThrow(ConfigError);
    await fs.remove(dir);
  });
});
