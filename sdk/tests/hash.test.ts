import {
  ZERO_HASH,
  computeDocumentHash,
  hashDocument,
  hashesMatch,
  isZeroHash,
  keccak256Bytes,
  keccak256Hex,
  normalizeHash,
  sha256Hex,
  toBytes32,
} from '../src/utils/hash';
import { ValidationError } from '../src/types/errors';

// reference digests computed independently of this library
const KECCAK_EMPTY = '0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470';
const KECCAK_HELLO = '0x1c8aff950685c2ed4bc3174f3472287b56d9517b9c948127319a09a7a36deac8';
const KECCAK_AB = '0xb8ffb64722137f4b100665a52e3c943f8066e8ab8ba3b427e6f4b404defd82b0';
const SHA256_AB = '0x43258cff783fe7036d8a43033f830adfc60ec037382473548ac742b888292777';
const KECCAK_CAFE = '0x3846924f5ba145cc65af490000ed9cc7fa1c07af2f2532cd93b6ad49c6637826';
const SHA256_CAFE = '0xba1a6cb41ad69028215638fee73105547ced074acec60f03386c3cf1e3613290';

describe('content hashes', () => {
  test('keccak256Hex matches known digests', () => {
    expect(keccak256Hex('')).toBe(KECCAK_EMPTY);
    expect(keccak256Hex('hello')).toBe(KECCAK_HELLO);
    expect(keccak256Hex(new TextEncoder().encode('hello'))).toBe(KECCAK_HELLO);
  });

  test('keccak256Bytes returns the 32 raw bytes', () => {
    const bytes = keccak256Bytes('hello');

    expect(bytes).toHaveLength(32);
    expect(bytes[0]).toBe(0x1c);
    expect(bytes[31]).toBe(0xc8);
  });

  test('sha256Hex is 0x-prefixed SHA-256', () => {
    expect(sha256Hex('{"a":1,"b":2}')).toBe(SHA256_AB);
    expect(sha256Hex('{"name":"Café","tags":["x"]}')).toBe(SHA256_CAFE);
  });

  test('document hash is keccak over canonical JSON bytes', () => {
    expect(computeDocumentHash({ b: 2, a: 1 })).toBe(KECCAK_AB);
    expect(computeDocumentHash({ a: 1, b: 2 })).toBe(KECCAK_AB);
    expect(computeDocumentHash({ tags: ['x'], name: 'Café' })).toBe(KECCAK_CAFE);
  });

  test('hashDocument returns canonical JSON, bytes and hash together', () => {
    const result = hashDocument({ b: 2, a: 1 });

    expect(result.canonicalJson).toBe('{"a":1,"b":2}');
    expect(Array.from(result.bytes)).toEqual(Array.from(new TextEncoder().encode('{"a":1,"b":2}')));
    expect(result.hash).toBe(KECCAK_AB);
  });
});

describe('hash helpers', () => {
  test('normalizeHash lowercases and strips 0x', () => {
    expect(normalizeHash('0xABCD')).toBe('abcd');
    expect(normalizeHash(' abcd ')).toBe('abcd');
    expect(normalizeHash('')).toBe('');
    expect(normalizeHash(undefined)).toBe('');
  });

  test('hashesMatch ignores case and prefix but never matches empty values', () => {
    expect(hashesMatch(KECCAK_AB, KECCAK_AB.slice(2).toUpperCase())).toBe(true);
    expect(hashesMatch(KECCAK_AB, KECCAK_HELLO)).toBe(false);
    expect(hashesMatch('', '')).toBe(false);
    expect(hashesMatch(null, KECCAK_AB)).toBe(false);
  });

  test('ZERO_HASH is 32 zero bytes', () => {
    expect(ZERO_HASH).toBe(`0x${'0'.repeat(64)}`);
    expect(isZeroHash(ZERO_HASH)).toBe(true);
    expect(isZeroHash(KECCAK_AB)).toBe(false);
  });

  test('toBytes32 fills unset values with the zero hash', () => {
    expect(toBytes32(undefined)).toBe(ZERO_HASH);
    expect(toBytes32(null)).toBe(ZERO_HASH);
    expect(toBytes32('')).toBe(ZERO_HASH);
  });

  test('toBytes32 normalizes hex strings and raw bytes', () => {
    expect(toBytes32(KECCAK_AB.toUpperCase().replace('0X', '0x'))).toBe(KECCAK_AB);
    expect(toBytes32(KECCAK_AB.slice(2))).toBe(KECCAK_AB);
    expect(toBytes32(new Uint8Array(32).fill(1))).toBe(`0x${'01'.repeat(32)}`);
  });

  test('toBytes32 rejects anything that is not 32 bytes', () => {
    expect(() => toBytes32('0x1234', 'resultHash')).toThrow('resultHash must be a 32-byte hex string (0x...)');
    expect(() => toBytes32(`0x${'zz'.repeat(32)}`)).toThrow(ValidationError);
    expect(() => toBytes32(new Uint8Array(31))).toThrow('hash must be exactly 32 bytes');
  });
});
