import { describe, it, expect } from 'vitest';
import {
  packToken,
  unpackToken,
  encodeUrlSafeBase64,
  decodeUrlSafeBase64,
  MIN_TOKEN_BYTES,
} from '../../src/lib/crypto/token.js';
import { FormatError, InvalidParameterError } from '../../src/errors.js';

const SALT = Buffer.alloc(16, 0x01);
const NONCE = Buffer.alloc(12, 0x02);
const SEALED = Buffer.alloc(16, 0x03);

describe('token', () => {
  it('should require at least salt + nonce + tag bytes', () => {
    expect(MIN_TOKEN_BYTES).toBe(44);
  });

  describe('encodeUrlSafeBase64', () => {
    it('should use - and _ instead of + and /', () => {
      expect(encodeUrlSafeBase64(Buffer.from([0xfb, 0xff]))).toBe('-_8=');
    });

    it('should keep padding', () => {
      expect(encodeUrlSafeBase64(Buffer.from('a'))).toBe('YQ==');
    });
  });

  describe('decodeUrlSafeBase64', () => {
    it('should decode the URL-safe alphabet', () => {
      expect([...decodeUrlSafeBase64('-_8=')]).toEqual([0xfb, 0xff]);
    });

    it('should reject the standard alphabet', () => {
      expect(() => decodeUrlSafeBase64('+/8=')).toThrow(FormatError);
    });

    it('should reject characters outside the alphabet', () => {
      expect(() => decodeUrlSafeBase64('not-valid-base64!!')).toThrow(FormatError);
    });

    it('should reject input with missing padding', () => {
      expect(() => decodeUrlSafeBase64('YQ')).toThrow(FormatError);
    });

    it('should reject embedded whitespace', () => {
      expect(() => decodeUrlSafeBase64('YWJj\nZGVm')).toThrow(FormatError);
    });
  });

  describe('packToken', () => {
    it('should encode salt, nonce and sealed bytes in order', () => {
      const token = packToken({ salt: SALT, nonce: NONCE, sealed: SEALED });
      const raw = Buffer.from(token.replace(/-/g, '+').replace(/_/g, '/'), 'base64');

      expect(raw).toHaveLength(44);
      expect(raw.subarray(0, 16).equals(SALT)).toBe(true);
      expect(raw.subarray(16, 28).equals(NONCE)).toBe(true);
      expect(raw.subarray(28).equals(SEALED)).toBe(true);
    });

    it('should produce a padded 60-character token for 44 bytes', () => {
      const token = packToken({ salt: SALT, nonce: NONCE, sealed: SEALED });
      expect(token).toHaveLength(60);
      expect(token.endsWith('=')).toBe(true);
      expect(token).toMatch(/^[A-Za-z0-9_-]+=*$/);
    });

    it('should reject a salt of the wrong size', () => {
      expect(() => packToken({ salt: Buffer.alloc(8), nonce: NONCE, sealed: SEALED })).toThrow(
        InvalidParameterError
      );
    });
  });

  describe('unpackToken', () => {
    it('should split a packed token at the fixed offsets', () => {
      const sealed = Buffer.from('ciphertext-and-tag-bytes');
      const parts = unpackToken(packToken({ salt: SALT, nonce: NONCE, sealed }));

      expect(parts.salt.equals(SALT)).toBe(true);
      expect(parts.nonce.equals(NONCE)).toBe(true);
      expect(parts.sealed.equals(sealed)).toBe(true);
    });

    it('should accept exactly the minimum length', () => {
      const parts = unpackToken(encodeUrlSafeBase64(Buffer.alloc(44)));
      expect(parts.sealed).toHaveLength(16);
    });

    it('should reject tokens shorter than the minimum', () => {
      expect(() => unpackToken(encodeUrlSafeBase64(Buffer.alloc(43)))).toThrow(
        'Malformed token: expected at least 44 bytes, got 43'
      );
    });

    it('should reject an empty token', () => {
      expect(() => unpackToken('')).toThrow(FormatError);
    });
  });
});
