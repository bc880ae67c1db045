import { describe, it, expect } from 'vitest';
import {
  productUrlSchema,
  recipientEmailSchema,
  targetPriceSchema,
  validate,
} from '../../src/utils/validation.js';

describe('validate', () => {
  describe('productUrlSchema', () => {
    it('accepts and trims http(s) URLs', () => {
      expect(validate(productUrlSchema, '  https://shop.test/item/1  ')).toEqual({
        ok: true,
        value: 'https://shop.test/item/1',
      });
    });

    it('rejects an empty URL', () => {
      expect(validate(productUrlSchema, '   ')).toEqual({ ok: false, error: 'URL cannot be empty.' });
    });

    it('rejects other schemes', () => {
      expect(validate(productUrlSchema, 'ftp://shop.test/item')).toEqual({
        ok: false,
        error: 'URL must start with http:// or https://.',
      });
    });

    it('rejects a malformed URL', () => {
      expect(validate(productUrlSchema, 'http://')).toEqual({ ok: false, error: 'URL is not valid.' });
    });
  });

  describe('targetPriceSchema', () => {
    it('accepts positive prices', () => {
      expect(validate(targetPriceSchema, 499.99)).toEqual({ ok: true, value: 499.99 });
    });

    it.each([0, -1])('rejects %s', value => {
      expect(validate(targetPriceSchema, value)).toEqual({
        ok: false,
        error: 'Target price must be a positive number.',
      });
    });

    it('rejects infinity', () => {
      expect(validate(targetPriceSchema, Infinity)).toEqual({
        ok: false,
        error: 'Target price must be a finite number.',
      });
    });

    it('rejects non-numbers', () => {
      expect(validate(targetPriceSchema, '100')).toEqual({ ok: false, error: 'Target price must be a number.' });
    });
  });

  describe('recipientEmailSchema', () => {
    it('accepts and trims an address', () => {
      expect(validate(recipientEmailSchema, ' user@example.com ')).toEqual({ ok: true, value: 'user@example.com' });
    });

    it('rejects a malformed address', () => {
      expect(validate(recipientEmailSchema, 'not-an-email')).toEqual({
        ok: false,
        error: 'Recipient must be a valid email address.',
      });
    });
  });
});
