/**
 * Tests for branded count types.
 */

import { describe, it, expect } from 'vitest';
import {
  elementCount,
  elementIndex,
  isValidCount,
  minCount,
  doubleCount,
  addCount,
  lastIndex,
  ZERO_COUNT,
  MAX_ARRAY_LENGTH,
} from './branded.ts';

describe('Branded Types', () => {
  describe('constructor functions', () => {
    it('should create ElementCount from number', () => {
      expect(elementCount(42)).toBe(42);
    });

    it('should create ElementIndex from number', () => {
      expect(elementIndex(7)).toBe(7);
    });
  });

  describe('validation functions', () => {
    it('should validate valid counts', () => {
      expect(isValidCount(0)).toBe(true);
      expect(isValidCount(10)).toBe(true);
      expect(isValidCount(Number.MAX_SAFE_INTEGER)).toBe(true);
    });

    it('should reject invalid counts', () => {
      expect(isValidCount(-1)).toBe(false);
      expect(isValidCount(1.5)).toBe(false);
      expect(isValidCount(NaN)).toBe(false);
      expect(isValidCount(Infinity)).toBe(false);
      expect(isValidCount(Number.MAX_SAFE_INTEGER + 1)).toBe(false);
    });
  });

  describe('arithmetic helpers', () => {
    it('should pick the smallest count', () => {
      expect(minCount(elementCount(8), elementCount(3), elementCount(5))).toBe(3);
      expect(minCount(elementCount(4))).toBe(4);
    });

    it('should double a count', () => {
      expect(doubleCount(elementCount(0))).toBe(0);
      expect(doubleCount(elementCount(6))).toBe(12);
    });

    it('should saturate doubling at the largest safe integer', () => {
      expect(doubleCount(elementCount(Number.MAX_SAFE_INTEGER))).toBe(Number.MAX_SAFE_INTEGER);
    });

    it('should add to a count', () => {
      expect(addCount(elementCount(5), 1)).toBe(6);
      expect(addCount(elementCount(5), -2)).toBe(3);
    });

    it('should not drop a count below zero', () => {
      expect(addCount(ZERO_COUNT, -1)).toBe(0);
    });

    it('should give the last index of a count', () => {
      expect(lastIndex(elementCount(10))).toBe(9);
      expect(lastIndex(elementCount(1))).toBe(0);
    });
  });

  describe('constants', () => {
    it('should have correct zero values', () => {
      expect(ZERO_COUNT).toBe(0);
    });

    it('should match the JavaScript array length limit', () => {
      expect(MAX_ARRAY_LENGTH).toBe(2 ** 32 - 1);
    });
  });
});
