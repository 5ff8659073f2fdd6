import { describe, it, expect } from 'vitest';
import { detectFormat, parseInput, parseMintermList, varCountFor } from '../src/input/parser.js';
import { toCells } from '../src/optimizer/bits.js';
import { KmapErrorType } from '../src/optimizer/errors.js';
import type { TruthTable } from '../src/types/kmap.js';

function parsed(text: string): TruthTable {
  const result = parseInput(text);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function errorOf(text: string): KmapErrorType | undefined {
  const result = parseInput(text);
  return result.ok ? undefined : result.error.type;
}

describe('Input parser', () => {
  describe('detectFormat', () => {
    it('should treat any comma as a minterm list', () => {
      expect(detectFormat('0,1,3')).toBe('minterm-list');
      expect(detectFormat('7,')).toBe('minterm-list');
    });

    it('should recognise binary strings', () => {
      expect(detectFormat('10X1')).toBe('binary-string');
      expect(detectFormat(' 1-x0 ')).toBe('binary-string');
    });

    it('should reject anything else', () => {
      expect(detectFormat('')).toBeNull();
      expect(detectFormat('   ')).toBeNull();
      expect(detectFormat('1012')).toBeNull();
    });
  });

  describe('binary strings', () => {
    it('should read the leftmost character as the highest cell', () => {
      const tt = parsed('1010');
      expect(tt.numVars).toBe(2);
      expect(toCells(tt.minterms)).toEqual([1, 3]);
      expect(tt.dontCares).toBe(0n);
    });

    it('should accept X, x and - as don\'t-cares', () => {
      const tt = parsed('10-1x000');
      expect(tt.numVars).toBe(3);
      expect(toCells(tt.minterms)).toEqual([4, 7]);
      expect(toCells(tt.dontCares)).toEqual([3, 5]);
    });

    it('should read 1X1X as minterms 1, 3 and don\'t-cares 0, 2', () => {
      const tt = parsed('1X1X');
      expect(toCells(tt.minterms)).toEqual([1, 3]);
      expect(toCells(tt.dontCares)).toEqual([0, 2]);
      expect(tt.mintermCount).toBe(2);
    });

    it('should derive up to 6 variables from the length', () => {
      expect(parsed('0'.repeat(64)).numVars).toBe(6);
      expect(parsed('1'.repeat(32)).mintermCount).toBe(32);
    });

    it('should reject lengths that are not 4 to 64 cells', () => {
      expect(errorOf('10')).toBe(KmapErrorType.INVALID_INPUT);
      expect(errorOf('101')).toBe(KmapErrorType.INVALID_INPUT);
      expect(errorOf('0'.repeat(128))).toBe(KmapErrorType.INVALID_INPUT);
    });
  });

  describe('minterm lists', () => {
    it('should size the table from the largest minterm', () => {
      expect(parsed('0,1,3').numVars).toBe(2);
      expect(parsed(' 0, 5 ').numVars).toBe(3);
      expect(parsed('63,0').numVars).toBe(6);
    });

    it('should collect the listed cells', () => {
      const tt = parsed('5, 0,2');
      expect(toCells(tt.minterms)).toEqual([0, 2, 5]);
      expect(tt.mintermCount).toBe(3);
    });

    it('should reject cells past 63', () => {
      expect(errorOf('1,64')).toBe(KmapErrorType.INVALID_INPUT);
    });

    it('should reject malformed entries', () => {
      expect(errorOf('1,,2')).toBe(KmapErrorType.INVALID_INPUT);
      expect(errorOf('1,-2')).toBe(KmapErrorType.INVALID_INPUT);
      expect(errorOf('1,2a')).toBe(KmapErrorType.INVALID_INPUT);
    });

    it('should reject repeated cells', () => {
      expect(errorOf('1,1')).toBe(KmapErrorType.INVALID_INPUT);
    });
  });

  it('should reject empty and unrecognised input', () => {
    expect(errorOf('')).toBe(KmapErrorType.INVALID_INPUT);
    expect(errorOf('64')).toBe(KmapErrorType.INVALID_INPUT);
  });

  describe('parseMintermList', () => {
    it('should keep the listed order', () => {
      expect(parseMintermList('6, 0,4')).toEqual({ ok: true, value: [6, 0, 4] });
    });

    it('should accept a single cell', () => {
      expect(parseMintermList('9')).toEqual({ ok: true, value: [9] });
    });
  });

  describe('varCountFor', () => {
    it('should give at least two variables', () => {
      expect(varCountFor(0)).toBe(2);
      expect(varCountFor(3)).toBe(2);
      expect(varCountFor(4)).toBe(3);
      expect(varCountFor(63)).toBe(6);
    });
  });
});
