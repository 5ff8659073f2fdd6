import { describe, it, expect } from 'vitest';
import { removeRedundantImplicants } from '../src/optimizer/reducer.js';
import { fromCells, popcount } from '../src/optimizer/bits.js';
import type { Implicant } from '../src/types/kmap.js';

function imp(cells: number[], literalMask = 0b111, literalValues = 0): Implicant {
  const coveredMinterms = fromCells(cells);
  return { coveredMinterms, literalMask, literalValues, size: popcount(coveredMinterms) };
}

describe('removeRedundantImplicants', () => {
  it('should drop an implicant contained in a larger one', () => {
    const big = imp([0, 1], 0b110);
    const small = imp([1]);
    expect(removeRedundantImplicants([big, small])).toEqual([big]);
  });

  it('should keep implicants of equal size with identical coverage', () => {
    const a = imp([2], 0b111, 2);
    const b = imp([2], 0b011, 2);
    expect(removeRedundantImplicants([a, b])).toEqual([a, b]);
  });

  it('should keep overlapping implicants that are not contained', () => {
    const a = imp([0, 1]);
    const b = imp([1, 3]);
    expect(removeRedundantImplicants([a, b])).toEqual([a, b]);
  });

  it('should preserve the order of survivors', () => {
    const a = imp([0]);
    const b = imp([1, 2]);
    const c = imp([2]);
    const d = imp([3, 4]);
    expect(removeRedundantImplicants([a, b, c, d])).toEqual([a, b, d]);
  });

  it('should remove every member of a containment chain but the largest', () => {
    const one = imp([0]);
    const two = imp([0, 1]);
    const three = imp([0, 1, 2]);
    expect(removeRedundantImplicants([one, two, three])).toEqual([three]);
  });

  it('should not mutate its input', () => {
    const big = imp([0, 1]);
    const small = imp([0]);
    const input = [big, small];
    removeRedundantImplicants(input);
    expect(input).toHaveLength(2);
    expect(small.size).toBe(1);
  });

  it('should return an empty list for no implicants', () => {
    expect(removeRedundantImplicants([])).toEqual([]);
  });
});
