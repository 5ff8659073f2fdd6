// Adjacency Oracle: which cells may share a group
//
// Two cells are adjacent when their indices differ in exactly one bit.
// Gray code only decides where cells are drawn on a K-map; adjacency
// never depends on it.

import { countOnes } from './bits.js';

function inDomain(cell: number, numVars: number): boolean {
  return Number.isInteger(cell) && cell >= 0 && cell < (1 << numVars);
}

/**
 * True iff both cells lie in [0, 2^numVars) and differ in a single variable.
 */
export function areAdjacent(a: number, b: number, numVars: number): boolean {
  if (!inDomain(a, numVars) || !inDomain(b, numVars)) {
    return false;
  }
  return countOnes(a ^ b) === 1;
}

/**
 * Position of a cell along a Gray-ordered K-map axis.
 * Returns 0 for an index outside the domain.
 */
export function linearToGray(linear: number, numVars: number): number {
  if (!inDomain(linear, numVars)) return 0;
  return linear ^ (linear >> 1);
}

/**
 * Inverse of linearToGray.
 */
export function grayToLinear(gray: number, numVars: number): number {
  if (!inDomain(gray, numVars)) return 0;

  let result = gray;
  for (let shift = 1; shift < numVars; shift++) {
    result ^= gray >> shift;
  }
  return result;
}
