// Bit helpers for cell sets
//
// A cell set is a bigint where bit i stands for truth-table cell i.
// Six variables give 64 cells, which is past what a number can hold exactly.

export type CellSet = bigint;

export const EMPTY: CellSet = 0n;

/**
 * Single-cell set.
 */
export function cellBit(cell: number): CellSet {
  return 1n << BigInt(cell);
}

export function hasCell(set: CellSet, cell: number): boolean {
  return (set & cellBit(cell)) !== 0n;
}

/**
 * Set of every cell in a function of numVars variables.
 */
export function domainMask(numVars: number): CellSet {
  return (1n << BigInt(1 << numVars)) - 1n;
}

/**
 * Mask with one bit per variable.
 */
export function variableMask(numVars: number): number {
  return (1 << numVars) - 1;
}

export function popcount(set: CellSet): number {
  let count = 0;
  let rest = set;
  while (rest !== 0n) {
    rest &= rest - 1n;
    count++;
  }
  return count;
}

/**
 * Count of 1 bits in a small (32-bit) number.
 */
export function countOnes(n: number): number {
  let count = 0;
  let rest = n >>> 0;
  while (rest) {
    count += rest & 1;
    rest >>>= 1;
  }
  return count;
}

export function fromCells(cells: Iterable<number>): CellSet {
  let set = EMPTY;
  for (const cell of cells) {
    set |= cellBit(cell);
  }
  return set;
}

/**
 * Cell indices in increasing order.
 */
export function toCells(set: CellSet): number[] {
  const cells: number[] = [];
  let rest = set;
  let cell = 0;
  while (rest !== 0n) {
    if (rest & 1n) cells.push(cell);
    rest >>= 1n;
    cell++;
  }
  return cells;
}
