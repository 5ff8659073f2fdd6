// Truth Table: canonical bit-vector form of a partially specified function

import { MIN_VARIABLES, MAX_VARIABLES, type TruthTable } from '../types/kmap.js';
import { cellBit, domainMask, popcount, EMPTY, type CellSet } from './bits.js';
import { KmapError, KmapErrorType } from './errors.js';

export interface TruthTableSpec {
  numVars: number;
  minterms: number[];
  dontCares?: number[];
}

export function isSupportedVarCount(numVars: number): boolean {
  return Number.isInteger(numVars) && numVars >= MIN_VARIABLES && numVars <= MAX_VARIABLES;
}

/**
 * Build a truth table from cell lists.
 * Throws KmapError(INVALID_INPUT) on a cell outside the domain, a repeated
 * cell, or a cell listed as both minterm and don't-care.
 */
export function createTruthTable(spec: TruthTableSpec): TruthTable {
  const { numVars } = spec;

  if (!isSupportedVarCount(numVars)) {
    throw new KmapError(
      KmapErrorType.INVALID_INPUT,
      `Variable count must be between ${MIN_VARIABLES} and ${MAX_VARIABLES}, got ${numVars}`
    );
  }

  const minterms = collectCells(spec.minterms, numVars, 'minterm');
  const dontCares = collectCells(spec.dontCares ?? [], numVars, "don't-care");

  const overlap = minterms & dontCares;
  if (overlap !== EMPTY) {
    throw new KmapError(
      KmapErrorType.INVALID_INPUT,
      `Cells cannot be both minterm and don't-care (overlap of ${popcount(overlap)} cells)`
    );
  }

  return Object.freeze({
    numVars,
    minterms,
    dontCares,
    mintermCount: popcount(minterms),
  });
}

function collectCells(cells: number[], numVars: number, what: string): CellSet {
  const numCells = 1 << numVars;
  let set = EMPTY;

  for (const cell of cells) {
    if (!Number.isInteger(cell) || cell < 0 || cell >= numCells) {
      throw new KmapError(
        KmapErrorType.INVALID_INPUT,
        `${what} ${cell} is out of range for ${numVars} variables`
      );
    }
    const bit = cellBit(cell);
    if (set & bit) {
      throw new KmapError(KmapErrorType.INVALID_INPUT, `Duplicate ${what} ${cell}`);
    }
    set |= bit;
  }

  return set;
}

/**
 * Check the truth table invariants. Tables that did not come from
 * createTruthTable are checked the same way.
 */
export function validateTruthTable(tt: TruthTable): boolean {
  if (!isSupportedVarCount(tt.numVars)) return false;
  if (tt.minterms < EMPTY || tt.dontCares < EMPTY) return false;

  // Minterms and don't-cares are disjoint
  if (tt.minterms & tt.dontCares) return false;

  // Nothing outside the domain
  if ((tt.minterms | tt.dontCares) & ~domainMask(tt.numVars)) return false;

  return tt.mintermCount === popcount(tt.minterms);
}

/**
 * Function is 0 everywhere it is specified.
 */
export function isConstantZero(tt: TruthTable): boolean {
  return tt.minterms === EMPTY;
}

/**
 * Every cell is a required minterm.
 */
export function isConstantOne(tt: TruthTable): boolean {
  return tt.minterms === domainMask(tt.numVars);
}
