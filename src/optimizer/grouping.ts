// Implicant Grouping Engine
//
// Greedy first-fit cover of the required minterms in three passes:
// 1. Pairs of adjacent usable cells, lowest partner first
// 2. 2x2 rectangles around minterms the pairs left uncovered
// 3. Single cells for whatever is still uncovered
//
// Don't-cares may fill out a group but are never counted as covered.
// A cell joins at most one pair or quad.

import { MAX_IMPLICANTS, type Implicant } from '../types/kmap.js';
import { cellBit, hasCell, popcount, variableMask, EMPTY, type CellSet } from './bits.js';
import { areAdjacent } from './adjacency.js';
import { fail, ok, KmapErrorType, type Result } from './errors.js';

export interface GroupingOptions {
  // Most implicants the engine may emit
  capacity: number;

  // Log each pass
  verbose: boolean;
}

const DEFAULT_OPTIONS: GroupingOptions = {
  capacity: MAX_IMPLICANTS,
  verbose: false,
};

// Mutable state shared by the passes
interface GroupingState {
  readonly minterms: CellSet;
  readonly numVars: number;
  readonly capacity: number;
  remaining: CellSet;   // Required minterms not yet covered
  usable: CellSet;      // Minterms and don't-cares not yet consumed by a group
  groups: Implicant[];
}

/**
 * Find implicants that jointly cover every minterm.
 *
 * The caller must not pass an empty or full minterm set; those are the
 * constant functions and need no grouping.
 */
export function groupImplicants(
  minterms: CellSet,
  dontCares: CellSet,
  numVars: number,
  options: Partial<GroupingOptions> = {}
): Result<Implicant[]> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  const state: GroupingState = {
    minterms,
    numVars,
    capacity: opts.capacity,
    remaining: minterms,
    usable: minterms | dontCares,
    groups: [],
  };

  const passes: Array<[string, (state: GroupingState) => boolean]> = [
    ['Pair', pairPass],
    ['Quad', quadPass],
    ['Singleton', singletonPass],
  ];

  for (const [name, pass] of passes) {
    const before = state.groups.length;

    if (!pass(state)) {
      return fail(
        KmapErrorType.CAPACITY_EXCEEDED,
        `Grouping needs more than ${state.capacity} implicants`
      );
    }

    if (opts.verbose) {
      console.log(`  ${name} pass: ${state.groups.length - before} implicants, ${popcount(state.remaining)} minterms left`);
    }
  }

  return ok(state.groups);
}

/**
 * Record a group and consume its cells. Returns false when the implicant
 * budget is already spent.
 */
function emit(state: GroupingState, group: CellSet, literalMask: number, literalValues: number): boolean {
  if (state.groups.length >= state.capacity) {
    return false;
  }

  const covered = group & state.minterms;

  state.groups.push({
    coveredMinterms: covered,
    literalMask,
    literalValues,
    size: popcount(covered),
  });

  state.remaining &= ~covered;
  state.usable &= ~group;
  return true;
}

function pairPass(state: GroupingState): boolean {
  const numCells = 1 << state.numVars;
  const allVars = variableMask(state.numVars);

  for (let cellA = 0; cellA < numCells; cellA++) {
    if (!hasCell(state.usable, cellA)) continue;
    if (!hasCell(state.remaining, cellA)) continue; // Pairs start from a required minterm

    for (let cellB = cellA + 1; cellB < numCells; cellB++) {
      if (!hasCell(state.usable, cellB)) continue;
      if (!areAdjacent(cellA, cellB, state.numVars)) continue;

      const group = cellBit(cellA) | cellBit(cellB);
      const literalMask = allVars & ~(cellA ^ cellB);
      if (!emit(state, group, literalMask, cellA & literalMask)) return false;
      break;
    }
  }

  return true;
}

/**
 * For each uncovered minterm, take the first pair of variables (in index
 * order) whose 2x2 rectangle through the minterm is made only of usable
 * cells. Four cells form a rectangle iff they vary in exactly two variables
 * and take all four combinations of them, which is how candidates are built.
 */
function quadPass(state: GroupingState): boolean {
  const numCells = 1 << state.numVars;
  const allVars = variableMask(state.numVars);

  for (let cell = 0; cell < numCells && state.remaining !== EMPTY; cell++) {
    if (!hasCell(state.remaining, cell)) continue;

    const quad = findQuad(state, cell);
    if (quad === null) continue;

    const literalMask = allVars & ~quad.varying;
    if (!emit(state, quad.group, literalMask, quad.base & literalMask)) return false;
  }

  return true;
}

function findQuad(state: GroupingState, cell: number): { group: CellSet; base: number; varying: number } | null {
  for (let i = 0; i < state.numVars; i++) {
    for (let j = i + 1; j < state.numVars; j++) {
      const varying = (1 << i) | (1 << j);
      const base = cell & ~varying;
      const cells = [base, base | (1 << i), base | (1 << j), base | varying];

      if (cells.every(c => hasCell(state.usable, c))) {
        let group = EMPTY;
        for (const c of cells) {
          group |= cellBit(c);
        }
        return { group, base, varying };
      }
    }
  }
  return null;
}

function singletonPass(state: GroupingState): boolean {
  const numCells = 1 << state.numVars;
  const allVars = variableMask(state.numVars);

  for (let cell = 0; cell < numCells; cell++) {
    if (!hasCell(state.remaining, cell)) continue;
    if (!emit(state, cellBit(cell), allVars, cell)) return false;
  }

  return true;
}
