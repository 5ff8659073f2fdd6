/**
 * Input Parser
 *
 * Reads a truth table from one of two text formats:
 * - Minterm list: "0,1,3,5" (any text containing a comma)
 * - Binary string: "10X1" (characters 0, 1, X, x, -), leftmost character
 *   is the highest cell
 */

import { MAX_CELLS, MAX_VARIABLES, MIN_VARIABLES, type TruthTable } from '../types/kmap.js';
import { createTruthTable } from '../optimizer/truth-table.js';
import { fail, ok, KmapError, KmapErrorType, type Result } from '../optimizer/errors.js';

export type InputFormat = 'minterm-list' | 'binary-string';

const BINARY_STRING = /^[01Xx-]+$/;
const DECIMAL = /^\d+$/;

/**
 * Detect the input format, or null when the text matches neither.
 */
export function detectFormat(text: string): InputFormat | null {
  const input = text.trim();
  if (input.length === 0) return null;
  if (input.includes(',')) return 'minterm-list';
  if (BINARY_STRING.test(input)) return 'binary-string';
  return null;
}

export function parseInput(text: string): Result<TruthTable> {
  const input = text.trim();

  switch (detectFormat(input)) {
    case 'minterm-list':
      return parseMintermTable(input);
    case 'binary-string':
      return parseBinaryString(input);
    default:
      return fail(
        KmapErrorType.INVALID_INPUT,
        input.length === 0 ? 'Input is empty' : `Unrecognized input format: '${input}'`
      );
  }
}

/**
 * Parse comma-separated cell numbers in [0, 64).
 */
export function parseMintermList(text: string): Result<number[]> {
  const cells: number[] = [];

  for (const raw of text.split(',')) {
    const token = raw.trim();
    if (!DECIMAL.test(token)) {
      return fail(KmapErrorType.INVALID_INPUT, `Invalid minterm '${token}'`);
    }

    const value = parseInt(token, 10);
    if (value >= MAX_CELLS) {
      return fail(KmapErrorType.INVALID_INPUT, `Minterm ${value} is out of range (max ${MAX_CELLS - 1})`);
    }
    cells.push(value);
  }

  return ok(cells);
}

/**
 * Fewest variables (at least 2) whose domain holds the given cell.
 */
export function varCountFor(maxCell: number): number {
  let numVars = MIN_VARIABLES;
  while ((1 << numVars) <= maxCell) numVars++;
  return numVars;
}

function parseMintermTable(input: string): Result<TruthTable> {
  const list = parseMintermList(input);
  if (!list.ok) return list;

  const numVars = varCountFor(Math.max(...list.value));
  return build(() => createTruthTable({ numVars, minterms: list.value }));
}

function parseBinaryString(input: string): Result<TruthTable> {
  const len = input.length;

  let numVars = 0;
  while ((1 << numVars) < len) numVars++;

  if ((1 << numVars) !== len || numVars < MIN_VARIABLES || numVars > MAX_VARIABLES) {
    return fail(
      KmapErrorType.INVALID_INPUT,
      `Binary string length must be 4, 8, 16, 32 or 64, got ${len}`
    );
  }

  const minterms: number[] = [];
  const dontCares: number[] = [];

  for (let i = 0; i < len; i++) {
    const cell = len - 1 - i;
    switch (input[i]) {
      case '1':
        minterms.push(cell);
        break;
      case 'X':
      case 'x':
      case '-':
        dontCares.push(cell);
        break;
    }
  }

  return build(() => createTruthTable({ numVars, minterms, dontCares }));
}

function build(make: () => TruthTable): Result<TruthTable> {
  try {
    return ok(make());
  } catch (e) {
    if (e instanceof KmapError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}
