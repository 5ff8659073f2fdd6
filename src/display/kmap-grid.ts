// K-map Grid: ASCII Karnaugh map of a truth table
//
// Columns hold the low half of the variables, rows the high half, both in
// Gray order so that neighbouring positions differ in one variable.
// Axis labels list the most significant variable first.

import { VARIABLE_NAMES, type TruthTable } from '../types/kmap.js';
import { hasCell } from '../optimizer/bits.js';
import { grayToLinear, linearToGray } from '../optimizer/adjacency.js';

export interface GridPosition {
  row: number;
  col: number;
}

export function axisBits(numVars: number): { rowBits: number; colBits: number } {
  const colBits = Math.ceil(numVars / 2);
  return { rowBits: numVars - colBits, colBits };
}

/**
 * Where a cell is drawn on the map.
 */
export function cellPosition(cell: number, numVars: number): GridPosition {
  const { rowBits, colBits } = axisBits(numVars);
  const colValue = cell & ((1 << colBits) - 1);
  const rowValue = cell >> colBits;
  return {
    row: grayToLinear(rowValue, rowBits),
    col: grayToLinear(colValue, colBits),
  };
}

function cellSymbol(tt: TruthTable, cell: number): string {
  if (hasCell(tt.minterms, cell)) return '1';
  if (hasCell(tt.dontCares, cell)) return 'X';
  return '0';
}

function axisLabel(value: number, bits: number): string {
  return bits === 0 ? '' : value.toString(2).padStart(bits, '0');
}

function axisNames(from: number, count: number): string {
  return VARIABLE_NAMES.slice(from, from + count).split('').reverse().join('');
}

export function renderKmap(tt: TruthTable): string {
  const { numVars } = tt;
  const { rowBits, colBits } = axisBits(numVars);
  const numRows = 1 << rowBits;
  const numCols = 1 << colBits;

  const grid: string[][] = Array.from({ length: numRows }, () => new Array<string>(numCols).fill('0'));
  for (let cell = 0; cell < (1 << numVars); cell++) {
    const { row, col } = cellPosition(cell, numVars);
    grid[row][col] = cellSymbol(tt, cell);
  }

  const corner = `${axisNames(colBits, rowBits)}\\${axisNames(0, colBits)}`;
  const width = Math.max(corner.length, rowBits);
  const column = (text: string) => ' ' + text.padStart(colBits);

  const lines = [`K-map (${numVars} variables):`];

  let header = corner.padEnd(width) + ' |';
  for (let col = 0; col < numCols; col++) {
    header += column(axisLabel(linearToGray(col, colBits), colBits));
  }
  lines.push(header);

  for (let row = 0; row < numRows; row++) {
    let line = axisLabel(linearToGray(row, rowBits), rowBits).padEnd(width) + ' |';
    for (const symbol of grid[row]) {
      line += column(symbol);
    }
    lines.push(line);
  }

  return lines.join('\n');
}
