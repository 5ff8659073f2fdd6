// Expression Renderer: solution -> sum-of-products text
//
// Format: terms joined by " + ", literals by "&", complement as "~".
// Variable 0 is A. Example: "A&~B + C"

import {
  MAX_EXPRESSION_LENGTH,
  MAX_RENDER_VARIABLES,
  VARIABLE_NAMES,
  type Implicant,
  type Solution,
} from '../types/kmap.js';
import { fail, ok, KmapErrorType, type Result } from './errors.js';

// Appends tokens while they fit; the first one that does not fit fails the render
class ExpressionWriter {
  private parts: string[] = [];
  private length = 0;

  constructor(private readonly maxLength: number) {}

  write(token: string): boolean {
    if (this.length + token.length > this.maxLength) {
      return false;
    }
    this.parts.push(token);
    this.length += token.length;
    return true;
  }

  toString(): string {
    return this.parts.join('');
  }
}

/**
 * Render a solution over numVars variables.
 * Fails with UNSUPPORTED_VAR_COUNT past 8 variables and with BUFFER_TOO_SMALL
 * when the text would exceed maxLength characters.
 */
export function generateExpression(
  solution: Solution,
  numVars: number,
  maxLength: number = MAX_EXPRESSION_LENGTH
): Result<string> {
  if (!Number.isInteger(numVars) || numVars < 0 || numVars > MAX_RENDER_VARIABLES) {
    return fail(
      KmapErrorType.UNSUPPORTED_VAR_COUNT,
      `Cannot name ${numVars} variables (at most ${MAX_RENDER_VARIABLES})`
    );
  }

  const out = new ExpressionWriter(maxLength);
  const tooSmall = () => fail<string>(
    KmapErrorType.BUFFER_TOO_SMALL,
    `Expression does not fit in ${maxLength} characters`
  );

  const terms = solution.implicants.filter(imp => imp.size > 0);

  if (terms.length === 0) {
    return out.write('0') ? ok(out.toString()) : tooSmall();
  }

  for (let i = 0; i < terms.length; i++) {
    if (i > 0 && !out.write(' + ')) return tooSmall();

    for (const token of termTokens(terms[i], numVars)) {
      if (!out.write(token)) return tooSmall();
    }
  }

  return ok(out.toString());
}

/**
 * Tokens of one product term, in increasing variable order.
 * A term with no literals is the constant 1.
 */
function termTokens(imp: Implicant, numVars: number): string[] {
  const tokens: string[] = [];

  for (let v = 0; v < numVars; v++) {
    const bit = 1 << v;
    if (!(imp.literalMask & bit)) continue;

    if (tokens.length > 0) tokens.push('&');
    if (!(imp.literalValues & bit)) tokens.push('~');
    tokens.push(VARIABLE_NAMES[v]);
  }

  if (tokens.length === 0) tokens.push('1');
  return tokens;
}
