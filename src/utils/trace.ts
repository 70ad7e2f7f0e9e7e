/**
 * java-frontend – Utils / trace
 *
 * Debug tracing for the parser. When enabled, every grammar production logs
 * one line on entry and one on exit:
 *
 *   00 > parseCompilationUnit(keyword "class" line 1, position 1)
 *   01 -> parseClassOrInterfaceDeclaration(keyword "class" line 1, position 1)
 *   01 <- parseClassOrInterfaceDeclaration(keyword "class" line 1, position 1, separator "}" line 1, position 10)
 *
 * Failed productions append the error description to the exit line.
 * Tracing never changes parse results.
 *
 * License: Apache-2.0
 */

import type { Lexeme } from '../core/tokens';
import { describeToken } from './inspect';

export type TraceSink = (line: string) => void;

export const TRACE_PREFIX = '[java-frontend:trace] ';

/**
 * Default sink: stderr, so traces never mix with program output.
 */
export const consoleTraceSink: TraceSink = (line) => {
  // eslint-disable-next-line no-console
  console.error(TRACE_PREFIX + line);
};

export class ProductionTracer {
  constructor(private readonly sink: TraceSink) {}

  enter(depth: number, production: string, lookahead: Lexeme): void {
    this.sink(`${pad(depth)} ${'-'.repeat(depth)}> ${production}(${describeToken(lookahead)})`);
  }

  exit(
    depth: number,
    production: string,
    start: Lexeme,
    last: Lexeme | null,
    failure: string | null,
  ): void {
    const consumed = last ? describeToken(last) : 'nothing';
    const suffix = failure ? ` ${failure}` : '';
    this.sink(
      `${pad(depth)} <${'-'.repeat(depth)} ${production}(${describeToken(start)}, ${consumed})${suffix}`,
    );
  }
}

function pad(depth: number): string {
  return String(depth).padStart(2, '0');
}
