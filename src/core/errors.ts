/**
 * java-frontend – Error types & helpers
 *
 * One base class (`FrontendError`) with three concrete failures:
 *
 *  - `LexError`           – the tokenizer could not scan the input
 *  - `JavaSyntaxError`    – the token stream does not match the grammar
 *  - `InternalUsageError` – the API itself was misused
 *
 * Every error carries a stable `code`, a 1-based position when one is
 * known and, when the source text is at hand, a snippet:
 *
 *   int x = ;
 *           ^--- Expected expression
 *
 * License: Apache-2.0
 */

import type { Lexeme, Position } from './tokens';

//////////////////////
// Error codes      //
//////////////////////

export type FrontendErrorCode =
  /** Lexical failures: unterminated literals, bad escapes, stray characters. */
  | 'E_LEX'
  /** Grammar failures, including unexpected end of input and the depth limit. */
  | 'E_SYNTAX'
  /** Programming errors in the caller (unbalanced markers, bad arguments). */
  | 'E_INTERNAL';

export interface FrontendErrorOptions {
  code: FrontendErrorCode;

  message: string;

  /** Source text used to render `snippet`. */
  source?: string;

  position?: Position | null;

  /** Width of the caret range under the offending text. */
  length?: number;

  note?: string;

  cause?: unknown;
}

export class FrontendError extends Error {
  public override readonly name: string = 'FrontendError';
  public readonly code: FrontendErrorCode;

  public readonly line: number | null;
  public readonly column: number | null;

  /** Offending source line plus a caret line, or `''` without source text. */
  public readonly snippet: string;

  public readonly note?: string;

  constructor(opts: FrontendErrorOptions) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });

    Object.setPrototypeOf(this, new.target.prototype);

    this.code = opts.code;
    this.line = opts.position?.line ?? null;
    this.column = opts.position?.column ?? null;
    this.snippet =
      opts.source !== undefined && opts.position
        ? buildSnippet(opts.source, opts.position, opts.length ?? 1, opts.message)
        : '';
    this.note = opts.note;
  }
}

/**
 * Raised by the tokenizer. The message follows the shape
 * `<description> at "<char>", line <n>: <line text>`.
 */
export class LexError extends FrontendError {
  public override readonly name: string = 'LexError';

  /** Short description without location, e.g. "Unterminated text block". */
  public readonly description: string;

  /** The character the scanner stopped at. */
  public readonly character: string;

  constructor(
    opts: Omit<FrontendErrorOptions, 'code' | 'message'> & {
      description: string;
      character: string;
      lineText: string;
    },
  ) {
    const line = opts.position?.line ?? 0;
    super({
      ...opts,
      code: 'E_LEX',
      message: `${opts.description} at "${opts.character}", line ${line}: ${opts.lineText.trim()}`,
    });
    this.description = opts.description;
    this.character = opts.character;
  }
}

export class JavaSyntaxError extends FrontendError {
  public override readonly name: string = 'JavaSyntaxError';

  public readonly description: string;

  /** The token the parser was looking at, or the end-of-input sentinel. */
  public readonly at: Lexeme | null;

  constructor(
    opts: Omit<FrontendErrorOptions, 'code' | 'message' | 'position'> & {
      description: string;
      at: Lexeme | null;
    },
  ) {
    const position = opts.at?.position ?? null;
    super({
      ...opts,
      code: 'E_SYNTAX',
      position,
      length: opts.length ?? Math.max(1, opts.at?.text.length ?? 1),
      message: formatSyntaxMessage(opts.description, opts.at),
    });
    this.description = opts.description;
    this.at = opts.at;
  }
}

export class InternalUsageError extends FrontendError {
  public override readonly name: string = 'InternalUsageError';
}

export function isFrontendError(err: unknown): err is FrontendError {
  return err instanceof FrontendError;
}

/////////////////////////////
// Public factory helpers  //
/////////////////////////////

export function createLexError(
  opts: ConstructorParameters<typeof LexError>[0],
): LexError {
  return new LexError(opts);
}

export function createSyntaxError(
  opts: ConstructorParameters<typeof JavaSyntaxError>[0],
): JavaSyntaxError {
  return new JavaSyntaxError(opts);
}

export function createInternalError(
  opts: Omit<FrontendErrorOptions, 'code'>,
): InternalUsageError {
  return new InternalUsageError({ ...opts, code: 'E_INTERNAL' });
}

/////////////////////////////
// Snippet & position util //
/////////////////////////////

function formatSyntaxMessage(description: string, at: Lexeme | null): string {
  if (!at) return description;
  if (at.position === null) return `${description} (found end of input)`;
  return `${description} at line ${at.position.line}, column ${at.position.column} (found '${at.text}')`;
}

/**
 * Render the line holding `position` with a caret range underneath:
 *
 *   String s = "abc
 *              ^--- Unterminated character/string literal
 */
export function buildSnippet(
  source: string,
  position: Position,
  length: number,
  messageForArrow: string,
): string {
  const lines = source.split(/\r\n|\r|\n/);
  const errorLine = lines[position.line - 1] ?? '';

  const startCol = clamp(position.column, 1, Math.max(errorLine.length, 1));
  const caretLength = Math.max(1, Math.min(length, errorLine.length - startCol + 1));

  const arrowMessage = messageForArrow.trim().length > 0 ? ` --- ${messageForArrow}` : '';

  return `${errorLine}\n${' '.repeat(startCol - 1)}${'^'.repeat(caretLength)}${arrowMessage}`;
}

/**
 * 1-based line and column of a 0-based offset, counting `\n` only.
 */
export function computeLineAndColumn(source: string, index: number): Position {
  const end = clamp(index, 0, source.length);
  let line = 1;
  let lastNewline = -1;

  for (let i = 0; i < end; i++) {
    if (source.charCodeAt(i) === 10 /* \n */) {
      line++;
      lastNewline = i;
    }
  }

  return { line, column: end - lastNewline };
}

function clamp(n: number, min: number, max: number): number {
  if (Number.isNaN(n)) return min;
  if (n < min) return min;
  if (n > max) return max;
  return n;
}
