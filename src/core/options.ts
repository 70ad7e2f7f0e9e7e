/**
 * java-frontend – Options
 *
 * Public option shapes for the tokenizer and the parser, their defaults and
 * the normalization applied once at each entry point. Invalid values fall
 * back to the defaults instead of failing.
 *
 * License: Apache-2.0
 */

import type { LexError } from './errors';
import type { TraceSink } from '../utils/trace';
import { consoleTraceSink } from '../utils/trace';

//////////////////////
// Tokenizer        //
//////////////////////

export type SourceEncoding = 'auto' | 'utf-8' | 'latin1';

export interface TokenizeOptions {
  /**
   * Collect lexical errors instead of throwing and keep scanning with the
   * best guess. Collected errors are exposed on `Tokenizer.errors`.
   */
  ignoreErrors?: boolean;

  /**
   * How byte input is decoded. `'auto'` tries UTF-8 and falls back to
   * Latin-1. Ignored for string input.
   */
  encoding?: SourceEncoding;

  /** Called for every error collected under `ignoreErrors`. */
  onError?: (error: LexError) => void;
}

export interface NormalizedTokenizeOptions {
  ignoreErrors: boolean;
  encoding: SourceEncoding;
  onError?: (error: LexError) => void;
}

const DEFAULT_TOKENIZE_OPTIONS: Readonly<NormalizedTokenizeOptions> = Object.freeze({
  ignoreErrors: false,
  encoding: 'auto',
});

const ENCODINGS: readonly SourceEncoding[] = ['auto', 'utf-8', 'latin1'];

function isSourceEncoding(value: unknown): value is SourceEncoding {
  return ENCODINGS.some((e) => e === value);
}

/**
 * A bare boolean is shorthand for `{ ignoreErrors }`.
 */
export function normalizeTokenizeOptions(
  opts?: TokenizeOptions | boolean,
): NormalizedTokenizeOptions {
  if (typeof opts === 'boolean') {
    return { ...DEFAULT_TOKENIZE_OPTIONS, ignoreErrors: opts };
  }
  if (!opts) return { ...DEFAULT_TOKENIZE_OPTIONS };

  return {
    ignoreErrors:
      typeof opts.ignoreErrors === 'boolean'
        ? opts.ignoreErrors
        : DEFAULT_TOKENIZE_OPTIONS.ignoreErrors,
    encoding: isSourceEncoding(opts.encoding)
      ? opts.encoding
      : DEFAULT_TOKENIZE_OPTIONS.encoding,
    onError: typeof opts.onError === 'function' ? opts.onError : undefined,
  };
}

//////////////////////
// Parser           //
//////////////////////

export interface ParseOptions {
  /**
   * Log every production's entry and exit to `trace`.
   * Defaults to the global flag set with `setDebugDefault`.
   */
  debug?: boolean;

  trace?: TraceSink;

  /**
   * Maximum number of nested grammar productions. Deeper input fails with
   * a syntax error rather than overflowing the call stack.
   */
  maxDepth?: number;

  /** Source text, used to attach snippets to syntax errors. */
  source?: string;
}

export interface NormalizedParseOptions {
  debug: boolean;
  trace: TraceSink;
  maxDepth: number;
  source?: string;
}

export const DEFAULT_MAX_DEPTH = 1000;

let debugDefault = false;

/**
 * Global debug toggle, consulted when `ParseOptions.debug` is not given.
 */
export function setDebugDefault(flag: boolean): void {
  debugDefault = flag;
}

export function isDebugDefault(): boolean {
  return debugDefault;
}

/**
 * A bare boolean is shorthand for `{ debug }`.
 */
export function normalizeParseOptions(opts?: ParseOptions | boolean): NormalizedParseOptions {
  const given: ParseOptions = typeof opts === 'boolean' ? { debug: opts } : opts ?? {};

  return {
    debug: typeof given.debug === 'boolean' ? given.debug : debugDefault,
    trace: typeof given.trace === 'function' ? given.trace : consoleTraceSink,
    maxDepth:
      typeof given.maxDepth === 'number' && given.maxDepth > 0
        ? given.maxDepth
        : DEFAULT_MAX_DEPTH,
    source: typeof given.source === 'string' ? given.source : undefined,
  };
}

//////////////////////
// Combined         //
//////////////////////

/**
 * Options for the one-shot helpers (`parseSource`, `parseExpression`,
 * `parseType`) that tokenize and parse in one call.
 */
export type SourceOptions = Omit<TokenizeOptions, 'ignoreErrors'> &
  Omit<ParseOptions, 'source'>;
