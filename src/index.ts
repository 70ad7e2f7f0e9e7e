/**
 * java-frontend – Public entry point
 *
 * This file defines the **public API surface** of java-frontend.
 *
 * It provides:
 *  - The tokenizer (`tokenize`, `Tokenizer`) and the parser (`parse`).
 *  - One-shot helpers (`parseSource`, `parseExpression`, `parseType`)
 *    that tokenize and parse in one call and attach source snippets to
 *    syntax errors.
 *  - Public types for tokens, the syntax tree, options and errors.
 *  - Utilities for inspection and tracing.
 *
 * Typical usage:
 *
 *   import { parseSource, analyzeTree, formatError } from 'java-frontend';
 *
 *   try {
 *     const unit = parseSource('class Greeter { String hi() { return "hi"; } }');
 *     console.log(unit.types[0].name, analyzeTree(unit).nodeCount);
 *   } catch (err) {
 *     console.error(formatError(err).detail);
 *   }
 *
 * License: Apache-2.0
 */

/////////////////////////////
// Core                    //
/////////////////////////////

import type { CompilationUnit, Expression, Type } from './core/ast';
import { createInternalError } from './core/errors';
import type { ParseOptions, SourceOptions, TokenizeOptions } from './core/options';
import { normalizeParseOptions } from './core/options';
import { Parser } from './core/parser';
import type { Token } from './core/tokens';
import { Tokenizer, tokenize } from './core/tokenizer';

/////////////////////////////
// Parsing helpers         //
/////////////////////////////

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  );
}

/**
 * Parse a token stream into a compilation unit.
 *
 * A boolean second argument is shorthand for `{ debug }`.
 *
 * Throws:
 *  - JavaSyntaxError on malformed input;
 *  - LexError when the underlying tokenizer fails while being read;
 *  - InternalUsageError when `tokens` is not an iterable object.
 */
export function parse(
  tokens: Iterable<Token>,
  options?: ParseOptions | boolean,
): CompilationUnit {
  const candidate: unknown = tokens;
  if (!isIterable(candidate)) {
    throw createInternalError({
      message: 'parse() expects an iterable of tokens',
      note: 'Pass the result of tokenize(source).',
    });
  }
  return new Parser(tokens, normalizeParseOptions(options)).parseUnit();
}

function startParser(source: string | Uint8Array, options: SourceOptions = {}): Parser {
  const tokenizerOptions: TokenizeOptions = {
    encoding: options.encoding,
    onError: options.onError,
  };
  const tokenizer = new Tokenizer(source, tokenizerOptions);

  const parseOptions = normalizeParseOptions({
    debug: options.debug,
    trace: options.trace,
    maxDepth: options.maxDepth,
    source: tokenizer.text,
  });
  return new Parser(tokenizer.tokens(), parseOptions);
}

/**
 * Tokenize and parse a whole source file. Syntax errors carry a snippet
 * of the offending line.
 */
export function parseSource(
  source: string | Uint8Array,
  options?: SourceOptions,
): CompilationUnit {
  return startParser(source, options).parseUnit();
}

/**
 * Parse a single expression, e.g. `a.b(c) + 1`. The whole input must be
 * consumed.
 */
export function parseExpression(source: string, options?: SourceOptions): Expression {
  return startParser(source, options).parseStandaloneExpression();
}

/**
 * Parse a single type, e.g. `Map<String, List<int[]>>`.
 */
export function parseType(source: string, options?: SourceOptions): Type {
  return startParser(source, options).parseStandaloneType();
}

/////////////////////////////
// Public exports          //
/////////////////////////////

// Tokenizer
export { tokenize, Tokenizer };

// Parser (for callers driving it over custom token sources)
export { Parser };

// Tokens
export type {
  Token,
  TokenKind,
  LiteralKind,
  Position,
  EndOfInput,
  Lexeme,
  ExpectedToken,
} from './core/tokens';
export { END_OF_INPUT, isEndOfInput, tok, kind, matchesExpected, describeExpected } from './core/tokens';

// Cursor
export { LookaheadCursor } from './core/cursor';
export type { MarkerScope } from './core/cursor';

// Syntax tree
export type * from './core/ast';

// Precedence
export { PRECEDENCE_LEVELS, precedenceOf } from './core/precedence';

// Options
export {
  DEFAULT_MAX_DEPTH,
  normalizeTokenizeOptions,
  normalizeParseOptions,
  setDebugDefault,
  isDebugDefault,
} from './core/options';
export type {
  TokenizeOptions,
  NormalizedTokenizeOptions,
  ParseOptions,
  NormalizedParseOptions,
  SourceOptions,
  SourceEncoding,
} from './core/options';

// Errors
export {
  FrontendError,
  LexError,
  JavaSyntaxError,
  InternalUsageError,
  isFrontendError,
  createLexError,
  createSyntaxError,
  createInternalError,
  buildSnippet,
  computeLineAndColumn,
} from './core/errors';
export type { FrontendErrorCode, FrontendErrorOptions } from './core/errors';

// Utilities: inspection
export {
  describeToken,
  qualifiedName,
  childNodes,
  walk,
  analyzeTree,
  formatError,
} from './utils/inspect';
export type { NodeVisitor, TreeInsight, FormattedError } from './utils/inspect';

// Utilities: tracing
export { ProductionTracer, consoleTraceSink, TRACE_PREFIX } from './utils/trace';
export type { TraceSink } from './utils/trace';
