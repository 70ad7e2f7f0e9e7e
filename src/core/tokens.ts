/**
 * java-frontend – Token model
 *
 * Shared token shapes and lexical classification tables used by the
 * tokenizer, the lookahead cursor and the parser.
 *
 * Token kinds:
 *  - "identifier"                        – names, including contextual words
 *                                          (var, yield, record, permits, when)
 *  - "keyword" / "modifier" / "basic-type"
 *  - "decimal-integer" / "octal-integer" / "binary-integer" / "hex-integer"
 *  - "decimal-float" / "hex-float"
 *  - "boolean" / "character" / "string" / "null"
 *  - "separator" / "operator" / "annotation"
 *  - "eof"                               – the shared end-of-input sentinel
 *
 * The tables themselves live in `lexicon.json`.
 *
 * License: Apache-2.0
 */

import lexicon from './lexicon.json';

/////////////////////
// Public types    //
/////////////////////

export type TokenKind =
  | 'identifier'
  | 'keyword'
  | 'modifier'
  | 'basic-type'
  | 'decimal-integer'
  | 'octal-integer'
  | 'binary-integer'
  | 'hex-integer'
  | 'decimal-float'
  | 'hex-float'
  | 'boolean'
  | 'character'
  | 'string'
  | 'null'
  | 'separator'
  | 'operator'
  | 'annotation';

export type LiteralKind =
  | 'decimal-integer'
  | 'octal-integer'
  | 'binary-integer'
  | 'hex-integer'
  | 'decimal-float'
  | 'hex-float'
  | 'boolean'
  | 'character'
  | 'string'
  | 'null';

/**
 * 1-based line and column. Columns count UTF-16 code units.
 */
export interface Position {
  readonly line: number;
  readonly column: number;
}

export interface Token {
  readonly kind: TokenKind;

  /**
   * The lexeme exactly as scanned, after unicode-escape substitution.
   * String and character literals keep their delimiters.
   */
  readonly text: string;

  /**
   * Decoded content for string, character and text-block literals;
   * identical to `text` for everything else.
   */
  readonly value: string;

  readonly position: Position;

  /** 0-based offset into the unicode-substituted buffer. */
  readonly offset: number;

  /** Raw `/** ... *\/` comment that directly preceded this token. */
  readonly javadoc: string | null;

  readonly textBlock: boolean;
}

/**
 * Sentinel returned by the cursor past the last real token.
 */
export interface EndOfInput {
  readonly kind: 'eof';
  readonly text: '';
  readonly value: '';
  readonly position: null;
  readonly offset: -1;
  readonly javadoc: null;
  readonly textBlock: false;
}

export type Lexeme = Token | EndOfInput;

export const END_OF_INPUT: EndOfInput = Object.freeze({
  kind: 'eof',
  text: '',
  value: '',
  position: null,
  offset: -1,
  javadoc: null,
  textBlock: false,
} as const);

export function isEndOfInput(token: Lexeme): token is EndOfInput {
  return token.kind === 'eof';
}

/////////////////////////
// Expected tokens     //
/////////////////////////

/**
 * What a parser step expects to see next: a literal lexeme (`tok('(')`)
 * or any token of a kind (`kind('identifier')`).
 */
export type ExpectedToken =
  | { readonly by: 'text'; readonly text: string }
  | { readonly by: 'kind'; readonly kind: TokenKind };

export function tok(text: string): ExpectedToken {
  return { by: 'text', text };
}

export function kind(k: TokenKind): ExpectedToken {
  return { by: 'kind', kind: k };
}

/**
 * Text matching compares the raw lexeme, so the string literal `"("`
 * never matches `tok('(')`.
 */
export function matchesExpected(token: Lexeme, expected: ExpectedToken): boolean {
  if (isEndOfInput(token)) return false;
  return expected.by === 'text'
    ? token.text === expected.text
    : token.kind === expected.kind;
}

export function describeExpected(expected: ExpectedToken): string {
  return expected.by === 'text' ? `'${expected.text}'` : expected.kind;
}

/////////////////////////
// Classification      //
/////////////////////////

export const KEYWORDS: ReadonlySet<string> = new Set(lexicon.keywords);
export const MODIFIERS: ReadonlySet<string> = new Set(lexicon.modifiers);
export const BASIC_TYPES: ReadonlySet<string> = new Set(lexicon.basicTypes);
export const BOOLEANS: ReadonlySet<string> = new Set(lexicon.booleans);
export const SEPARATORS: ReadonlySet<string> = new Set(lexicon.separators);
export const OPERATORS: ReadonlySet<string> = new Set(lexicon.operators);

export const INFIX_OPERATORS: ReadonlySet<string> = new Set(lexicon.infixOperators);
export const PREFIX_OPERATORS: ReadonlySet<string> = new Set(lexicon.prefixOperators);
export const POSTFIX_OPERATORS: ReadonlySet<string> = new Set(lexicon.postfixOperators);
export const ASSIGNMENT_OPERATORS: ReadonlySet<string> = new Set(
  lexicon.assignmentOperators,
);

export const MAX_OPERATOR_LENGTH = lexicon.operators.reduce(
  (max, op) => Math.max(max, op.length),
  0,
);

const LITERAL_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  'decimal-integer',
  'octal-integer',
  'binary-integer',
  'hex-integer',
  'decimal-float',
  'hex-float',
  'boolean',
  'character',
  'string',
  'null',
]);

export function isLiteralToken(
  token: Lexeme,
): token is Token & { readonly kind: LiteralKind } {
  return !isEndOfInput(token) && LITERAL_KINDS.has(token.kind);
}

/**
 * Classify a scanned word. Modifiers win over keywords, basic types
 * over both.
 */
export function classifyWord(word: string): TokenKind {
  if (BASIC_TYPES.has(word)) return 'basic-type';
  if (MODIFIERS.has(word)) return 'modifier';
  if (KEYWORDS.has(word)) return 'keyword';
  if (BOOLEANS.has(word)) return 'boolean';
  if (word === 'null') return 'null';
  return 'identifier';
}
