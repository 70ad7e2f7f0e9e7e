/**
 * java-frontend – Tokenizer core
 *
 * Turns Java source text into a lazy stream of tokens.
 *
 * Pipeline:
 *  - byte input is decoded (UTF-8, falling back to Latin-1);
 *  - `\uXXXX` escapes are substituted over the whole buffer;
 *  - the scanner yields one token per `next()` of the generator.
 *
 * Scanning order at each position: whitespace, comments, `...`, `@`,
 * `.5`-style floats, separators, text blocks / strings / characters,
 * numbers, identifiers and words, operators (longest first).
 *
 * `/** ... *\/` comments are kept and attached to the next token as
 * `javadoc`. Columns are 1-based and count UTF-16 code units.
 *
 * License: Apache-2.0
 */

import { Buffer } from 'node:buffer';

import { LexError, computeLineAndColumn, createLexError } from './errors';
import { decodeEscapes, processTextBlock } from './literals';
import type { NormalizedTokenizeOptions, SourceEncoding, TokenizeOptions } from './options';
import { normalizeTokenizeOptions } from './options';
import type { Token, TokenKind } from './tokens';
import { MAX_OPERATOR_LENGTH, OPERATORS, SEPARATORS, classifyWord } from './tokens';

/////////////////////
// Public API      //
/////////////////////

/**
 * Tokenize Java source lazily.
 *
 * A boolean second argument is shorthand for `{ ignoreErrors }`.
 *
 * Throws (unless `ignoreErrors`):
 *  - LexError on the first lexical error, when the generator reaches it.
 */
export function tokenize(
  source: string | Uint8Array,
  options?: TokenizeOptions | boolean,
): Generator<Token, void, undefined> {
  return new Tokenizer(source, options).tokens();
}

/////////////////////
// Implementation  //
/////////////////////

export class Tokenizer {
  /** Errors collected under `ignoreErrors`, in source order. */
  readonly errors: LexError[] = [];

  private readonly options: NormalizedTokenizeOptions;
  private readonly data: string;
  private readonly len: number;

  private pos = 0;
  private line = 1;
  /** Index of the last `\n` before `pos`, or -1. */
  private lastNewline = -1;
  private pendingJavadoc: string | null = null;

  constructor(source: string | Uint8Array, options?: TokenizeOptions | boolean) {
    this.options = normalizeTokenizeOptions(options);
    const text = typeof source === 'string' ? source : this.decode(source);
    this.data = this.substituteUnicodeEscapes(text);
    this.len = this.data.length;
  }

  /**
   * The buffer the scanner works on, after unicode-escape substitution.
   * Token offsets and positions refer to it.
   */
  get text(): string {
    return this.data;
  }

  *tokens(): Generator<Token, void, undefined> {
    while (this.pos < this.len) {
      const token = this.next();
      if (token) yield token;
    }
  }

  /**
   * Scan from the current position. Returns `null` when only trivia (or
   * an ignored error) was consumed.
   */
  private next(): Token | null {
    const data = this.data;
    const start = this.pos;
    const ch = data.charCodeAt(start);
    const next = start + 1 < this.len ? data.charCodeAt(start + 1) : -1;

    if (isWhitespace(data[start])) {
      let j = start + 1;
      while (j < this.len && isWhitespace(data[j])) j++;
      this.advanceTo(j);
      return null;
    }

    // Comments: // and /* */
    if (ch === 47 /* / */ && (next === 47 /* / */ || next === 42 /* * */)) {
      this.skipComment(start, next === 42);
      return null;
    }

    if (data.startsWith('...', start)) {
      return this.emit('operator', start, start + 3);
    }

    if (ch === 64 /* @ */) {
      return this.emit('annotation', start, start + 1);
    }

    // Float starting with a dot: .5
    if (ch === 46 /* . */ && isDigit(next)) {
      return this.readDecimal(start);
    }

    if (SEPARATORS.has(data[start])) {
      return this.emit('separator', start, start + 1);
    }

    if (data.startsWith('"""', start)) {
      return this.readTextBlock(start);
    }

    if (ch === 34 /* " */ || ch === 39 /* ' */) {
      return this.readQuoted(start);
    }

    if (isDigit(ch)) {
      return this.readNumber(start);
    }

    const cp = data.codePointAt(start) ?? ch;
    if (isIdentifierStart(cp)) {
      return this.readWord(start, cp);
    }

    for (let l = Math.min(MAX_OPERATOR_LENGTH, this.len - start); l > 0; l--) {
      const candidate = data.slice(start, start + l);
      if (OPERATORS.has(candidate)) {
        return this.emit('operator', start, start + l);
      }
    }

    this.error('Could not process token', start);
    this.advanceTo(start + (cp > 0xffff ? 2 : 1));
    return null;
  }

  ///////////////////////
  // Bookkeeping       //
  ///////////////////////

  /** Move to `end`, counting the newlines passed over. */
  private advanceTo(end: number): void {
    for (let i = this.pos; i < end; i++) {
      if (this.data.charCodeAt(i) === 10 /* \n */) {
        this.line++;
        this.lastNewline = i;
      }
    }
    this.pos = end;
  }

  private emit(
    kind: TokenKind,
    start: number,
    end: number,
    value?: string,
    textBlock = false,
  ): Token {
    const text = this.data.slice(start, end);
    const token: Token = {
      kind,
      text,
      value: value ?? text,
      position: { line: this.line, column: start - this.lastNewline },
      offset: start,
      javadoc: this.pendingJavadoc,
      textBlock,
    };
    this.pendingJavadoc = null;
    this.advanceTo(end);
    return token;
  }

  /**
   * Throw, or record the error under `ignoreErrors`.
   */
  private error(description: string, at: number, character?: string): void {
    const err = lexErrorAt(this.data, description, at, character);
    if (!this.options.ignoreErrors) throw err;
    this.errors.push(err);
    this.options.onError?.(err);
  }

  ////////////////////////////
  // Input preparation      //
  ////////////////////////////

  private decode(bytes: Uint8Array): string {
    const encoding: SourceEncoding = this.options.encoding;
    if (encoding === 'latin1') return decodeLatin1(bytes);

    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (cause) {
      if (encoding === 'auto') return decodeLatin1(bytes);
      const err = createLexError({
        description: 'Could not decode input data',
        character: '',
        lineText: '',
        position: { line: 1, column: 1 },
        cause,
      });
      if (!this.options.ignoreErrors) throw err;
      this.errors.push(err);
      this.options.onError?.(err);
      return decodeLatin1(bytes);
    }
  }

  /**
   * Replace `\uXXXX` (any number of `u`) unless the backslash is itself
   * escaped, i.e. preceded by an odd run of backslashes.
   */
  private substituteUnicodeEscapes(text: string): string {
    if (!text.includes('\\u')) return text;

    let out = '';
    let run = 0;
    let i = 0;

    while (i < text.length) {
      const ch = text[i];
      if (ch !== '\\') {
        run = 0;
        out += ch;
        i++;
        continue;
      }

      if (text[i + 1] === 'u' && run % 2 === 0) {
        let j = i + 1;
        while (text[j] === 'u') j++;
        const hex = text.slice(j, j + 4);
        if (/^[0-9a-fA-F]{4}$/.test(hex)) {
          out += String.fromCharCode(parseInt(hex, 16));
          run = 0;
          i = j + 4;
          continue;
        }
        const err = lexErrorAt(text, 'Invalid unicode escape', i);
        if (!this.options.ignoreErrors) throw err;
        this.errors.push(err);
        this.options.onError?.(err);
      }

      run++;
      out += ch;
      i++;
    }

    return out;
  }

  ///////////////////////
  // Trivia            //
  ///////////////////////

  private skipComment(start: number, block: boolean): void {
    const data = this.data;

    if (!block) {
      const eol = data.indexOf('\n', start + 2);
      this.advanceTo(eol < 0 ? this.len : eol);
      return;
    }

    const close = data.indexOf('*/', start + 2);
    if (close < 0) {
      this.error('Unterminated block comment', start);
      this.advanceTo(this.len);
      return;
    }

    const comment = data.slice(start, close + 2);
    if (comment.startsWith('/**') && comment !== '/**/') {
      this.pendingJavadoc = comment;
    }
    this.advanceTo(close + 2);
  }

  ///////////////////////
  // Token readers     //
  ///////////////////////

  private readWord(start: number, firstCodePoint: number): Token {
    const data = this.data;
    let j = start + codePointWidth(firstCodePoint);
    while (j < this.len) {
      const cp = data.codePointAt(j) ?? 0;
      if (!isIdentifierPart(cp)) break;
      j += codePointWidth(cp);
    }

    let word = data.slice(start, j);

    if (word === 'non' && data.startsWith('-sealed', j)) {
      const after = j + '-sealed'.length;
      const cp = after < this.len ? data.codePointAt(after) ?? 0 : -1;
      if (cp < 0 || !isIdentifierPart(cp)) {
        j = after;
        word = 'non-sealed';
      }
    }

    return this.emit(classifyWord(word), start, j);
  }

  private readQuoted(start: number): Token {
    const data = this.data;
    const quote = data[start];
    let j = start + 1;
    let closed = false;

    while (j < this.len) {
      const c = data[j];
      if (c === '\n' || c === '\r') break;
      if (c === quote) {
        closed = true;
        break;
      }
      if (c === '\\' && j + 1 < this.len && data[j + 1] !== '\n' && data[j + 1] !== '\r') {
        j += 2;
        continue;
      }
      j++;
    }

    if (!closed) {
      this.error('Unterminated character/string literal', start);
    }

    const bodyStart = start + 1;
    const body = data.slice(bodyStart, j);
    const end = closed ? j + 1 : j;

    if (quote === "'" && closed && body.length === 0) {
      this.error('Empty character literal', start);
    }

    const value = decodeEscapes(body, (offset, character) =>
      this.error('Illegal escape character', bodyStart + offset, character),
    );

    return this.emit(quote === '"' ? 'string' : 'character', start, end, value);
  }

  private readTextBlock(start: number): Token {
    const data = this.data;
    const contentStart = start + 3;
    let j = contentStart;
    let close = -1;

    while (j < this.len) {
      if (data[j] === '\\') {
        j += 2;
        continue;
      }
      if (data.startsWith('"""', j)) {
        close = j;
        break;
      }
      j++;
    }

    if (close < 0) {
      this.error('Unterminated text block', start);
    }

    const contentEnd = close < 0 ? this.len : close;
    const end = close < 0 ? this.len : close + 3;

    const value = processTextBlock(data.slice(contentStart, contentEnd), (_offset, character) =>
      this.error('Illegal escape character', start, character),
    );

    return this.emit('string', start, end, value, true);
  }

  private readNumber(start: number): Token {
    const data = this.data;
    const n = data[start + 1];

    if (data[start] === '0' && (n === 'x' || n === 'X')) {
      return this.readHex(start);
    }

    if (data[start] === '0' && (n === 'b' || n === 'B')) {
      const end = this.readIntegerSuffix(this.readDigits(start + 2, isBinaryDigit));
      return this.emit('binary-integer', start, end);
    }

    if (data[start] === '0' && isDigit(data.charCodeAt(start + 1))) {
      const digitsEnd = this.readDigits(start, isDigit);
      if (isFloatContinuation(data[digitsEnd])) {
        return this.readDecimal(start);
      }
      const text = data.slice(start, digitsEnd);
      if (/[89]/.test(text)) {
        this.error('Invalid octal literal', start + text.search(/[89]/));
      }
      return this.emit('octal-integer', start, this.readIntegerSuffix(digitsEnd));
    }

    return this.readDecimal(start);
  }

  private readDecimal(start: number): Token {
    const data = this.data;
    let j = this.readDigits(start, isDigit);

    if (isLongSuffix(data[j])) {
      return this.emit('decimal-integer', start, j + 1);
    }

    let float = false;

    if (data[j] === '.') {
      float = true;
      j = this.readDigits(j + 1, isDigit);
    }

    if (data[j] === 'e' || data[j] === 'E') {
      float = true;
      j = this.readExponent(j);
    }

    if (isFloatSuffix(data[j])) {
      float = true;
      j++;
    }

    return this.emit(float ? 'decimal-float' : 'decimal-integer', start, j);
  }

  private readHex(start: number): Token {
    const data = this.data;
    let j = this.readDigits(start + 2, isHexDigit);

    if (isLongSuffix(data[j])) {
      return this.emit('hex-integer', start, j + 1);
    }

    const c = data[j];
    if (c !== '.' && c !== 'p' && c !== 'P') {
      return this.emit('hex-integer', start, j);
    }

    if (c === '.') {
      j = this.readDigits(j + 1, isHexDigit);
    }

    if (data[j] === 'p' || data[j] === 'P') {
      j = this.readExponent(j);
    } else {
      this.error('Invalid hex float literal', j);
    }

    if (isFloatSuffix(data[j])) j++;

    return this.emit('hex-float', start, j);
  }

  /**
   * `at` points at the exponent letter. Returns the index after the
   * exponent digits.
   */
  private readExponent(at: number): number {
    let k = at + 1;
    if (this.data[k] === '+' || this.data[k] === '-') k++;
    const end = this.readDigits(k, isDigit);
    if (end === k) {
      this.error('Malformed floating-point literal', at);
    }
    return end;
  }

  /**
   * Digits accepted by `accept`, with `_` allowed between digits.
   */
  private readDigits(from: number, accept: (ch: number) => boolean): number {
    const data = this.data;
    let j = from;
    while (j < this.len) {
      const ch = data.charCodeAt(j);
      if (accept(ch)) {
        j++;
        continue;
      }
      if (ch === 95 /* _ */ && j > from) {
        let k = j;
        while (data.charCodeAt(k) === 95) k++;
        if (k < this.len && accept(data.charCodeAt(k))) {
          j = k;
          continue;
        }
      }
      break;
    }
    return j;
  }

  private readIntegerSuffix(at: number): number {
    return isLongSuffix(this.data[at]) ? at + 1 : at;
  }
}

////////////////////////////
// Error helpers          //
////////////////////////////

function lexErrorAt(
  text: string,
  description: string,
  at: number,
  character?: string,
): LexError {
  const position = computeLineAndColumn(text, at);
  const lineStart = at - position.column + 1;
  const lineEnd = text.indexOf('\n', lineStart);
  const lineText = text.slice(lineStart, lineEnd < 0 ? text.length : lineEnd);

  return createLexError({
    description,
    character: character ?? text[at] ?? '',
    lineText,
    position,
    source: text,
  });
}

function decodeLatin1(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
}

////////////////////////////
// Character classification
////////////////////////////

const WHITESPACE = /\s/;
const IDENTIFIER_START = /[\p{Lu}\p{Ll}\p{Lt}\p{Lm}\p{Lo}\p{Nl}\p{Pc}\p{Sc}]/u;
const IDENTIFIER_PART = /[\p{Lu}\p{Ll}\p{Lt}\p{Lm}\p{Lo}\p{Nl}\p{Pc}\p{Sc}\p{Mn}\p{Mc}\p{Nd}]/u;

function isWhitespace(ch: string | undefined): boolean {
  return ch !== undefined && WHITESPACE.test(ch);
}

function isDigit(ch: number): boolean {
  return ch >= 48 && ch <= 57; // 0-9
}

function isHexDigit(ch: number): boolean {
  return (
    isDigit(ch) ||
    (ch >= 65 && ch <= 70) || // A-F
    (ch >= 97 && ch <= 102) // a-f
  );
}

function isBinaryDigit(ch: number): boolean {
  return ch === 48 || ch === 49;
}

function isIdentifierStart(cp: number): boolean {
  return IDENTIFIER_START.test(String.fromCodePoint(cp));
}

function isIdentifierPart(cp: number): boolean {
  return IDENTIFIER_PART.test(String.fromCodePoint(cp));
}

function codePointWidth(cp: number): number {
  return cp > 0xffff ? 2 : 1;
}

function isLongSuffix(ch: string | undefined): boolean {
  return ch === 'l' || ch === 'L';
}

function isFloatSuffix(ch: string | undefined): boolean {
  return ch === 'f' || ch === 'F' || ch === 'd' || ch === 'D';
}

function isFloatContinuation(ch: string | undefined): boolean {
  return ch === '.' || ch === 'e' || ch === 'E' || isFloatSuffix(ch);
}
