// java-frontend/tests/unit/tokenizer.spec.ts
//
// Unit tests for the tokenizer.
//
// Focus areas:
//  - Classification of words, separators and operators.
//  - Positions (1-based line / column) and doc-comment attachment.
//  - Numeric, string, character and text-block literals.
//  - Unicode-escape pre-pass.
//  - Lexical errors, thrown or collected under `ignoreErrors`.

import { describe, it, expect, vi } from 'vitest';
import { tokenize, Tokenizer } from '@/core/tokenizer';
import { LexError } from '@/core/errors';
import type { Token } from '@/core/tokens';

function lex(source: string): Token[] {
  return [...tokenize(source)];
}

function texts(tokens: Token[]): string[] {
  return tokens.map((t) => t.text);
}

function kinds(tokens: Token[]): string[] {
  return tokens.map((t) => t.kind);
}

function lexError(source: string): LexError {
  try {
    lex(source);
  } catch (err) {
    if (err instanceof LexError) return err;
    throw err;
  }
  throw new Error(`expected a LexError for ${source}`);
}

// -----------------------------------------------------------------------------
// Words, separators and operators
// -----------------------------------------------------------------------------

describe('Tokenizer – classification', () => {
  it('classifies a simple declaration', () => {
    const tokens = lex('int x = 42;');

    expect(texts(tokens)).toEqual(['int', 'x', '=', '42', ';']);
    expect(kinds(tokens)).toEqual([
      'basic-type',
      'identifier',
      'operator',
      'decimal-integer',
      'separator',
    ]);
  });

  it('treats modifiers, keywords and contextual words separately', () => {
    const tokens = lex('public class non-sealed record var yield');

    expect(kinds(tokens)).toEqual([
      'modifier',
      'keyword',
      'modifier',
      'identifier',
      'identifier',
      'identifier',
    ]);
    expect(tokens[2].text).toBe('non-sealed');
  });

  it('keeps `non-sealed` apart when followed by an identifier part', () => {
    expect(texts(lex('non-sealedX'))).toEqual(['non', '-', 'sealedX']);
  });

  it('classifies literals of the fixed vocabularies', () => {
    expect(kinds(lex('true false null'))).toEqual(['boolean', 'boolean', 'null']);
  });

  it('never scans `>>` or `>>>`, but keeps compound assignments', () => {
    expect(texts(lex('a >> b'))).toEqual(['a', '>', '>', 'b']);
    expect(texts(lex('a >>>= b'))).toEqual(['a', '>>>=', 'b']);
  });

  it('uses the longest operator match', () => {
    expect(texts(lex('x->y::z...'))).toEqual(['x', '->', 'y', '::', 'z', '...']);
    expect(texts(lex('i++<=--j'))).toEqual(['i', '++', '<=', '--', 'j']);
  });

  it('scans `@` as an annotation marker', () => {
    const tokens = lex('@Override');

    expect(kinds(tokens)).toEqual(['annotation', 'identifier']);
  });

  it('accepts non-ASCII identifiers', () => {
    const [token] = lex('größe');

    expect(token.kind).toBe('identifier');
    expect(token.text).toBe('größe');
  });
});

// -----------------------------------------------------------------------------
// Positions and doc comments
// -----------------------------------------------------------------------------

describe('Tokenizer – positions', () => {
  it('reports 1-based lines and columns', () => {
    const [a, b] = lex('a\n  b');

    expect(a.position).toEqual({ line: 1, column: 1 });
    expect(b.position).toEqual({ line: 2, column: 3 });
    expect(b.offset).toBe(4);
  });

  it('skips line and block comments', () => {
    expect(texts(lex('a // one\n/* two */ b'))).toEqual(['a', 'b']);
  });

  it('attaches a doc comment to the next token only', () => {
    const [cls, name] = lex('/** Doc */\nclass A');

    expect(cls.javadoc).toBe('/** Doc */');
    expect(name.javadoc).toBeNull();
  });

  it('does not treat `/**/` as a doc comment', () => {
    const [cls] = lex('/**/ class');

    expect(cls.javadoc).toBeNull();
  });
});

// -----------------------------------------------------------------------------
// Numbers
// -----------------------------------------------------------------------------

describe('Tokenizer – numeric literals', () => {
  it('recognises every numeric form', () => {
    const tokens = lex('0x1F 0b1010L 017 09.5 1_000 3.14f 1e10 0x1.8p1 .5 10L 2d');

    expect(texts(tokens)).toEqual([
      '0x1F',
      '0b1010L',
      '017',
      '09.5',
      '1_000',
      '3.14f',
      '1e10',
      '0x1.8p1',
      '.5',
      '10L',
      '2d',
    ]);
    expect(kinds(tokens)).toEqual([
      'hex-integer',
      'binary-integer',
      'octal-integer',
      'decimal-float',
      'decimal-integer',
      'decimal-float',
      'decimal-float',
      'hex-float',
      'decimal-float',
      'decimal-integer',
      'decimal-float',
    ]);
  });

  it('rejects 8 and 9 in octal literals', () => {
    const err = lexError('08');

    expect(err.description).toBe('Invalid octal literal');
    expect(err.message).toBe('Invalid octal literal at "8", line 1: 08');
    expect(err.code).toBe('E_LEX');
  });

  it('requires a binary exponent in hex floats', () => {
    expect(lexError('0x1.8').description).toBe('Invalid hex float literal');
  });

  it('requires digits after an exponent', () => {
    const err = lexError('1e;');

    expect(err.description).toBe('Malformed floating-point literal');
    expect(err.character).toBe('e');
  });
});

// -----------------------------------------------------------------------------
// Strings and characters
// -----------------------------------------------------------------------------

describe('Tokenizer – string and character literals', () => {
  it('keeps the raw lexeme and decodes the value', () => {
    const [token] = lex('"a\\tb"');

    expect(token.kind).toBe('string');
    expect(token.text).toBe('"a\\tb"');
    expect(token.value).toBe('a\tb');
    expect(token.textBlock).toBe(false);
  });

  it('decodes octal escapes', () => {
    const [token] = lex('"\\101\\7\\0"');

    expect(token.value).toBe('A\u0007\u0000');
  });

  it('decodes character literals', () => {
    const [quote, letter] = lex("'\\'' 'x'");

    expect(quote.kind).toBe('character');
    expect(quote.value).toBe("'");
    expect(letter.value).toBe('x');
  });

  it('rejects a literal broken by a newline', () => {
    const err = lexError('"abc\nx');

    expect(err.description).toBe('Unterminated character/string literal');
    expect(err.message).toBe('Unterminated character/string literal at """, line 1: "abc');
    expect(err.line).toBe(1);
    expect(err.column).toBe(1);
  });

  it('rejects an illegal escape', () => {
    const err = lexError('"\\q"');

    expect(err.description).toBe('Illegal escape character');
    expect(err.character).toBe('q');
    expect(err.column).toBe(3);
  });

  it('rejects an empty character literal', () => {
    expect(lexError("''").description).toBe('Empty character literal');
  });
});

// -----------------------------------------------------------------------------
// Text blocks
// -----------------------------------------------------------------------------

describe('Tokenizer – text blocks', () => {
  it('strips incidental indentation and keeps relative indentation', () => {
    const [token] = lex('"""\n    Hello\n      World   \n    """');

    expect(token.kind).toBe('string');
    expect(token.textBlock).toBe(true);
    expect(token.value).toBe('\nHello\n  World\n');
  });

  it('processes escapes after indentation removal', () => {
    const [token] = lex('"""\n  a\\tb \\\n  c"""');

    expect(token.value).toBe('\na\tb c');
  });

  it('positions the token at the opening delimiter', () => {
    const [, block, after] = lex('x """\nab\n""" y');

    expect(block.position).toEqual({ line: 1, column: 3 });
    expect(after.position).toEqual({ line: 3, column: 5 });
  });

  it('rejects an unterminated text block', () => {
    expect(lexError('"""\nabc').description).toBe('Unterminated text block');
  });
});

// -----------------------------------------------------------------------------
// Unicode escapes
// -----------------------------------------------------------------------------

describe('Tokenizer – unicode escapes', () => {
  it('substitutes escapes before classification', () => {
    const [token] = lex('cl\\u0061ss');

    expect(token.kind).toBe('keyword');
    expect(token.text).toBe('class');
  });

  it('accepts several `u` characters', () => {
    expect(lex('\\uuu0041')[0].text).toBe('A');
  });

  it('leaves an escaped backslash alone', () => {
    const [token] = lex('"\\\\u0041"');

    expect(token.value).toBe('\\u0041');
  });

  it('rejects malformed hex digits eagerly', () => {
    expect(() => tokenize('\\u00G1')).toThrow(LexError);
  });
});

// -----------------------------------------------------------------------------
// Input decoding and error collection
// -----------------------------------------------------------------------------

describe('Tokenizer – input and ignoreErrors', () => {
  it('decodes UTF-8 bytes and falls back to Latin-1', () => {
    const utf8 = new TextEncoder().encode('ä');
    const latin1 = Uint8Array.from([0xe4]);

    expect(lex('x')[0].text).toBe('x');
    expect([...tokenize(utf8)][0].text).toBe('ä');
    expect([...tokenize(latin1)][0].text).toBe('ä');
  });

  it('rejects undecodable bytes when UTF-8 is required', () => {
    expect(() => tokenize(Uint8Array.from([0xe4]), { encoding: 'utf-8' })).toThrow(
      'Could not decode input data',
    );
  });

  it('collects errors and keeps scanning under ignoreErrors', () => {
    const onError = vi.fn();
    const tokenizer = new Tokenizer('a # b', { ignoreErrors: true, onError });

    expect([...tokenizer.tokens()].map((t) => t.text)).toEqual(['a', 'b']);
    expect(tokenizer.errors).toHaveLength(1);
    expect(tokenizer.errors[0].description).toBe('Could not process token');
    expect(tokenizer.errors[0].column).toBe(3);
    expect(onError).toHaveBeenCalledTimes(1);
  });

  it('accepts a boolean shorthand for ignoreErrors', () => {
    expect([...tokenize('a # b', true)].map((t) => t.text)).toEqual(['a', 'b']);
  });

  it('throws lazily, when the bad character is reached', () => {
    const tokens = tokenize('a #');

    expect(tokens.next().value).toMatchObject({ text: 'a' });
    expect(() => tokens.next()).toThrow(LexError);
  });
});
