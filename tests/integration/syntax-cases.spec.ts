// java-frontend/tests/integration/syntax-cases.spec.ts
//
// Table-driven coverage of the language constructs the parser accepts,
// plus the main failure categories.

import { describe, it, expect } from 'vitest';
import {
  FrontendError,
  JavaSyntaxError,
  LexError,
  parseSource,
  tokenize,
  Tokenizer,
} from '../../src';

// -----------------------------------------------------------------------------
// Accepted sources
// -----------------------------------------------------------------------------

const ACCEPTED: [string, string][] = [
  ['generic class with bounds', 'class Box<T extends Comparable<? super T>> { T value; }'],
  ['interface with default method', 'interface Greeter { default String hi() { return "hi"; } }'],
  ['enum with constructor', 'enum Coin { PENNY(1), DIME(10); final int cents; Coin(int c) { cents = c; } }'],
  ['annotation type', '@interface Tag { String value() default ""; int[] ids() default {}; }'],
  ['sealed hierarchy', 'sealed interface S permits A {} final class A implements S {}'],
  ['record', 'record Pair<L, R>(L left, R right) implements java.io.Serializable {}'],
  ['lambdas and method references', 'class L { Runnable r = () -> {}; Function<String, Integer> f = String::length; }'],
  ['anonymous class', 'class L { Object o = new Object() { public String toString() { return ""; } }; }'],
  ['array creation', 'class L { int[][] grid = new int[3][]; String[] names = { "a", "b", }; }'],
  ['labelled loops', 'class L { void m() { outer: for (int i = 0; i < 3; i++) { while (true) continue outer; } } }'],
  ['try with resources', 'class L { void m() { try (var in = open(); out) { use(in); } catch (IOException | RuntimeException e) { } finally { } } }'],
  ['switch patterns', 'class L { int m(Object o) { return switch (o) { case Integer i when i > 0 -> i; default -> 0; }; } }'],
  ['unicode-escaped keyword', '\\u0063lass Escaped {}'],
];

describe('Syntax cases – accepted', () => {
  it.each(ACCEPTED)('parses %s', (_name, source) => {
    const unit = parseSource(source);

    expect(unit.types.length).toBeGreaterThan(0);
  });

  it('resolves unicode escapes before classifying words', () => {
    expect(parseSource('\\u0063lass Escaped {}').types[0]).toMatchObject({
      type: 'ClassDeclaration',
      name: 'Escaped',
    });
  });
});

// -----------------------------------------------------------------------------
// Rejected sources
// -----------------------------------------------------------------------------

type ErrorClass = typeof LexError | typeof JavaSyntaxError;

const REJECTED: [string, ErrorClass, string][] = [
  ['class A {', JavaSyntaxError, 'Unexpected end of input'],
  ['class A { int x = ; }', JavaSyntaxError, 'Expected expression'],
  ['class A { void m()[] {} }', JavaSyntaxError, 'Array dimensions on a void method'],
  ['class A { String s = "abc; }', LexError, 'Unterminated character/string literal'],
  ['class A { int x = #; }', LexError, 'Could not process token'],
];

describe('Syntax cases – rejected', () => {
  it.each(REJECTED)('rejects %j', (source, errorClass, message) => {
    expect(() => parseSource(source)).toThrow(errorClass);
    expect(() => parseSource(source)).toThrow(message);
    expect(() => parseSource(source)).toThrow(FrontendError);
  });
});

// -----------------------------------------------------------------------------
// Best-effort tokenizing
// -----------------------------------------------------------------------------

describe('Syntax cases – best-effort tokenizing', () => {
  it('collects lexical errors and keeps going', () => {
    const tokenizer = new Tokenizer('int # x;', { ignoreErrors: true });
    const texts = [...tokenizer.tokens()].map((t) => t.text);

    expect(texts).toEqual(['int', 'x', ';']);
    expect(tokenizer.errors.map((e) => e.description)).toEqual(['Could not process token']);
  });

  it('throws on the first error by default', () => {
    expect(() => [...tokenize('int # x;')]).toThrow(LexError);
  });
});
