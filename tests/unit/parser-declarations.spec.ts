// java-frontend/tests/unit/parser-declarations.spec.ts
//
// Unit tests for declarations: package, imports, classes, interfaces,
// enums, annotation types, records, members and top-level methods.

import { describe, it, expect } from 'vitest';
import { parseSource } from '@/index';
import { qualifiedName } from '@/utils/inspect';
import { nodeOf } from '../helpers/nodes';

// -----------------------------------------------------------------------------
// Compilation unit
// -----------------------------------------------------------------------------

describe('Parser – compilation unit', () => {
  it('parses a single empty class', () => {
    const unit = parseSource('class A {}');

    expect(unit.types).toHaveLength(1);
    expect(unit.types[0].type).toBe('ClassDeclaration');
    expect(unit.types[0].name).toBe('A');
    expect(unit.package).toBeNull();
    expect(unit.imports).toEqual([]);
  });

  it('parses package, imports and doc comments', () => {
    const unit = parseSource(
      [
        '/** Package docs */',
        'package com.example.app;',
        '',
        'import java.util.List;',
        'import static java.lang.Math.*;',
        '',
        '/** A greeter. */',
        'public final class Greeter {}',
      ].join('\n'),
    );

    expect(unit.package?.name).toBe('com.example.app');
    expect(unit.package?.documentation).toBe('/** Package docs */');
    expect(unit.package?.position).toEqual({ line: 2, column: 1 });

    expect(unit.imports.map((i) => [i.path, i.static, i.wildcard])).toEqual([
      ['java.util.List', false, false],
      ['java.lang.Math', true, true],
    ]);

    const cls = nodeOf(unit.types[0], 'ClassDeclaration');
    expect(cls.modifiers).toEqual(['public', 'final']);
    expect(cls.documentation).toBe('/** A greeter. */');
  });

  it('parses an annotated package declaration', () => {
    const unit = parseSource('@Generated package a.b;');

    expect(unit.package?.annotations.map((a) => a.name)).toEqual(['Generated']);
    expect(unit.package?.name).toBe('a.b');
  });

  it('skips stray semicolons and collects top-level methods', () => {
    const unit = parseSource(';; void helper() {} int twice(int v) { return v * 2; } ;');

    expect(unit.types).toEqual([]);
    expect(unit.methods.map((m) => m.name)).toEqual(['helper', 'twice']);
    expect(unit.methods[0].returnType).toBeNull();
  });

  it('parses empty input', () => {
    const unit = parseSource('');

    expect(unit.types).toEqual([]);
    expect(unit.position).toEqual({ line: 1, column: 1 });
  });
});

// -----------------------------------------------------------------------------
// Classes and members
// -----------------------------------------------------------------------------

describe('Parser – classes', () => {
  const source = [
    'public class Greeter<T extends Comparable<T>> extends Base implements Runnable, AutoCloseable {',
    '  private static final int COUNT = 1, OTHER[] = {1, 2};',
    '  static { init(); }',
    '  { count++; }',
    '  public Greeter(String name) throws java.io.IOException { super(name); }',
    '  public <R> R map(T value, String... rest)[] { return null; }',
    '  abstract void run();',
    '  <E> Greeter(E e) { this(); }',
    '  class Inner {}',
    '}',
  ].join('\n');

  const cls = nodeOf(parseSource(source).types[0], 'ClassDeclaration');

  it('parses the header', () => {
    expect(cls.name).toBe('Greeter');
    expect(cls.typeParameters.map((p) => p.name)).toEqual(['T']);

    const bound = cls.typeParameters[0].extends[0];
    expect(bound.name).toBe('Comparable');
    expect(bound.arguments?.[0].argumentType).toMatchObject({ type: 'ReferenceType', name: 'T' });

    expect(cls.extends?.name).toBe('Base');
    expect(cls.implements.map((t) => t.name)).toEqual(['Runnable', 'AutoCloseable']);
  });

  it('lists members in order', () => {
    expect(cls.body.map((m) => m.type)).toEqual([
      'FieldDeclaration',
      'InitializerBlock',
      'InitializerBlock',
      'ConstructorDeclaration',
      'MethodDeclaration',
      'MethodDeclaration',
      'ConstructorDeclaration',
      'ClassDeclaration',
    ]);
  });

  it('parses field declarators with their own dimensions', () => {
    const field = nodeOf(cls.body[0], 'FieldDeclaration');

    expect(field.modifiers).toEqual(['private', 'static', 'final']);
    expect(field.fieldType).toMatchObject({ type: 'BasicType', name: 'int', dimensions: 0 });
    expect(field.declarators.map((d) => [d.name, d.dimensions])).toEqual([
      ['COUNT', 0],
      ['OTHER', 1],
    ]);
    expect(nodeOf(field.declarators[1].initializer, 'ArrayInitializer').initializers).toHaveLength(2);
  });

  it('parses static and instance initializers', () => {
    expect(nodeOf(cls.body[1], 'InitializerBlock').static).toBe(true);
    expect(nodeOf(cls.body[2], 'InitializerBlock').static).toBe(false);
  });

  it('parses constructors', () => {
    const ctor = nodeOf(cls.body[3], 'ConstructorDeclaration');

    expect(ctor.name).toBe('Greeter');
    expect(ctor.parameters.map((p) => p.name)).toEqual(['name']);
    expect(ctor.throws).toEqual(['java.io.IOException']);

    const call = nodeOf(ctor.body[0], 'StatementExpression');
    expect(call.expression.type).toBe('SuperConstructorInvocation');

    const generic = nodeOf(cls.body[6], 'ConstructorDeclaration');
    expect(generic.typeParameters.map((p) => p.name)).toEqual(['E']);
    expect(nodeOf(generic.body[0], 'StatementExpression').expression.type).toBe(
      'ExplicitConstructorInvocation',
    );
  });

  it('parses generic methods with varargs and trailing dimensions', () => {
    const method = nodeOf(cls.body[4], 'MethodDeclaration');

    expect(method.typeParameters.map((p) => p.name)).toEqual(['R']);
    expect(method.returnType).toMatchObject({ type: 'ReferenceType', name: 'R', dimensions: 1 });
    expect(method.parameters.map((p) => [p.name, p.varargs])).toEqual([
      ['value', false],
      ['rest', true],
    ]);
    expect(nodeOf(method.body?.[0], 'ReturnStatement').expression).toMatchObject({
      type: 'Literal',
      kind: 'null',
    });
  });

  it('parses abstract methods without a body', () => {
    const method = nodeOf(cls.body[5], 'MethodDeclaration');

    expect(method.modifiers).toEqual(['abstract']);
    expect(method.returnType).toBeNull();
    expect(method.body).toBeNull();
  });

  it('de-duplicates repeated modifiers', () => {
    const unit = parseSource('public public class A {}');

    expect(unit.types[0].modifiers).toEqual(['public']);
  });

  it('keeps annotations and their elements', () => {
    const unit = parseSource(
      '@Deprecated @SuppressWarnings({"a", "b"}) @Range(min = 1, max = 2) class A {}',
    );
    const [plain, single, pairs] = unit.types[0].annotations;

    expect(plain.name).toBe('Deprecated');
    expect(plain.element).toBeNull();

    expect(single.element).toMatchObject({ type: 'ElementArrayValue', values: [{ value: 'a' }, { value: 'b' }] });

    expect(pairs.element).toMatchObject([
      { type: 'ElementValuePair', name: 'min', value: { type: 'Literal', text: '1' } },
      { type: 'ElementValuePair', name: 'max', value: { type: 'Literal', text: '2' } },
    ]);
  });

  it('parses sealed hierarchies with permits', () => {
    const unit = parseSource('sealed class S permits A, B {} non-sealed class A extends S {}');
    const sealed = nodeOf(unit.types[0], 'ClassDeclaration');

    expect(sealed.modifiers).toEqual(['sealed']);
    expect(sealed.permits.map((t) => t.name)).toEqual(['A', 'B']);
    expect(unit.types[1].modifiers).toEqual(['non-sealed']);
  });
});

// -----------------------------------------------------------------------------
// Interfaces, enums, annotation types, records
// -----------------------------------------------------------------------------

describe('Parser – interfaces', () => {
  it('parses constants, abstract, default and static methods', () => {
    const unit = parseSource(
      [
        'public sealed interface Shape extends Comparable<Shape>, Cloneable permits Circle, Square {',
        '  double PI = 3.14;',
        '  double area();',
        '  default String label() { return "shape"; }',
        '  static Shape unit() { return null; }',
        '}',
      ].join('\n'),
    );
    const shape = nodeOf(unit.types[0], 'InterfaceDeclaration');

    expect(shape.modifiers).toEqual(['public', 'sealed']);
    expect(shape.extends.map((t) => t.name)).toEqual(['Comparable', 'Cloneable']);
    expect(shape.permits.map((t) => t.name)).toEqual(['Circle', 'Square']);
    expect(shape.body.map((m) => m.type)).toEqual([
      'ConstantDeclaration',
      'MethodDeclaration',
      'MethodDeclaration',
      'MethodDeclaration',
    ]);
    expect(nodeOf(shape.body[1], 'MethodDeclaration').body).toBeNull();
    expect(nodeOf(shape.body[2], 'MethodDeclaration').modifiers).toEqual(['default']);
  });

  it('requires interface constants to be initialized', () => {
    expect(() => parseSource('interface I { int X; }')).toThrow("Expected '='");
  });
});

describe('Parser – enums', () => {
  const unit = parseSource(
    [
      'enum Color implements Named {',
      '  /** red */ RED("r") { void paint() {} },',
      '  @Deprecated GREEN,',
      '  BLUE;',
      '  private final String code;',
      '  Color() { this("x"); }',
      '}',
    ].join('\n'),
  );
  const color = nodeOf(unit.types[0], 'EnumDeclaration');

  it('parses constants with arguments, bodies, annotations and docs', () => {
    expect(color.implements.map((t) => t.name)).toEqual(['Named']);
    expect(color.constants.map((c) => c.name)).toEqual(['RED', 'GREEN', 'BLUE']);

    const [red, green, blue] = color.constants;
    expect(red.documentation).toBe('/** red */');
    expect(red.arguments).toHaveLength(1);
    expect(red.body?.map((m) => m.type)).toEqual(['MethodDeclaration']);
    expect(green.annotations.map((a) => a.name)).toEqual(['Deprecated']);
    expect(blue.arguments).toBeNull();
    expect(blue.body).toBeNull();
  });

  it('parses body declarations after the constants', () => {
    expect(color.body.map((m) => m.type)).toEqual(['FieldDeclaration', 'ConstructorDeclaration']);
  });

  it('accepts a trailing comma without a body', () => {
    const e = nodeOf(parseSource('enum E { A, B, }').types[0], 'EnumDeclaration');

    expect(e.constants.map((c) => c.name)).toEqual(['A', 'B']);
    expect(e.body).toEqual([]);
  });
});

describe('Parser – annotation types', () => {
  it('parses elements with defaults and constants', () => {
    const unit = parseSource(
      [
        '@interface Config {',
        '  String name() default "x";',
        '  int[] sizes() default {1, 2};',
        '  int LIMIT = 3;',
        '}',
      ].join('\n'),
    );
    const config = nodeOf(unit.types[0], 'AnnotationDeclaration');
    const name = nodeOf(config.body[0], 'AnnotationMethod');
    const sizes = nodeOf(config.body[1], 'AnnotationMethod');

    expect(config.name).toBe('Config');
    expect(name.default).toMatchObject({ type: 'Literal', value: 'x' });
    expect(sizes.returnType).toMatchObject({ type: 'BasicType', name: 'int', dimensions: 1 });
    expect(nodeOf(sizes.default, 'ElementArrayValue').values).toHaveLength(2);
    expect(config.body[2].type).toBe('ConstantDeclaration');
  });
});

describe('Parser – records', () => {
  it('parses components, interfaces and a compact constructor', () => {
    const unit = parseSource(
      [
        'record Point<T>(int x, T y) implements Shape {',
        '  Point {',
        '    if (x < 0) throw new IllegalArgumentException();',
        '  }',
        '  static int zero() { return 0; }',
        '}',
      ].join('\n'),
    );
    const point = nodeOf(unit.types[0], 'RecordDeclaration');

    expect(point.name).toBe('Point');
    expect(point.typeParameters.map((p) => p.name)).toEqual(['T']);
    expect(point.components.map((c) => c.name)).toEqual(['x', 'y']);
    expect(point.implements.map((t) => t.name)).toEqual(['Shape']);

    const ctor = nodeOf(point.body[0], 'ConstructorDeclaration');
    expect(ctor.compact).toBe(true);
    expect(ctor.parameters).toEqual([]);
    expect(ctor.body[0].type).toBe('IfStatement');
    expect(point.body[1].type).toBe('MethodDeclaration');
  });

  it('still treats `record` as a name elsewhere', () => {
    const unit = parseSource('class A { String record; void record() {} }');
    const cls = nodeOf(unit.types[0], 'ClassDeclaration');

    expect(nodeOf(cls.body[0], 'FieldDeclaration').declarators[0].name).toBe('record');
    expect(nodeOf(cls.body[1], 'MethodDeclaration').name).toBe('record');
  });
});

// -----------------------------------------------------------------------------
// Types in declarations
// -----------------------------------------------------------------------------

describe('Parser – reference type chains', () => {
  it('nests qualified types right-recursively', () => {
    const unit = parseSource('class A { java.util.Map.Entry<K, V>[] entries; }');
    const field = nodeOf(nodeOf(unit.types[0], 'ClassDeclaration').body[0], 'FieldDeclaration');
    const type = nodeOf(field.fieldType, 'ReferenceType');

    expect(type.name).toBe('java');
    expect(type.dimensions).toBe(1);
    expect(qualifiedName(type)).toBe('java.util.Map.Entry');
    expect(type.subType?.subType?.subType?.arguments).toHaveLength(2);
  });
});
