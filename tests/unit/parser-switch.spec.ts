// java-frontend/tests/unit/parser-switch.spec.ts
//
// Unit tests for switch statements, switch expressions and patterns.
//
// Focus areas:
//  - Colon groups vs arrow rules, and the rule that forbids mixing them.
//  - `yield` as a statement inside rule blocks and a name elsewhere.
//  - Case labels: constants, null, default, type and record patterns, guards.
//  - `instanceof` with and without patterns.

import { describe, it, expect } from 'vitest';
import { parseExpression } from '@/index';
import type { SwitchRule, SwitchStatementCase } from '@/core/ast';
import { firstStatement, nodeOf, statementsOf } from '../helpers/nodes';

function switchRules(body: string) {
  const decl = nodeOf(firstStatement(`int n = switch (v) { ${body} };`), 'LocalVariableDeclaration');
  return nodeOf(decl.declarators[0].initializer, 'SwitchExpression').rules;
}

// -----------------------------------------------------------------------------
// Switch statements
// -----------------------------------------------------------------------------

describe('Parser – switch statements', () => {
  it('merges consecutive labels into one statement group', () => {
    const stmt = nodeOf(
      firstStatement('switch (x) { case 1: case 2, 3: a(); b(); default: c(); }'),
      'SwitchStatement',
    );

    expect(stmt.expression).toMatchObject({ type: 'MemberReference', member: 'x' });
    expect(stmt.cases).toHaveLength(2);

    const first = nodeOf(stmt.cases[0], 'SwitchStatementCase');
    expect(first.labels.map((l) => (l.type === 'Literal' ? l.text : l.type))).toEqual([
      '1',
      '2',
      '3',
    ]);
    expect(first.statements).toHaveLength(2);

    const second = nodeOf(stmt.cases[1], 'SwitchStatementCase');
    expect(second.labels.map((l) => l.type)).toEqual(['DefaultLabel']);
    expect(second.statements).toHaveLength(1);
  });

  it('parses arrow rules with expression, block and throw actions', () => {
    const stmt = nodeOf(
      firstStatement(
        'switch (x) { case 1 -> a(); case 2 -> { b(); } default -> throw new IllegalStateException(); }',
      ),
      'SwitchStatement',
    );

    const cases: readonly (SwitchStatementCase | SwitchRule)[] = stmt.cases;
    expect(cases.map((c) => c.type)).toEqual(['SwitchRule', 'SwitchRule', 'SwitchRule']);

    const actions = cases.map((c) => nodeOf(c, 'SwitchRule').action.type);
    expect(actions).toEqual(['MethodInvocation', 'BlockStatement', 'ThrowStatement']);
  });

  it('parses qualified constants as labels', () => {
    const stmt = nodeOf(firstStatement('switch (c) { case Color.RED -> paint(); }'), 'SwitchStatement');

    expect(nodeOf(stmt.cases[0], 'SwitchRule').labels[0]).toMatchObject({
      type: 'MemberReference',
      qualifier: 'Color',
      member: 'RED',
    });
  });

  it('rejects a second default label', () => {
    expect(() => statementsOf('switch (x) { default: a(); default: b(); }')).toThrow(
      'Duplicate default label',
    );
  });

  it('rejects mixing rules and groups', () => {
    expect(() => statementsOf('switch (x) { case 1 -> a(); case 2: b(); }')).toThrow(
      'Cannot mix switch rules and statement groups',
    );
  });
});

// -----------------------------------------------------------------------------
// Switch expressions and yield
// -----------------------------------------------------------------------------

describe('Parser – switch expressions', () => {
  it('parses rules with several labels and a yielding block', () => {
    const rules = switchRules(
      'case MONDAY, FRIDAY -> 6; case TUESDAY -> { int t = 7; yield t; } default -> 0;',
    );

    expect(rules).toHaveLength(3);
    expect(rules[0].labels).toMatchObject([
      { type: 'MemberReference', member: 'MONDAY' },
      { type: 'MemberReference', member: 'FRIDAY' },
    ]);
    expect(rules[0].action).toMatchObject({ type: 'Literal', text: '6' });

    const block = nodeOf(rules[1].action, 'BlockStatement');
    expect(block.statements.map((s) => s.type)).toEqual([
      'LocalVariableDeclaration',
      'YieldStatement',
    ]);
    expect(nodeOf(block.statements[1], 'YieldStatement').expression).toMatchObject({
      type: 'MemberReference',
      member: 't',
    });

    expect(rules[2].labels.map((l) => l.type)).toEqual(['DefaultLabel']);
  });

  it('accepts a lambda as a rule action', () => {
    const [rule] = switchRules('default -> () -> 2;');

    expect(rule.action).toMatchObject({ type: 'LambdaExpression', parameters: [] });
  });

  it('requires arrow rules', () => {
    expect(() => statementsOf('int n = switch (x) { case 1: yield 2; };')).toThrow(
      "Expected '->'",
    );
  });

  it('treats `yield` as a name outside rule blocks', () => {
    const [, assignment] = statementsOf('int r = switch (k) { default -> { yield 1; } }; yield = r;');

    expect(nodeOf(assignment, 'StatementExpression').expression).toMatchObject({
      type: 'Assignment',
      target: { type: 'MemberReference', member: 'yield' },
    });
  });

  it('treats `yield =` inside a rule block as an assignment', () => {
    const [rule] = switchRules('default -> { yield = 2; yield yield; }');
    const block = nodeOf(rule.action, 'BlockStatement');

    expect(block.statements.map((s) => s.type)).toEqual(['StatementExpression', 'YieldStatement']);
  });
});

// -----------------------------------------------------------------------------
// Patterns in case labels
// -----------------------------------------------------------------------------

describe('Parser – case patterns', () => {
  const rules = switchRules(
    [
      'case null -> 0;',
      'case String s when s.isEmpty() -> 1;',
      'case Point(int x, var y) -> 2;',
      'case null, default -> 3;',
    ].join(' '),
  );

  it('parses a null label', () => {
    expect(rules[0].labels).toMatchObject([{ type: 'Literal', kind: 'null' }]);
  });

  it('parses a type pattern with a guard', () => {
    expect(rules[1].labels).toMatchObject([
      { type: 'TypePattern', patternType: { name: 'String' }, name: 's' },
    ]);
    expect(rules[1].guard).toMatchObject({
      type: 'MethodInvocation',
      qualifier: 's',
      member: 'isEmpty',
    });
  });

  it('parses a record pattern with nested type patterns', () => {
    const pattern = nodeOf(rules[2].labels[0], 'RecordPattern');

    expect(pattern.patternType.name).toBe('Point');
    expect(pattern.components).toMatchObject([
      { type: 'TypePattern', patternType: { type: 'BasicType', name: 'int' }, name: 'x' },
      { type: 'TypePattern', patternType: { type: 'ReferenceType', name: 'var' }, name: 'y' },
    ]);
  });

  it('parses `case null, default`', () => {
    expect(rules[3].labels.map((l) => l.type)).toEqual(['Literal', 'DefaultLabel']);
    expect(rules[3].guard).toBeNull();
  });
});

// -----------------------------------------------------------------------------
// instanceof
// -----------------------------------------------------------------------------

describe('Parser – instanceof', () => {
  it('parses a type test without a binding', () => {
    const expr = nodeOf(parseExpression('x instanceof List'), 'InstanceOfExpression');

    expect(expr.expression).toMatchObject({ member: 'x' });
    expect(expr.testType).toMatchObject({ type: 'ReferenceType', name: 'List' });
  });

  it('parses a type pattern and binds tighter than &&', () => {
    const expr = nodeOf(parseExpression('o instanceof String s && s.isEmpty()'), 'BinaryOperation');

    expect(expr.operator).toBe('&&');
    expect(expr.left).toMatchObject({
      type: 'InstanceOfPatternExpression',
      pattern: { type: 'TypePattern', name: 's' },
    });
    expect(expr.right).toMatchObject({ type: 'MethodInvocation', member: 'isEmpty' });
  });

  it('keeps final on a pattern variable', () => {
    const expr = nodeOf(parseExpression('o instanceof final String s'), 'InstanceOfPatternExpression');

    expect(expr.pattern).toMatchObject({ modifiers: ['final'], name: 's' });
  });

  it('parses a record pattern', () => {
    const expr = nodeOf(
      parseExpression('shape instanceof Circle(var r)'),
      'InstanceOfPatternExpression',
    );

    expect(expr.pattern).toMatchObject({
      type: 'RecordPattern',
      patternType: { name: 'Circle' },
      components: [{ type: 'TypePattern', name: 'r' }],
    });
  });

  it('rejects an arithmetic operator right after the type', () => {
    expect(() => parseExpression('x instanceof Foo + 1')).toThrow(
      'Unexpected operator after instanceof type',
    );
  });

  it('rejects modifiers without a binding', () => {
    expect(() => parseExpression('x instanceof final Foo')).toThrow('Expected pattern variable');
  });
});
