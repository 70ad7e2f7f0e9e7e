/**
 * java-frontend – Binary operator precedence
 *
 * The parser collects a binary expression flat (head operand plus a list
 * of infix steps) and folds it here. Folding splits at every operator of
 * the lowest precedence level present and recurses into the pieces, so
 * every level is left-associative:
 *
 *   1 - 2 - 3      →  (1 - 2) - 3
 *   1 + 2 * 3      →  1 + (2 * 3)
 *
 * License: Apache-2.0
 */

import type { Expression, Pattern, Type } from './ast';
import { createInternalError } from './errors';

export type InfixStep =
  | { readonly kind: 'operator'; readonly operator: string; readonly operand: Expression }
  | { readonly kind: 'instanceof'; readonly test: Type | Pattern };

/** Lowest to highest. */
export const PRECEDENCE_LEVELS: readonly (readonly string[])[] = [
  ['||'],
  ['&&'],
  ['|'],
  ['^'],
  ['&'],
  ['==', '!='],
  ['<', '>', '>=', '<=', 'instanceof'],
  ['<<', '>>', '>>>'],
  ['+', '-'],
  ['*', '/', '%'],
];

const LEVEL_BY_OPERATOR: ReadonlyMap<string, number> = new Map(
  PRECEDENCE_LEVELS.flatMap((ops, level) => ops.map((op) => [op, level] as const)),
);

export function precedenceOf(operator: string): number {
  const level = LEVEL_BY_OPERATOR.get(operator);
  if (level === undefined) {
    throw createInternalError({ message: `Not a binary operator: ${operator}` });
  }
  return level;
}

function stepOperator(step: InfixStep): string {
  return step.kind === 'operator' ? step.operator : 'instanceof';
}

export function foldBinary(head: Expression, steps: readonly InfixStep[]): Expression {
  if (steps.length === 0) return head;

  let lowest = Number.POSITIVE_INFINITY;
  for (const step of steps) {
    lowest = Math.min(lowest, precedenceOf(stepOperator(step)));
  }

  const splits: number[] = [];
  steps.forEach((step, i) => {
    if (precedenceOf(stepOperator(step)) === lowest) splits.push(i);
  });

  let result = foldBinary(head, steps.slice(0, splits[0]));

  splits.forEach((at, k) => {
    const step = steps[at];
    const rest = steps.slice(at + 1, k + 1 < splits.length ? splits[k + 1] : steps.length);

    if (step.kind === 'instanceof') {
      if (rest.length > 0) {
        throw createInternalError({ message: 'Operator after an instanceof type was not rejected' });
      }
      result = instanceOf(result, step.test);
      return;
    }

    result = {
      type: 'BinaryOperation',
      position: result.position,
      operator: step.operator,
      left: result,
      right: foldBinary(step.operand, rest),
    };
  });

  return result;
}

function instanceOf(expression: Expression, test: Type | Pattern): Expression {
  if (test.type === 'TypePattern' || test.type === 'RecordPattern') {
    return {
      type: 'InstanceOfPatternExpression',
      position: expression.position,
      expression,
      pattern: test,
    };
  }
  return {
    type: 'InstanceOfExpression',
    position: expression.position,
    expression,
    testType: test,
  };
}
