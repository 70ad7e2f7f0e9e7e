// java-frontend/tests/helpers/nodes.ts
//
// Narrowing helpers shared by the parser specs.

import { parseSource } from '@/index';
import type { Node, NodeType, Statement } from '@/core/ast';

export type NodeOf<K extends NodeType> = Extract<Node, { type: K }>;

function isKind<K extends NodeType>(node: Node, type: K): node is NodeOf<K> {
  return node.type === type;
}

/**
 * Return `node` narrowed to `type`, failing the test with the actual type
 * otherwise.
 */
export function nodeOf<K extends NodeType>(node: Node | null | undefined, type: K): NodeOf<K> {
  if (!node) throw new Error(`expected ${type}, got ${String(node)}`);
  if (!isKind(node, type)) throw new Error(`expected ${type}, got ${node.type}`);
  return node;
}

/**
 * Statements of `void m() { ... }` inside a wrapper class.
 */
export function statementsOf(body: string): readonly Statement[] {
  const unit = parseSource(`class T { void m() { ${body} } }`);
  const cls = nodeOf(unit.types[0], 'ClassDeclaration');
  const method = nodeOf(cls.body[0], 'MethodDeclaration');
  if (method.body === null) throw new Error('method without body');
  return method.body;
}

export function firstStatement(body: string): Statement {
  const [first] = statementsOf(body);
  if (!first) throw new Error('no statement parsed');
  return first;
}
