/**
 * java-frontend – Utils / inspect
 *
 * Convenience helpers for:
 *  - describing tokens in traces and diagnostics;
 *  - walking and summarizing syntax trees;
 *  - formatting frontend errors with context.
 *
 * License: Apache-2.0
 */

import type { Node, ReferenceType } from '../core/ast';
import { buildSnippet, isFrontendError } from '../core/errors';
import type { Lexeme } from '../core/tokens';

/////////////////////////////
// Tokens                  //
/////////////////////////////

/**
 * `identifier "foo" line 3, position 9`, or `end of input`.
 */
export function describeToken(token: Lexeme): string {
  if (token.position === null) return 'end of input';
  return `${token.kind} ${JSON.stringify(token.text)} line ${token.position.line}, position ${token.position.column}`;
}

/////////////////////////////
// Types                   //
/////////////////////////////

/**
 * Dotted name of a reference type chain, without type arguments:
 * `java.util.Map.Entry`.
 */
export function qualifiedName(type: ReferenceType): string {
  const parts: string[] = [];
  for (let t: ReferenceType | null = type; t; t = t.subType) {
    parts.push(t.name);
  }
  return parts.join('.');
}

/////////////////////////////
// Tree walking            //
/////////////////////////////

export type NodeVisitor = (node: Node, parent: Node | null, depth: number) => void;

function isNode(value: unknown): value is Node {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'string' &&
    'position' in value
  );
}

/**
 * Direct child nodes, in property order.
 */
export function childNodes(node: Node): Node[] {
  const children: Node[] = [];
  const values: unknown[] = Object.values(node);
  for (const value of values) {
    if (isNode(value)) {
      children.push(value);
    } else if (Array.isArray(value)) {
      for (const item of value) {
        if (isNode(item)) children.push(item);
      }
    }
  }
  return children;
}

/**
 * Depth-first, pre-order walk. The root has depth 1.
 */
export function walk(root: Node, visit: NodeVisitor): void {
  const stack: { node: Node; parent: Node | null; depth: number }[] = [
    { node: root, parent: null, depth: 1 },
  ];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    visit(entry.node, entry.parent, entry.depth);

    const children = childNodes(entry.node);
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ node: children[i], parent: entry.node, depth: entry.depth + 1 });
    }
  }
}

export interface TreeInsight {
  nodeCount: number;

  /** Root = 1. */
  maxDepth: number;

  /** Occurrences per node type, keys sorted. */
  nodeTypes: Record<string, number>;
}

export function analyzeTree(root: Node): TreeInsight {
  let nodeCount = 0;
  let maxDepth = 0;
  const counts = new Map<string, number>();

  walk(root, (node, _parent, depth) => {
    nodeCount++;
    if (depth > maxDepth) maxDepth = depth;
    counts.set(node.type, (counts.get(node.type) ?? 0) + 1);
  });

  const nodeTypes: Record<string, number> = {};
  for (const key of Array.from(counts.keys()).sort()) {
    nodeTypes[key] = counts.get(key) ?? 0;
  }

  return { nodeCount, maxDepth, nodeTypes };
}

/////////////////////////////
// Error formatting        //
/////////////////////////////

export interface FormattedError {
  /** Compact single-line summary. */
  summary: string;

  /** Summary plus snippet and note, when available. */
  detail: string;

  error: unknown;
}

/**
 * Format a frontend error (or any thrown value) for display.
 *
 * When the error carries no snippet but `source` is given, one is built
 * from the error's line and column.
 */
export function formatError(err: unknown, source?: string): FormattedError {
  if (!isFrontendError(err)) {
    const message = err instanceof Error ? err.message : String(err);
    const summary = `Error: ${message}`;
    return { summary, detail: summary, error: err };
  }

  let snippet = err.snippet;
  if (snippet.trim() === '' && source !== undefined && err.line !== null) {
    snippet = buildSnippet(source, { line: err.line, column: err.column ?? 1 }, 1, err.message);
  }

  const summary = `[${err.code}] ${err.message}`;

  let detail = summary;
  if (snippet.trim() !== '') {
    detail += `\n\n${snippet}`;
  }
  if (err.note && err.note.trim() !== '') {
    detail += `\n\nHint: ${err.note}`;
  }

  return { summary, detail, error: err };
}
