/**
 * java-frontend – Lookahead cursor
 *
 * Wraps a lazy token iterator with unbounded lookahead and nested
 * checkpoints ("markers") so the parser can try an alternative and rewind.
 *
 *  - `peek(n)` looks ahead without consuming;
 *  - `advance()` consumes one token;
 *  - `pushMarker()` / `popMarker(accept)` open and close a checkpoint.
 *    Rejecting replays every token consumed since the push, in order,
 *    before anything new is pulled from the iterator.
 *
 * Prefer the scoped forms, which always pop exactly once:
 *
 *   const decl = cursor.speculate(() => parser.parseLocalVariableDeclaration());
 *
 * License: Apache-2.0
 */

import { createInternalError } from './errors';

interface Marker<T> {
  /** History length when the marker was pushed. */
  readonly index: number;
  readonly last: T | null;
}

export interface MarkerScope {
  /** Keep the tokens consumed inside the scope when it ends. */
  commit(): void;
}

export class LookaheadCursor<T> {
  private readonly iterator: Iterator<T>;
  private readonly sentinel: T;

  /** Peeked (or replayed) tokens not yet consumed, in order. */
  private pending: T[] = [];
  /** Tokens consumed while at least one marker is open. */
  private history: T[] = [];
  private markers: Marker<T>[] = [];
  private lastToken: T | null = null;
  private exhausted = false;

  constructor(source: Iterable<T>, sentinel: T) {
    this.iterator = source[Symbol.iterator]();
    this.sentinel = sentinel;
  }

  /** Number of open markers. */
  get depth(): number {
    return this.markers.length;
  }

  /**
   * The token `offset` positions ahead (0 = next), or the sentinel past
   * the end of input.
   */
  peek(offset = 0): T {
    while (this.pending.length <= offset) {
      if (!this.fill()) return this.sentinel;
    }
    return this.pending[offset];
  }

  /**
   * Consume the next token. At end of input the sentinel is returned and
   * nothing is consumed.
   */
  advance(): T {
    if (this.pending.length === 0 && !this.fill()) {
      return this.sentinel;
    }
    const token = this.pending.shift();
    if (token === undefined) return this.sentinel;
    if (this.markers.length > 0) this.history.push(token);
    this.lastToken = token;
    return token;
  }

  /** The most recently consumed token, or `null` before the first one. */
  last(): T | null {
    return this.lastToken;
  }

  pushMarker(): void {
    this.markers.push({ index: this.history.length, last: this.lastToken });
  }

  /**
   * Close the innermost marker. Accepting keeps the consumed tokens;
   * rejecting puts them back in front of the pending buffer.
   */
  popMarker(accept: boolean): void {
    const marker = this.markers.pop();
    if (!marker) {
      throw createInternalError({ message: 'popMarker() called with no open marker' });
    }

    if (!accept) {
      const replay = this.history.splice(marker.index);
      this.pending = replay.concat(this.pending);
      this.lastToken = marker.last;
    }

    if (this.markers.length === 0) {
      this.history = [];
    }
  }

  /**
   * Run `body` inside a marker that is rolled back unless the body calls
   * `scope.commit()`. The marker is popped even when `body` throws.
   */
  withMarker<R>(body: (scope: MarkerScope) => R): R {
    let committed = false;
    const scope: MarkerScope = {
      commit: () => {
        committed = true;
      },
    };

    this.pushMarker();
    try {
      return body(scope);
    } finally {
      this.popMarker(committed);
    }
  }

  /**
   * Run `body` speculatively: its tokens stay consumed when it returns
   * and are put back when it throws.
   */
  speculate<R>(body: () => R): R {
    return this.withMarker((scope) => {
      const result = body();
      scope.commit();
      return result;
    });
  }

  private fill(): boolean {
    if (this.exhausted) return false;
    const step = this.iterator.next();
    if (step.done) {
      this.exhausted = true;
      return false;
    }
    this.pending.push(step.value);
    return true;
  }
}
