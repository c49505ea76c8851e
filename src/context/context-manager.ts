/**
 * ContextManager — short-lived, bounded history of completed turns.
 *
 * The history is an immutable array replaced wholesale on every write, so a
 * reader holding the previous array never observes a half-applied append.
 * Turns expire `ttlMs` after creation; past `maxTurns` the oldest go first.
 */

import { EventEmitter } from 'node:events';
import { getLogger } from '../core/logger.js';
import type { ContextConfig } from '../core/types.js';
import type { ContextReader, ContextTurn, EvictedTurn } from './types.js';

export type Clock = () => number;

export class ContextManager extends EventEmitter implements ContextReader {
  private turns: readonly ContextTurn[] = Object.freeze([]);
  private readonly logger = getLogger();

  constructor(
    private readonly config: ContextConfig,
    private readonly clock: Clock = Date.now,
  ) {
    super();
  }

  append(turn: ContextTurn): void {
    const now = this.clock();
    const evicted: EvictedTurn[] = [];
    const next: ContextTurn[] = [];

    for (const existing of this.turns) {
      if (this.isExpired(existing, now)) {
        evicted.push({ turn: existing, reason: 'ttl' });
      } else {
        next.push(existing);
      }
    }
    next.push(Object.freeze({ ...turn }));

    while (next.length > this.config.maxTurns) {
      const oldest = next.shift();
      if (oldest) evicted.push({ turn: oldest, reason: 'overflow' });
    }

    this.turns = Object.freeze(next);

    for (const e of evicted) {
      this.logger.debug({ turnId: e.turn.id, reason: e.reason }, 'Context turn evicted');
      this.emit('evicted', e);
    }
    this.emit('appended', turn);
  }

  /**
   * Up to `n` live turns, most recent first.
   */
  recent(n: number): readonly ContextTurn[] {
    if (n <= 0) return [];
    const snapshot = this.turns;
    const now = this.clock();
    const out: ContextTurn[] = [];
    for (let i = snapshot.length - 1; i >= 0 && out.length < n; i--) {
      if (!this.isExpired(snapshot[i], now)) out.push(snapshot[i]);
    }
    return out;
  }

  find(turnId: string): ContextTurn | undefined {
    return this.turns.find(t => t.id === turnId);
  }

  /** Stored turns, including any that expired since the last append */
  get size(): number {
    return this.turns.length;
  }

  clear(): void {
    this.turns = Object.freeze([]);
    this.emit('cleared');
  }

  private isExpired(turn: ContextTurn, now: number): boolean {
    return now - turn.createdAt > this.config.ttlMs;
  }
}
