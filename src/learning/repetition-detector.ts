/**
 * RepetitionDetector — spots a phrase the user keeps repeating while the
 * pipeline keeps answering it differently.
 *
 * Fires once `count` occurrences of the same text fall inside `windowMs` and
 * they resolved to at least two distinct outcomes; that text's history is
 * then reset so one burst fires once.
 */

import { BoundedMap } from '../utils/bounded-map.js';

interface Sighting {
  at: number;
  outcome: string;
}

export interface RepetitionOptions {
  count: number;
  windowMs: number;
  /** Distinct phrases tracked at once */
  maxTracked?: number;
}

export class RepetitionDetector {
  private readonly history: BoundedMap<string, Sighting[]>;

  constructor(private readonly options: RepetitionOptions) {
    this.history = new BoundedMap(options.maxTracked ?? 200);
  }

  /**
   * Record one occurrence. Returns true when this occurrence completes a burst.
   */
  record(text: string, outcome: string, at: number): boolean {
    const recent = (this.history.get(text) ?? []).filter(s => at - s.at <= this.options.windowMs);
    recent.push({ at, outcome });

    const distinct = new Set(recent.map(s => s.outcome)).size;
    if (recent.length >= this.options.count && distinct >= 2) {
      this.history.delete(text);
      return true;
    }

    this.history.set(text, recent);
    return false;
  }

  reset(): void {
    this.history.clear();
  }
}
