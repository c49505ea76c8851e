/**
 * TranscriptNormalizer — makes engine output engine-agnostic.
 *
 * trim → strip token-final punctuation → locale lowercase → collapse
 * whitespace → phrase corrections (learned first, then built-in).
 */

import { BoundedMap } from '../utils/bounded-map.js';

/** Frequent misrecognitions of app names and command verbs. */
const BUILTIN_CORRECTIONS: ReadonlyArray<readonly [string, string]> = [
  ['mozilla firefox', 'firefox'],
  ['firefox browser', 'firefox'],
  ['fire fox', 'firefox'],
  ['fire folks', 'firefox'],
  ['fire fucks', 'firefox'],
  ['google chrome', 'chrome'],
  ['chrome browser', 'chrome'],
  ['note pad', 'notepad'],
  ['no pad', 'notepad'],
  ['new pad', 'notepad'],
  ['word pad', 'wordpad'],
  ['visual studio code', 'vscode'],
  ['vs code', 'vscode'],
  ['word document', 'word'],
  ['excel spreadsheet', 'excel'],
  ['open up', 'open'],
  ['start up', 'start'],
  ['close down', 'close'],
  ['shut down', 'shutdown'],
  ['clothes that', 'close that'],
];

const TRAILING_PUNCTUATION = /[.,!?;:]+(?=\s|$)/g;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function phrasePattern(phrase: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(phrase)}(?![\\p{L}\\p{N}])`, 'gu');
}

export class TranscriptNormalizer {
  private readonly learned: BoundedMap<string, string>;

  constructor(
    private readonly locale: string,
    maxLearned = 200,
  ) {
    this.learned = new BoundedMap(maxLearned);
  }

  normalize(raw: string): string {
    const base = this.clean(raw);
    if (base.length === 0) return base;

    let text = base;
    // Longest learned phrases first so a learned phrase wins over its substrings.
    const learned = [...this.learned.entries()].sort((a, b) => b[0].length - a[0].length);
    for (const [wrong, right] of learned) {
      text = text.replace(phrasePattern(wrong), right);
    }
    for (const [wrong, right] of BUILTIN_CORRECTIONS) {
      text = text.replace(phrasePattern(wrong), right);
    }
    return text.replace(/\s+/g, ' ').trim();
  }

  /**
   * Record that `heard` should read as `meant`. Both sides are cleaned first;
   * identical or empty pairs are ignored. Returns whether a correction was stored.
   */
  learn(heard: string, meant: string): boolean {
    const wrong = this.clean(heard);
    const right = this.clean(meant);
    if (!wrong || !right || wrong === right) return false;
    this.learned.set(wrong, right);
    return true;
  }

  get learnedCount(): number {
    return this.learned.size;
  }

  private clean(raw: string): string {
    return raw
      .trim()
      .replace(TRAILING_PUNCTUATION, '')
      .toLocaleLowerCase(this.locale)
      .replace(/\s+/g, ' ')
      .trim();
  }
}
