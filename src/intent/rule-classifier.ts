/**
 * RuleBasedClassifier — deterministic pattern tier of the intent classifier.
 *
 * Order of decision for a transcript:
 *   1. learned phrase (explicit correction) → its task type and slots
 *   2. every anchored pattern is scored as base × weight[taskType];
 *      the best score wins, ties go to the earlier pattern
 *   3. keyword fallback, base 0.5, no slots
 *   4. a result repeating the task type that failed to execute for this
 *      exact transcript, or one below the confidence floor → unknown
 * Never throws.
 */

import { getLogger } from '../core/logger.js';
import type { ClassifierConfig, TaskType } from '../core/types.js';
import { KNOWN_APP_ALIASES, resolveApp } from './apps.js';
import type { ClassifierState } from './classifier-state.js';
import { scoreComplexity } from './complexity.js';
import type { ClassificationResult, Slots } from './types.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

type Extractor = (match: RegExpMatchArray) => string | undefined;

interface TaskPattern {
  pattern: RegExp;
  taskType: Exclude<TaskType, 'unknown'>;
  /** Confidence before the task type's weight is applied */
  base: number;
  extractors?: Record<string, Extractor>;
  description: string;
}

interface Candidate {
  taskType: Exclude<TaskType, 'unknown'>;
  score: number;
  slots: Slots;
  matchedBy: 'pattern' | 'keyword';
  /** Matched pattern, for debug logs */
  description?: string;
}

export type RuleClassifierConfig = Pick<
  ClassifierConfig,
  'ruleConfidenceFloor' | 'floorMin' | 'wakeWord'
>;

export const LEARNED_PHRASE_CONFIDENCE = 0.95;
export const KEYWORD_BASE = 0.5;

const PRONOUN_TARGET = /^(?:it|that|this)(?:\s+(?:one|app|application|window|up|again))?$/;

const KEYWORDS: ReadonlyArray<readonly [Exclude<TaskType, 'unknown'>, readonly string[]]> = [
  ['app-control', ['open', 'launch', 'close', 'start', 'quit', 'minimize', 'maximize', 'switch', 'app', 'application', 'window']],
  ['messaging', ['message', 'text', 'whatsapp', 'send', 'reply', 'chat']],
  ['query', ['search', 'google', 'what', 'who', 'where', 'when', 'why', 'how', 'weather', 'news']],
  ['file-op', ['file', 'folder', 'directory', 'document', 'delete', 'rename', 'copy', 'move', 'save']],
  ['system-op', ['volume', 'mute', 'shutdown', 'restart', 'lock', 'screenshot', 'brightness', 'sleep', 'wifi', 'bluetooth']],
  ['conversation', ['hello', 'hi', 'hey', 'thanks', 'thank', 'bye', 'goodbye', 'joke']],
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function appTarget(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const target = raw.trim();
  if (!target || PRONOUN_TARGET.test(target)) return undefined;
  return resolveApp(target);
}

function appOperation(verb: string): string {
  const head = verb.split(/\s+/)[0];
  switch (head) {
    case 'close':
    case 'quit':
    case 'exit':
      return 'close';
    case 'minimize':
    case 'minimise':
      return 'minimize';
    case 'maximize':
    case 'maximise':
      return 'maximize';
    case 'switch':
    case 'focus':
      return 'focus';
    default:
      return 'launch';
  }
}

function fileOperation(verb: string): string {
  switch (verb) {
    case 'create':
    case 'make':
      return 'create';
    case 'delete':
    case 'remove':
      return 'delete';
    case 'find':
    case 'locate':
      return 'find';
    default:
      return verb;
  }
}

function inAppAction(verb: string): string {
  switch (verb.replace(/\s+/g, ' ')) {
    case 'write':
    case 'type':
      return 'type';
    case 'search':
    case 'search for':
      return 'search';
    case 'go to':
      return 'navigate';
    default:
      return verb;
  }
}

/**
 * Drop the wake word and politeness around the actual command.
 */
export function toCommandText(text: string, wakeWord: string): string {
  let command = text.trim();
  if (wakeWord) {
    const wake = new RegExp(`^(?:(?:hey|ok|okay)\\s+)?${escapeRegExp(wakeWord)}\\b[\\s,]*`);
    command = command.replace(wake, '');
  }
  command = command
    .replace(/^(?:please\s+)?(?:(?:can|could|would|will)\s+you\s+)?(?:please\s+)?/, '')
    .replace(/\s+please$/, '');
  return command.trim();
}

// ═══════════════════════════════════════════════════════════════
// RULE-BASED CLASSIFIER
// ═══════════════════════════════════════════════════════════════

export class RuleBasedClassifier {
  private readonly patterns: TaskPattern[] = [];
  private readonly logger = getLogger();

  constructor(
    private readonly state: ClassifierState,
    private readonly config: RuleClassifierConfig,
  ) {
    this.registerBuiltinPatterns();
  }

  // ─────────────────────────────────────────────────────────
  // CLASSIFICATION
  // ─────────────────────────────────────────────────────────

  classify(text: string): ClassificationResult {
    const complexity = scoreComplexity(text);
    const suspect = this.state.suspectTaskType(text);

    const learned = this.state.lookupPhrase(text);
    if (learned && learned.taskType !== suspect) {
      return {
        taskType: learned.taskType,
        complexity: learned.taskType === 'unknown' ? 0 : complexity,
        slots: learned.slots,
        confidence: LEARNED_PHRASE_CONFIDENCE,
        provenance: 'rule-based',
        inherited: false,
        ...(learned.taskType === 'unknown' ? {} : { matchedBy: 'phrase' as const }),
      };
    }

    const command = toCommandText(text, this.config.wakeWord);
    if (!command) return this.unknown(0);

    const best = this.matchPatterns(command) ?? this.matchKeywords(command);
    if (!best) return this.unknown(0);

    const confidence = Math.min(1, best.score);
    this.logger.debug({ command, matchedBy: best.matchedBy, pattern: best.description, score: best.score }, 'Rule tier match');
    if (best.taskType === suspect) {
      this.logger.debug({ text, suspect }, 'Suspect transcript, deferring to confirmation');
      return { ...this.unknown(confidence), suspect: { taskType: best.taskType, slots: best.slots } };
    }

    const floor = this.state.floorFor(text, this.config.ruleConfidenceFloor, this.config.floorMin);
    if (best.score < floor) {
      return this.unknown(confidence);
    }

    return {
      taskType: best.taskType,
      complexity,
      slots: best.slots,
      confidence,
      provenance: 'rule-based',
      inherited: false,
      matchedBy: best.matchedBy,
    };
  }

  // ─────────────────────────────────────────────────────────
  // MATCHING
  // ─────────────────────────────────────────────────────────

  private matchPatterns(command: string): Candidate | null {
    let best: Candidate | null = null;

    for (const p of this.patterns) {
      const match = command.match(p.pattern);
      if (!match) continue;

      const score = p.base * this.state.weight(p.taskType);
      if (best && score <= best.score) continue;

      const slots: Slots = {};
      for (const [key, extract] of Object.entries(p.extractors ?? {})) {
        const value = extract(match)?.trim();
        if (value) slots[key] = value;
      }
      best = { taskType: p.taskType, score, slots, matchedBy: 'pattern', description: p.description };
    }

    return best;
  }

  private matchKeywords(command: string): Candidate | null {
    const words = command.split(/\s+/);
    let bestType: Exclude<TaskType, 'unknown'> | null = null;
    let bestHits = 0;

    for (const [taskType, keywords] of KEYWORDS) {
      let hits = 0;
      for (const word of words) {
        if (keywords.includes(word)) hits++;
      }
      if (hits > bestHits) {
        bestHits = hits;
        bestType = taskType;
      }
    }

    if (!bestType) return null;
    return { taskType: bestType, score: KEYWORD_BASE * this.state.weight(bestType), slots: {}, matchedBy: 'keyword' };
  }

  private unknown(confidence: number): ClassificationResult {
    return {
      taskType: 'unknown',
      complexity: 0,
      slots: {},
      confidence,
      provenance: 'rule-based',
      inherited: false,
    };
  }

  // ─────────────────────────────────────────────────────────
  // BUILT-IN PATTERNS
  // ─────────────────────────────────────────────────────────

  private registerBuiltinPatterns(): void {
    // ── Multi-step: open an app, then act in it ──

    this.patterns.push({
      pattern: /^(?:open|launch|start)\s+(.+?)\s+(?:and\s+then|and|then)\s+(type|write|search\s+for|search|go\s+to|open)\s+(.+)$/,
      taskType: 'app-action',
      base: 0.9,
      extractors: {
        app: (m) => appTarget(m[1]),
        action: (m) => inAppAction(m[2]),
        text: (m) => m[3],
      },
      description: 'Open an app and act in it (e.g., "open notepad and type hello")',
    });

    // ── Messaging ──

    const messageVerb = '(?:send\\s+(?:a\\s+|an\\s+)?(?:message|text|whatsapp(?:\\s+message)?)\\s+to|message|text|whatsapp)';

    this.patterns.push({
      pattern: new RegExp(`^${messageVerb}\\s+(\\S+)\\s+(?:saying\\s+|that\\s+)?(.+)$`),
      taskType: 'messaging',
      base: 0.9,
      extractors: {
        contact: (m) => m[1],
        message: (m) => m[2],
      },
      description: 'Send a message (e.g., "send a message to sam saying hello")',
    });

    this.patterns.push({
      pattern: new RegExp(`^${messageVerb}\\s+(\\S+)$`),
      taskType: 'messaging',
      base: 0.85,
      extractors: {
        contact: (m) => m[1],
      },
      description: 'Message a contact, text to follow (e.g., "message sam")',
    });

    this.patterns.push({
      pattern: /^send\s+(?:a\s+|an\s+)?(?:message|text)$/,
      taskType: 'messaging',
      base: 0.85,
      description: 'Send a message, contact and text to follow',
    });

    // ── File operations ──

    this.patterns.push({
      pattern: /^(create|make|delete|remove|open|find|locate)\s+(?:(?:a|an|the|new|my)\s+)*(file|folder|directory|document)(?:\s+(?:called|named))?(?:\s+(.+))?$/,
      taskType: 'file-op',
      base: 0.92,
      extractors: {
        operation: (m) => fileOperation(m[1]),
        kind: (m) => (m[2] === 'folder' || m[2] === 'directory' ? 'folder' : 'file'),
        target: (m) => m[3],
      },
      description: 'File or folder operation (e.g., "create a folder called reports")',
    });

    this.patterns.push({
      pattern: /^(create|make|delete|remove|open|find|locate)\s+(?:the\s+)?([\w-]+\.[a-z0-9]{1,5})$/,
      taskType: 'file-op',
      base: 0.92,
      extractors: {
        operation: (m) => fileOperation(m[1]),
        kind: () => 'file',
        target: (m) => m[2],
      },
      description: 'Operation on a named file (e.g., "open notes.txt")',
    });

    // ── System operations ──

    const system = (pattern: RegExp, operation: (m: RegExpMatchArray) => string, description: string): void => {
      this.patterns.push({
        pattern,
        taskType: 'system-op',
        base: 0.9,
        extractors: { operation },
        description,
      });
    };

    system(/^lock(?:\s+the)?(?:\s+(?:screen|computer|pc))?$/, () => 'lock', 'Lock the screen');
    system(/^(?:shutdown|power\s+off|turn\s+off)(?:\s+the)?(?:\s+(?:computer|pc|system))?$/, () => 'shutdown', 'Shut down');
    system(/^(?:restart|reboot)(?:\s+the)?(?:\s+(?:computer|pc|system))?$/, () => 'restart', 'Restart');
    system(/^(?:sleep|go\s+to\s+sleep|suspend)(?:\s+the)?(?:\s+(?:computer|pc|system))?$/, () => 'sleep', 'Sleep');
    system(/^(?:turn\s+(?:the\s+)?)?volume\s+(up|down)$/, (m) => `volume-${m[1]}`, 'Volume up or down');
    system(/^(increase|raise|decrease|lower)\s+(?:the\s+)?volume$/, (m) => (m[1] === 'increase' || m[1] === 'raise' ? 'volume-up' : 'volume-down'), 'Change the volume');
    system(/^(mute|unmute)(?:\s+the)?(?:\s+(?:sound|audio|volume))?$/, (m) => m[1], 'Mute or unmute');
    system(/^(?:take\s+(?:a\s+)?)?screenshot$/, () => 'screenshot', 'Take a screenshot');
    system(/^(?:list|show)(?:\s+me)?(?:\s+(?:all|the))?(?:\s+(?:running|open|installed))?\s+(?:apps|applications|programs)$/, () => 'list-apps', 'List applications');
    system(/^refresh(?:\s+the)?\s+(?:apps|applications|app\s+list)$/, () => 'refresh-apps', 'Refresh the application list');

    // ── Conversation ──

    this.patterns.push({
      pattern: /^(?:(?:hi|hello|hey)(?:\s+there)?|good\s+(?:morning|afternoon|evening)|thanks|thank\s+you|bye|goodbye|how\s+are\s+you(?:\s+doing)?(?:\s+today)?|(?:who|what)\s+are\s+you|tell\s+me\s+a\s+joke)$/,
      taskType: 'conversation',
      base: 0.85,
      description: 'Small talk (e.g., "hello", "how are you")',
    });

    // ── App control ──

    this.patterns.push({
      pattern: /^(open|launch|start|run|close|quit|exit|minimi[sz]e|maximi[sz]e|switch\s+to|focus(?:\s+on)?)\s+((?:(?!\s(?:and|then)\s).)+)$/,
      taskType: 'app-control',
      base: 0.9,
      extractors: {
        operation: (m) => appOperation(m[1]),
        app: (m) => appTarget(m[2]),
      },
      description: 'Launch, close or focus an app (e.g., "open notepad", "close it")',
    });

    this.patterns.push({
      pattern: new RegExp(`^(?:the\\s+)?(${KNOWN_APP_ALIASES.map(escapeRegExp).join('|')})$`),
      taskType: 'app-control',
      base: 0.85,
      extractors: {
        operation: () => 'launch',
        app: (m) => resolveApp(m[1]),
      },
      description: 'A bare app name launches it (e.g., "calculator")',
    });

    // ── Queries ──

    this.patterns.push({
      pattern: /^(?:search(?:\s+the\s+web)?\s+for|google|look\s+up|search)\s+(.+)$/,
      taskType: 'query',
      base: 0.85,
      extractors: {
        query: (m) => m[1],
      },
      description: 'Web search (e.g., "search for rust tutorials")',
    });

    this.patterns.push({
      pattern: /^(?:what|who|where|when|why|how|which)\b.+$/,
      taskType: 'query',
      base: 0.8,
      extractors: {
        query: (m) => m[0],
      },
      description: 'Question (e.g., "what is the weather")',
    });
  }
}
