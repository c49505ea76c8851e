/**
 * Spoken application names and the canonical name each resolves to.
 */
const APP_ALIASES: Record<string, string[]> = {
  notepad: ['notepad', 'text editor', 'note pad'],
  firefox: ['firefox', 'fire fox', 'browser', 'web browser'],
  chrome: ['chrome', 'google chrome'],
  word: ['word', 'microsoft word', 'ms word'],
  excel: ['excel', 'microsoft excel', 'ms excel'],
  calculator: ['calculator', 'calc'],
  explorer: ['explorer', 'file explorer', 'files'],
  vscode: ['vscode', 'code editor'],
  terminal: ['terminal', 'command prompt', 'console'],
  whatsapp: ['whatsapp', 'whats app'],
  spotify: ['spotify'],
};

const ALIAS_TO_APP = new Map<string, string>();
for (const [app, aliases] of Object.entries(APP_ALIASES)) {
  for (const alias of aliases) {
    if (!ALIAS_TO_APP.has(alias)) ALIAS_TO_APP.set(alias, app);
  }
}

/** Aliases, longest first, for building alternations. */
export const KNOWN_APP_ALIASES: readonly string[] = [...ALIAS_TO_APP.keys()].sort((a, b) => b.length - a.length);

const FUZZY_MIN_SIMILARITY = 0.7;

function bigrams(text: string): Set<string> {
  const out = new Set<string>();
  for (let i = 0; i < text.length - 1; i++) out.add(text.slice(i, i + 2));
  return out;
}

/**
 * Jaccard similarity of the two strings' character bigrams.
 */
export function bigramSimilarity(a: string, b: string): number {
  if (!a || !b) return 0;
  const left = bigrams(a);
  const right = bigrams(b);
  if (left.size === 0 && right.size === 0) return 1;
  if (left.size === 0 || right.size === 0) return 0;
  let shared = 0;
  for (const pair of left) {
    if (right.has(pair)) shared++;
  }
  return shared / (left.size + right.size - shared);
}

function containsWords(haystack: string, needle: string): boolean {
  return ` ${haystack} `.includes(` ${needle} `);
}

/**
 * Known app for a spoken name: exact alias, then an alias sharing whole
 * words with it, then the closest alias above the similarity cutoff.
 */
export function matchKnownApp(spoken: string): string | undefined {
  const exact = ALIAS_TO_APP.get(spoken);
  if (exact) return exact;

  for (const [alias, app] of ALIAS_TO_APP) {
    if (containsWords(spoken, alias) || containsWords(alias, spoken)) return app;
  }

  let best: string | undefined;
  let bestScore = FUZZY_MIN_SIMILARITY;
  for (const [alias, app] of ALIAS_TO_APP) {
    const score = bigramSimilarity(spoken, alias);
    if (score > bestScore) {
      bestScore = score;
      best = app;
    }
  }
  return best;
}

/**
 * Canonical app name for a spoken target. Unknown names pass through trimmed
 * of articles and "app"/"application"/"window" suffixes.
 */
export function resolveApp(spoken: string): string {
  const cleaned = spoken
    .trim()
    .replace(/^(?:the|my)\s+/, '')
    .replace(/\s+(?:app|application|program|window)$/, '')
    .trim();
  if (!cleaned) return cleaned;
  return matchKnownApp(cleaned) ?? cleaned;
}
