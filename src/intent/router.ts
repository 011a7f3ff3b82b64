import type { ConversationTurn, GetPatientsIntent, Intent, IntentKind } from "./types.js";

type Rule = {
  kind: IntentKind;
  // `text` is the trimmed utterance with its original casing
  match: (normalized: string, text: string) => Intent | undefined;
};

const GREETING_PATTERN =
  /^(?:hello|hi|hey|hiya|greetings|good (?:morning|afternoon|evening))(?:\s+(?:there|everyone|all|team))?(?:[\s,!.]+([a-z][a-z'-]*))?[\s!.]*$/i;
// "commands" and "usage" only count on their own; inside a query they are data words
const HELP_PATTERN =
  /\bhelp\b|what can you do|how do i\b|how does this work|^(?:show |list )?(?:the |your )?(?:commands?|usage)[?!.]*$/;
const TOOLS_PATTERN = /\btools?\b/;
const PATIENT_KEYWORDS = ["patient", "diagnos", "medication", "allerg"] as const;

const QUOTED_PATTERN = /["“]([^"”]+)["”]|(?:^|\s)'([^']+)'(?=$|[\s.,!?])/;
const NAME_AFTER_KEYWORD_PATTERN = /\b(?:named|called|name is|with (?:the )?name)\s+([^\s,.!?;:]+)/gi;
const LIMIT_PATTERN = /\b(\d+)\b/;
const BARE_NUMBER_PATTERN = /^\d+$/;

// Words that can follow a name keyword without being a name
const NAME_STOPWORDS = new Set(["a", "an", "the", "is", "are", "of", "for", "with", "and", "limit"]);
// "hi tools" is not someone called Tools
const RESERVED_WORDS = new Set(["help", "tool", "tools", "patient", "patients"]);

export function extractNameFilter(text: string): string | undefined {
  const quoted = QUOTED_PATTERN.exec(text);
  const quotedValue = quoted?.[1] ?? quoted?.[2];
  if (quotedValue && quotedValue.trim()) return quotedValue.trim();

  for (const match of text.matchAll(NAME_AFTER_KEYWORD_PATTERN)) {
    const token = match[1];
    if (token && !NAME_STOPWORDS.has(token.toLowerCase())) return token;
  }
  return undefined;
}

export function extractLimit(text: string): number | undefined {
  const withoutQuoted = text.replace(QUOTED_PATTERN, " ");
  const match = LIMIT_PATTERN.exec(withoutQuoted);
  return match?.[1] ? Number.parseInt(match[1], 10) : undefined;
}

export const RULES: readonly Rule[] = [
  {
    kind: "greeting",
    match: (_normalized, text) => {
      const m = GREETING_PATTERN.exec(text);
      if (!m) return undefined;
      const name = m[1];
      if (name && RESERVED_WORDS.has(name.toLowerCase())) return undefined;
      return name ? { kind: "greeting", name } : { kind: "greeting" };
    },
  },
  {
    kind: "help",
    match: (normalized) => (HELP_PATTERN.test(normalized) ? { kind: "help" } : undefined),
  },
  {
    kind: "listTools",
    match: (normalized) => (TOOLS_PATTERN.test(normalized) ? { kind: "listTools" } : undefined),
  },
  {
    kind: "getPatients",
    match: (normalized, text) => {
      if (!PATIENT_KEYWORDS.some((keyword) => normalized.includes(keyword))) return undefined;
      const intent: GetPatientsIntent = { kind: "getPatients" };
      const nameFilter = extractNameFilter(text);
      const limit = extractLimit(text);
      if (nameFilter !== undefined) intent.nameFilter = nameFilter;
      if (limit !== undefined) intent.limit = limit;
      return intent;
    },
  },
];

function lastUserIntent(recentTurns: readonly ConversationTurn[]): Intent | undefined {
  for (let i = recentTurns.length - 1; i >= 0; i--) {
    const turn = recentTurns[i];
    if (turn?.role === "user") return turn.intent;
  }
  return undefined;
}

/**
 * Classifies one utterance. Rules are tried in order and the first match wins;
 * anything unmatched comes back as `unknown` with the utterance untouched.
 *
 * `recentTurns` is read only to treat a bare number right after a patient query
 * as a new limit for that query.
 */
export function route(utterance: string, recentTurns: readonly ConversationTurn[] = []): Intent {
  const text = utterance.trim();
  const normalized = text.toLowerCase();

  if (BARE_NUMBER_PATTERN.test(text)) {
    const previous = lastUserIntent(recentTurns);
    if (previous?.kind === "getPatients") {
      return { ...previous, limit: Number.parseInt(text, 10) };
    }
  }

  for (const rule of RULES) {
    const intent = rule.match(normalized, text);
    if (intent) return intent;
  }
  return { kind: "unknown", utterance };
}
