/**
 * WaveJSON token classifier
 *
 * Fixed vocabularies for highlighting and completion. Everything is a
 * lookup into tables built once when the module loads.
 */

export type TokenCategory =
  | 'keyword'
  | 'signalAttribute'
  | 'configAttribute'
  | 'headFootAttribute'
  | 'bracket'
  | 'punctuation';

export const VOCABULARY: Readonly<Record<TokenCategory, readonly string[]>> = {
  keyword: ['signal', 'edge', 'config', 'head', 'foot', 'assign'],
  signalAttribute: ['name', 'wave', 'data', 'period', 'phase', 'node'],
  configAttribute: ['hscale', 'skin'],
  headFootAttribute: ['tick', 'tock', 'text', 'every'],
  bracket: ['[', ']', '{', '}'],
  punctuation: ["'", ',', ':'],
};

/** Categories whose members are identifiers (and so completion candidates) */
const IDENTIFIER_CATEGORIES: readonly TokenCategory[] = [
  'keyword',
  'signalAttribute',
  'configAttribute',
  'headFootAttribute',
];

const ALL_CATEGORIES: readonly TokenCategory[] = [
  ...IDENTIFIER_CATEGORIES,
  'bracket',
  'punctuation',
];

const TOKEN_TABLE: ReadonlyMap<string, TokenCategory> = new Map(
  ALL_CATEGORIES.flatMap(category =>
    VOCABULARY[category].map(token => [token, category] as const),
  ),
);

const IDENTIFIERS: readonly string[] = IDENTIFIER_CATEGORIES.flatMap(
  category => VOCABULARY[category],
);

const SYMBOL_CHAR = /[A-Za-z0-9_$]/;

/**
 * Category of a whole token, or null when it belongs to no vocabulary
 */
export function classifyToken(token: string): TokenCategory | null {
  return TOKEN_TABLE.get(token) ?? null;
}

/**
 * Every vocabulary identifier except the one under the cursor.
 * Unranked; filtering by the typed prefix is up to the caller.
 */
export function completionCandidates(excluding: string): string[] {
  return IDENTIFIERS.filter(identifier => identifier !== excluding);
}

export interface TokenSpan {
  from: number;
  to: number;
  text: string;
  category: TokenCategory | null;
}

/**
 * End of the string literal opened at `start`: just past the closing quote,
 * or at the line break / end of text when it is unterminated
 */
function stringLiteralEnd(text: string, start: number): { end: number; closed: boolean } {
  const quote = text[start];
  let i = start + 1;

  while (i < text.length) {
    const ch = text[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === quote) return { end: i + 1, closed: true };
    if (ch === '\n') return { end: i, closed: false };
    i++;
  }

  return { end: text.length, closed: false };
}

/**
 * Split text into symbol runs and single bracket/punctuation characters.
 *
 * Symbols are maximal runs of [A-Za-z0-9_$], so `signals` is one token and
 * never matches `signal`. String literals are opaque: only their single
 * quotes are reported. Whitespace and other characters are skipped.
 */
export function scanTokens(text: string): TokenSpan[] {
  const spans: TokenSpan[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (ch === "'" || ch === '"') {
      const { end, closed } = stringLiteralEnd(text, i);
      if (ch === "'") {
        spans.push({ from: i, to: i + 1, text: ch, category: 'punctuation' });
        if (closed) spans.push({ from: end - 1, to: end, text: ch, category: 'punctuation' });
      }
      i = end;
      continue;
    }

    if (SYMBOL_CHAR.test(ch)) {
      const start = i;
      while (i < text.length && SYMBOL_CHAR.test(text[i])) i++;
      const symbol = text.slice(start, i);
      spans.push({ from: start, to: i, text: symbol, category: classifyToken(symbol) });
      continue;
    }

    const category = classifyToken(ch);
    if (category === 'bracket' || category === 'punctuation') {
      spans.push({ from: i, to: i + 1, text: ch, category });
    }
    i++;
  }

  return spans;
}

/**
 * The symbol touching `offset` (cursor directly after or inside it)
 */
export function symbolAt(
  text: string,
  offset: number,
): { from: number; to: number; text: string } | null {
  let from = offset;
  while (from > 0 && SYMBOL_CHAR.test(text[from - 1])) from--;
  let to = offset;
  while (to < text.length && SYMBOL_CHAR.test(text[to])) to++;

  if (from === to) return null;
  return { from, to, text: text.slice(from, to) };
}
