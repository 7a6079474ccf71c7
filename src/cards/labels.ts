import { card, type Card, type Rank, type Suit } from './Card.js';

export type Label<T> = readonly [label: string, value: T];

// Tables are tried top to bottom and the first label that prefixes the token wins.
// Spelled-out names come before abbreviations: "ace" must win over "a", "ten" over "t"
// and "two"/"three" over "t". "10" comes before the single digits.
export const RANK_LABELS: readonly Label<Rank>[] = [
  ['two', '2'],
  ['three', '3'],
  ['four', '4'],
  ['five', '5'],
  ['six', '6'],
  ['seven', '7'],
  ['eight', '8'],
  ['nine', '9'],
  ['ten', '10'],
  ['jack', 'J'],
  ['queen', 'Q'],
  ['king', 'K'],
  ['ace', 'A'],
  ['10', '10'],
  ['2', '2'],
  ['3', '3'],
  ['4', '4'],
  ['5', '5'],
  ['6', '6'],
  ['7', '7'],
  ['8', '8'],
  ['9', '9'],
  ['t', '10'],
  ['j', 'J'],
  ['q', 'Q'],
  ['k', 'K'],
  ['a', 'A'],
];

export const SUIT_LABELS: readonly Label<Suit>[] = [
  ['clubs', 'C'],
  ['diamonds', 'D'],
  ['hearts', 'H'],
  ['spades', 'S'],
  ['c', 'C'],
  ['d', 'D'],
  ['h', 'H'],
  ['s', 'S'],
  ['♣', 'C'],
  ['♦', 'D'],
  ['♥', 'H'],
  ['♠', 'S'],
];

export type PrefixMatch<T> = { value: T; rest: string };

/** First table entry whose label prefixes `text` (already lower-cased). */
export function matchPrefix<T>(table: readonly Label<T>[], text: string): PrefixMatch<T> | null {
  for (const [label, value] of table) {
    if (text.startsWith(label)) return { value, rest: text.slice(label.length) };
  }
  return null;
}

/**
 * Reads one card token: rank first, then suit as a prefix of what is left.
 * Anything after the suit label is ignored. Returns null when either part is missing.
 */
export function readCardToken(token: string): Card | null {
  const rank = matchPrefix(RANK_LABELS, token.toLowerCase());
  if (!rank) return null;
  const suit = matchPrefix(SUIT_LABELS, rank.rest);
  if (!suit) return null;
  return card(rank.value, suit.value);
}
