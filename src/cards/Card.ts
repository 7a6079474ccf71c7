export type Suit = 'C' | 'D' | 'H' | 'S';
export type Rank = '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9' | '10' | 'J' | 'Q' | 'K' | 'A';
export type Card = { readonly rank: Rank; readonly suit: Suit };

export const RANKS: readonly Rank[] = ['2', '3', '4', '5', '6', '7', '8', '9', '10', 'J', 'Q', 'K', 'A'];

const RANK_VALUE: Record<Rank, number> = {
  '2': 2, '3': 3, '4': 4, '5': 5, '6': 6, '7': 7, '8': 8, '9': 9, '10': 10,
  J: 11, Q: 12, K: 13, A: 14,
};

const RANK_NAME: Record<Rank, string> = {
  '2': 'Two', '3': 'Three', '4': 'Four', '5': 'Five', '6': 'Six', '7': 'Seven', '8': 'Eight',
  '9': 'Nine', '10': 'Ten', J: 'Jack', Q: 'Queen', K: 'King', A: 'Ace',
};

const SUIT_NAME: Record<Suit, string> = { C: 'Clubs', D: 'Diamonds', H: 'Hearts', S: 'Spades' };

export function card(rank: Rank, suit: Suit): Card {
  return Object.freeze({ rank, suit });
}

/** 2..14, ace high. */
export function rankValue(rank: Rank): number {
  return RANK_VALUE[rank];
}

export function rankName(rank: Rank): string {
  return RANK_NAME[rank];
}

export function rankFromValue(value: number): Rank {
  const found = RANKS.find((r) => RANK_VALUE[r] === value);
  if (!found) throw new RangeError(`no rank with value ${value}`);
  return found;
}

/** Canonical key, e.g. "10H", "AS". Two cards are the same card exactly when their keys match. */
export function cardKey(c: Card): string {
  return `${c.rank}${c.suit}`;
}

export function formatCard(c: Card, style: 'short' | 'long' = 'short'): string {
  if (style === 'long') return `${RANK_NAME[c.rank]} of ${SUIT_NAME[c.suit]}`;
  return cardKey(c);
}
