import type { Card, Suit } from './Card.js';

export const SUIT_SYMBOL: Record<Suit, string> = { C: '♣', D: '♦', H: '♥', S: '♠' };

/** Rank plus suit symbol, e.g. "10♥". */
export function cardToSymbol(card: Card): string {
  return `${card.rank}${SUIT_SYMBOL[card.suit]}`;
}
