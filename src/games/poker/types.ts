import type { Card } from '../../cards/Card.js';

export type { Card };

export type CategoryName =
  | 'high_card'
  | 'pair'
  | 'two_pair'
  | 'three_of_a_kind'
  | 'straight'
  | 'flush'
  | 'full_house'
  | 'four_of_a_kind'
  | 'straight_flush';

export interface HandCategory {
  name: CategoryName;
  tiebreak: number[]; // rank values, most significant first
}

export interface Hand<C = HandCategory> {
  ownerId: number;
  cards: Card[];
  category?: C;
  standing?: number; // 1 = best, shared on ties
}

export type RankedHand<C = HandCategory> = Hand<C> & { category: C; standing: number };

/** Three-way comparison: negative when a is weaker, 0 when tied, positive when stronger. */
export type CategoryOrder<C> = (a: C, b: C) => number;

export type RankClassifier<C = HandCategory> = (hand: Hand<C>) => C;
