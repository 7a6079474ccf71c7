import { rankFromValue, rankName, rankValue, type Card } from '../../cards/Card.js';
import { HandSizeError } from './errors.js';
import type { CategoryName, Hand, HandCategory } from './types.js';

function byRankDesc(a: number, b: number) { return b - a; }

const WHEEL = [14, 5, 4, 3, 2];

export function rankFive(cards: readonly Card[]): HandCategory {
  if (cards.length !== 5) throw new HandSizeError(cards.length);
  const counts = new Map<number, number>();
  const suits = new Set<string>();
  for (const c of cards) {
    const v = rankValue(c.rank);
    counts.set(v, (counts.get(v) ?? 0) + 1);
    suits.add(c.suit);
  }
  const isFlush = suits.size === 1;
  const sorted = cards.map((c) => rankValue(c.rank)).sort(byRankDesc);
  const unique = Array.from(new Set(sorted));
  let isStraight = false;
  let topStraight = 0;
  // straight handling including wheel A-2-3-4-5
  if (unique.length === 5 && unique[0] - unique[4] === 4) {
    isStraight = true; topStraight = unique[0];
  } else if (unique.length === 5 && unique.every((v, i) => v === WHEEL[i])) {
    isStraight = true; topStraight = 5;
  }

  if (isStraight && isFlush) {
    return { name: 'straight_flush', tiebreak: [topStraight] };
  }

  // [rank, count], biggest group first, then higher rank
  const groups = Array.from(counts.entries()).sort((a, b) => {
    if (b[1] !== a[1]) return b[1] - a[1];
    return b[0] - a[0];
  });
  const [top, second] = groups;
  const kickers = (...used: number[]) => unique.filter((r) => !used.includes(r));

  if (top[1] === 4) {
    return { name: 'four_of_a_kind', tiebreak: [top[0], ...kickers(top[0])] };
  }
  if (top[1] === 3 && second[1] === 2) {
    return { name: 'full_house', tiebreak: [top[0], second[0]] };
  }
  if (isFlush) {
    return { name: 'flush', tiebreak: sorted };
  }
  if (isStraight) {
    return { name: 'straight', tiebreak: [topStraight] };
  }
  if (top[1] === 3) {
    return { name: 'three_of_a_kind', tiebreak: [top[0], ...kickers(top[0])] };
  }
  if (top[1] === 2 && second[1] === 2) {
    return { name: 'two_pair', tiebreak: [top[0], second[0], ...kickers(top[0], second[0])] };
  }
  if (top[1] === 2) {
    return { name: 'pair', tiebreak: [top[0], ...kickers(top[0])] };
  }
  return { name: 'high_card', tiebreak: sorted };
}

/** Default rank classifier: a pure function of the hand's five cards. */
export function classifyHand(hand: Pick<Hand, 'cards'>): HandCategory {
  return rankFive(hand.cards);
}

const ORDER: Record<CategoryName, number> = {
  high_card: 1,
  pair: 2,
  two_pair: 3,
  three_of_a_kind: 4,
  straight: 5,
  flush: 6,
  full_house: 7,
  four_of_a_kind: 8,
  straight_flush: 9,
};

export function compareCategories(a: HandCategory, b: HandCategory): number {
  if (ORDER[a.name] !== ORDER[b.name]) return ORDER[a.name] - ORDER[b.name];
  for (let i = 0; i < Math.max(a.tiebreak.length, b.tiebreak.length); i++) {
    const ai = a.tiebreak[i] ?? 0;
    const bi = b.tiebreak[i] ?? 0;
    if (ai !== bi) return ai - bi;
  }
  return 0;
}

function plural(value: number): string {
  const name = rankName(rankFromValue(value));
  return name === 'Six' ? 'Sixes' : `${name}s`;
}

function single(value: number): string {
  return rankName(rankFromValue(value));
}

export function describeCategory(category: HandCategory): string {
  const [first, second] = category.tiebreak;
  switch (category.name) {
    case 'straight_flush':
      return first === 14 ? 'Royal Flush' : `Straight Flush, ${single(first)} high`;
    case 'four_of_a_kind':
      return `Four ${plural(first)}`;
    case 'full_house':
      return `Full House, ${plural(first)} over ${plural(second)}`;
    case 'flush':
      return `Flush, ${single(first)} high`;
    case 'straight':
      return `Straight, ${single(first)} high`;
    case 'three_of_a_kind':
      return `Three ${plural(first)}`;
    case 'two_pair':
      return `Two Pair, ${plural(first)} and ${plural(second)}`;
    case 'pair':
      return `Pair of ${plural(first)}`;
    case 'high_card':
      return `${single(first)} high`;
  }
}
