import { compareCategories } from './evaluator.js';
import { UnclassifiedHandError } from './errors.js';
import type { CategoryOrder, Hand, HandCategory, RankClassifier, RankedHand } from './types.js';

export type RankOptions<C> = {
  /** When given, hands without a category are classified first. Hands that have one keep it. */
  classify?: RankClassifier<C>;
  compare: CategoryOrder<C>;
};

/** Presentation order: best standing first, ties listed by ascending owner id. */
export function compareByStandingThenOwner(a: RankedHand<unknown>, b: RankedHand<unknown>): number {
  if (a.standing !== b.standing) return a.standing - b.standing;
  return a.ownerId - b.ownerId;
}

function requireCategory<C>(hand: Hand<C>): C {
  if (hand.category === undefined) throw new UnclassifiedHandError(hand.ownerId);
  return hand.category;
}

/**
 * Assign dense standings (1,1,2 on a tie for first) and return the hands in
 * presentation order. The hands themselves are updated; the input array is not reordered.
 */
export function rankBy<C>(hands: readonly Hand<C>[], { classify, compare }: RankOptions<C>): RankedHand<C>[] {
  const classified = hands.map((hand) => {
    if (hand.category === undefined && classify) hand.category = classify(hand);
    return { hand, category: requireCategory(hand) };
  });

  // strongest first; order among equal categories does not matter
  classified.sort((a, b) => compare(b.category, a.category));

  const ranked: RankedHand<C>[] = [];
  for (const { hand, category } of classified) {
    const prev = ranked[ranked.length - 1];
    let standing = 1;
    if (prev) standing = compare(category, prev.category) === 0 ? prev.standing : prev.standing + 1;
    ranked.push(Object.assign(hand, { category, standing }));
  }

  return ranked.sort(compareByStandingThenOwner);
}

export function rankRound(
  hands: readonly Hand[],
  opts: Partial<RankOptions<HandCategory>> = {},
): RankedHand[] {
  return rankBy(hands, { classify: opts.classify, compare: opts.compare ?? compareCategories });
}
