import { classifyHand, compareCategories } from './evaluator.js';
import { parseHand } from './parser.js';
import { rankBy } from './ranker.js';
import { RoundContext } from './round.js';
import type { Hand, HandCategory, RankClassifier, RankedHand } from './types.js';

export type StandingsServiceOptions = {
  classifier?: RankClassifier<HandCategory>;
  atomic?: boolean;
};

/** One table: parses submissions against its own round state and ranks them. */
export class StandingsService {
  readonly round = new RoundContext();
  private readonly classifier: RankClassifier<HandCategory>;
  private readonly atomic: boolean;

  constructor(opts: StandingsServiceOptions = {}) {
    this.classifier = opts.classifier ?? classifyHand;
    this.atomic = opts.atomic ?? false;
  }

  makeHand(line: string): Hand {
    return parseHand(line, this.round, { atomic: this.atomic });
  }

  /** Attach a category to every hand that lacks one. */
  assignCategories(hands: readonly Hand[]): void {
    for (const hand of hands) {
      if (hand.category === undefined) hand.category = this.classifier(hand);
    }
  }

  rankRound(hands: readonly Hand[]): RankedHand[] {
    return rankBy(hands, { classify: this.classifier, compare: compareCategories });
  }

  resetRound(): void {
    this.round.reset();
  }
}
