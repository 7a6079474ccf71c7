import { formatCard, type Card } from '../cards/Card.js';
import { cardToSymbol } from '../cards/unicode.js';
import type { CardStyle } from '../config/index.js';
import { describeValidationError } from '../games/poker/errors.js';
import { describeCategory } from '../games/poker/evaluator.js';
import type { RoundResult } from '../games/poker/runner.js';

export function formatCards(cards: readonly Card[], style: CardStyle): string {
  switch (style) {
    case 'unicode': return cards.map(cardToSymbol).join(' ');
    case 'long': return cards.map((c) => formatCard(c, 'long')).join(', ');
    case 'short': return cards.map((c) => formatCard(c)).join(' ');
  }
}

export function standingRows(result: RoundResult, style: CardStyle) {
  return result.standings.map((h) => ({
    Standing: h.standing,
    Player: h.ownerId,
    Hand: describeCategory(h.category),
    Cards: formatCards(h.cards, style),
  }));
}

export function rejectedLines(result: RoundResult): string[] {
  return result.rejected.map((r) => `line ${r.lineNo}: ${describeValidationError(r.error)}`);
}

/** Plain data for --json output. */
export function toJson(results: readonly RoundResult[], style: CardStyle) {
  return {
    rounds: results.map((r) => ({
      round: r.round,
      standings: r.standings.map((h) => ({
        standing: h.standing,
        ownerId: h.ownerId,
        category: h.category.name,
        description: describeCategory(h.category),
        cards: h.cards.map((c) => formatCards([c], style)),
      })),
      rejected: r.rejected.map((x) => ({ lineNo: x.lineNo, line: x.text, code: x.error.code, message: x.error.message })),
    })),
  };
}
