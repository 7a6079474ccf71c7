import { cardKey, type Card } from '../../cards/Card.js';
import { readCardToken } from '../../cards/labels.js';
import {
  DuplicateCardError,
  DuplicateOwnerError,
  EmptyInputError,
  InvalidCardTokenError,
  InvalidOwnerIdError,
  WrongTokenCountError,
} from './errors.js';
import type { RoundContext } from './round.js';
import type { Hand } from './types.js';

export const TOKENS_PER_LINE = 6;

export type ParseOptions = {
  /** Register the owner and cards only once the whole line is valid. */
  atomic?: boolean;
};

const INTEGER = /^[+-]?\d+$/;

export function parseOwnerId(token: string): number {
  if (!INTEGER.test(token)) throw new InvalidOwnerIdError(token);
  const id = Number(token);
  if (!Number.isSafeInteger(id)) throw new InvalidOwnerIdError(token);
  // "-0" and "0" are the same player
  return id === 0 ? 0 : id;
}

/**
 * Parse "<ownerId> <card> <card> <card> <card> <card>" into a hand, in input order.
 *
 * By default every token is registered with the round as soon as it validates, so a
 * line that fails on its fourth card still leaves its owner and first three cards
 * claimed. With `atomic` nothing is registered unless the whole line is accepted.
 */
export function parseHand(line: string | null | undefined, round: RoundContext, opts: ParseOptions = {}): Hand {
  if (line == null || line.trim() === '') throw new EmptyInputError();

  const tokens = line.trim().split(/\s+/);
  if (tokens.length !== TOKENS_PER_LINE) throw new WrongTokenCountError(tokens.length);

  const [ownerToken, ...cardTokens] = tokens;
  const ownerId = parseOwnerId(ownerToken);
  if (round.hasOwner(ownerId)) throw new DuplicateOwnerError(ownerId);
  if (!opts.atomic) round.claimOwner(ownerId);

  const staged = new Set<string>();
  const cards: Card[] = [];
  for (const token of cardTokens) {
    const c = readCardToken(token);
    if (!c) throw new InvalidCardTokenError(token);
    if (round.hasCard(c) || staged.has(cardKey(c))) throw new DuplicateCardError(token);
    if (opts.atomic) staged.add(cardKey(c));
    else round.claimCard(c);
    cards.push(c);
  }

  if (opts.atomic) {
    round.claimOwner(ownerId);
    cards.forEach((c) => round.claimCard(c));
  }
  return { ownerId, cards };
}
