import { log } from '../../cli/logger.js';
import { isValidationError, type HandValidationError } from './errors.js';
import type { StandingsService } from './service.js';
import type { Hand, RankedHand } from './types.js';

const rlog = log.withScope('round');

export type RoundLine = { lineNo: number; text: string };
export type RejectedLine = RoundLine & { error: HandValidationError };
export type RoundResult = { round: number; standings: RankedHand[]; rejected: RejectedLine[] };

const SEPARATOR = '---';

/**
 * Blank lines and "---" end a round, "#" starts a comment line.
 * Line numbers are 1-based positions in `text`.
 */
export function splitRounds(text: string): RoundLine[][] {
  const rounds: RoundLine[][] = [];
  let current: RoundLine[] = [];
  const flush = () => {
    if (current.length) rounds.push(current);
    current = [];
  };

  text.split(/\r?\n/).forEach((raw, i) => {
    const t = raw.trim();
    if (t === '' || t === SEPARATOR) return flush();
    if (t.startsWith('#')) return;
    current.push({ lineNo: i + 1, text: t });
  });
  flush();
  return rounds;
}

/**
 * Reset the table, then parse and rank one round. Rejected lines are collected and
 * the rest of the round still plays.
 */
export function playRound(service: StandingsService, lines: readonly RoundLine[]): Omit<RoundResult, 'round'> {
  service.resetRound();
  const hands: Hand[] = [];
  const rejected: RejectedLine[] = [];

  for (const line of lines) {
    try {
      hands.push(service.makeHand(line.text));
    } catch (err) {
      if (!isValidationError(err)) throw err;
      rlog.warn('line rejected', { lineNo: line.lineNo, code: err.code, reason: err.message });
      rejected.push({ ...line, error: err });
    }
  }

  const standings = service.rankRound(hands);
  rlog.debug('round ranked', { hands: standings.length, rejected: rejected.length });
  return { standings, rejected };
}

export function playAll(service: StandingsService, text: string): RoundResult[] {
  return splitRounds(text).map((lines, i) => ({ round: i + 1, ...playRound(service, lines) }));
}
