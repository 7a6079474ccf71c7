import { readCardToken } from '../../../cards/labels.js';
import type { Card } from '../../../cards/Card.js';
import { HandSizeError } from '../errors.js';
import { classifyHand, compareCategories, describeCategory, rankFive } from '../evaluator.js';

function cards(text: string): Card[] {
  return text.split(' ').map((t) => {
    const c = readCardToken(t);
    if (!c) throw new Error(`bad fixture token ${t}`);
    return c;
  });
}

const rank = (text: string) => rankFive(cards(text));

describe('poker evaluator', () => {
  test('recognises every category', () => {
    expect(rank('AS KS QS JS 10S').name).toBe('straight_flush');
    expect(rank('9C 9D 9H 9S 2C').name).toBe('four_of_a_kind');
    expect(rank('3C 3D 3H 7S 7C').name).toBe('full_house');
    expect(rank('2H 7H 9H JH KH').name).toBe('flush');
    expect(rank('5C 6D 7H 8S 9C').name).toBe('straight');
    expect(rank('QC QD QH 4S 2C').name).toBe('three_of_a_kind');
    expect(rank('JC JD 4H 4S AC').name).toBe('two_pair');
    expect(rank('10C 10D 4H 8S AC').name).toBe('pair');
    expect(rank('2C 5D 9H JS KC').name).toBe('high_card');
  });

  test('categories order weakest to strongest', () => {
    const ladder = [
      '2C 5D 9H JS KC',
      '10C 10D 4H 8S AC',
      'JC JD 4H 4S AC',
      'QC QD QH 4S 2C',
      '5C 6D 7H 8S 9C',
      '2H 7H 9H JH KH',
      '3C 3D 3H 7S 7C',
      '9C 9D 9H 9S 2C',
      'AS KS QS JS 10S',
    ].map(rank);
    for (let i = 1; i < ladder.length; i++) {
      expect(compareCategories(ladder[i], ladder[i - 1])).toBeGreaterThan(0);
      expect(compareCategories(ladder[i - 1], ladder[i])).toBeLessThan(0);
    }
  });

  test('wheel is a five-high straight, below six-high', () => {
    const wheel = rank('AC 2D 3H 4S 5C');
    expect(wheel).toEqual({ name: 'straight', tiebreak: [5] });
    expect(compareCategories(rank('2C 3D 4H 5S 6C'), wheel)).toBeGreaterThan(0);
    expect(rank('AH 2H 3H 4H 5H')).toEqual({ name: 'straight_flush', tiebreak: [5] });
  });

  test('ace cannot wrap around the top', () => {
    expect(rank('QC KD AH 2S 3C').name).toBe('high_card');
  });

  test('pair tie-break compares the pair, then kickers', () => {
    expect(compareCategories(rank('KC KD 2H 3S 4C'), rank('QC QD AH JS 9C'))).toBeGreaterThan(0);
    expect(rank('KC KD 2H 9S 4C').tiebreak).toEqual([13, 9, 4, 2]);
    expect(compareCategories(rank('KC KD 2H 9S 4C'), rank('KH KS 3H 8S 4D'))).toBeGreaterThan(0);
  });

  test('two pair and full house tie-breaks', () => {
    expect(rank('JC JD 4H 4S AC').tiebreak).toEqual([11, 4, 14]);
    expect(compareCategories(rank('JC JD 4H 4S 2C'), rank('JH JS 3H 3S AC'))).toBeGreaterThan(0);
    expect(rank('3C 3D 3H 7S 7C').tiebreak).toEqual([3, 7]);
    expect(compareCategories(rank('4C 4D 4H 2S 2C'), rank('3S 3D 3H AS AC'))).toBeGreaterThan(0);
  });

  test('identical strength in different suits ties', () => {
    expect(compareCategories(rank('AC KD 9H 7S 3C'), rank('AD KH 9S 7C 3D'))).toBe(0);
    expect(compareCategories(rank('5C 6D 7H 8S 9C'), rank('5D 6H 7S 8C 9D'))).toBe(0);
  });

  test('order of the cards does not matter', () => {
    expect(rank('7S 3C 7C 3D 3H')).toEqual(rank('3C 3D 3H 7S 7C'));
    expect(rank('10S AS JS KS QS')).toEqual(rank('AS KS QS JS 10S'));
  });

  test('rejects anything but five cards', () => {
    expect(() => rankFive(cards('AS KS QS JS'))).toThrow(HandSizeError);
    expect(() => classifyHand({ cards: cards('AS KS QS JS 10S 9S') })).toThrow(new HandSizeError(6));
  });

  test('describes categories', () => {
    expect(describeCategory(rank('AS KS QS JS 10S'))).toBe('Royal Flush');
    expect(describeCategory(rank('AH 2H 3H 4H 5H'))).toBe('Straight Flush, Five high');
    expect(describeCategory(rank('6C 6D 6H 6S 2C'))).toBe('Four Sixes');
    expect(describeCategory(rank('3C 3D 3H 7S 7C'))).toBe('Full House, Threes over Sevens');
    expect(describeCategory(rank('JC JD 4H 4S AC'))).toBe('Two Pair, Jacks and Fours');
    expect(describeCategory(rank('KC KD 2H 9S 4C'))).toBe('Pair of Kings');
    expect(describeCategory(rank('2C 5D 9H JS KC'))).toBe('King high');
  });
});
