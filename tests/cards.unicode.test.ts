import { card } from '../src/cards/Card.js';
import { cardToSymbol, SUIT_SYMBOL } from '../src/cards/unicode.js';
import { formatCards } from '../src/cli/render.js';

describe('unicode card symbols', () => {
  test('rank and suit symbol', () => {
    expect(cardToSymbol(card('10', 'H'))).toBe('10♥');
    expect(cardToSymbol(card('J', 'C'))).toBe('J♣');
  });

  test('every suit has a symbol', () => {
    expect(Object.values(SUIT_SYMBOL)).toEqual(['♣', '♦', '♥', '♠']);
  });

  test('unicode style renders a hand with suit symbols', () => {
    expect(formatCards([card('A', 'S'), card('10', 'D'), card('2', 'C')], 'unicode')).toBe('A♠ 10♦ 2♣');
  });
});
