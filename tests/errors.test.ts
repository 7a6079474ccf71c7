import {
  DuplicateOwnerError,
  EmptyInputError,
  HandSizeError,
  HandValidationError,
  InvalidCardTokenError,
  describeValidationError,
  isValidationError,
} from '../src/games/poker/errors.js';
import { formatUserError, normalizeError } from '../src/utils/errors.js';

describe('errors', () => {
  test('validation errors carry a code and their class name', () => {
    const err = new InvalidCardTokenError('ZZ');
    expect(err).toBeInstanceOf(HandValidationError);
    expect(err.code).toBe('invalid_card_token');
    expect(err.name).toBe('InvalidCardTokenError');
    expect(err.token).toBe('ZZ');
  });

  test('hand size errors are not validation errors', () => {
    expect(isValidationError(new HandSizeError(4))).toBe(false);
    expect(isValidationError(new DuplicateOwnerError(3))).toBe(true);
    expect(isValidationError('nope')).toBe(false);
  });

  test('user-facing descriptions', () => {
    expect(describeValidationError(new EmptyInputError())).toBe('Empty line. Expected "<player id> <card> <card> <card> <card> <card>".');
    expect(describeValidationError(new DuplicateOwnerError(3))).toBe('player id 3 already in use this round.');
    expect(describeValidationError(new InvalidCardTokenError('ZZ'))).toBe('invalid card token "ZZ". Cards look like AH, 10c, KingSpades or q♦.');
  });

  test('normalizeError handles non-errors', () => {
    expect(normalizeError('boom')).toEqual({ name: 'string', message: 'boom', stack: '' });
    expect(normalizeError(new TypeError('bad')).name).toBe('TypeError');
  });

  test('formatUserError', () => {
    expect(formatUserError('line 2', new DuplicateOwnerError(1))).toBe('line 2: player id 1 already in use this round.');
    expect(formatUserError('poker-standings', new Error('ENOENT'))).toBe('poker-standings failed (Error): ENOENT');
    expect(formatUserError('poker-standings', new Error('ENOENT'), true).split('\n')[0]).toBe('poker-standings failed (Error): ENOENT');
  });
});
