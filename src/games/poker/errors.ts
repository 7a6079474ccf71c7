export type ValidationCode =
  | 'empty_input'
  | 'wrong_token_count'
  | 'invalid_owner_id'
  | 'duplicate_owner'
  | 'invalid_card_token'
  | 'duplicate_card'
  | 'unclassified';

/** Base class for every rejection the parser or ranker raises. Callers may recover and move on. */
export abstract class HandValidationError extends Error {
  abstract readonly code: ValidationCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class EmptyInputError extends HandValidationError {
  readonly code = 'empty_input';

  constructor() {
    super('input may not be empty');
  }
}

export class WrongTokenCountError extends HandValidationError {
  readonly code = 'wrong_token_count';

  constructor(readonly count: number) {
    super(`input requires 6 whitespace-delimited tokens, got ${count}`);
  }
}

export class InvalidOwnerIdError extends HandValidationError {
  readonly code = 'invalid_owner_id';

  constructor(readonly token: string) {
    super(`first token must be an integer player id, got "${token}"`);
  }
}

export class DuplicateOwnerError extends HandValidationError {
  readonly code = 'duplicate_owner';

  constructor(readonly ownerId: number) {
    super(`player id ${ownerId} already in use this round`);
  }
}

export class InvalidCardTokenError extends HandValidationError {
  readonly code = 'invalid_card_token';

  constructor(readonly token: string) {
    super(`invalid card token "${token}"`);
  }
}

export class DuplicateCardError extends HandValidationError {
  readonly code = 'duplicate_card';

  constructor(readonly token: string) {
    super(`card "${token}" was already dealt this round`);
  }
}

export class UnclassifiedHandError extends HandValidationError {
  readonly code = 'unclassified';

  constructor(readonly ownerId: number) {
    super(`hand of player ${ownerId} has no category`);
  }
}

/** Raised by the classifier; a hand that reaches it with the wrong card count is a programming error. */
export class HandSizeError extends Error {
  readonly code = 'hand_size';

  constructor(readonly size: number) {
    super(`need 5 cards, got ${size}`);
    this.name = 'HandSizeError';
  }
}

export function isValidationError(err: unknown): err is HandValidationError {
  return err instanceof HandValidationError;
}

export function describeValidationError(err: HandValidationError): string {
  switch (err.code) {
    case 'empty_input':
      return 'Empty line. Expected "<player id> <card> <card> <card> <card> <card>".';
    case 'wrong_token_count':
      return `${err.message}. Expected a player id followed by five cards.`;
    case 'invalid_owner_id':
    case 'duplicate_owner':
    case 'duplicate_card':
    case 'unclassified':
      return `${err.message}.`;
    case 'invalid_card_token':
      return `${err.message}. Cards look like AH, 10c, KingSpades or q♦.`;
  }
}
