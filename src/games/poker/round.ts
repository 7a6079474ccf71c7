import { cardKey, type Card } from '../../cards/Card.js';

/**
 * Duplicate tracking for one round: owner ids and cards seen so far.
 * Single writer; lines of a round are parsed one after another.
 */
export class RoundContext {
  private readonly owners = new Set<number>();
  private readonly cards = new Set<string>();

  get ownerCount(): number {
    return this.owners.size;
  }

  get cardCount(): number {
    return this.cards.size;
  }

  hasOwner(ownerId: number): boolean {
    return this.owners.has(ownerId);
  }

  hasCard(c: Card): boolean {
    return this.cards.has(cardKey(c));
  }

  claimOwner(ownerId: number): void {
    this.owners.add(ownerId);
  }

  claimCard(c: Card): void {
    this.cards.add(cardKey(c));
  }

  /** Must run between rounds, or the next round rejects ids and cards it never saw. */
  reset(): void {
    this.owners.clear();
    this.cards.clear();
  }
}
