import type { Card, CardLookup } from './card';
import { isBasicPokemon } from './card';
import { GameStateError } from './errors';

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
};

/**
 * Owns every Card value a match can reference. Cards are frozen on
 * registration so one database can back many matches at once.
 */
export class CardDatabase implements CardLookup {
  private readonly cards = new Map<string, Card>();

  constructor(cards: Iterable<Card> = []) {
    for (const card of cards) {
      this.register(card);
    }
  }

  public register(card: Card): Card {
    if (this.cards.has(card.id)) {
      throw new GameStateError('INVALID_STATE', `Card ${card.id} is already registered`);
    }
    const frozen = deepFreeze(card);
    this.cards.set(frozen.id, frozen);
    return frozen;
  }

  public registerAll(cards: Iterable<Card>): void {
    for (const card of cards) {
      this.register(card);
    }
  }

  public getCard(cardId: string): Card | undefined {
    return this.cards.get(cardId);
  }

  public require(cardId: string): Card {
    const card = this.cards.get(cardId);
    if (!card) {
      throw new GameStateError('CARD_NOT_FOUND', `Card ${cardId} not found`);
    }
    return card;
  }

  public has(cardId: string): boolean {
    return this.cards.has(cardId);
  }

  public findByName(name: string): Card[] {
    const needle = name.trim().toLowerCase();
    return [...this.cards.values()].filter((card) => card.name.toLowerCase() === needle);
  }

  public basicPokemon(): Card[] {
    return [...this.cards.values()].filter((card) => isBasicPokemon(card));
  }

  get size(): number {
    return this.cards.size;
  }

  public values(): IterableIterator<Card> {
    return this.cards.values();
  }
}
