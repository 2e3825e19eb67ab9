import { v4 as uuidv4 } from 'uuid';
import type { CardDatabase } from './card-database';
import { CardKind, EnergyType, EvolutionStage, isBasicEnergy, type Card } from './card';
import { GameStateError } from './errors';
import { shuffled, type RandomSource } from './random';

export const STANDARD_DECK_SIZE = 60;
export const LIMITED_MIN_DECK_SIZE = 40;
export const MAX_COPIES_PER_CARD = 4;

const EXACT_SIZE_FORMATS = new Set(['standard', 'expanded']);
const LIMITED_FORMATS = new Set(['limited']);

export type DeckValidationError =
  | { kind: 'too_few_cards'; minimum: number; actual: number }
  | { kind: 'too_many_cards'; maximum: number; actual: number }
  | { kind: 'too_many_copies'; cardId: string; cardName: string; maximum: number; actual: number }
  | { kind: 'no_basic_pokemon' }
  | { kind: 'unknown_card'; cardId: string };

export type DeckValidationResult = { ok: true } | { ok: false; errors: DeckValidationError[] };

export interface DeckStatistics {
  totalCards: number;
  uniqueCards: number;
  pokemonCount: number;
  trainerCount: number;
  energyCount: number;
  basicPokemonCount: number;
  energyDistribution: Partial<Record<EnergyType, number>>;
}

export const describeDeckError = (error: DeckValidationError): string => {
  switch (error.kind) {
    case 'too_few_cards':
      return `Deck has ${error.actual} cards, minimum is ${error.minimum}`;
    case 'too_many_cards':
      return `Deck has ${error.actual} cards, maximum is ${error.maximum}`;
    case 'too_many_copies':
      return `${error.cardName} appears ${error.actual} times, maximum is ${error.maximum}`;
    case 'no_basic_pokemon':
      return 'Deck contains no Basic Pokemon';
    case 'unknown_card':
      return `Card ${error.cardId} is not in the card database`;
  }
};

/**
 * A named multiset of card ids. Quantities are always positive; setting a
 * quantity to zero removes the entry.
 */
export class Deck {
  public readonly id: string;
  public name: string;
  public format: string;
  public metadata: Record<string, string> = {};
  private readonly cards = new Map<string, number>();

  constructor(name: string, format = 'Standard', id: string = uuidv4()) {
    this.id = id;
    this.name = name;
    this.format = format;
  }

  static fromCardList(name: string, cardIds: readonly string[], format = 'Standard'): Deck {
    const deck = new Deck(name, format);
    for (const cardId of cardIds) {
      deck.addCard(cardId, 1);
    }
    return deck;
  }

  // ========================================================================
  // MUTATION
  // ========================================================================

  public addCard(cardId: string, quantity = 1): void {
    this.assertQuantity(quantity);
    if (quantity === 0) {
      return;
    }
    this.cards.set(cardId, (this.cards.get(cardId) ?? 0) + quantity);
  }

  /**
   * Removes up to `quantity` copies and returns how many were actually removed.
   */
  public removeCard(cardId: string, quantity = 1): number {
    this.assertQuantity(quantity);
    const current = this.cards.get(cardId) ?? 0;
    const removed = Math.min(current, quantity);
    if (current - removed === 0) {
      this.cards.delete(cardId);
    } else {
      this.cards.set(cardId, current - removed);
    }
    return removed;
  }

  public setCardQuantity(cardId: string, quantity: number): void {
    this.assertQuantity(quantity);
    if (quantity === 0) {
      this.cards.delete(cardId);
      return;
    }
    this.cards.set(cardId, quantity);
  }

  public clear(): void {
    this.cards.clear();
  }

  // ========================================================================
  // QUERIES
  // ========================================================================

  public getCardQuantity(cardId: string): number {
    return this.cards.get(cardId) ?? 0;
  }

  public containsCard(cardId: string): boolean {
    return this.cards.has(cardId);
  }

  public totalCards(): number {
    let total = 0;
    for (const count of this.cards.values()) {
      total += count;
    }
    return total;
  }

  public uniqueCards(): number {
    return this.cards.size;
  }

  public entries(): Array<[string, number]> {
    return [...this.cards.entries()];
  }

  /** One id per copy, in insertion order. */
  public toCardList(): string[] {
    const list: string[] = [];
    for (const [cardId, count] of this.cards) {
      for (let i = 0; i < count; i++) {
        list.push(cardId);
      }
    }
    return list;
  }

  public shuffle(random: RandomSource): string[] {
    return shuffled(this.toCardList(), random);
  }

  // ========================================================================
  // VALIDATION
  // ========================================================================

  public validate(database: CardDatabase): DeckValidationResult {
    const errors: DeckValidationError[] = [];
    const total = this.totalCards();
    const format = this.format.trim().toLowerCase();

    if (EXACT_SIZE_FORMATS.has(format)) {
      if (total < STANDARD_DECK_SIZE) {
        errors.push({ kind: 'too_few_cards', minimum: STANDARD_DECK_SIZE, actual: total });
      } else if (total > STANDARD_DECK_SIZE) {
        errors.push({ kind: 'too_many_cards', maximum: STANDARD_DECK_SIZE, actual: total });
      }
    } else if (LIMITED_FORMATS.has(format) && total < LIMITED_MIN_DECK_SIZE) {
      errors.push({ kind: 'too_few_cards', minimum: LIMITED_MIN_DECK_SIZE, actual: total });
    }

    let basicPokemon = 0;
    for (const [cardId, count] of this.cards) {
      const card = database.getCard(cardId);
      if (!card) {
        errors.push({ kind: 'unknown_card', cardId });
        continue;
      }
      if (!isBasicEnergy(card) && count > MAX_COPIES_PER_CARD) {
        errors.push({
          kind: 'too_many_copies',
          cardId,
          cardName: card.name,
          maximum: MAX_COPIES_PER_CARD,
          actual: count
        });
      }
      if (card.cardType.kind === CardKind.POKEMON && card.cardType.stage === EvolutionStage.BASIC) {
        basicPokemon += count;
      }
    }

    if (basicPokemon === 0) {
      errors.push({ kind: 'no_basic_pokemon' });
    }

    return errors.length === 0 ? { ok: true } : { ok: false, errors };
  }

  public getStatistics(database: CardDatabase): DeckStatistics {
    const stats: DeckStatistics = {
      totalCards: 0,
      uniqueCards: 0,
      pokemonCount: 0,
      trainerCount: 0,
      energyCount: 0,
      basicPokemonCount: 0,
      energyDistribution: {}
    };

    for (const [cardId, count] of this.cards) {
      const card = database.getCard(cardId);
      if (!card) {
        continue;
      }
      stats.totalCards += count;
      stats.uniqueCards += 1;

      const details = card.cardType;
      switch (details.kind) {
        case CardKind.POKEMON:
          stats.pokemonCount += count;
          if (details.stage === EvolutionStage.BASIC) {
            stats.basicPokemonCount += count;
          }
          break;
        case CardKind.ENERGY:
          stats.energyCount += count;
          stats.energyDistribution[details.energyType] =
            (stats.energyDistribution[details.energyType] ?? 0) + count;
          break;
        case CardKind.TRAINER:
          stats.trainerCount += count;
          break;
      }
    }

    return stats;
  }

  /**
   * Plain-text deck list grouped by card kind, e.g.
   *
   *   Deck: Fire Starter
   *   Format: Standard
   *
   *   Pokemon:
   *   4 Charmander
   */
  public exportText(database: CardDatabase): string {
    const groups: Record<CardKind, string[]> = {
      [CardKind.POKEMON]: [],
      [CardKind.TRAINER]: [],
      [CardKind.ENERGY]: []
    };

    for (const [cardId, count] of this.cards) {
      const card: Card | undefined = database.getCard(cardId);
      if (card) {
        groups[card.cardType.kind].push(`${count} ${card.name}`);
      }
    }

    const lines = [`Deck: ${this.name}`, `Format: ${this.format}`];
    const sections: Array<[string, string[]]> = [
      ['Pokemon:', groups[CardKind.POKEMON]],
      ['Trainers:', groups[CardKind.TRAINER]],
      ['Energy:', groups[CardKind.ENERGY]]
    ];
    for (const [heading, entries] of sections) {
      if (entries.length > 0) {
        lines.push('', heading, ...entries);
      }
    }
    return lines.join('\n');
  }

  private assertQuantity(quantity: number): void {
    if (!Number.isInteger(quantity) || quantity < 0) {
      throw new GameStateError('OUT_OF_BOUNDS', `Invalid card quantity: ${quantity}`);
    }
  }
}
