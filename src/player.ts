import { v4 as uuidv4 } from 'uuid';
import {
  EnergyType,
  SpecialConditionType,
  isBasicPokemon,
  isEnergy,
  isPokemon,
  type CardLookup,
  type SpecialCondition
} from './card';
import { flipCoin, shuffleInPlace, type RandomSource } from './random';

export const MAX_BENCH_SIZE = 5;

export enum CardLocation {
  HAND = 'hand',
  DECK = 'deck',
  DISCARD_PILE = 'discard_pile',
  ACTIVE = 'active',
  BENCH = 'bench',
  PRIZES = 'prizes',
  ATTACHED = 'attached'
}

export interface SpecialConditionInstance {
  condition: SpecialCondition;
  /** Turns remaining; -1 lasts until cured. */
  duration: number;
  appliedTurn: number;
  data: Record<string, string | number | boolean>;
}

export type ConditionEffect =
  | { type: 'damage'; pokemonId: string; amount: number; condition: SpecialConditionType }
  | { type: 'coin_flip'; pokemonId: string; condition: SpecialConditionType; heads: boolean }
  | { type: 'condition_removed'; pokemonId: string; condition: SpecialConditionType };

// Asleep, Confused and Paralyzed replace one another.
const ROTATION_CONDITIONS = new Set<SpecialConditionType>([
  SpecialConditionType.ASLEEP,
  SpecialConditionType.CONFUSED,
  SpecialConditionType.PARALYZED
]);

const removeOne = (list: string[], cardId: string): boolean => {
  const index = list.indexOf(cardId);
  if (index === -1) {
    return false;
  }
  list.splice(index, 1);
  return true;
};

/**
 * One seat at the table: every zone the player owns plus per-turn flags.
 *
 * Zones hold card ids in order; the top of the deck is the end of the array.
 * Mutators return false (or null) instead of throwing when a move is not
 * possible, and never leave a card in two zones.
 */
export class Player {
  public readonly id: string;
  public name: string;

  public hand: string[] = [];
  public deck: string[] = [];
  public discardPile: string[] = [];
  public activePokemon: string | null = null;
  public bench: string[] = [];
  public prizes: string[] = [];
  public prizeCards = 0;
  public stadium: string | null = null;

  public readonly attachedEnergy = new Map<string, string[]>();
  public readonly attachedTools = new Map<string, string>();
  public readonly damageCounters = new Map<string, number>();
  public readonly specialConditions = new Map<string, SpecialConditionInstance[]>();
  /** Cards beneath an evolved Pokémon, lowest stage first. */
  public readonly evolutionStack = new Map<string, string[]>();
  /** Turn number on which each in-play Pokémon entered play or last evolved. */
  public readonly enteredPlayTurn = new Map<string, number>();

  public hasAttacked = false;
  public canPlayTrainer = true;
  public energyAttachedThisTurn = false;
  public hasRetreated = false;

  constructor(name: string, id: string = uuidv4()) {
    this.id = id;
    this.name = name;
  }

  // ========================================================================
  // DECK AND HAND
  // ========================================================================

  public setDeck(cardIds: readonly string[]): void {
    this.deck = [...cardIds];
  }

  public drawCard(): string | null {
    const cardId = this.deck.pop();
    if (cardId === undefined) {
      return null;
    }
    this.hand.push(cardId);
    return cardId;
  }

  /** Draws up to `count` cards; a short deck yields fewer. */
  public drawCards(count: number): string[] {
    const drawn: string[] = [];
    for (let i = 0; i < count; i++) {
      const cardId = this.drawCard();
      if (cardId === null) {
        break;
      }
      drawn.push(cardId);
    }
    return drawn;
  }

  public shuffleDeck(random: RandomSource): void {
    shuffleInPlace(this.deck, random);
  }

  public removeFromHand(cardId: string): boolean {
    return removeOne(this.hand, cardId);
  }

  public discardFromHand(cardId: string): boolean {
    if (!removeOne(this.hand, cardId)) {
      return false;
    }
    this.discardPile.push(cardId);
    return true;
  }

  public returnHandToDeck(): string[] {
    const returned = this.hand;
    this.hand = [];
    this.deck.push(...returned);
    return returned;
  }

  // ========================================================================
  // POKEMON IN PLAY
  // ========================================================================

  public pokemonInPlay(): string[] {
    return this.activePokemon ? [this.activePokemon, ...this.bench] : [...this.bench];
  }

  public isInPlay(cardId: string): boolean {
    return this.activePokemon === cardId || this.bench.includes(cardId);
  }

  public isBenchFull(): boolean {
    return this.bench.length >= MAX_BENCH_SIZE;
  }

  /**
   * Moves a Pokémon from hand or bench into the active spot. The previous
   * active, if any, goes to the bench.
   */
  public setActivePokemon(cardId: string): boolean {
    const fromBench = this.bench.includes(cardId);
    if (!fromBench && !this.hand.includes(cardId)) {
      return false;
    }
    if (this.activePokemon && !fromBench && this.isBenchFull()) {
      return false;
    }

    if (fromBench) {
      removeOne(this.bench, cardId);
    } else {
      removeOne(this.hand, cardId);
    }
    if (this.activePokemon) {
      this.bench.push(this.activePokemon);
    }
    this.activePokemon = cardId;
    return true;
  }

  public benchPokemon(cardId: string): boolean {
    if (this.isBenchFull() || !removeOne(this.hand, cardId)) {
      return false;
    }
    this.bench.push(cardId);
    return true;
  }

  public promoteFromBench(cardId: string): boolean {
    if (this.activePokemon !== null || !removeOne(this.bench, cardId)) {
      return false;
    }
    this.activePokemon = cardId;
    return true;
  }

  /**
   * Places an evolution card from hand on top of an in-play Pokémon. Damage,
   * energy and tools carry over; special conditions do not.
   */
  public evolvePokemon(targetId: string, evolutionId: string): boolean {
    if (!this.isInPlay(targetId) || !removeOne(this.hand, evolutionId)) {
      return false;
    }

    if (this.activePokemon === targetId) {
      this.activePokemon = evolutionId;
    } else {
      this.bench[this.bench.indexOf(targetId)] = evolutionId;
    }

    this.rekey(this.attachedEnergy, targetId, evolutionId);
    this.rekey(this.attachedTools, targetId, evolutionId);
    this.rekey(this.damageCounters, targetId, evolutionId);
    this.rekey(this.enteredPlayTurn, targetId, evolutionId);
    this.specialConditions.delete(targetId);

    const stack = this.evolutionStack.get(targetId) ?? [];
    this.evolutionStack.delete(targetId);
    this.evolutionStack.set(evolutionId, [...stack, targetId]);
    return true;
  }

  /**
   * Takes a Pokémon out of play, detaching everything on or beneath it.
   * Returns those cards with the Pokémon itself, lowest stage first, or an
   * empty list when it was not in play. The caller decides where they go.
   */
  public removeFromPlay(pokemonId: string): string[] {
    if (this.activePokemon === pokemonId) {
      this.activePokemon = null;
    } else if (!removeOne(this.bench, pokemonId)) {
      return [];
    }

    const removed = [
      ...(this.evolutionStack.get(pokemonId) ?? []),
      pokemonId,
      ...(this.attachedEnergy.get(pokemonId) ?? [])
    ];
    const tool = this.attachedTools.get(pokemonId);
    if (tool) {
      removed.push(tool);
    }
    this.clearPokemonState(pokemonId);
    return removed;
  }

  /** Removes a Pokémon from play and sends it and its attachments to the discard pile. */
  public discardPokemon(pokemonId: string): string[] {
    const discarded = this.removeFromPlay(pokemonId);
    this.discardPile.push(...discarded);
    return discarded;
  }

  // ========================================================================
  // ATTACHMENTS
  // ========================================================================

  public attachEnergy(energyId: string, pokemonId: string): boolean {
    if (!this.isInPlay(pokemonId) || !removeOne(this.hand, energyId)) {
      return false;
    }
    const attached = this.attachedEnergy.get(pokemonId) ?? [];
    attached.push(energyId);
    this.attachedEnergy.set(pokemonId, attached);
    return true;
  }

  /** Moves attached energy to the discard pile. */
  public discardEnergy(pokemonId: string, energyIds: readonly string[]): boolean {
    const attached = this.attachedEnergy.get(pokemonId);
    if (!attached || energyIds.some((energyId) => !attached.includes(energyId))) {
      return false;
    }
    for (const energyId of energyIds) {
      removeOne(attached, energyId);
      this.discardPile.push(energyId);
    }
    if (attached.length === 0) {
      this.attachedEnergy.delete(pokemonId);
    }
    return true;
  }

  public getAttachedEnergy(pokemonId: string): string[] {
    return [...(this.attachedEnergy.get(pokemonId) ?? [])];
  }

  public getAttachedEnergyCount(pokemonId: string): number {
    return this.attachedEnergy.get(pokemonId)?.length ?? 0;
  }

  public getAttachedEnergyTypes(pokemonId: string, cards: CardLookup): EnergyType[] {
    const types: EnergyType[] = [];
    for (const energyId of this.attachedEnergy.get(pokemonId) ?? []) {
      const card = cards.getCard(energyId);
      if (card && isEnergy(card)) {
        types.push(card.cardType.energyType);
      }
    }
    return types;
  }

  public attachTool(toolId: string, pokemonId: string): boolean {
    if (!this.isInPlay(pokemonId) || this.attachedTools.has(pokemonId)) {
      return false;
    }
    if (!removeOne(this.hand, toolId)) {
      return false;
    }
    this.attachedTools.set(pokemonId, toolId);
    return true;
  }

  // ========================================================================
  // DAMAGE
  // ========================================================================

  public addDamage(pokemonId: string, amount: number): void {
    if (amount <= 0) {
      return;
    }
    this.damageCounters.set(pokemonId, this.getDamage(pokemonId) + amount);
  }

  public healDamage(pokemonId: string, amount: number): number {
    const current = this.getDamage(pokemonId);
    const healed = Math.min(current, Math.max(0, amount));
    if (current - healed === 0) {
      this.damageCounters.delete(pokemonId);
    } else {
      this.damageCounters.set(pokemonId, current - healed);
    }
    return healed;
  }

  public getDamage(pokemonId: string): number {
    return this.damageCounters.get(pokemonId) ?? 0;
  }

  public isPokemonKnockedOut(pokemonId: string, cards: CardLookup): boolean {
    const card = cards.getCard(pokemonId);
    if (!card || !isPokemon(card)) {
      return false;
    }
    return this.getDamage(pokemonId) >= card.cardType.hp;
  }

  // ========================================================================
  // SPECIAL CONDITIONS
  // ========================================================================

  public addSpecialCondition(
    pokemonId: string,
    condition: SpecialCondition,
    appliedTurn: number,
    duration = -1
  ): void {
    const existing = (this.specialConditions.get(pokemonId) ?? []).filter((instance) => {
      if (instance.condition.type === condition.type) {
        return false;
      }
      return !(ROTATION_CONDITIONS.has(condition.type) && ROTATION_CONDITIONS.has(instance.condition.type));
    });
    existing.push({ condition, duration, appliedTurn, data: {} });
    this.specialConditions.set(pokemonId, existing);
  }

  public removeSpecialCondition(pokemonId: string, type: SpecialConditionType): boolean {
    const existing = this.specialConditions.get(pokemonId);
    if (!existing) {
      return false;
    }
    const remaining = existing.filter((instance) => instance.condition.type !== type);
    if (remaining.length === existing.length) {
      return false;
    }
    if (remaining.length === 0) {
      this.specialConditions.delete(pokemonId);
    } else {
      this.specialConditions.set(pokemonId, remaining);
    }
    return true;
  }

  public hasSpecialCondition(pokemonId: string, type: SpecialConditionType): boolean {
    return (this.specialConditions.get(pokemonId) ?? []).some((instance) => instance.condition.type === type);
  }

  public getSpecialConditions(pokemonId: string): SpecialConditionInstance[] {
    return [...(this.specialConditions.get(pokemonId) ?? [])];
  }

  public clearSpecialConditions(pokemonId: string): void {
    this.specialConditions.delete(pokemonId);
  }

  /**
   * Between-turns check for every Pokémon in play. Coin flips and expiring
   * durations remove conditions here; poison and burn damage is reported
   * for the caller to apply so knock-outs go through the game.
   */
  public updateSpecialConditions(random: RandomSource): ConditionEffect[] {
    const effects: ConditionEffect[] = [];

    for (const pokemonId of this.pokemonInPlay()) {
      for (const instance of this.getSpecialConditions(pokemonId)) {
        const condition = instance.condition;
        switch (condition.type) {
          case SpecialConditionType.POISONED:
            effects.push({ type: 'damage', pokemonId, amount: condition.damagePerTurn, condition: condition.type });
            break;
          case SpecialConditionType.BURNED: {
            effects.push({ type: 'damage', pokemonId, amount: condition.damagePerTurn, condition: condition.type });
            const heads = flipCoin(random);
            effects.push({ type: 'coin_flip', pokemonId, condition: condition.type, heads });
            if (heads && this.removeSpecialCondition(pokemonId, condition.type)) {
              effects.push({ type: 'condition_removed', pokemonId, condition: condition.type });
              continue;
            }
            break;
          }
          case SpecialConditionType.ASLEEP: {
            const heads = flipCoin(random);
            effects.push({ type: 'coin_flip', pokemonId, condition: condition.type, heads });
            if (heads && this.removeSpecialCondition(pokemonId, condition.type)) {
              effects.push({ type: 'condition_removed', pokemonId, condition: condition.type });
              continue;
            }
            break;
          }
          default:
            break;
        }

        if (instance.duration > 0) {
          instance.duration -= 1;
          if (instance.duration === 0 && this.removeSpecialCondition(pokemonId, condition.type)) {
            effects.push({ type: 'condition_removed', pokemonId, condition: condition.type });
          }
        }
      }
    }

    return effects;
  }

  // ========================================================================
  // PRIZES AND TURN FLAGS
  // ========================================================================

  /** Moves up to `count` cards from the top of the deck into the prize area. */
  public drawPrizeCards(count: number): string[] {
    const taken: string[] = [];
    for (let i = 0; i < count; i++) {
      const cardId = this.deck.pop();
      if (cardId === undefined) {
        break;
      }
      taken.push(cardId);
    }
    this.prizes.push(...taken);
    this.prizeCards = this.prizes.length;
    return taken;
  }

  /**
   * Takes one prize. The card moves to hand when prizes were laid out; the
   * count drops either way. Returns null when no prize is left.
   */
  public takePrizeCard(): { cardId: string | null } | null {
    if (this.prizeCards <= 0) {
      return null;
    }
    this.prizeCards -= 1;
    const cardId = this.prizes.pop() ?? null;
    if (cardId) {
      this.hand.push(cardId);
    }
    return { cardId };
  }

  public startTurn(): void {
    this.hasAttacked = false;
    this.canPlayTrainer = true;
    this.energyAttachedThisTurn = false;
    this.hasRetreated = false;
  }

  public hasLost(): boolean {
    return this.activePokemon === null && this.bench.length === 0;
  }

  public hasWon(): boolean {
    return this.prizeCards === 0;
  }

  // ========================================================================
  // LOOKUPS
  // ========================================================================

  public findCardLocation(cardId: string): CardLocation | null {
    if (this.hand.includes(cardId)) return CardLocation.HAND;
    if (this.deck.includes(cardId)) return CardLocation.DECK;
    if (this.discardPile.includes(cardId)) return CardLocation.DISCARD_PILE;
    if (this.activePokemon === cardId) return CardLocation.ACTIVE;
    if (this.bench.includes(cardId)) return CardLocation.BENCH;
    if (this.prizes.includes(cardId)) return CardLocation.PRIZES;
    if (this.stadium === cardId) return CardLocation.ATTACHED;
    for (const attached of this.attachedEnergy.values()) {
      if (attached.includes(cardId)) return CardLocation.ATTACHED;
    }
    for (const tool of this.attachedTools.values()) {
      if (tool === cardId) return CardLocation.ATTACHED;
    }
    for (const stack of this.evolutionStack.values()) {
      if (stack.includes(cardId)) return CardLocation.ATTACHED;
    }
    return null;
  }

  public findBasicPokemonInHand(cards: CardLookup): string[] {
    return this.hand.filter((cardId) => {
      const card = cards.getCard(cardId);
      return card !== undefined && isBasicPokemon(card);
    });
  }

  public hasBasicPokemonInHand(cards: CardLookup): boolean {
    return this.findBasicPokemonInHand(cards).length > 0;
  }

  /** Every card the player owns, across all zones. */
  public allCards(): string[] {
    const cards = [...this.hand, ...this.deck, ...this.discardPile, ...this.prizes, ...this.pokemonInPlay()];
    for (const attached of this.attachedEnergy.values()) cards.push(...attached);
    for (const tool of this.attachedTools.values()) cards.push(tool);
    for (const stack of this.evolutionStack.values()) cards.push(...stack);
    if (this.stadium) cards.push(this.stadium);
    return cards;
  }

  private clearPokemonState(pokemonId: string): void {
    this.attachedEnergy.delete(pokemonId);
    this.attachedTools.delete(pokemonId);
    this.damageCounters.delete(pokemonId);
    this.specialConditions.delete(pokemonId);
    this.evolutionStack.delete(pokemonId);
    this.enteredPlayTurn.delete(pokemonId);
  }

  private rekey<V>(map: Map<string, V>, from: string, to: string): void {
    const value = map.get(from);
    map.delete(from);
    if (value !== undefined) {
      map.set(to, value);
    }
  }
}
