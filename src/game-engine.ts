import { v4 as uuidv4 } from 'uuid';
import type { Logger } from 'winston';
import {
  AttackTargetType,
  EnergyType,
  EvolutionStage,
  SpecialConditionType,
  StatusTarget,
  TrainerType,
  calculateDamage,
  canPayAttackCost,
  isBasicPokemon,
  isEnergy,
  isPokemon,
  isTrainer,
  type Attack,
  type Card,
  type CardLookup,
  type PokemonCard,
  type SpecialCondition
} from './card';
import type { CardDatabase } from './card-database';
import type { Deck } from './deck';
import type { EffectManager } from './effects/effect-manager';
import { EffectTrigger, createEffectContext, type EffectResult, type EffectTarget } from './effects/effect-types';
import { GameStateError } from './errors';
import type { GameAction } from './game-actions';
import {
  EventBus,
  type GameEndReason,
  type GameEvent,
  type GameEventOf,
  type GameEventPayload,
  type GameEventType
} from './game-events';
import { resolveGameRules, type GameRules, type GameRulesInput } from './game-rules';
import { createMatchLogger } from './logger';
import { Player, type ConditionEffect } from './player';
import { createSeededRandom, flipCoins, randomSeed, rollChance, shuffleInPlace, type RandomSource } from './random';
import { ViolationSeverity, isBlocking, type RuleEngine, type RuleViolation } from './rules/rule-engine';

/**
 * Pokémon TCG match core
 *
 * One Game instance owns a single match:
 * - Players and their zones
 * - The setup protocol, mulligans included
 * - Turn order, phases and win conditions
 * - Validated action execution
 * - The append-only event history
 *
 * Card data is shared through a read-only CardDatabase. Every physical copy
 * in a deck gets its own instance id when the deck is loaded, so two copies
 * of one card stay distinct in play.
 */

// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

export enum GameStatus {
  SETUP = 'setup',
  IN_PROGRESS = 'in_progress',
  FINISHED = 'finished',
  CANCELLED = 'cancelled'
}

export enum GamePhase {
  BEGINNING_OF_TURN = 'beginning_of_turn',
  MAIN = 'main',
  ATTACK = 'attack',
  END_OF_TURN = 'end_of_turn'
}

export interface GameOptions {
  id?: string;
  rules?: GameRulesInput;
  /** Seed for every shuffle, coin flip and turn-order draw. Random when omitted. */
  seed?: number | string;
  random?: RandomSource;
}

export type ActionResult = { ok: true; warnings: RuleViolation[] } | { ok: false; violations: RuleViolation[] };

export interface NoBasicDeclaration {
  playersWithoutBasic: string[];
  allWithoutBasic: boolean;
}

export type MulliganRoundResult =
  | { outcome: 'all_with_basic' }
  | { outcome: 'all_without_basic' }
  | { outcome: 'one_without_basic'; playerId: string };

export interface RevealedHand {
  playerId: string;
  cards: Card[];
}

export const OPENING_HAND_SIZE = 7;
export const WEAKNESS_MULTIPLIER = 2;
export const RESISTANCE_REDUCTION = 30;
export const CONFUSION_SELF_DAMAGE = 30;
const MAX_MULLIGANS = 1000;

// ============================================================================
// GAME CLASS
// ============================================================================

export class Game implements CardLookup {
  public readonly id: string;
  public readonly rules: GameRules;
  public readonly events = new EventBus();
  /** Logger stamped with this match's id. */
  public readonly log: Logger;

  private readonly cardDatabase: CardDatabase;
  private readonly random: RandomSource;
  private readonly players = new Map<string, Player>();
  private readonly cardInstances = new Map<string, string>();
  private readonly history: GameEvent[] = [];
  private readonly mulligansByPlayer = new Map<string, number>();
  private readonly compensationClaimed = new Set<string>();

  private gameStatus: GameStatus = GameStatus.SETUP;
  private gamePhase: GamePhase = GamePhase.BEGINNING_OF_TURN;
  private order: string[] = [];
  private playerIndex = 0;
  private turn = 1;
  private gameWinner: string | null = null;
  private gameEndReason: GameEndReason | null = null;
  private setupStarted = false;
  private handsDealt = false;
  private prizesPlaced = false;
  private awaitingMulligan: string | null = null;
  private totalMulligans = 0;
  private instanceCounter = 0;
  private effects: EffectManager | null = null;

  constructor(cardDatabase: CardDatabase, options: GameOptions = {}) {
    this.id = options.id ?? uuidv4();
    this.log = createMatchLogger(this.id);
    this.cardDatabase = cardDatabase;
    this.rules = resolveGameRules(options.rules);
    this.random = options.random ?? createSeededRandom(options.seed ?? randomSeed());

    this.log.info('[MATCH-CREATED] Game created', {
      format: this.rules.format,
      prizeCards: this.rules.prizeCards,
      seed: this.random.seed
    });
  }

  // ========================================================================
  // PLAYERS AND CARDS
  // ========================================================================

  /**
   * Seats a player. Only allowed during setup, at most two.
   */
  public addPlayer(player: Player | string): Player {
    this.assertStatus(GameStatus.SETUP, 'add a player');
    if (this.players.size >= 2) {
      throw new GameStateError('INVALID_STATE', 'Game already has 2 players');
    }
    const seat = typeof player === 'string' ? new Player(player) : player;
    if (this.players.has(seat.id)) {
      throw new GameStateError('INVALID_STATE', `Player ${seat.id} already joined`);
    }
    seat.prizeCards = this.rules.prizeCards;
    this.players.set(seat.id, seat);
    this.emit({ type: 'player_joined', playerId: seat.id, name: seat.name });
    return seat;
  }

  /**
   * Loads a deck into a player's draw pile, one instance id per copy.
   * Shuffled when the rules ask for it.
   */
  public setPlayerDeck(playerId: string, deck: Deck): void {
    this.assertStatus(GameStatus.SETUP, 'set a deck');
    if (this.setupStarted) {
      throw new GameStateError('INVALID_STATE', 'Cannot set a deck once setup has started');
    }
    const player = this.getPlayer(playerId);
    const cardIds = deck.toCardList();
    const unknown = [...new Set(cardIds.filter((cardId) => !this.cardDatabase.has(cardId)))];
    if (unknown.length > 0) {
      throw new GameStateError('CARD_NOT_FOUND', `Deck ${deck.name} references unknown cards: ${unknown.join(', ')}`);
    }

    for (const instanceId of player.allCards()) {
      this.cardInstances.delete(instanceId);
    }
    const instances = cardIds.map((cardId) => {
      const instanceId = `${cardId}#${++this.instanceCounter}`;
      this.cardInstances.set(instanceId, cardId);
      return instanceId;
    });
    player.setDeck(instances);
    player.hand = [];
    this.emit({ type: 'deck_set', playerId, cardCount: instances.length });

    if (this.rules.autoShuffle) {
      this.shuffleDeck(player);
    }
  }

  public getPlayer(playerId: string): Player {
    const player = this.players.get(playerId);
    if (!player) {
      throw new GameStateError('PLAYER_NOT_FOUND', `Player ${playerId} not found`);
    }
    return player;
  }

  public findPlayer(playerId: string): Player | undefined {
    return this.players.get(playerId);
  }

  /** Players in turn order once it is fixed, join order before that. */
  public getPlayers(): Player[] {
    if (this.order.length > 0) {
      return this.order.map((playerId) => this.getPlayer(playerId));
    }
    return [...this.players.values()];
  }

  public getOpponents(playerId: string): Player[] {
    return this.getPlayers().filter((player) => player.id !== playerId);
  }

  public getCard(cardId: string): Card | undefined {
    return this.cardDatabase.getCard(this.cardInstances.get(cardId) ?? cardId);
  }

  public requireCard(cardId: string): Card {
    const card = this.getCard(cardId);
    if (!card) {
      throw new GameStateError('CARD_NOT_FOUND', `Card ${cardId} not found`);
    }
    return card;
  }

  /** Printed card id behind an instance id. */
  public getCardIdOf(instanceId: string): string | undefined {
    return this.cardInstances.get(instanceId) ?? (this.cardDatabase.has(instanceId) ? instanceId : undefined);
  }

  public findCardOwner(cardId: string): Player | undefined {
    for (const player of this.players.values()) {
      if (player.findCardLocation(cardId) !== null) {
        return player;
      }
    }
    return undefined;
  }

  public getCardDatabase(): CardDatabase {
    return this.cardDatabase;
  }

  /** Installs an effect manager; the game then fires triggers itself. */
  public useEffects(manager: EffectManager | null): void {
    this.effects = manager;
  }

  get effectManager(): EffectManager | null {
    return this.effects;
  }

  // ========================================================================
  // SETUP PROTOCOL
  // ========================================================================

  public startSetup(): void {
    this.assertStatus(GameStatus.SETUP, 'start setup');
    if (this.players.size < 2) {
      throw new GameStateError('PRECONDITION_FAILED', 'At least 2 players are required to start setup');
    }
    for (const player of this.players.values()) {
      if (player.deck.length === 0) {
        throw new GameStateError('PRECONDITION_FAILED', `Player ${player.id} has no deck`);
      }
    }
    this.setupStarted = true;
    this.emit({ type: 'setup_started', playerIds: [...this.players.keys()] });
    this.log.info('[MATCH-SETUP] Setup started', { players: [...this.players.keys()] });
  }

  /**
   * Fixes the turn order with a seeded shuffle. Once fixed it never changes;
   * later calls return it unchanged.
   */
  public determineTurnOrder(): string[] {
    this.assertSetupStep('determine turn order');
    if (this.order.length > 0) {
      return [...this.order];
    }
    this.order = shuffleInPlace([...this.players.keys()], this.random);
    this.playerIndex = 0;
    this.emit({ type: 'turn_order_determined', order: [...this.order], seed: this.random.seed });
    this.log.info('[MATCH-SETUP] Turn order determined', { order: this.order, seed: this.random.seed });
    return [...this.order];
  }

  public dealOpeningHands(): void {
    this.assertSetupStep('deal opening hands');
    if (this.order.length === 0) {
      throw new GameStateError('PRECONDITION_FAILED', 'Turn order must be determined before dealing');
    }
    if (this.handsDealt) {
      throw new GameStateError('INVALID_STATE', 'Opening hands were already dealt');
    }

    const handSizes: Record<string, number> = {};
    for (const player of this.getPlayers()) {
      player.drawCards(OPENING_HAND_SIZE);
      handSizes[player.id] = player.hand.length;
    }
    this.handsDealt = true;
    this.emit({ type: 'opening_hands_dealt', handSizes });
  }

  /** Players, in turn order, whose hand holds no Basic Pokémon. */
  public checkForBasicPokemon(): string[] {
    this.assertSetupStep('check for Basic Pokemon');
    return this.getPlayers()
      .filter((player) => !player.hasBasicPokemonInHand(this))
      .map((player) => player.id);
  }

  public declareNoBasicPokemon(): NoBasicDeclaration {
    const playersWithoutBasic = this.checkForBasicPokemon();
    return {
      playersWithoutBasic,
      allWithoutBasic: playersWithoutBasic.length === this.players.size
    };
  }

  /** Defers a player's mulligan until their opponent has an Active Pokémon. */
  public markPlayerForMulligan(playerId: string): void {
    this.assertSetupStep('mark a mulligan');
    this.getPlayer(playerId);
    if (this.awaitingMulligan !== null && this.awaitingMulligan !== playerId) {
      throw new GameStateError('PRECONDITION_FAILED', `Player ${this.awaitingMulligan} is already awaiting a mulligan`);
    }
    this.awaitingMulligan = playerId;
  }

  public revealHand(playerId: string): RevealedHand {
    const player = this.getPlayer(playerId);
    const revealedTo = this.getOpponents(playerId).map((opponent) => opponent.id);
    this.emit({ type: 'hand_revealed', playerId, revealedTo, cardIds: [...player.hand] });
    return {
      playerId,
      cards: player.hand.map((cardId) => this.requireCard(cardId))
    };
  }

  /**
   * Both hands are revealed, then the player's whole hand goes back into the
   * deck, the deck is shuffled and seven new cards are drawn.
   * Returns whether the new hand holds a Basic Pokémon.
   */
  public performMulligan(playerId: string): boolean {
    this.assertSetupStep('perform a mulligan');
    const player = this.getPlayer(playerId);

    for (const seat of this.getPlayers()) {
      this.revealHand(seat.id);
    }

    player.returnHandToDeck();
    this.shuffleDeck(player);
    player.drawCards(OPENING_HAND_SIZE);

    this.totalMulligans += 1;
    this.mulligansByPlayer.set(playerId, (this.mulligansByPlayer.get(playerId) ?? 0) + 1);
    const hasBasic = player.hasBasicPokemonInHand(this);
    this.emit({ type: 'mulligan_performed', playerId, mulliganCount: this.totalMulligans, hasBasic });
    this.log.info('[MATCH-SETUP] Mulligan performed', {
      playerId,
      mulliganCount: this.totalMulligans,
      hasBasic
    });
    return hasBasic;
  }

  /**
   * Every player mulligans once, in turn order, and the new hands are
   * checked for a Basic Pokémon.
   */
  public performMulliganForAll(): MulliganRoundResult {
    this.assertSetupStep('perform a mulligan');
    const withoutBasic = this.getPlayers()
      .filter((player) => !this.performMulligan(player.id))
      .map((player) => player.id);

    if (withoutBasic.length === 0) {
      return { outcome: 'all_with_basic' };
    }
    if (withoutBasic.length === this.players.size) {
      return { outcome: 'all_without_basic' };
    }
    return { outcome: 'one_without_basic', playerId: withoutBasic[0] };
  }

  /**
   * Resolves a deferred mulligan: the player mulligans until their hand holds
   * a Basic Pokémon. Returns the number of mulligans taken.
   */
  public performPendingMulligans(): number {
    this.assertSetupStep('perform pending mulligans');
    const playerId = this.awaitingMulligan;
    if (playerId === null) {
      return 0;
    }
    const player = this.getPlayer(playerId);

    for (const opponent of this.getOpponents(playerId)) {
      if (opponent.activePokemon === null) {
        throw new GameStateError('PRECONDITION_FAILED', `Opponent ${opponent.id} must select an Active Pokemon first`);
      }
    }
    const hasAnyBasic = [...player.hand, ...player.deck].some((cardId) => {
      const card = this.getCard(cardId);
      return card !== undefined && isBasicPokemon(card);
    });
    if (!hasAnyBasic) {
      throw new GameStateError('PRECONDITION_FAILED', `Player ${playerId} has no Basic Pokemon in hand or deck`);
    }

    let performed = 0;
    while (!player.hasBasicPokemonInHand(this)) {
      if (performed >= MAX_MULLIGANS) {
        throw new GameStateError('INVALID_STATE', `Mulligan limit reached for player ${playerId}`);
      }
      this.performMulligan(playerId);
      performed += 1;
    }
    this.awaitingMulligan = null;
    return performed;
  }

  public getMulliganCompensationLimit(playerId: string): number {
    this.getPlayer(playerId);
    return this.totalMulligans;
  }

  public getMulliganCount(playerId?: string): number {
    if (playerId === undefined) {
      return this.totalMulligans;
    }
    return this.mulligansByPlayer.get(playerId) ?? 0;
  }

  /**
   * Draws `count` extra cards for an opponent's mulligans. One claim per
   * player, never more than the match-wide mulligan count.
   */
  public mulliganCompensation(playerId: string, count: number): string[] {
    this.assertSetupStep('draw mulligan compensation');
    const player = this.getPlayer(playerId);
    const limit = this.getMulliganCompensationLimit(playerId);
    if (!Number.isInteger(count) || count < 0) {
      throw new GameStateError('OUT_OF_BOUNDS', `Declared card count ${count} is not a valid count`);
    }
    if (count > limit) {
      throw new GameStateError('OUT_OF_BOUNDS', `Declared card count ${count} exceeds limit ${limit}`);
    }
    if (this.compensationClaimed.has(playerId)) {
      throw new GameStateError('PRECONDITION_FAILED', `Player ${playerId} already drew mulligan compensation`);
    }

    const drawn = player.drawCards(count);
    this.compensationClaimed.add(playerId);
    this.emit({ type: 'mulligan_compensation', playerId, cardsDrawn: drawn.length });
    return drawn;
  }

  public selectActivePokemon(playerId: string, cardId: string): void {
    this.assertSetupStep('select an Active Pokemon');
    const player = this.getPlayer(playerId);
    if (!player.hand.includes(cardId)) {
      throw new GameStateError('CARD_NOT_FOUND', `Card ${cardId} is not in hand`);
    }
    const card = this.requireCard(cardId);
    if (!isPokemon(card)) {
      throw new GameStateError('INVALID_TARGET', 'Selected card is not a Pokemon');
    }
    if (!isBasicPokemon(card)) {
      throw new GameStateError('INVALID_TARGET', 'Selected Pokemon is not a Basic Pokemon');
    }
    if (player.activePokemon !== null && player.isBenchFull()) {
      throw new GameStateError('OUT_OF_BOUNDS', 'Bench is full; the current Active Pokemon cannot move there');
    }

    player.setActivePokemon(cardId);
    player.enteredPlayTurn.set(cardId, this.turn);
    this.emit({ type: 'active_pokemon_selected', playerId, cardId });
  }

  /**
   * Benches several Pokémon at once. The whole batch is checked before any
   * card moves, so a bad batch leaves the player untouched.
   */
  public setupBench(playerId: string, cardIds: readonly string[]): void {
    this.assertSetupStep('set up the bench');
    const player = this.getPlayer(playerId);

    if (new Set(cardIds).size !== cardIds.length) {
      throw new GameStateError('INVALID_TARGET', 'The same card was listed more than once');
    }
    for (const cardId of cardIds) {
      if (!player.hand.includes(cardId)) {
        throw new GameStateError('CARD_NOT_FOUND', `Card ${cardId} is not in hand`);
      }
      if (!isPokemon(this.requireCard(cardId))) {
        throw new GameStateError('INVALID_TARGET', `Card ${cardId} is not a Pokemon`);
      }
    }
    if (player.bench.length + cardIds.length > 5) {
      throw new GameStateError(
        'OUT_OF_BOUNDS',
        `Bench can hold 5 Pokemon (${player.bench.length} benched, ${cardIds.length} requested)`
      );
    }

    for (const cardId of cardIds) {
      player.benchPokemon(cardId);
      player.enteredPlayTurn.set(cardId, this.turn);
      this.emit({ type: 'pokemon_benched', playerId, cardId });
    }
  }

  /**
   * Each player sets aside the top cards of their deck as prizes. A short
   * deck gives fewer prizes rather than failing.
   */
  public placePrizeCards(): void {
    this.assertSetupStep('place prize cards');
    if (this.prizesPlaced) {
      throw new GameStateError('INVALID_STATE', 'Prize cards were already placed');
    }
    for (const player of this.getPlayers()) {
      const taken = player.drawPrizeCards(this.rules.prizeCards);
      this.emit({ type: 'prize_cards_placed', playerId: player.id, count: taken.length });
    }
    this.prizesPlaced = true;
  }

  public completeSetup(): void {
    this.assertSetupStep('complete setup');
    for (const player of this.getPlayers()) {
      if (player.activePokemon === null) {
        throw new GameStateError('PRECONDITION_FAILED', `Player ${player.id} has no Active Pokemon`);
      }
    }
    if (this.order.length === 0) {
      this.determineTurnOrder();
    }
    this.beginPlay();
  }

  // ========================================================================
  // TURN CONTROLLER
  // ========================================================================

  /**
   * Starts play without the setup protocol: decks are required, turn order
   * is fixed if it was not already.
   */
  public start(): void {
    this.assertStatus(GameStatus.SETUP, 'start the game');
    if (this.players.size < 2) {
      throw new GameStateError('PRECONDITION_FAILED', 'At least 2 players are required to start');
    }
    for (const player of this.players.values()) {
      if (player.deck.length === 0) {
        throw new GameStateError('PRECONDITION_FAILED', `Player ${player.id} has no deck`);
      }
    }
    if (this.order.length === 0) {
      this.order = shuffleInPlace([...this.players.keys()], this.random);
      this.playerIndex = 0;
      this.emit({ type: 'turn_order_determined', order: [...this.order], seed: this.random.seed });
    }
    this.beginPlay();
  }

  public startTurn(): void {
    this.assertStatus(GameStatus.IN_PROGRESS, 'start a turn');
    const player = this.requireCurrentPlayer();
    player.startTurn();
    const cardId = player.drawCard();
    this.gamePhase = GamePhase.BEGINNING_OF_TURN;
    this.emit({ type: 'turn_started', playerId: player.id });
    this.emit({ type: 'card_drawn', playerId: player.id, cardId });
    this.log.debug('[MATCH-TURN] Turn started', { playerId: player.id, turnNumber: this.turn });

    if (this.effects) {
      this.effects.onTurnStart(this, player.id);
    }
  }

  /**
   * Ends the current turn. When the order wraps back to the first player the
   * turn number goes up by one.
   */
  public endTurn(): void {
    this.assertStatus(GameStatus.IN_PROGRESS, 'end a turn');
    const player = this.requireCurrentPlayer();
    this.gamePhase = GamePhase.END_OF_TURN;
    this.emit({ type: 'turn_ended', playerId: player.id });

    if (this.effects) {
      this.effects.onTurnEnd(this, player.id);
    }
    if (this.checkWinConditions() !== null || this.gameStatus !== GameStatus.IN_PROGRESS) {
      return;
    }

    this.playerIndex = (this.playerIndex + 1) % this.order.length;
    if (this.playerIndex === 0) {
      this.turn += 1;
    }
    this.startTurn();
  }

  public nextPhase(): GamePhase {
    this.assertStatus(GameStatus.IN_PROGRESS, 'advance the phase');
    switch (this.gamePhase) {
      case GamePhase.BEGINNING_OF_TURN:
        this.changePhase(GamePhase.MAIN);
        break;
      case GamePhase.MAIN:
        this.changePhase(GamePhase.ATTACK);
        break;
      case GamePhase.ATTACK:
        this.changePhase(GamePhase.END_OF_TURN);
        break;
      case GamePhase.END_OF_TURN:
        this.endTurn();
        break;
    }
    return this.gamePhase;
  }

  /**
   * A player with no prize cards left wins; a player with no Pokémon in
   * play loses. Ends the game and returns the winner when either holds.
   */
  public checkWinConditions(): string | null {
    if (this.gameStatus !== GameStatus.IN_PROGRESS) {
      return this.gameWinner;
    }
    const players = this.getPlayers();

    const prizeWinner = players.find((player) => player.hasWon());
    if (prizeWinner) {
      this.endGame(prizeWinner.id, 'prizes_taken');
      return prizeWinner.id;
    }

    const losers = players.filter((player) => player.hasLost());
    if (losers.length > 0) {
      const survivors = players.filter((player) => !player.hasLost());
      const winner = survivors.length === 1 ? survivors[0].id : null;
      this.endGame(winner, 'no_pokemon_in_play');
      return winner;
    }
    return null;
  }

  /** Fills an empty active spot from the bench, e.g. after a knock-out. */
  public promoteBenchedPokemon(playerId: string, cardId: string): void {
    this.assertStatus(GameStatus.IN_PROGRESS, 'promote a Pokemon');
    const player = this.getPlayer(playerId);
    if (player.activePokemon !== null) {
      throw new GameStateError('PRECONDITION_FAILED', `Player ${playerId} already has an Active Pokemon`);
    }
    if (!player.bench.includes(cardId)) {
      throw new GameStateError('CARD_NOT_FOUND', `Card ${cardId} is not on the bench`);
    }
    player.promoteFromBench(cardId);
    this.emit({ type: 'pokemon_promoted', playerId, pokemonId: cardId });
  }

  /**
   * Between-turns check for one player's Pokémon: poison and burn damage,
   * burn and sleep coin flips, expiring durations.
   */
  public tickSpecialConditions(playerId: string): ConditionEffect[] {
    this.assertStatus(GameStatus.IN_PROGRESS, 'check special conditions');
    const player = this.getPlayer(playerId);
    const effects = player.updateSpecialConditions(this.random);

    for (const effect of effects) {
      if (effect.type === 'damage') {
        if (player.isInPlay(effect.pokemonId) && this.gameStatus === GameStatus.IN_PROGRESS) {
          this.dealDamage(effect.pokemonId, effect.amount, null);
        }
      } else if (effect.type === 'condition_removed') {
        this.emit({
          type: 'special_condition_removed',
          playerId,
          pokemonId: effect.pokemonId,
          condition: effect.condition
        });
      }
    }
    this.checkWinConditions();
    return effects;
  }

  public endGame(winner: string | null, reason: GameEndReason = 'manual'): void {
    if (this.gameStatus === GameStatus.FINISHED || this.gameStatus === GameStatus.CANCELLED) {
      throw new GameStateError('INVALID_STATE', `Game is already ${this.gameStatus}`);
    }
    if (winner !== null) {
      this.getPlayer(winner);
    }
    this.gameStatus = GameStatus.FINISHED;
    this.gameWinner = winner;
    this.gameEndReason = reason;
    this.emit({ type: 'game_ended', winner, reason });
    this.log.info('[MATCH-FINALIZED] Game ended', { winner, reason, turnNumber: this.turn });
  }

  public cancel(): void {
    if (this.gameStatus === GameStatus.FINISHED || this.gameStatus === GameStatus.CANCELLED) {
      throw new GameStateError('INVALID_STATE', `Game is already ${this.gameStatus}`);
    }
    this.gameStatus = GameStatus.CANCELLED;
    this.emit({ type: 'game_cancelled' });
    this.log.info('[MATCH-FINALIZED] Game cancelled');
  }

  public getCurrentPlayer(): Player | undefined {
    const playerId = this.order[this.playerIndex];
    return playerId === undefined ? undefined : this.players.get(playerId);
  }

  public isPlayerTurn(playerId: string): boolean {
    return this.gameStatus === GameStatus.IN_PROGRESS && this.getCurrentPlayer()?.id === playerId;
  }

  // ========================================================================
  // ACTION EXECUTION
  // ========================================================================

  /**
   * Validates an action against the rule engine and, when nothing blocks it,
   * applies it and records the matching events. A rejected action leaves the
   * game untouched.
   */
  public executeAction(ruleEngine: RuleEngine, action: GameAction): ActionResult {
    if (this.gameStatus !== GameStatus.IN_PROGRESS) {
      return this.reject(action, [
        { ruleName: 'GameState', message: `Game is ${this.gameStatus}`, severity: ViolationSeverity.ERROR }
      ]);
    }

    const violations = ruleEngine.validateAction(this, action);
    if (violations.some(isBlocking)) {
      return this.reject(action, violations);
    }

    const problem = this.preflight(action);
    if (problem !== null) {
      return this.reject(action, [
        { ruleName: 'ActionExecution', message: problem, severity: ViolationSeverity.ERROR }
      ]);
    }

    if (ruleEngine.autoApplyEffects) {
      const failure = ruleEngine.applyRuleEffects(this, action);
      if (failure) {
        return this.reject(action, [failure]);
      }
    }

    this.applyAction(action);
    this.log.debug('[MATCH-ACTION] Action applied', { action: action.type, playerId: action.playerId });
    return { ok: true, warnings: violations };
  }

  private reject(action: GameAction, violations: RuleViolation[]): ActionResult {
    this.log.info('[MATCH-ACTION] Action rejected', {
      action: action.type,
      playerId: action.playerId,
      violations: violations.map((violation) => `${violation.ruleName}: ${violation.message}`)
    });
    return { ok: false, violations };
  }

  /** Feasibility of an action. Returns the reason it cannot apply, or null. */
  private preflight(action: GameAction): string | null {
    const player = this.players.get(action.playerId);
    if (!player) {
      return `Player ${action.playerId} not found`;
    }

    switch (action.type) {
      case 'draw_card':
      case 'end_turn':
      case 'pass':
        return null;
      case 'play_card':
        return this.preflightPlayCard(player, action.cardId, action.target);
      case 'attach_energy': {
        if (!player.hand.includes(action.energyId)) return 'Energy card not in hand';
        const card = this.getCard(action.energyId);
        if (!card || !isEnergy(card)) return 'Card is not an energy';
        if (!player.isInPlay(action.pokemonId)) return 'Target Pokemon not found';
        return null;
      }
      case 'use_attack':
        return this.preflightAttack(player, action.pokemonId, action.attackIndex, action.target);
      case 'retreat':
        return this.preflightRetreat(player, action.pokemonId);
    }
  }

  private preflightPlayCard(player: Player, cardId: string, target?: string): string | null {
    if (!player.hand.includes(cardId)) {
      return 'Card not in hand';
    }
    const card = this.getCard(cardId);
    if (!card) {
      return `Card ${cardId} not found`;
    }

    if (isEnergy(card)) {
      return 'Energy cards are attached, not played';
    }

    if (isPokemon(card)) {
      if (card.cardType.stage === EvolutionStage.BASIC) {
        return player.activePokemon !== null && player.isBenchFull() ? 'Bench is full' : null;
      }
      if (target === undefined || !player.isInPlay(target)) {
        return 'Evolution needs one of your Pokemon in play as target';
      }
      const base = this.getCard(target);
      if (!base || base.name !== card.cardType.evolvesFrom) {
        return `${card.name} does not evolve from ${base?.name ?? 'that card'}`;
      }
      if (player.enteredPlayTurn.get(target) === this.turn) {
        return 'Cannot evolve a Pokemon the turn it came into play';
      }
      return null;
    }

    if (isTrainer(card)) {
      switch (card.cardType.trainerType) {
        case TrainerType.SUPPORTER:
          return player.canPlayTrainer ? null : 'Supporter already played this turn';
        case TrainerType.TOOL:
          if (target === undefined || !player.isInPlay(target)) return 'Tool needs one of your Pokemon in play as target';
          return player.attachedTools.has(target) ? 'Pokemon already has a Tool attached' : null;
        case TrainerType.ITEM:
        case TrainerType.STADIUM:
          return null;
      }
    }
    return null;
  }

  private preflightAttack(player: Player, pokemonId: string, attackIndex: number, target?: string): string | null {
    if (player.activePokemon !== pokemonId) {
      return 'Only the Active Pokemon can attack';
    }
    if (player.hasAttacked) {
      return 'Already attacked this turn';
    }
    const card = this.getCard(pokemonId);
    if (!card || !isPokemon(card)) {
      return 'Attacker is not a Pokemon';
    }
    const attack = card.attacks[attackIndex];
    if (!Number.isInteger(attackIndex) || attack === undefined) {
      return `Attack ${attackIndex} not found`;
    }
    if (
      player.hasSpecialCondition(pokemonId, SpecialConditionType.ASLEEP) ||
      player.hasSpecialCondition(pokemonId, SpecialConditionType.PARALYZED)
    ) {
      return 'Pokemon cannot attack while Asleep or Paralyzed';
    }
    if (!canPayAttackCost(attack.cost, player.getAttachedEnergyTypes(pokemonId, this))) {
      return 'Not enough energy attached';
    }
    return this.resolveAttackTargets(player, pokemonId, attack, target).length === 0 &&
      attack.targetType !== AttackTargetType.ALL
      ? 'No valid target for the attack'
      : null;
  }

  private preflightRetreat(player: Player, benchId: string): string | null {
    const activeId = player.activePokemon;
    if (activeId === null) {
      return 'No Active Pokemon to retreat';
    }
    if (!player.bench.includes(benchId)) {
      return 'Replacement Pokemon is not on the bench';
    }
    if (player.hasRetreated) {
      return 'Already retreated this turn';
    }
    const blocking = [SpecialConditionType.ASLEEP, SpecialConditionType.PARALYZED, SpecialConditionType.TRAPPED];
    if (blocking.some((condition) => player.hasSpecialCondition(activeId, condition))) {
      return 'Active Pokemon cannot retreat';
    }
    const card = this.getCard(activeId);
    const cost = card && isPokemon(card) ? card.cardType.retreatCost : 0;
    if (player.getAttachedEnergyCount(activeId) < cost) {
      return 'Not enough energy to retreat';
    }
    return null;
  }

  private applyAction(action: GameAction): void {
    const player = this.getPlayer(action.playerId);
    switch (action.type) {
      case 'draw_card': {
        const cardId = player.drawCard();
        this.emit({ type: 'card_drawn', playerId: player.id, cardId });
        if (cardId) {
          this.fireCardTrigger(cardId, EffectTrigger.ON_CARD_DRAW, player.id);
        }
        break;
      }
      case 'play_card':
        this.applyPlayCard(player, action.cardId, action.target);
        break;
      case 'attach_energy':
        player.attachEnergy(action.energyId, action.pokemonId);
        player.energyAttachedThisTurn = true;
        this.emit({
          type: 'energy_attached',
          playerId: player.id,
          energyId: action.energyId,
          pokemonId: action.pokemonId
        });
        this.fireCardTrigger(action.energyId, EffectTrigger.ON_ENERGY_ATTACH, player.id, {
          type: 'card',
          cardId: action.pokemonId
        });
        break;
      case 'use_attack':
        this.applyAttack(player, action.pokemonId, action.attackIndex, action.target);
        break;
      case 'retreat':
        this.applyRetreat(player, action.pokemonId);
        break;
      case 'end_turn':
        this.endTurn();
        break;
      case 'pass':
        this.emit({ type: 'turn_passed', playerId: player.id });
        this.endTurn();
        break;
    }
  }

  private applyPlayCard(player: Player, cardId: string, target?: string): void {
    const card = this.requireCard(cardId);

    if (isPokemon(card)) {
      if (card.cardType.stage === EvolutionStage.BASIC) {
        if (player.activePokemon === null) {
          player.setActivePokemon(cardId);
        } else {
          player.benchPokemon(cardId);
        }
        player.enteredPlayTurn.set(cardId, this.turn);
        this.emit({ type: 'card_played', playerId: player.id, cardId, target: null });
        if (player.bench.includes(cardId)) {
          this.emit({ type: 'pokemon_benched', playerId: player.id, cardId });
        }
        this.fireCardTrigger(cardId, EffectTrigger.ON_PLAY, player.id);
        this.fireCardTrigger(cardId, EffectTrigger.ON_ENTER_PLAY, player.id);
        return;
      }
      if (target !== undefined) {
        player.evolvePokemon(target, cardId);
        player.enteredPlayTurn.set(cardId, this.turn);
        this.emit({ type: 'card_played', playerId: player.id, cardId, target });
        this.emit({ type: 'pokemon_evolved', playerId: player.id, fromId: target, toId: cardId });
        this.fireCardTrigger(cardId, EffectTrigger.ON_PLAY, player.id);
      }
      return;
    }

    if (!isTrainer(card)) {
      return;
    }
    const effectTarget: EffectTarget = target === undefined ? { type: 'none' } : { type: 'card', cardId: target };

    switch (card.cardType.trainerType) {
      case TrainerType.ITEM:
      case TrainerType.SUPPORTER:
        player.removeFromHand(cardId);
        if (card.cardType.trainerType === TrainerType.SUPPORTER) {
          player.canPlayTrainer = false;
        }
        this.emit({ type: 'card_played', playerId: player.id, cardId, target: target ?? null });
        this.fireCardTrigger(cardId, EffectTrigger.ON_PLAY, player.id, effectTarget);
        player.discardPile.push(cardId);
        break;
      case TrainerType.STADIUM:
        for (const seat of this.players.values()) {
          if (seat.stadium) {
            seat.discardPile.push(seat.stadium);
            seat.stadium = null;
          }
        }
        player.removeFromHand(cardId);
        player.stadium = cardId;
        this.emit({ type: 'card_played', playerId: player.id, cardId, target: null });
        this.fireCardTrigger(cardId, EffectTrigger.ON_PLAY, player.id);
        break;
      case TrainerType.TOOL:
        if (target !== undefined) {
          player.attachTool(cardId, target);
          this.emit({ type: 'card_played', playerId: player.id, cardId, target });
          this.fireCardTrigger(cardId, EffectTrigger.ON_PLAY, player.id, effectTarget);
        }
        break;
    }
  }

  private applyAttack(player: Player, pokemonId: string, attackIndex: number, target?: string): void {
    const attacker = this.requirePokemon(pokemonId);
    const attack = attacker.attacks[attackIndex];
    this.gamePhase = GamePhase.ATTACK;
    player.hasAttacked = true;
    this.emit({ type: 'attack_used', playerId: player.id, pokemonId, attackName: attack.name });
    this.fireCardTrigger(pokemonId, EffectTrigger.ON_ATTACK, player.id);

    if (player.hasSpecialCondition(pokemonId, SpecialConditionType.CONFUSED)) {
      const [heads] = flipCoins(this.random, 1);
      if (!heads) {
        this.dealDamage(pokemonId, CONFUSION_SELF_DAMAGE, null);
        this.checkWinConditions();
        return;
      }
    }

    const targets = this.resolveAttackTargets(player, pokemonId, attack, target);
    const mode = attack.damageMode;
    const coinResults = mode && mode.type === 'coin_flip' ? flipCoins(this.random, mode.flips) : [];
    const baseDamage = calculateDamage(attack, {
      attachedEnergy: player.getAttachedEnergyTypes(pokemonId, this),
      coinResults,
      pokemonCount: this.countPokemonFor(player, attack)
    });

    const defendingActives = new Set(this.getOpponents(player.id).map((opponent) => opponent.activePokemon));
    for (const targetId of targets) {
      const defender = this.requirePokemon(targetId);
      const amount = defendingActives.has(targetId)
        ? this.applyWeaknessAndResistance(baseDamage, attack, defender)
        : baseDamage;
      this.dealDamage(targetId, amount, player.id);
    }
    if (targets.length > 0 && player.isInPlay(pokemonId)) {
      this.fireCardTrigger(pokemonId, EffectTrigger.ON_DEAL_DAMAGE, player.id);
    }

    for (const statusEffect of attack.statusEffects) {
      if (!rollChance(this.random, statusEffect.probability)) {
        continue;
      }
      const recipients =
        statusEffect.target === StatusTarget.SELF ? [pokemonId] : targets.filter((id) => id !== pokemonId);
      for (const recipient of recipients) {
        if (this.findCardOwner(recipient)?.isInPlay(recipient)) {
          this.applySpecialCondition(recipient, statusEffect.condition);
        }
      }
    }

    this.checkWinConditions();
  }

  private applyRetreat(player: Player, benchId: string): void {
    const activeId = player.activePokemon;
    if (activeId === null) {
      return;
    }
    const retreatCost = this.requirePokemon(activeId).cardType.retreatCost;
    const attached = player.getAttachedEnergy(activeId);
    const discarded = attached.slice(attached.length - retreatCost);
    if (retreatCost > 0) {
      player.discardEnergy(activeId, discarded);
    }
    player.clearSpecialConditions(activeId);
    player.setActivePokemon(benchId);
    player.hasRetreated = true;
    this.emit({
      type: 'pokemon_retreated',
      playerId: player.id,
      fromId: activeId,
      toId: benchId,
      discardedEnergy: retreatCost > 0 ? discarded : []
    });
  }

  private resolveAttackTargets(player: Player, pokemonId: string, attack: Attack, target?: string): string[] {
    const opponents = this.getOpponents(player.id);
    switch (attack.targetType) {
      case AttackTargetType.ACTIVE:
        return opponents.flatMap((opponent) => (opponent.activePokemon ? [opponent.activePokemon] : []));
      case AttackTargetType.SELF:
        return [pokemonId];
      case AttackTargetType.ALL:
        return opponents.flatMap((opponent) => opponent.pokemonInPlay());
      case AttackTargetType.CHOOSE:
        return target !== undefined && opponents.some((opponent) => opponent.isInPlay(target)) ? [target] : [];
      case AttackTargetType.BENCH:
        return target !== undefined && opponents.some((opponent) => opponent.bench.includes(target)) ? [target] : [];
    }
  }

  private countPokemonFor(player: Player, attack: Attack): number {
    const mode = attack.damageMode;
    if (!mode || mode.type !== 'per_pokemon') {
      return 0;
    }
    const opponents = this.getOpponents(player.id);
    switch (mode.location) {
      case 'own_bench':
        return player.bench.length;
      case 'own_in_play':
        return player.pokemonInPlay().length;
      case 'opponent_bench':
        return opponents.reduce((sum, opponent) => sum + opponent.bench.length, 0);
      case 'opponent_in_play':
        return opponents.reduce((sum, opponent) => sum + opponent.pokemonInPlay().length, 0);
    }
  }

  // The attack's typed energy cost stands in for the attacker's type.
  private applyWeaknessAndResistance(damage: number, attack: Attack, defender: PokemonCard): number {
    const attackTypes = new Set<EnergyType>(attack.cost.filter((energyType) => energyType !== EnergyType.COLORLESS));
    let total = damage;
    if (defender.cardType.weakness && attackTypes.has(defender.cardType.weakness)) {
      total *= WEAKNESS_MULTIPLIER;
    }
    if (defender.cardType.resistance && attackTypes.has(defender.cardType.resistance)) {
      total = Math.max(0, total - RESISTANCE_REDUCTION);
    }
    return total;
  }

  // ========================================================================
  // DAMAGE AND CONDITIONS
  // ========================================================================

  /**
   * Puts damage on a Pokémon in play and resolves a knock-out. The owner's
   * opponent takes a prize for every knock-out.
   */
  public dealDamage(pokemonId: string, amount: number, sourcePlayerId: string | null): void {
    const owner = this.findCardOwner(pokemonId);
    if (!owner || !owner.isInPlay(pokemonId)) {
      throw new GameStateError('INVALID_TARGET', `Pokemon ${pokemonId} is not in play`);
    }
    if (amount <= 0) {
      return;
    }

    owner.addDamage(pokemonId, amount);
    this.emit({ type: 'damage_dealt', playerId: sourcePlayerId ?? owner.id, targetId: pokemonId, amount });
    this.fireCardTrigger(pokemonId, EffectTrigger.ON_TAKE_DAMAGE, owner.id);

    if (owner.isPokemonKnockedOut(pokemonId, this)) {
      this.knockOut(owner, pokemonId);
    }
  }

  public applySpecialCondition(pokemonId: string, condition: SpecialCondition, duration = -1): void {
    const owner = this.findCardOwner(pokemonId);
    if (!owner || !owner.isInPlay(pokemonId)) {
      throw new GameStateError('INVALID_TARGET', `Pokemon ${pokemonId} is not in play`);
    }
    // Paralysis wears off after the owner's next turn.
    const effectiveDuration =
      condition.type === SpecialConditionType.PARALYZED && duration === -1 ? 1 : duration;
    owner.addSpecialCondition(pokemonId, condition, this.turn, effectiveDuration);
    this.emit({ type: 'special_condition_applied', playerId: owner.id, pokemonId, condition: condition.type });
  }

  /** Draws for a player outside the normal turn draw, recording each card. */
  public drawCards(playerId: string, count: number): string[] {
    const player = this.getPlayer(playerId);
    const drawn = player.drawCards(count);
    for (const cardId of drawn) {
      this.emit({ type: 'card_drawn', playerId, cardId });
    }
    return drawn;
  }

  private knockOut(owner: Player, pokemonId: string): void {
    this.fireCardTrigger(pokemonId, EffectTrigger.ON_KNOCK_OUT, owner.id);
    this.fireCardTrigger(pokemonId, EffectTrigger.ON_LEAVE_PLAY, owner.id);
    owner.discardPokemon(pokemonId);
    this.emit({ type: 'pokemon_knocked_out', playerId: owner.id, pokemonId });
    this.log.info('[MATCH-COMBAT] Pokemon knocked out', { playerId: owner.id, pokemonId });

    for (const opponent of this.getOpponents(owner.id)) {
      const prize = opponent.takePrizeCard();
      if (prize) {
        this.emit({
          type: 'prize_taken',
          playerId: opponent.id,
          cardId: prize.cardId,
          remaining: opponent.prizeCards
        });
      }
    }
  }

  // ========================================================================
  // HELPERS
  // ========================================================================

  private beginPlay(): void {
    this.gameStatus = GameStatus.IN_PROGRESS;
    this.playerIndex = 0;
    this.awaitingMulligan = null;
    this.emit({ type: 'game_started', turnOrder: [...this.order] });
    this.log.info('[MATCH-STARTED] Game started', { turnOrder: this.order });
    this.startTurn();
  }

  private changePhase(phase: GamePhase): void {
    this.gamePhase = phase;
    this.emit({ type: 'phase_changed', playerId: this.requireCurrentPlayer().id, phase });
  }

  private shuffleDeck(player: Player): void {
    player.shuffleDeck(this.random);
    this.emit({ type: 'deck_shuffled', playerId: player.id });
  }

  private fireCardTrigger(
    cardId: string,
    trigger: EffectTrigger,
    controller: string,
    target: EffectTarget = { type: 'none' }
  ): EffectResult[] {
    if (!this.effects) {
      return [];
    }
    const context = createEffectContext(cardId, controller, { target, trigger });
    return this.effects.triggerCardEffects(this, cardId, trigger, context);
  }

  private requireCurrentPlayer(): Player {
    const player = this.getCurrentPlayer();
    if (!player) {
      throw new GameStateError('INVALID_STATE', 'Turn order has not been determined');
    }
    return player;
  }

  private requirePokemon(cardId: string): PokemonCard {
    const card = this.requireCard(cardId);
    if (!isPokemon(card)) {
      throw new GameStateError('INVALID_TARGET', `Card ${cardId} is not a Pokemon`);
    }
    return card;
  }

  private assertStatus(expected: GameStatus, operation: string): void {
    if (this.gameStatus !== expected) {
      throw new GameStateError('INVALID_STATE', `Cannot ${operation} while the game is ${this.gameStatus}`);
    }
  }

  private assertSetupStep(operation: string): void {
    this.assertStatus(GameStatus.SETUP, operation);
    if (!this.setupStarted) {
      throw new GameStateError('INVALID_STATE', `Cannot ${operation} before setup has started`);
    }
  }

  private emit(payload: GameEventPayload): GameEvent {
    // Handlers receive the stored history entry, so it is frozen first.
    const event: GameEvent = Object.freeze({
      ...payload,
      id: uuidv4(),
      sequence: this.history.length + 1,
      timestamp: Date.now(),
      turnNumber: this.turn
    });
    this.history.push(event);
    this.events.publish(event);
    return event;
  }

  // ========================================================================
  // PUBLIC GETTERS
  // ========================================================================

  public getHistory(): readonly GameEvent[] {
    return [...this.history];
  }

  public getEvents<T extends GameEventType>(type: T): GameEventOf<T>[] {
    return this.history.filter((event): event is GameEventOf<T> => event.type === type);
  }

  public getPlayerEvents(playerId: string): GameEvent[] {
    return this.history.filter((event) => 'playerId' in event && event.playerId === playerId);
  }

  get status(): GameStatus {
    return this.gameStatus;
  }

  get phase(): GamePhase {
    return this.gamePhase;
  }

  get turnNumber(): number {
    return this.turn;
  }

  get currentPlayerIndex(): number {
    return this.playerIndex;
  }

  get turnOrder(): string[] {
    return [...this.order];
  }

  get winner(): string | null {
    return this.gameWinner;
  }

  get endReason(): GameEndReason | null {
    return this.gameEndReason;
  }

  get mulliganCount(): number {
    return this.totalMulligans;
  }

  get playerAwaitingMulligan(): string | null {
    return this.awaitingMulligan;
  }

  get seed(): number {
    return this.random.seed;
  }

  get playerCount(): number {
    return this.players.size;
  }
}
