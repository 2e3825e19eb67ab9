import type { SpecialConditionType } from './card';
import type winston from 'winston';
import logger from './logger';

export type GameEndReason = 'prizes_taken' | 'no_pokemon_in_play' | 'concede' | 'manual';

export type GameEventPayload =
  | { type: 'player_joined'; playerId: string; name: string }
  | { type: 'deck_set'; playerId: string; cardCount: number }
  | { type: 'deck_shuffled'; playerId: string }
  | { type: 'setup_started'; playerIds: string[] }
  | { type: 'turn_order_determined'; order: string[]; seed: number }
  | { type: 'opening_hands_dealt'; handSizes: Record<string, number> }
  | { type: 'hand_revealed'; playerId: string; revealedTo: string[]; cardIds: string[] }
  | { type: 'mulligan_performed'; playerId: string; mulliganCount: number; hasBasic: boolean }
  | { type: 'mulligan_compensation'; playerId: string; cardsDrawn: number }
  | { type: 'active_pokemon_selected'; playerId: string; cardId: string }
  | { type: 'pokemon_benched'; playerId: string; cardId: string }
  | { type: 'prize_cards_placed'; playerId: string; count: number }
  | { type: 'game_started'; turnOrder: string[] }
  | { type: 'turn_started'; playerId: string }
  | { type: 'phase_changed'; playerId: string; phase: string }
  | { type: 'card_drawn'; playerId: string; cardId: string | null }
  | { type: 'card_played'; playerId: string; cardId: string; target: string | null }
  | { type: 'pokemon_evolved'; playerId: string; fromId: string; toId: string }
  | { type: 'energy_attached'; playerId: string; energyId: string; pokemonId: string }
  | { type: 'attack_used'; playerId: string; pokemonId: string; attackName: string }
  | { type: 'damage_dealt'; playerId: string; targetId: string; amount: number }
  | { type: 'special_condition_applied'; playerId: string; pokemonId: string; condition: SpecialConditionType }
  | { type: 'special_condition_removed'; playerId: string; pokemonId: string; condition: SpecialConditionType }
  | { type: 'pokemon_knocked_out'; playerId: string; pokemonId: string }
  | { type: 'prize_taken'; playerId: string; cardId: string | null; remaining: number }
  | { type: 'pokemon_retreated'; playerId: string; fromId: string; toId: string; discardedEnergy: string[] }
  | { type: 'pokemon_promoted'; playerId: string; pokemonId: string }
  | { type: 'turn_passed'; playerId: string }
  | { type: 'turn_ended'; playerId: string }
  | { type: 'game_ended'; winner: string | null; reason: GameEndReason }
  | { type: 'game_cancelled' };

export type GameEventType = GameEventPayload['type'];

export interface GameEventMeta {
  id: string;
  /** 1-based position in the match history. */
  sequence: number;
  timestamp: number;
  turnNumber: number;
}

export type GameEvent = GameEventPayload & GameEventMeta;

export type GameEventOf<T extends GameEventType> = Extract<GameEventPayload, { type: T }> & GameEventMeta;

export type GameEventHandler = (event: GameEvent) => void;

interface Subscription {
  handler: GameEventHandler;
  types: ReadonlySet<GameEventType> | null;
}

/**
 * Synchronous fan-out of match events. Handlers run in subscription order;
 * a throwing handler is logged and does not stop the others.
 */
export class EventBus {
  private readonly subscriptions = new Map<number, Subscription>();
  private nextSubscriptionId = 1;

  public subscribe(handler: GameEventHandler, types?: readonly GameEventType[]): () => void {
    const subscriptionId = this.nextSubscriptionId++;
    this.subscriptions.set(subscriptionId, {
      handler,
      types: types && types.length > 0 ? new Set(types) : null
    });
    return () => {
      this.subscriptions.delete(subscriptionId);
    };
  }

  public publish(event: GameEvent): void {
    for (const subscription of [...this.subscriptions.values()]) {
      if (subscription.types && !subscription.types.has(event.type)) {
        continue;
      }
      try {
        subscription.handler(event);
      } catch (error) {
        logger.error('[MATCH-EVENTS] Event handler failed', { eventType: event.type, sequence: event.sequence, error });
      }
    }
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }
}

export const createLoggingEventHandler =
  (target: winston.Logger = logger, level = 'debug'): GameEventHandler =>
  (event) => {
    const { type, sequence, turnNumber, ...details } = event;
    target.log(level, `[MATCH-EVENT] ${type}`, { sequence, turnNumber, ...details });
  };
