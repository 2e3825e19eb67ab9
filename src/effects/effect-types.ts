import type { EnergyType, SpecialConditionType } from '../card';
import type { Game } from '../game-engine';

export enum EffectTrigger {
  ON_PLAY = 'on_play',
  ON_ENTER_PLAY = 'on_enter_play',
  ON_LEAVE_PLAY = 'on_leave_play',
  ON_KNOCK_OUT = 'on_knock_out',
  ON_TURN_START = 'on_turn_start',
  ON_TURN_END = 'on_turn_end',
  ON_TAKE_DAMAGE = 'on_take_damage',
  ON_DEAL_DAMAGE = 'on_deal_damage',
  ON_ATTACK = 'on_attack',
  ON_ENERGY_ATTACH = 'on_energy_attach',
  ON_CARD_DRAW = 'on_card_draw',
  MANUAL = 'manual'
}

export type EffectTarget =
  | { type: 'none' }
  | { type: 'self' }
  | { type: 'card'; cardId: string }
  | { type: 'player'; playerId: string }
  | { type: 'all_player_pokemon'; playerId: string }
  | { type: 'all_pokemon' }
  | { type: 'active_pokemon'; playerId: string };

export type TargetRequirement =
  | { type: 'pokemon' }
  | { type: 'energy' }
  | { type: 'trainer' }
  | { type: 'in_play' }
  | { type: 'in_hand' }
  | { type: 'in_discard' }
  | { type: 'owned_by'; playerId: string }
  | { type: 'owned_by_controller' }
  | { type: 'has_energy_type'; energyType: EnergyType }
  | { type: 'min_hp'; hp: number }
  | { type: 'min_damage'; damage: number }
  | { type: 'custom'; description: string; test: (game: Game, cardId: string) => boolean };

export type EffectParameter = string | number | boolean;

export interface EffectContext {
  /** Card the effect is attached to. Rebound per effect on dispatch. */
  sourceCard: string;
  /** Player controlling the source card. */
  controller: string;
  target: EffectTarget;
  parameters: Record<string, EffectParameter>;
  trigger: EffectTrigger | null;
}

export type EffectOutcome =
  | { type: 'damage_dealt'; targetId: string; amount: number }
  | { type: 'healing'; targetId: string; amount: number }
  | { type: 'cards_drawn'; playerId: string; cardIds: string[] }
  | { type: 'energy_attached'; energyId: string; pokemonId: string }
  | { type: 'card_moved'; cardId: string; from: string; to: string }
  | { type: 'special_condition_applied'; pokemonId: string; condition: SpecialConditionType }
  | { type: 'special_condition_removed'; pokemonId: string; condition: SpecialConditionType }
  | { type: 'custom'; description: string };

export type EffectErrorKind =
  | 'invalid_target'
  | 'insufficient_resources'
  | 'invalid_game_state'
  | 'requirements_not_met'
  | 'general';

export class EffectError extends Error {
  readonly kind: EffectErrorKind;

  constructor(kind: EffectErrorKind, message: string) {
    super(message);
    this.name = 'EffectError';
    this.kind = kind;
  }
}

export interface Effect {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly triggers: readonly EffectTrigger[];
  readonly targetRequirements: readonly TargetRequirement[];
  canApply(game: Game, context: EffectContext): boolean;
  /** Throws EffectError when the effect cannot resolve. */
  apply(game: Game, context: EffectContext): EffectOutcome[];
}

export type EffectResult =
  | { status: 'applied'; effectId: string; cardId: string; outcomes: EffectOutcome[] }
  | { status: 'skipped'; effectId: string; cardId: string }
  | { status: 'failed'; effectId: string; cardId: string; error: EffectError };

export const createEffectContext = (
  sourceCard: string,
  controller: string,
  overrides: Partial<Omit<EffectContext, 'sourceCard' | 'controller'>> = {}
): EffectContext => ({
  sourceCard,
  controller,
  target: overrides.target ?? { type: 'none' },
  parameters: { ...(overrides.parameters ?? {}) },
  trigger: overrides.trigger ?? null
});
