import { v4 as uuidv4 } from 'uuid';
import {
  AbilityType,
  CardKind,
  EnergyType,
  TrainerType,
  type Ability,
  type SpecialCondition
} from '../card';
import type { Game } from '../game-engine';
import { CardLocation } from '../player';
import {
  EffectError,
  EffectTrigger,
  type Effect,
  type EffectContext,
  type EffectOutcome,
  type TargetRequirement
} from './effect-types';

export interface EffectOptions {
  id?: string;
  name?: string;
  description?: string;
  triggers?: EffectTrigger[];
  targetRequirements?: TargetRequirement[];
}

// ============================================================================
// TARGETING
// ============================================================================

export function resolveTargetCardIds(game: Game, context: EffectContext): string[] {
  const target = context.target;
  switch (target.type) {
    case 'none':
    case 'player':
      return [];
    case 'self':
      return [context.sourceCard];
    case 'card':
      return [target.cardId];
    case 'all_player_pokemon':
      return game.findPlayer(target.playerId)?.pokemonInPlay() ?? [];
    case 'all_pokemon':
      return game.getPlayers().flatMap((player) => player.pokemonInPlay());
    case 'active_pokemon': {
      const active = game.findPlayer(target.playerId)?.activePokemon;
      return active ? [active] : [];
    }
  }
}

export function meetsTargetRequirement(
  game: Game,
  cardId: string,
  requirement: TargetRequirement,
  controller: string
): boolean {
  const card = game.getCard(cardId);
  const owner = game.findCardOwner(cardId);

  switch (requirement.type) {
    case 'pokemon':
      return card?.cardType.kind === CardKind.POKEMON;
    case 'energy':
      return card?.cardType.kind === CardKind.ENERGY;
    case 'trainer':
      return card?.cardType.kind === CardKind.TRAINER;
    case 'in_play':
      return owner?.isInPlay(cardId) ?? false;
    case 'in_hand':
      return owner?.findCardLocation(cardId) === CardLocation.HAND;
    case 'in_discard':
      return owner?.findCardLocation(cardId) === CardLocation.DISCARD_PILE;
    case 'owned_by':
      return owner?.id === requirement.playerId;
    case 'owned_by_controller':
      return owner?.id === controller;
    case 'has_energy_type':
      return owner ? owner.getAttachedEnergyTypes(cardId, game).includes(requirement.energyType) : false;
    case 'min_hp': {
      if (!card || card.cardType.kind !== CardKind.POKEMON || !owner) {
        return false;
      }
      return card.cardType.hp - owner.getDamage(cardId) >= requirement.hp;
    }
    case 'min_damage':
      return owner ? owner.getDamage(cardId) >= requirement.damage : false;
    case 'custom':
      return requirement.test(game, cardId);
  }
}

export function meetsTargetRequirements(
  game: Game,
  cardId: string,
  requirements: readonly TargetRequirement[],
  controller: string
): boolean {
  return requirements.every((requirement) => meetsTargetRequirement(game, cardId, requirement, controller));
}

const pokemonTargetsInPlay = (game: Game, context: EffectContext): string[] =>
  resolveTargetCardIds(game, context).filter((cardId) => game.findCardOwner(cardId)?.isInPlay(cardId) ?? false);

const numberParameter = (context: EffectContext, key: string, fallback: number): number => {
  const value = context.parameters[key];
  return typeof value === 'number' ? value : fallback;
};

// ============================================================================
// BASE EFFECT
// ============================================================================

export abstract class BaseEffect implements Effect {
  public readonly id: string;
  public readonly name: string;
  public readonly description: string;
  public readonly triggers: readonly EffectTrigger[];
  public readonly targetRequirements: readonly TargetRequirement[];

  protected constructor(defaults: Required<Omit<EffectOptions, 'id'>>, options: EffectOptions = {}) {
    this.id = options.id ?? uuidv4();
    this.name = options.name ?? defaults.name;
    this.description = options.description ?? defaults.description;
    this.triggers = [...(options.triggers ?? defaults.triggers)];
    this.targetRequirements = [...(options.targetRequirements ?? defaults.targetRequirements)];
  }

  /** Every resolved target must satisfy every requirement. */
  public canApply(game: Game, context: EffectContext): boolean {
    if (this.targetRequirements.length === 0) {
      return true;
    }
    const targets = resolveTargetCardIds(game, context);
    return (
      targets.length > 0 &&
      targets.every((cardId) => meetsTargetRequirements(game, cardId, this.targetRequirements, context.controller))
    );
  }

  abstract apply(game: Game, context: EffectContext): EffectOutcome[];
}

// ============================================================================
// GENERIC EFFECTS
// ============================================================================

/** Puts damage on target Pokémon. `parameters.amount` overrides the base amount. */
export class DamageEffect extends BaseEffect {
  constructor(private readonly amount: number, options: EffectOptions = {}) {
    super(
      {
        name: 'Damage',
        description: `Deal ${amount} damage`,
        triggers: [EffectTrigger.MANUAL],
        targetRequirements: [{ type: 'pokemon' }, { type: 'in_play' }]
      },
      options
    );
  }

  apply(game: Game, context: EffectContext): EffectOutcome[] {
    const targets = pokemonTargetsInPlay(game, context);
    if (targets.length === 0) {
      throw new EffectError('invalid_target', `${this.name}: no Pokemon in play to damage`);
    }
    const amount = numberParameter(context, 'amount', this.amount);
    return targets.map((targetId): EffectOutcome => {
      game.dealDamage(targetId, amount, context.controller);
      return { type: 'damage_dealt', targetId, amount };
    });
  }
}

export class HealEffect extends BaseEffect {
  constructor(private readonly amount: number, options: EffectOptions = {}) {
    super(
      {
        name: 'Heal',
        description: `Heal ${amount} damage`,
        triggers: [EffectTrigger.MANUAL],
        targetRequirements: [{ type: 'pokemon' }, { type: 'in_play' }]
      },
      options
    );
  }

  apply(game: Game, context: EffectContext): EffectOutcome[] {
    const targets = pokemonTargetsInPlay(game, context);
    if (targets.length === 0) {
      throw new EffectError('invalid_target', `${this.name}: no Pokemon in play to heal`);
    }
    const outcomes: EffectOutcome[] = [];
    for (const targetId of targets) {
      const owner = game.findCardOwner(targetId);
      if (owner) {
        outcomes.push({ type: 'healing', targetId, amount: owner.healDamage(targetId, this.amount) });
      }
    }
    return outcomes;
  }
}

/** The controller draws cards. */
export class DrawCardsEffect extends BaseEffect {
  constructor(private readonly count: number, options: EffectOptions = {}) {
    super(
      {
        name: 'Draw',
        description: `Draw ${count} card${count === 1 ? '' : 's'}`,
        triggers: [EffectTrigger.ON_PLAY],
        targetRequirements: []
      },
      options
    );
  }

  apply(game: Game, context: EffectContext): EffectOutcome[] {
    const count = numberParameter(context, 'count', this.count);
    const cardIds = game.drawCards(context.controller, count);
    if (count > 0 && cardIds.length === 0) {
      throw new EffectError('insufficient_resources', `${this.name}: deck is empty`);
    }
    return [{ type: 'cards_drawn', playerId: context.controller, cardIds }];
  }
}

export class SpecialConditionEffect extends BaseEffect {
  constructor(
    private readonly condition: SpecialCondition,
    private readonly duration = -1,
    options: EffectOptions = {}
  ) {
    super(
      {
        name: `Inflict ${condition.type}`,
        description: `The target becomes ${condition.type}`,
        triggers: [EffectTrigger.MANUAL],
        targetRequirements: [{ type: 'pokemon' }, { type: 'in_play' }]
      },
      options
    );
  }

  apply(game: Game, context: EffectContext): EffectOutcome[] {
    const targets = pokemonTargetsInPlay(game, context);
    if (targets.length === 0) {
      throw new EffectError('invalid_target', `${this.name}: no Pokemon in play`);
    }
    return targets.map((pokemonId): EffectOutcome => {
      game.applySpecialCondition(pokemonId, this.condition, this.duration);
      return { type: 'special_condition_applied', pokemonId, condition: this.condition.type };
    });
  }
}

// ============================================================================
// CARD-BOUND EFFECTS
// ============================================================================

/**
 * An ability printed on a Pokémon. It only resolves while the Pokémon is in
 * play; activated abilities resolve at most once per turn.
 */
export class PokemonAbilityEffect extends BaseEffect {
  private readonly usedOnTurn = new Map<string, string>();
  private readonly oncePerTurn: boolean;

  constructor(
    public readonly ability: Ability,
    private readonly inner: Effect,
    options: EffectOptions & { oncePerTurn?: boolean } = {}
  ) {
    super(
      {
        name: ability.name,
        description: ability.effect,
        triggers: PokemonAbilityEffect.defaultTriggers(ability, inner),
        targetRequirements: []
      },
      options
    );
    this.oncePerTurn = options.oncePerTurn ?? ability.abilityType === AbilityType.ACTIVATED;
  }

  private static defaultTriggers(ability: Ability, inner: Effect): EffectTrigger[] {
    switch (ability.abilityType) {
      case AbilityType.PASSIVE:
        return [EffectTrigger.ON_TURN_START];
      case AbilityType.ACTIVATED:
        return [EffectTrigger.MANUAL];
      case AbilityType.TRIGGERED:
        return [...inner.triggers];
    }
  }

  canApply(game: Game, context: EffectContext): boolean {
    const owner = game.findCardOwner(context.sourceCard);
    if (!owner || !owner.isInPlay(context.sourceCard)) {
      return false;
    }
    if (this.oncePerTurn && this.usedOnTurn.get(context.sourceCard) === this.turnKey(game)) {
      return false;
    }
    return this.inner.canApply(game, context);
  }

  apply(game: Game, context: EffectContext): EffectOutcome[] {
    if (this.oncePerTurn) {
      this.usedOnTurn.set(context.sourceCard, this.turnKey(game));
    }
    return this.inner.apply(game, context);
  }

  private turnKey(game: Game): string {
    return `${game.turnNumber}:${game.currentPlayerIndex}`;
  }
}

/**
 * A Trainer card's effect: its steps resolve in order when the card is
 * played, once per card.
 */
export class TrainerEffect extends BaseEffect {
  private readonly resolvedCards = new Set<string>();

  constructor(
    public readonly trainerType: TrainerType,
    private readonly steps: Effect[],
    options: EffectOptions = {}
  ) {
    super(
      {
        name: `${trainerType} effect`,
        description: steps.map((step) => step.description).join('. '),
        triggers: [EffectTrigger.ON_PLAY],
        targetRequirements: []
      },
      options
    );
  }

  canApply(game: Game, context: EffectContext): boolean {
    if (this.resolvedCards.has(context.sourceCard)) {
      return false;
    }
    return super.canApply(game, context) && this.steps.every((step) => step.canApply(game, context));
  }

  apply(game: Game, context: EffectContext): EffectOutcome[] {
    this.resolvedCards.add(context.sourceCard);
    return this.steps.flatMap((step) => step.apply(game, context));
  }
}

/**
 * Special Energy: one effect when attached, another at the start of each of
 * its owner's turns while it stays attached.
 */
export class SpecialEnergyEffect extends BaseEffect {
  constructor(
    public readonly energyType: EnergyType,
    private readonly effects: { onAttach?: Effect; persistent?: Effect },
    options: EffectOptions = {}
  ) {
    super(
      {
        name: `${energyType} special energy`,
        description: [effects.onAttach?.description, effects.persistent?.description].filter(Boolean).join('. '),
        triggers: [EffectTrigger.ON_ENERGY_ATTACH, EffectTrigger.ON_TURN_START],
        targetRequirements: [{ type: 'pokemon' }]
      },
      options
    );
  }

  canApply(game: Game, context: EffectContext): boolean {
    if (context.trigger === EffectTrigger.ON_TURN_START) {
      const holder = this.findHolder(game, context.sourceCard);
      return holder !== null && this.effects.persistent !== undefined;
    }
    return this.effects.onAttach !== undefined && super.canApply(game, context);
  }

  apply(game: Game, context: EffectContext): EffectOutcome[] {
    if (context.trigger === EffectTrigger.ON_TURN_START) {
      const holder = this.findHolder(game, context.sourceCard);
      if (!holder || !this.effects.persistent) {
        return [];
      }
      return this.effects.persistent.apply(game, { ...context, target: { type: 'card', cardId: holder } });
    }
    return this.effects.onAttach ? this.effects.onAttach.apply(game, context) : [];
  }

  private findHolder(game: Game, energyId: string): string | null {
    const owner = game.findCardOwner(energyId);
    if (!owner) {
      return null;
    }
    for (const [pokemonId, energyIds] of owner.attachedEnergy) {
      if (energyIds.includes(energyId)) {
        return pokemonId;
      }
    }
    return null;
  }
}
