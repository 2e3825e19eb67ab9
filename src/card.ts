import { v4 as uuidv4 } from 'uuid';
import { GameStateError } from './errors';

/**
 * Card model for the match core.
 *
 * Cards are immutable once registered with a CardDatabase. Zones, decks and
 * effects refer to them by id only.
 */

// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

export enum EnergyType {
  GRASS = 'grass',
  FIRE = 'fire',
  WATER = 'water',
  LIGHTNING = 'lightning',
  PSYCHIC = 'psychic',
  FIGHTING = 'fighting',
  DARKNESS = 'darkness',
  METAL = 'metal',
  FAIRY = 'fairy',
  DRAGON = 'dragon',
  COLORLESS = 'colorless'
}

export enum EvolutionStage {
  BASIC = 'basic',
  STAGE_1 = 'stage_1',
  STAGE_2 = 'stage_2',
  MEGA = 'mega',
  GX = 'gx',
  EX = 'ex',
  V = 'v',
  VMAX = 'vmax'
}

export enum TrainerType {
  ITEM = 'item',
  SUPPORTER = 'supporter',
  STADIUM = 'stadium',
  TOOL = 'tool'
}

export enum CardRarity {
  COMMON = 'common',
  UNCOMMON = 'uncommon',
  RARE = 'rare',
  RARE_HOLO = 'rare_holo',
  ULTRA_RARE = 'ultra_rare',
  SECRET_RARE = 'secret_rare',
  PROMO = 'promo'
}

export enum CardKind {
  POKEMON = 'pokemon',
  ENERGY = 'energy',
  TRAINER = 'trainer'
}

export enum SpecialConditionType {
  POISONED = 'poisoned',
  BURNED = 'burned',
  PARALYZED = 'paralyzed',
  ASLEEP = 'asleep',
  CONFUSED = 'confused',
  TRAPPED = 'trapped',
  CUSTOM = 'custom'
}

export type SpecialCondition =
  | { type: SpecialConditionType.POISONED; damagePerTurn: number }
  | { type: SpecialConditionType.BURNED; damagePerTurn: number }
  | { type: SpecialConditionType.PARALYZED }
  | { type: SpecialConditionType.ASLEEP }
  | { type: SpecialConditionType.CONFUSED }
  | { type: SpecialConditionType.TRAPPED }
  | { type: SpecialConditionType.CUSTOM; name: string; description: string };

export const POISON_DAMAGE = 10;
export const BURN_DAMAGE = 20;

export const poisoned = (damagePerTurn = POISON_DAMAGE): SpecialCondition => ({
  type: SpecialConditionType.POISONED,
  damagePerTurn
});

export const burned = (damagePerTurn = BURN_DAMAGE): SpecialCondition => ({
  type: SpecialConditionType.BURNED,
  damagePerTurn
});

export interface PokemonDetails {
  kind: CardKind.POKEMON;
  species: string;
  hp: number;
  retreatCost: number;
  weakness: EnergyType | null;
  resistance: EnergyType | null;
  stage: EvolutionStage;
  evolvesFrom: string | null;
}

export interface EnergyDetails {
  kind: CardKind.ENERGY;
  energyType: EnergyType;
  isBasic: boolean;
}

export interface TrainerDetails {
  kind: CardKind.TRAINER;
  trainerType: TrainerType;
}

export type CardDetails = PokemonDetails | EnergyDetails | TrainerDetails;

export type DamageMode =
  | { type: 'per_energy'; perEnergy: number; energyType: EnergyType | null }
  | { type: 'coin_flip'; perHeads: number; flips: number }
  | { type: 'per_pokemon'; perPokemon: number; location: PokemonCountLocation }
  | { type: 'variable'; min: number; max: number };

export type PokemonCountLocation = 'own_bench' | 'opponent_bench' | 'own_in_play' | 'opponent_in_play';

export enum AttackTargetType {
  ACTIVE = 'active',
  CHOOSE = 'choose',
  ALL = 'all',
  BENCH = 'bench',
  SELF = 'self'
}

export enum StatusTarget {
  DEFENDING = 'defending',
  SELF = 'self'
}

export interface StatusEffectChance {
  condition: SpecialCondition;
  /** 0-100 */
  probability: number;
  target: StatusTarget;
}

export interface Attack {
  name: string;
  cost: EnergyType[];
  damage: number;
  effect: string | null;
  damageMode: DamageMode | null;
  statusEffects: StatusEffectChance[];
  conditions: string[];
  targetType: AttackTargetType;
}

export enum AbilityType {
  PASSIVE = 'passive',
  ACTIVATED = 'activated',
  TRIGGERED = 'triggered'
}

export interface Ability {
  name: string;
  effect: string;
  abilityType: AbilityType;
}

export interface Card {
  id: string;
  name: string;
  cardType: CardDetails;
  setName: string;
  setNumber: string;
  rarity: CardRarity;
  attacks: Attack[];
  abilities: Ability[];
  rules: string[];
  metadata: Record<string, string>;
}

export type PokemonCard = Card & { cardType: PokemonDetails };
export type EnergyCard = Card & { cardType: EnergyDetails };
export type TrainerCard = Card & { cardType: TrainerDetails };

/** Resolves a card id (or a per-match instance id) to its card. */
export interface CardLookup {
  getCard(cardId: string): Card | undefined;
}

// ============================================================================
// CONSTRUCTION
// ============================================================================

export interface CreateCardInput {
  id?: string;
  name: string;
  cardType: CardDetails;
  setName?: string;
  setNumber?: string;
  rarity?: CardRarity;
  attacks?: Attack[];
  abilities?: Ability[];
  rules?: string[];
  metadata?: Record<string, string>;
}

export function createCard(input: CreateCardInput): Card {
  const card: Card = {
    id: input.id ?? uuidv4(),
    name: input.name,
    cardType: input.cardType,
    setName: input.setName ?? '',
    setNumber: input.setNumber ?? '',
    rarity: input.rarity ?? CardRarity.COMMON,
    attacks: [],
    abilities: [],
    rules: [...(input.rules ?? [])],
    metadata: { ...(input.metadata ?? {}) }
  };
  for (const attack of input.attacks ?? []) {
    addAttack(card, attack);
  }
  for (const ability of input.abilities ?? []) {
    addAbility(card, ability);
  }
  return card;
}

export interface PokemonInput {
  id?: string;
  name: string;
  species?: string;
  hp: number;
  stage?: EvolutionStage;
  evolvesFrom?: string | null;
  retreatCost?: number;
  weakness?: EnergyType | null;
  resistance?: EnergyType | null;
  attacks?: Attack[];
  abilities?: Ability[];
  rarity?: CardRarity;
  setName?: string;
  setNumber?: string;
}

export function createPokemonCard(input: PokemonInput): PokemonCard {
  const details: PokemonDetails = {
    kind: CardKind.POKEMON,
    species: input.species ?? input.name,
    hp: input.hp,
    retreatCost: input.retreatCost ?? 1,
    weakness: input.weakness ?? null,
    resistance: input.resistance ?? null,
    stage: input.stage ?? EvolutionStage.BASIC,
    evolvesFrom: input.evolvesFrom ?? null
  };
  const card = createCard({ ...input, cardType: details });
  return { ...card, cardType: details };
}

export function createEnergyCard(
  energyType: EnergyType,
  options: { id?: string; name?: string; isBasic?: boolean } = {}
): EnergyCard {
  const details: EnergyDetails = {
    kind: CardKind.ENERGY,
    energyType,
    isBasic: options.isBasic ?? true
  };
  const name = options.name ?? `${energyType.charAt(0).toUpperCase()}${energyType.slice(1)} Energy`;
  const card = createCard({ id: options.id, name, cardType: details });
  return { ...card, cardType: details };
}

export function createTrainerCard(
  name: string,
  trainerType: TrainerType,
  options: { id?: string; rules?: string[] } = {}
): TrainerCard {
  const details: TrainerDetails = { kind: CardKind.TRAINER, trainerType };
  const card = createCard({ id: options.id, name, cardType: details, rules: options.rules });
  return { ...card, cardType: details };
}

export function createAttack(
  name: string,
  cost: EnergyType[],
  damage: number,
  extras: Partial<Omit<Attack, 'name' | 'cost' | 'damage'>> = {}
): Attack {
  return {
    name,
    cost: [...cost],
    damage,
    effect: extras.effect ?? null,
    damageMode: extras.damageMode ?? null,
    statusEffects: [...(extras.statusEffects ?? [])],
    conditions: [...(extras.conditions ?? [])],
    targetType: extras.targetType ?? AttackTargetType.ACTIVE
  };
}

export function addAttack(card: Card, attack: Attack): void {
  if (card.cardType.kind !== CardKind.POKEMON) {
    throw new GameStateError('INVALID_TARGET', `Cannot add an attack to non-Pokemon card ${card.name}`);
  }
  card.attacks.push(attack);
}

export function addAbility(card: Card, ability: Ability): void {
  if (card.cardType.kind !== CardKind.POKEMON) {
    throw new GameStateError('INVALID_TARGET', `Cannot add an ability to non-Pokemon card ${card.name}`);
  }
  card.abilities.push(ability);
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

export const isPokemon = (card: Card): card is PokemonCard => card.cardType.kind === CardKind.POKEMON;

export const isEnergy = (card: Card): card is EnergyCard => card.cardType.kind === CardKind.ENERGY;

export const isTrainer = (card: Card): card is TrainerCard => card.cardType.kind === CardKind.TRAINER;

export const isBasicPokemon = (card: Card): card is PokemonCard =>
  isPokemon(card) && card.cardType.stage === EvolutionStage.BASIC;

export const isBasicEnergy = (card: Card): card is EnergyCard => isEnergy(card) && card.cardType.isBasic;

// ============================================================================
// ATTACKS AND DAMAGE
// ============================================================================

/**
 * Whether the attached energy pays for the attack. Typed costs consume
 * matching energy first; colorless costs take whatever is left.
 */
export function canPayAttackCost(cost: readonly EnergyType[], attached: readonly EnergyType[]): boolean {
  const pool = new Map<EnergyType, number>();
  for (const energyType of attached) {
    pool.set(energyType, (pool.get(energyType) ?? 0) + 1);
  }

  let colorless = 0;
  for (const required of cost) {
    if (required === EnergyType.COLORLESS) {
      colorless++;
      continue;
    }
    const available = pool.get(required) ?? 0;
    if (available === 0) {
      return false;
    }
    pool.set(required, available - 1);
  }

  let remaining = 0;
  for (const count of pool.values()) {
    remaining += count;
  }
  return remaining >= colorless;
}

export function getUsableAttacks(card: Card, attachedEnergy: readonly EnergyType[]): Attack[] {
  if (!isPokemon(card)) {
    return [];
  }
  return card.attacks.filter((attack) => canPayAttackCost(attack.cost, attachedEnergy));
}

export interface DamageContext {
  /** Energy attached to the attacker, by type. */
  attachedEnergy?: readonly EnergyType[];
  coinResults?: readonly boolean[];
  /** Pokémon counted at the mode's location. */
  pokemonCount?: number;
  /** Chosen value for variable damage. */
  chosenDamage?: number;
}

export function calculateDamage(attack: Attack, context: DamageContext = {}): number {
  const mode = attack.damageMode;
  if (!mode) {
    return attack.damage;
  }

  switch (mode.type) {
    case 'per_energy': {
      const attached = context.attachedEnergy ?? [];
      const counted = mode.energyType
        ? attached.filter((energyType) => energyType === mode.energyType).length
        : attached.length;
      return attack.damage + mode.perEnergy * counted;
    }
    case 'coin_flip': {
      const heads = (context.coinResults ?? []).filter(Boolean).length;
      return attack.damage + mode.perHeads * heads;
    }
    case 'per_pokemon':
      return attack.damage + mode.perPokemon * (context.pokemonCount ?? 0);
    case 'variable': {
      const chosen = context.chosenDamage ?? mode.min;
      return Math.min(mode.max, Math.max(mode.min, chosen));
    }
  }
}

export function describeCondition(condition: SpecialCondition): string {
  if (condition.type === SpecialConditionType.CUSTOM) {
    return condition.name;
  }
  return condition.type;
}
