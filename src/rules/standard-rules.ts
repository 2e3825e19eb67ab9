import { isEnergy } from '../card';
import type { GameAction } from '../game-actions';
import type { Game } from '../game-engine';
import { BaseRule, RuleEngine, type RuleConfig, type RuleViolation } from './rule-engine';

export class TurnOrderRule extends BaseRule {
  readonly name = 'TurnOrder';
  readonly description = 'Only the current player may act';

  validate(game: Game, action: GameAction): RuleViolation | null {
    const current = game.getCurrentPlayer();
    if (!current || current.id !== action.playerId) {
      return this.violation('Not your turn');
    }
    return null;
  }
}

export class HandLimitRule extends BaseRule {
  readonly name = 'HandLimit';
  readonly description = 'A draw is refused once the hand reaches the configured maximum';

  validate(game: Game, action: GameAction): RuleViolation | null {
    const maxHandSize = game.rules.maxHandSize;
    if (action.type !== 'draw_card' || maxHandSize === null) {
      return null;
    }
    const player = game.findPlayer(action.playerId);
    if (player && player.hand.length >= maxHandSize) {
      return this.violation(`Hand size limit exceeded (${maxHandSize})`);
    }
    return null;
  }
}

export class EnergyAttachmentRule extends BaseRule {
  readonly name = 'EnergyAttachment';
  readonly description = 'One energy per turn, from hand, onto one of your own Pokemon';

  validate(game: Game, action: GameAction): RuleViolation | null {
    if (action.type !== 'attach_energy') {
      return null;
    }
    const player = game.findPlayer(action.playerId);
    if (!player) {
      return null;
    }
    if (!player.hand.includes(action.energyId)) {
      return this.violation('Energy card not in hand');
    }
    if (!player.isInPlay(action.pokemonId)) {
      return this.violation('Target Pokemon not found');
    }
    const card = game.getCard(action.energyId);
    if (!card || !isEnergy(card)) {
      return this.violation('Card is not an energy');
    }
    if (player.energyAttachedThisTurn) {
      return this.violation('Energy already attached this turn');
    }
    return null;
  }
}

const createStandardRules = () => [new TurnOrderRule(), new HandLimitRule(), new EnergyAttachmentRule()];

export const StandardRules = {
  all: createStandardRules,
  createEngine: (config: Partial<RuleConfig> = {}): RuleEngine => new RuleEngine(createStandardRules(), config)
};
