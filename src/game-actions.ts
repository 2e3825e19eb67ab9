export type GameAction =
  | { type: 'draw_card'; playerId: string }
  | { type: 'play_card'; playerId: string; cardId: string; target?: string }
  | { type: 'attach_energy'; playerId: string; energyId: string; pokemonId: string }
  | { type: 'use_attack'; playerId: string; pokemonId: string; attackIndex: number; target?: string }
  // pokemonId names the benched Pokémon that becomes active.
  | { type: 'retreat'; playerId: string; pokemonId: string }
  | { type: 'end_turn'; playerId: string }
  | { type: 'pass'; playerId: string };

export type GameActionType = GameAction['type'];

export const GameActions = {
  drawCard: (playerId: string): GameAction => ({ type: 'draw_card', playerId }),
  playCard: (playerId: string, cardId: string, target?: string): GameAction =>
    target === undefined ? { type: 'play_card', playerId, cardId } : { type: 'play_card', playerId, cardId, target },
  attachEnergy: (playerId: string, energyId: string, pokemonId: string): GameAction => ({
    type: 'attach_energy',
    playerId,
    energyId,
    pokemonId
  }),
  useAttack: (playerId: string, pokemonId: string, attackIndex: number, target?: string): GameAction =>
    target === undefined
      ? { type: 'use_attack', playerId, pokemonId, attackIndex }
      : { type: 'use_attack', playerId, pokemonId, attackIndex, target },
  retreat: (playerId: string, pokemonId: string): GameAction => ({ type: 'retreat', playerId, pokemonId }),
  endTurn: (playerId: string): GameAction => ({ type: 'end_turn', playerId }),
  pass: (playerId: string): GameAction => ({ type: 'pass', playerId })
};
