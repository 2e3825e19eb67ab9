import { describeCondition, isPokemon, type Card } from './card';
import type { Game } from './game-engine';
import type { Player } from './player';

export type PlayerVisibility = 'self' | 'opponent' | 'spectator';

interface SerializeGameOptions {
  viewerId?: string | null;
}

const cardKind = (card: Card | undefined): string | null => card?.cardType.kind ?? null;

const serializeCardSnapshot = (game: Game, cardId: string) => {
  const card = game.getCard(cardId);
  return {
    cardId,
    printedId: game.getCardIdOf(cardId) ?? null,
    name: card?.name ?? null,
    kind: cardKind(card)
  };
};

const serializeCardZone = (game: Game, cardIds: readonly string[]) =>
  cardIds.map((cardId) => serializeCardSnapshot(game, cardId));

const serializePokemonInPlay = (game: Game, player: Player, pokemonId: string) => {
  const card = game.getCard(pokemonId);
  const hp = card && isPokemon(card) ? card.cardType.hp : null;
  const damage = player.getDamage(pokemonId);
  const tool = player.attachedTools.get(pokemonId);

  return {
    ...serializeCardSnapshot(game, pokemonId),
    hp,
    damage,
    remainingHp: hp === null ? null : Math.max(0, hp - damage),
    attachedEnergy: serializeCardZone(game, player.getAttachedEnergy(pokemonId)),
    attachedTool: tool ? serializeCardSnapshot(game, tool) : null,
    evolvedFrom: serializeCardZone(game, player.evolutionStack.get(pokemonId) ?? []),
    specialConditions: player.getSpecialConditions(pokemonId).map((instance) => ({
      type: instance.condition.type,
      label: describeCondition(instance.condition),
      duration: instance.duration,
      appliedTurn: instance.appliedTurn
    }))
  };
};

export const serializePlayerState = (game: Game, player: Player, visibility: PlayerVisibility) => {
  const hideHand = visibility === 'opponent';

  return {
    playerId: player.id,
    name: player.name,
    handSize: player.hand.length,
    deckCount: player.deck.length,
    prizeCount: player.prizeCards,
    hand: hideHand ? [] : serializeCardZone(game, player.hand),
    activePokemon: player.activePokemon ? serializePokemonInPlay(game, player, player.activePokemon) : null,
    bench: player.bench.map((pokemonId) => serializePokemonInPlay(game, player, pokemonId)),
    discardPile: serializeCardZone(game, player.discardPile),
    stadium: player.stadium ? serializeCardSnapshot(game, player.stadium) : null,
    turnFlags: {
      hasAttacked: player.hasAttacked,
      canPlayTrainer: player.canPlayTrainer,
      energyAttachedThisTurn: player.energyAttachedThisTurn,
      hasRetreated: player.hasRetreated
    }
  };
};

/**
 * JSON-safe snapshot of a match. With a viewer, every other player's hand is
 * reduced to its size; decks and prizes are always counts only.
 */
export const serializeGame = (game: Game, options?: SerializeGameOptions) => {
  const viewerId = options?.viewerId ?? null;
  return {
    gameId: game.id,
    status: game.status,
    phase: game.phase,
    turnNumber: game.turnNumber,
    currentPlayerIndex: game.currentPlayerIndex,
    currentPlayerId: game.getCurrentPlayer()?.id ?? null,
    turnOrder: game.turnOrder,
    rules: { ...game.rules },
    players: game.getPlayers().map((player) =>
      serializePlayerState(
        game,
        player,
        viewerId ? (viewerId === player.id ? 'self' : 'opponent') : 'spectator'
      )
    ),
    mulliganCount: game.mulliganCount,
    winner: game.winner,
    endReason: game.endReason,
    eventCount: game.getHistory().length
  };
};

export const buildOpponentView = (game: Game, playerId: string) => {
  const opponent = game.getOpponents(playerId)[0];
  if (!opponent) {
    return {
      playerId: null,
      handSize: 0,
      deckCount: 0,
      prizeCount: 0,
      activePokemon: null,
      bench: []
    };
  }

  const snapshot = serializePlayerState(game, opponent, 'opponent');
  return {
    playerId: opponent.id,
    handSize: snapshot.handSize,
    deckCount: snapshot.deckCount,
    prizeCount: snapshot.prizeCount,
    activePokemon: snapshot.activePokemon,
    bench: snapshot.bench
  };
};
