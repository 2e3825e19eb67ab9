import {
  AttackTargetType,
  EnergyType,
  EvolutionStage,
  SpecialConditionType,
  StatusTarget,
  TrainerType,
  createAttack,
  createEnergyCard,
  createPokemonCard,
  createTrainerCard,
  type Card
} from '../card';
import { CardDatabase } from '../card-database';
import { Deck } from '../deck';
import { isGameStateError } from '../errors';
import { Game } from '../game-engine';
import type { GameRulesInput } from '../game-rules';
import { Player } from '../player';
import type { RandomSource } from '../random';
import type { RuleEngine } from '../rules/rule-engine';
import { StandardRules } from '../rules/standard-rules';

export const buildCards = (): Card[] => [
  createPokemonCard({
    id: 'pikachu',
    name: 'Pikachu',
    hp: 60,
    weakness: EnergyType.FIGHTING,
    attacks: [
      createAttack('Thunder Shock', [EnergyType.LIGHTNING], 20),
      createAttack('Quick Attack', [EnergyType.LIGHTNING, EnergyType.COLORLESS], 10, {
        damageMode: { type: 'coin_flip', perHeads: 20, flips: 1 }
      })
    ]
  }),
  createPokemonCard({
    id: 'raichu',
    name: 'Raichu',
    hp: 90,
    stage: EvolutionStage.STAGE_1,
    evolvesFrom: 'Pikachu',
    attacks: [createAttack('Thunder', [EnergyType.LIGHTNING, EnergyType.LIGHTNING, EnergyType.COLORLESS], 80)]
  }),
  createPokemonCard({
    id: 'squirtle',
    name: 'Squirtle',
    hp: 50,
    weakness: EnergyType.LIGHTNING,
    attacks: [
      createAttack('Bubble', [EnergyType.WATER], 10, {
        statusEffects: [
          {
            condition: { type: SpecialConditionType.PARALYZED },
            probability: 100,
            target: StatusTarget.DEFENDING
          }
        ]
      })
    ]
  }),
  createPokemonCard({
    id: 'geodude',
    name: 'Geodude',
    hp: 70,
    retreatCost: 2,
    resistance: EnergyType.LIGHTNING,
    attacks: [createAttack('Rock Throw', [EnergyType.FIGHTING], 20, { targetType: AttackTargetType.CHOOSE })]
  }),
  createEnergyCard(EnergyType.LIGHTNING, { id: 'lightning-energy' }),
  createEnergyCard(EnergyType.WATER, { id: 'water-energy' }),
  createEnergyCard(EnergyType.FIGHTING, { id: 'fighting-energy' }),
  createTrainerCard('Potion', TrainerType.ITEM, { id: 'potion' }),
  createTrainerCard('Professor Research', TrainerType.SUPPORTER, { id: 'professor-research' }),
  createTrainerCard('Training Court', TrainerType.STADIUM, { id: 'training-court' }),
  createTrainerCard('Muscle Band', TrainerType.TOOL, { id: 'muscle-band' })
];

export const buildCardDatabase = (): CardDatabase => new CardDatabase(buildCards());

/** A RandomSource that always returns the same value. 0.9 means tails and no swaps. */
export const fixedRandom = (value: number, seed = 42): RandomSource => ({
  seed,
  next: () => value
});

/**
 * Twenty cards, bottom of the deck first. Without shuffling the opening
 * hand is 2 Squirtle, 3 Pikachu and 2 Lightning Energy.
 */
export const buildStarterDeck = (name = 'Starter'): Deck => {
  const deck = new Deck(name);
  deck.addCard('water-energy', 4);
  deck.addCard('raichu', 2);
  deck.addCard('potion', 2);
  deck.addCard('professor-research', 2);
  deck.addCard('lightning-energy', 5);
  deck.addCard('pikachu', 3);
  deck.addCard('squirtle', 2);
  return deck;
};

/** First instance in `zone` of the printed card. */
export const findCard = (game: Game, zone: readonly string[], printedId: string): string => {
  const instanceId = zone.find((cardId) => game.getCardIdOf(cardId) === printedId);
  if (instanceId === undefined) {
    throw new Error(`No ${printedId} in zone`);
  }
  return instanceId;
};

/** Moves a card from the player's deck into their hand. */
export const fetchToHand = (game: Game, player: Player, printedId: string): string => {
  const instanceId = findCard(game, player.deck, printedId);
  player.deck.splice(player.deck.indexOf(instanceId), 1);
  player.hand.push(instanceId);
  return instanceId;
};

/** Code of the GameStateError the action throws, or null. */
export const errorCode = (action: () => unknown): string | null => {
  try {
    action();
  } catch (error) {
    return isGameStateError(error) ? error.code : null;
  }
  return null;
};

export interface MatchFixture {
  game: Game;
  alice: Player;
  bob: Player;
  rules: RuleEngine;
}

export interface MatchFixtureOptions {
  actives?: [string, string];
  decks?: [Deck, Deck];
  rules?: GameRulesInput;
  random?: RandomSource;
}

export const createSetupGame = (options: MatchFixtureOptions = {}): MatchFixture => {
  const game = new Game(buildCardDatabase(), {
    id: 'test-game',
    rules: { autoShuffle: false, ...options.rules },
    random: options.random ?? fixedRandom(0.9)
  });
  const alice = game.addPlayer(new Player('Alice', 'alice'));
  const bob = game.addPlayer(new Player('Bob', 'bob'));
  const [aliceDeck, bobDeck] = options.decks ?? [buildStarterDeck('Alice deck'), buildStarterDeck('Bob deck')];
  game.setPlayerDeck('alice', aliceDeck);
  game.setPlayerDeck('bob', bobDeck);
  return { game, alice, bob, rules: StandardRules.createEngine() };
};

/**
 * Runs the whole setup protocol. With the default random source Alice goes
 * first and both players open with Pikachu active.
 */
export const startMatch = (options: MatchFixtureOptions = {}): MatchFixture => {
  const fixture = createSetupGame(options);
  const { game, alice, bob } = fixture;
  const [aliceActive, bobActive] = options.actives ?? ['pikachu', 'pikachu'];

  game.startSetup();
  game.determineTurnOrder();
  game.dealOpeningHands();
  game.selectActivePokemon('alice', findCard(game, alice.hand, aliceActive));
  game.selectActivePokemon('bob', findCard(game, bob.hand, bobActive));
  game.placePrizeCards();
  game.completeSetup();
  return fixture;
};
