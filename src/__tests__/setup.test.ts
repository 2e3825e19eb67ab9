import { describe, expect, it } from 'vitest';
import { Deck } from '../deck';
import { Game, GameStatus } from '../game-engine';
import { Player } from '../player';
import { createSeededRandom, hashSeed } from '../random';
import {
  buildCardDatabase,
  buildStarterDeck,
  createSetupGame,
  errorCode,
  fetchToHand,
  findCard,
  fixedRandom
} from './fixtures';

// Two Pikachu at the bottom, ten Lightning Energy on top: the opening hand has no Basic.
const energyHeavyDeck = (): Deck => {
  const deck = new Deck('Energy heavy');
  deck.addCard('pikachu', 2);
  deck.addCard('lightning-energy', 10);
  return deck;
};

const multiset = (player: Player): string[] => [...player.deck, ...player.hand].sort();

describe('setup preconditions', () => {
  it('seats at most two players', () => {
    const { game } = createSetupGame();
    expect(errorCode(() => game.addPlayer('Carol'))).toBe('INVALID_STATE');
    expect(game.playerCount).toBe(2);
  });

  it('needs two players with decks before setup starts', () => {
    const game = new Game(buildCardDatabase(), { random: fixedRandom(0.9) });
    const alice = game.addPlayer('Alice');
    game.setPlayerDeck(alice.id, buildStarterDeck());
    expect(errorCode(() => game.startSetup())).toBe('PRECONDITION_FAILED');

    game.addPlayer('Bob');
    expect(() => game.startSetup()).toThrow(/has no deck$/);
  });

  it('rejects decks with cards missing from the database', () => {
    const { game } = createSetupGame();
    const deck = Deck.fromCardList('Broken', ['pikachu', 'unknown-card']);
    expect(() => game.setPlayerDeck('alice', deck)).toThrow('Deck Broken references unknown cards: unknown-card');
  });

  it('refuses a new deck once setup has started', () => {
    const { game, alice, bob } = createSetupGame();
    game.startSetup();
    game.determineTurnOrder();
    game.dealOpeningHands();
    game.selectActivePokemon('alice', findCard(game, alice.hand, 'pikachu'));
    game.selectActivePokemon('bob', findCard(game, bob.hand, 'pikachu'));
    game.placePrizeCards();

    expect(() => game.setPlayerDeck('alice', buildStarterDeck())).toThrow('Cannot set a deck once setup has started');
    expect(alice.activePokemon).toBe('pikachu#18');
    expect(alice.allCards()).toHaveLength(20);
    expect(alice.allCards().filter((cardId) => game.getCard(cardId) === undefined)).toEqual([]);
  });

  it('refuses setup steps before setup has started', () => {
    const { game } = createSetupGame();
    expect(() => game.determineTurnOrder()).toThrow('Cannot determine turn order before setup has started');
    expect(errorCode(() => game.dealOpeningHands())).toBe('INVALID_STATE');
  });

  it('gives each copy in a deck its own instance id', () => {
    const { alice, bob } = createSetupGame();
    expect(alice.deck.slice(-3)).toEqual(['pikachu#18', 'squirtle#19', 'squirtle#20']);
    expect(bob.deck[0]).toBe('water-energy#21');
    expect(new Set([...alice.deck, ...bob.deck]).size).toBe(40);
  });
});

describe('determineTurnOrder', () => {
  it('is decided by the game random source and recorded with its seed', () => {
    const { game } = createSetupGame({ random: fixedRandom(0.1, 7) });
    game.startSetup();

    expect(game.determineTurnOrder()).toEqual(['bob', 'alice']);
    expect(game.getEvents('turn_order_determined')).toMatchObject([{ order: ['bob', 'alice'], seed: 7 }]);
  });

  it('repeats for the same seed', () => {
    const orderFor = (seed: string) => {
      const { game } = createSetupGame({ random: createSeededRandom(seed) });
      game.startSetup();
      return game.determineTurnOrder();
    };
    expect(orderFor('same-seed')).toEqual(orderFor('same-seed'));
  });

  it('never changes once fixed', () => {
    const { game } = createSetupGame({ random: createSeededRandom('fixed-order') });
    game.startSetup();
    const order = game.determineTurnOrder();

    expect(game.determineTurnOrder()).toEqual(order);
    expect(game.getEvents('turn_order_determined')).toHaveLength(1);
    expect(game.getEvents('turn_order_determined')[0].seed).toBe(hashSeed('fixed-order'));
  });
});

describe('dealOpeningHands', () => {
  it('deals seven cards from the top of each deck', () => {
    const { game, alice, bob } = createSetupGame();
    game.startSetup();
    game.determineTurnOrder();
    game.dealOpeningHands();

    expect(alice.hand).toEqual([
      'squirtle#20',
      'squirtle#19',
      'pikachu#18',
      'pikachu#17',
      'pikachu#16',
      'lightning-energy#15',
      'lightning-energy#14'
    ]);
    expect(bob.hand).toHaveLength(7);
    expect(game.getEvents('opening_hands_dealt')).toMatchObject([{ handSizes: { alice: 7, bob: 7 } }]);
  });

  it('needs a turn order and deals only once', () => {
    const { game } = createSetupGame();
    game.startSetup();
    expect(errorCode(() => game.dealOpeningHands())).toBe('PRECONDITION_FAILED');

    game.determineTurnOrder();
    game.dealOpeningHands();
    expect(errorCode(() => game.dealOpeningHands())).toBe('INVALID_STATE');
  });
});

describe('mulligans', () => {
  const dealtGame = (random = fixedRandom(0)) => {
    const fixture = createSetupGame({ decks: [buildStarterDeck(), energyHeavyDeck()], random });
    fixture.game.startSetup();
    fixture.game.determineTurnOrder();
    fixture.game.dealOpeningHands();
    return fixture;
  };

  it('finds players without a Basic Pokemon', () => {
    const { game } = dealtGame();
    expect(game.checkForBasicPokemon()).toEqual(['bob']);
    expect(game.declareNoBasicPokemon()).toEqual({ playersWithoutBasic: ['bob'], allWithoutBasic: false });
  });

  it('defers the mulligan until the opponent has an Active Pokemon', () => {
    const { game, alice, bob } = dealtGame();
    game.markPlayerForMulligan('bob');
    expect(game.playerAwaitingMulligan).toBe('bob');
    expect(() => game.performPendingMulligans()).toThrow('Opponent alice must select an Active Pokemon first');

    game.selectActivePokemon('alice', findCard(game, alice.hand, 'pikachu'));

    expect(game.performPendingMulligans()).toBe(1);
    expect(bob.hand).toEqual([
      'pikachu#21',
      'lightning-energy#26',
      'lightning-energy#27',
      'lightning-energy#28',
      'lightning-energy#29',
      'lightning-energy#30',
      'lightning-energy#31'
    ]);
    expect(game.playerAwaitingMulligan).toBeNull();
    expect(game.mulliganCount).toBe(1);
    expect(game.getEvents('mulligan_performed')).toMatchObject([{ playerId: 'bob', mulliganCount: 1, hasBasic: true }]);
  });

  it('reveals both hands before a mulligan', () => {
    const { game } = dealtGame();
    game.performMulligan('bob');

    expect(game.getEvents('hand_revealed')).toMatchObject([
      {
        playerId: 'bob',
        revealedTo: ['alice'],
        cardIds: [
          'lightning-energy#32',
          'lightning-energy#31',
          'lightning-energy#30',
          'lightning-energy#29',
          'lightning-energy#28',
          'lightning-energy#27',
          'lightning-energy#26'
        ]
      },
      { playerId: 'alice', revealedTo: ['bob'] }
    ]);
  });

  it('returns zero when no mulligan is pending', () => {
    const { game } = dealtGame();
    expect(game.performPendingMulligans()).toBe(0);
  });

  it('refuses a pending mulligan that can never find a Basic', () => {
    const allEnergy = new Deck('All energy');
    allEnergy.addCard('lightning-energy', 12);
    const { game, alice } = createSetupGame({ decks: [buildStarterDeck(), allEnergy], random: fixedRandom(0) });
    game.startSetup();
    game.determineTurnOrder();
    game.dealOpeningHands();
    game.markPlayerForMulligan('bob');
    game.selectActivePokemon('alice', findCard(game, alice.hand, 'pikachu'));

    expect(() => game.performPendingMulligans()).toThrow('Player bob has no Basic Pokemon in hand or deck');
    expect(game.mulliganCount).toBe(0);
  });

  it('keeps every card across repeated mulligans', () => {
    const { game, alice } = dealtGame(createSeededRandom('mulligan-invariant'));
    for (let round = 1; round <= 5; round++) {
      const before = multiset(alice);
      game.performMulligan('alice');
      expect(multiset(alice)).toEqual(before);
      expect(alice.hand).toHaveLength(7);
    }
    expect(game.mulliganCount).toBe(5);
    expect(game.getMulliganCount('alice')).toBe(5);
    expect(game.getMulliganCount('bob')).toBe(0);
  });

  it('redraws the whole hand when the deck holds fewer than seven cards', () => {
    const tiny = new Deck('Tiny');
    tiny.addCard('pikachu', 1);
    tiny.addCard('lightning-energy', 4);
    const { game, bob } = createSetupGame({ decks: [buildStarterDeck(), tiny], random: fixedRandom(0) });
    game.startSetup();
    game.determineTurnOrder();
    game.dealOpeningHands();
    expect(bob.hand).toHaveLength(5);

    expect(game.performMulligan('bob')).toBe(true);
    expect(bob.hand).toHaveLength(5);
    expect(bob.deck).toEqual([]);
  });

  it('mulligans every player once and reports who still lacks a Basic', () => {
    const basicsOnly = new Deck('Basics only');
    basicsOnly.addCard('pikachu', 10);
    const dealt = (decks: [Deck, Deck]) => {
      const fixture = createSetupGame({ decks, random: fixedRandom(0) });
      fixture.game.startSetup();
      fixture.game.determineTurnOrder();
      fixture.game.dealOpeningHands();
      return fixture.game;
    };
    const allEnergy = () => {
      const deck = new Deck('All energy');
      deck.addCard('lightning-energy', 10);
      return deck;
    };

    const mixed = dealt([basicsOnly, allEnergy()]);
    expect(mixed.performMulliganForAll()).toEqual({ outcome: 'one_without_basic', playerId: 'bob' });
    expect(mixed.mulliganCount).toBe(2);
    expect([mixed.getMulliganCount('alice'), mixed.getMulliganCount('bob')]).toEqual([1, 1]);

    expect(dealt([allEnergy(), allEnergy()]).performMulliganForAll()).toEqual({ outcome: 'all_without_basic' });
    expect(dealt([basicsOnly, basicsOnly]).performMulliganForAll()).toEqual({ outcome: 'all_with_basic' });
  });

  it('bounds compensation draws by the match-wide mulligan count', () => {
    const { game, alice } = dealtGame();
    game.performMulligan('bob');
    expect(game.getMulliganCompensationLimit('alice')).toBe(1);

    expect(() => game.mulliganCompensation('alice', 2)).toThrow('Declared card count 2 exceeds limit 1');
    expect(errorCode(() => game.mulliganCompensation('alice', -1))).toBe('OUT_OF_BOUNDS');
    expect(alice.hand).toHaveLength(7);

    expect(game.mulliganCompensation('alice', 1)).toEqual(['lightning-energy#13']);
    expect(alice.hand).toHaveLength(8);
    expect(errorCode(() => game.mulliganCompensation('alice', 1))).toBe('PRECONDITION_FAILED');
    expect(game.getEvents('mulligan_compensation')).toMatchObject([{ playerId: 'alice', cardsDrawn: 1 }]);
  });

  it('allows declaring zero compensation cards', () => {
    const { game, alice } = dealtGame();
    expect(game.mulliganCompensation('alice', 0)).toEqual([]);
    expect(alice.hand).toHaveLength(7);
  });
});

describe('selectActivePokemon', () => {
  const dealt = () => {
    const fixture = createSetupGame();
    fixture.game.startSetup();
    fixture.game.determineTurnOrder();
    fixture.game.dealOpeningHands();
    return fixture;
  };

  it('refuses a Stage 1 Pokemon', () => {
    const { game, alice } = dealt();
    const raichu = fetchToHand(game, alice, 'raichu');

    expect(() => game.selectActivePokemon('alice', raichu)).toThrow('Selected Pokemon is not a Basic Pokemon');
    expect(errorCode(() => game.selectActivePokemon('alice', raichu))).toBe('INVALID_TARGET');
    expect(alice.activePokemon).toBeNull();
    expect(alice.hand).toContain(raichu);
  });

  it('refuses cards outside the hand and non-Pokemon', () => {
    const { game, alice } = dealt();
    expect(errorCode(() => game.selectActivePokemon('alice', 'pikachu#38'))).toBe('CARD_NOT_FOUND');
    expect(() => game.selectActivePokemon('alice', 'lightning-energy#15')).toThrow('Selected card is not a Pokemon');
    expect(errorCode(() => game.selectActivePokemon('nobody', 'pikachu#18'))).toBe('PLAYER_NOT_FOUND');
    expect(alice.activePokemon).toBeNull();
  });

  it('moves a previous active to the bench', () => {
    const { game, alice } = dealt();
    game.selectActivePokemon('alice', 'pikachu#18');
    game.selectActivePokemon('alice', 'squirtle#20');

    expect(alice.activePokemon).toBe('squirtle#20');
    expect(alice.bench).toEqual(['pikachu#18']);
  });
});

describe('setupBench', () => {
  const withActive = () => {
    const fixture = createSetupGame();
    fixture.game.startSetup();
    fixture.game.determineTurnOrder();
    fixture.game.dealOpeningHands();
    fixture.game.selectActivePokemon('alice', 'pikachu#18');
    return fixture;
  };

  it('benches a batch of Pokemon from hand', () => {
    const { game, alice } = withActive();
    game.setupBench('alice', ['squirtle#20', 'pikachu#17']);

    expect(alice.bench).toEqual(['squirtle#20', 'pikachu#17']);
    expect(alice.hand).toEqual(['squirtle#19', 'pikachu#16', 'lightning-energy#15', 'lightning-energy#14']);
    expect(game.getEvents('pokemon_benched').map((event) => event.cardId)).toEqual(['squirtle#20', 'pikachu#17']);
  });

  it('applies nothing when any card in the batch is illegal', () => {
    const { game, alice } = withActive();
    const handBefore = [...alice.hand];

    expect(errorCode(() => game.setupBench('alice', ['squirtle#20', 'lightning-energy#15']))).toBe('INVALID_TARGET');
    expect(errorCode(() => game.setupBench('alice', ['squirtle#20', 'pikachu#38']))).toBe('CARD_NOT_FOUND');
    expect(errorCode(() => game.setupBench('alice', ['squirtle#20', 'squirtle#20']))).toBe('INVALID_TARGET');
    expect(alice.bench).toEqual([]);
    expect(alice.hand).toEqual(handBefore);
    expect(game.getEvents('pokemon_benched')).toEqual([]);
  });

  it('refuses a batch that would overfill the bench', () => {
    const { game, alice } = withActive();
    game.setupBench('alice', ['squirtle#20', 'squirtle#19', 'pikachu#17', 'pikachu#16']);
    const first = fetchToHand(game, alice, 'raichu');
    const second = fetchToHand(game, alice, 'raichu');

    expect(() => game.setupBench('alice', [first, second])).toThrow(
      'Bench can hold 5 Pokemon (4 benched, 2 requested)'
    );
    expect(alice.bench).toHaveLength(4);
    expect(alice.hand).toContain(first);
  });
});

describe('placePrizeCards and completeSetup', () => {
  it('places fewer prizes when a deck is short', () => {
    const shortDeck = new Deck('Short');
    shortDeck.addCard('lightning-energy', 4);
    shortDeck.addCard('pikachu', 7);
    const { game, alice, bob } = createSetupGame({ decks: [shortDeck, buildStarterDeck()] });
    game.startSetup();
    game.determineTurnOrder();
    game.dealOpeningHands();
    expect(alice.deck).toHaveLength(4);

    game.placePrizeCards();

    expect(alice.prizeCards).toBe(4);
    expect(alice.deck).toEqual([]);
    expect(bob.prizeCards).toBe(6);
    expect(game.getEvents('prize_cards_placed')).toMatchObject([
      { playerId: 'alice', count: 4 },
      { playerId: 'bob', count: 6 }
    ]);
    expect(errorCode(() => game.placePrizeCards())).toBe('INVALID_STATE');
  });

  it('needs an Active Pokemon for every player', () => {
    const { game } = createSetupGame();
    game.startSetup();
    game.determineTurnOrder();
    game.dealOpeningHands();
    game.selectActivePokemon('alice', 'pikachu#18');

    expect(() => game.completeSetup()).toThrow('Player bob has no Active Pokemon');
    expect(game.status).toBe(GameStatus.SETUP);
  });

  it('starts the first turn once setup is complete', () => {
    const { game, alice } = createSetupGame();
    game.startSetup();
    game.determineTurnOrder();
    game.dealOpeningHands();
    game.selectActivePokemon('alice', 'pikachu#18');
    game.selectActivePokemon('bob', 'pikachu#38');
    game.placePrizeCards();
    game.completeSetup();

    expect(game.status).toBe(GameStatus.IN_PROGRESS);
    expect(game.getCurrentPlayer()?.id).toBe('alice');
    expect(game.turnNumber).toBe(1);
    expect(alice.hand).toHaveLength(7);
    expect(alice.hand[6]).toBe('potion#7');
    expect(game.getEvents('game_started')).toMatchObject([{ turnOrder: ['alice', 'bob'] }]);
    expect(game.getEvents('card_drawn')).toMatchObject([{ playerId: 'alice', cardId: 'potion#7', turnNumber: 1 }]);
    expect(errorCode(() => game.selectActivePokemon('alice', 'pikachu#17'))).toBe('INVALID_STATE');
  });
});
