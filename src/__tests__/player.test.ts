import { describe, expect, it } from 'vitest';
import { SpecialConditionType, burned, poisoned } from '../card';
import { CardLocation, MAX_BENCH_SIZE, Player } from '../player';
import { buildCardDatabase, fixedRandom } from './fixtures';

const cards = buildCardDatabase();

const playerWithHand = (hand: string[]): Player => {
  const player = new Player('Tester', 'tester');
  player.hand = [...hand];
  return player;
};

describe('Player deck and hand', () => {
  it('draws from the end of the deck', () => {
    const player = new Player('Tester');
    player.setDeck(['bottom', 'middle', 'top']);

    expect(player.drawCard()).toBe('top');
    expect(player.drawCards(5)).toEqual(['middle', 'bottom']);
    expect(player.drawCard()).toBeNull();
    expect(player.hand).toEqual(['top', 'middle', 'bottom']);
  });

  it('returns the whole hand to the deck', () => {
    const player = playerWithHand(['a', 'b']);
    player.setDeck(['c']);
    expect(player.returnHandToDeck()).toEqual(['a', 'b']);
    expect(player.hand).toEqual([]);
    expect(player.deck).toEqual(['c', 'a', 'b']);
  });

  it('discards from hand only cards it holds', () => {
    const player = playerWithHand(['potion']);
    expect(player.discardFromHand('missing')).toBe(false);
    expect(player.discardFromHand('potion')).toBe(true);
    expect(player.discardPile).toEqual(['potion']);
  });
});

describe('Player active and bench', () => {
  it('moves the previous active to the bench', () => {
    const player = playerWithHand(['pikachu', 'squirtle']);
    expect(player.setActivePokemon('pikachu')).toBe(true);
    expect(player.setActivePokemon('squirtle')).toBe(true);

    expect(player.activePokemon).toBe('squirtle');
    expect(player.bench).toEqual(['pikachu']);
    expect(player.hand).toEqual([]);
  });

  it('caps the bench at five Pokemon', () => {
    const hand = ['p1', 'p2', 'p3', 'p4', 'p5', 'p6'];
    const player = playerWithHand(hand);
    for (const cardId of hand.slice(0, MAX_BENCH_SIZE)) {
      expect(player.benchPokemon(cardId)).toBe(true);
    }
    expect(player.benchPokemon('p6')).toBe(false);
    expect(player.hand).toEqual(['p6']);
  });

  it('refuses a new active from hand when the old one has nowhere to go', () => {
    const player = playerWithHand(['a', 'b1', 'b2', 'b3', 'b4', 'b5', 'c']);
    player.setActivePokemon('a');
    for (const cardId of ['b1', 'b2', 'b3', 'b4', 'b5']) {
      player.benchPokemon(cardId);
    }
    expect(player.setActivePokemon('c')).toBe(false);
    expect(player.activePokemon).toBe('a');

    expect(player.setActivePokemon('b3')).toBe(true);
    expect(player.activePokemon).toBe('b3');
    expect(player.bench).toEqual(['b1', 'b2', 'b4', 'b5', 'a']);
  });

  it('evolves in place, keeping damage and energy but not conditions', () => {
    const player = playerWithHand(['pikachu', 'lightning-energy', 'raichu']);
    player.setActivePokemon('pikachu');
    player.attachEnergy('lightning-energy', 'pikachu');
    player.addDamage('pikachu', 30);
    player.addSpecialCondition('pikachu', poisoned(), 1);

    expect(player.evolvePokemon('pikachu', 'raichu')).toBe(true);
    expect(player.activePokemon).toBe('raichu');
    expect(player.getDamage('raichu')).toBe(30);
    expect(player.getAttachedEnergy('raichu')).toEqual(['lightning-energy']);
    expect(player.getSpecialConditions('raichu')).toEqual([]);
    expect(player.evolutionStack.get('raichu')).toEqual(['pikachu']);
    expect(player.findCardLocation('pikachu')).toBe(CardLocation.ATTACHED);
  });

  it('discards a Pokemon with everything under and attached to it', () => {
    const player = playerWithHand(['pikachu', 'raichu', 'lightning-energy', 'muscle-band']);
    player.setActivePokemon('pikachu');
    player.evolvePokemon('pikachu', 'raichu');
    player.attachEnergy('lightning-energy', 'raichu');
    player.attachTool('muscle-band', 'raichu');
    player.addDamage('raichu', 90);

    expect(player.isPokemonKnockedOut('raichu', cards)).toBe(true);
    expect(player.discardPokemon('raichu')).toEqual(['pikachu', 'raichu', 'lightning-energy', 'muscle-band']);
    expect(player.activePokemon).toBeNull();
    expect(player.getDamage('raichu')).toBe(0);
    expect(player.hasLost()).toBe(true);
  });

  it('takes a Pokemon out of play without discarding it', () => {
    const player = playerWithHand(['pikachu', 'squirtle', 'lightning-energy']);
    player.setActivePokemon('pikachu');
    player.benchPokemon('squirtle');
    player.attachEnergy('lightning-energy', 'squirtle');
    player.addDamage('squirtle', 20);

    expect(player.removeFromPlay('squirtle')).toEqual(['squirtle', 'lightning-energy']);
    expect(player.bench).toEqual([]);
    expect(player.discardPile).toEqual([]);
    expect(player.getDamage('squirtle')).toBe(0);
    expect(player.removeFromPlay('squirtle')).toEqual([]);
  });
});

describe('Player attachments and damage', () => {
  it('reads attached energy types through the card lookup', () => {
    const player = playerWithHand(['pikachu', 'lightning-energy', 'water-energy']);
    player.setActivePokemon('pikachu');
    player.attachEnergy('lightning-energy', 'pikachu');
    player.attachEnergy('water-energy', 'pikachu');

    expect(player.getAttachedEnergyTypes('pikachu', cards)).toEqual(['lightning', 'water']);
    expect(player.discardEnergy('pikachu', ['water-energy'])).toBe(true);
    expect(player.getAttachedEnergyCount('pikachu')).toBe(1);
    expect(player.discardPile).toEqual(['water-energy']);
  });

  it('heals no more than the damage present', () => {
    const player = playerWithHand(['pikachu']);
    player.setActivePokemon('pikachu');
    player.addDamage('pikachu', 30);

    expect(player.healDamage('pikachu', 20)).toBe(20);
    expect(player.healDamage('pikachu', 50)).toBe(10);
    expect(player.damageCounters.has('pikachu')).toBe(false);
  });

  it('allows one tool per Pokemon', () => {
    const player = playerWithHand(['pikachu', 'muscle-band', 'spare-band']);
    player.setActivePokemon('pikachu');
    expect(player.attachTool('muscle-band', 'pikachu')).toBe(true);
    expect(player.attachTool('spare-band', 'pikachu')).toBe(false);
    expect(player.hand).toEqual(['spare-band']);
  });
});

describe('Player special conditions', () => {
  it('lets asleep, confused and paralyzed replace one another', () => {
    const player = playerWithHand(['pikachu']);
    player.setActivePokemon('pikachu');
    player.addSpecialCondition('pikachu', poisoned(), 1);
    player.addSpecialCondition('pikachu', { type: SpecialConditionType.ASLEEP }, 1);
    player.addSpecialCondition('pikachu', { type: SpecialConditionType.CONFUSED }, 1);

    expect(player.getSpecialConditions('pikachu').map((instance) => instance.condition.type)).toEqual([
      SpecialConditionType.POISONED,
      SpecialConditionType.CONFUSED
    ]);
  });

  it('reports poison damage without applying it', () => {
    const player = playerWithHand(['pikachu']);
    player.setActivePokemon('pikachu');
    player.addSpecialCondition('pikachu', poisoned(), 1);

    expect(player.updateSpecialConditions(fixedRandom(0.9))).toEqual([
      { type: 'damage', pokemonId: 'pikachu', amount: 10, condition: SpecialConditionType.POISONED }
    ]);
    expect(player.getDamage('pikachu')).toBe(0);
    expect(player.hasSpecialCondition('pikachu', SpecialConditionType.POISONED)).toBe(true);
  });

  it('removes a burn on heads', () => {
    const player = playerWithHand(['pikachu']);
    player.setActivePokemon('pikachu');
    player.addSpecialCondition('pikachu', burned(), 1);

    expect(player.updateSpecialConditions(fixedRandom(0.1))).toEqual([
      { type: 'damage', pokemonId: 'pikachu', amount: 20, condition: SpecialConditionType.BURNED },
      { type: 'coin_flip', pokemonId: 'pikachu', condition: SpecialConditionType.BURNED, heads: true },
      { type: 'condition_removed', pokemonId: 'pikachu', condition: SpecialConditionType.BURNED }
    ]);
    expect(player.getSpecialConditions('pikachu')).toEqual([]);
  });

  it('keeps a Pokemon asleep on tails', () => {
    const player = playerWithHand(['pikachu']);
    player.setActivePokemon('pikachu');
    player.addSpecialCondition('pikachu', { type: SpecialConditionType.ASLEEP }, 1);

    expect(player.updateSpecialConditions(fixedRandom(0.9))).toEqual([
      { type: 'coin_flip', pokemonId: 'pikachu', condition: SpecialConditionType.ASLEEP, heads: false }
    ]);
    expect(player.hasSpecialCondition('pikachu', SpecialConditionType.ASLEEP)).toBe(true);
  });

  it('expires conditions when their duration runs out', () => {
    const player = playerWithHand(['pikachu']);
    player.setActivePokemon('pikachu');
    player.addSpecialCondition('pikachu', { type: SpecialConditionType.PARALYZED }, 1, 2);

    expect(player.updateSpecialConditions(fixedRandom(0.9))).toEqual([]);
    expect(player.getSpecialConditions('pikachu')[0].duration).toBe(1);
    expect(player.updateSpecialConditions(fixedRandom(0.9))).toEqual([
      { type: 'condition_removed', pokemonId: 'pikachu', condition: SpecialConditionType.PARALYZED }
    ]);
  });
});

describe('Player prizes', () => {
  it('places fewer prizes when the deck is short', () => {
    const player = new Player('Tester');
    player.setDeck(['d1', 'd2', 'd3', 'd4']);

    expect(player.drawPrizeCards(6)).toEqual(['d4', 'd3', 'd2', 'd1']);
    expect(player.prizeCards).toBe(4);
    expect(player.deck).toEqual([]);
  });

  it('takes prizes into hand and wins at zero', () => {
    const player = new Player('Tester');
    player.setDeck(['d1', 'd2']);
    player.drawPrizeCards(2);

    expect(player.takePrizeCard()).toEqual({ cardId: 'd1' });
    expect(player.takePrizeCard()).toEqual({ cardId: 'd2' });
    expect(player.hand).toEqual(['d1', 'd2']);
    expect(player.hasWon()).toBe(true);
    expect(player.takePrizeCard()).toBeNull();
  });

  it('resets per-turn flags at the start of a turn', () => {
    const player = new Player('Tester');
    player.hasAttacked = true;
    player.canPlayTrainer = false;
    player.energyAttachedThisTurn = true;
    player.hasRetreated = true;
    player.startTurn();

    expect([player.hasAttacked, player.canPlayTrainer, player.energyAttachedThisTurn, player.hasRetreated]).toEqual([
      false,
      true,
      false,
      false
    ]);
  });
});
