import type { Game } from '../game-engine';
import { GameStateError } from '../errors';
import {
  EffectError,
  EffectTrigger,
  type Effect,
  type EffectContext,
  type EffectResult
} from './effect-types';

const toEffectError = (error: unknown): EffectError => {
  if (error instanceof EffectError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new EffectError('general', message);
};

/**
 * Registry of effects plus the index of which cards carry them. A card may
 * carry the same effect more than once; each attachment fires separately.
 *
 * Dispatch iterates a snapshot of the index, so effects that attach or
 * detach during resolution take part from the next trigger on.
 */
export class EffectManager {
  private readonly effects = new Map<string, Effect>();
  private readonly cardEffects = new Map<string, string[]>();

  // ========================================================================
  // REGISTRY
  // ========================================================================

  public registerEffect(effect: Effect): void {
    if (this.effects.has(effect.id)) {
      throw new GameStateError('INVALID_STATE', `Effect ${effect.id} is already registered`);
    }
    this.effects.set(effect.id, effect);
  }

  /** Drops the effect and every attachment of it. */
  public unregisterEffect(effectId: string): boolean {
    if (!this.effects.delete(effectId)) {
      return false;
    }
    for (const [cardId, effectIds] of this.cardEffects) {
      const remaining = effectIds.filter((id) => id !== effectId);
      if (remaining.length === 0) {
        this.cardEffects.delete(cardId);
      } else {
        this.cardEffects.set(cardId, remaining);
      }
    }
    return true;
  }

  public getEffect(effectId: string): Effect | undefined {
    return this.effects.get(effectId);
  }

  /** Attached effects listening for the trigger, one entry per attachment. */
  public getEffectsByTrigger(trigger: EffectTrigger): Effect[] {
    const effects: Effect[] = [];
    for (const effectIds of this.cardEffects.values()) {
      for (const effectId of effectIds) {
        const effect = this.effects.get(effectId);
        if (effect && effect.triggers.includes(trigger)) {
          effects.push(effect);
        }
      }
    }
    return effects;
  }

  // ========================================================================
  // ATTACHMENTS
  // ========================================================================

  public attachEffect(cardId: string, effectId: string): void {
    if (!this.effects.has(effectId)) {
      throw new GameStateError('PRECONDITION_FAILED', `Effect ${effectId} is not registered`);
    }
    const attached = this.cardEffects.get(cardId) ?? [];
    attached.push(effectId);
    this.cardEffects.set(cardId, attached);
  }

  /** Removes one attachment of the effect from the card. */
  public detachEffect(cardId: string, effectId: string): boolean {
    const attached = this.cardEffects.get(cardId);
    if (!attached) {
      return false;
    }
    const index = attached.indexOf(effectId);
    if (index === -1) {
      return false;
    }
    attached.splice(index, 1);
    if (attached.length === 0) {
      this.cardEffects.delete(cardId);
    }
    return true;
  }

  public removeCardEffects(cardId: string): void {
    this.cardEffects.delete(cardId);
  }

  public getCardEffects(cardId: string): Effect[] {
    const effects: Effect[] = [];
    for (const effectId of this.cardEffects.get(cardId) ?? []) {
      const effect = this.effects.get(effectId);
      if (effect) {
        effects.push(effect);
      }
    }
    return effects;
  }

  public hasEffects(cardId: string): boolean {
    return (this.cardEffects.get(cardId)?.length ?? 0) > 0;
  }

  // ========================================================================
  // DISPATCH
  // ========================================================================

  /**
   * Fires every attached effect listening for the trigger, on any card.
   * The context is rebound per effect: sourceCard becomes the carrying card
   * and controller its owner when the game knows one.
   */
  public triggerEffects(game: Game, trigger: EffectTrigger, context: EffectContext): EffectResult[] {
    return this.dispatch(game, trigger, context, this.snapshot());
  }

  /** Fires only the effects attached to one card. */
  public triggerCardEffects(
    game: Game,
    cardId: string,
    trigger: EffectTrigger,
    context: EffectContext
  ): EffectResult[] {
    const attached = this.cardEffects.get(cardId);
    if (!attached) {
      return [];
    }
    return this.dispatch(game, trigger, context, [[cardId, [...attached]]]);
  }

  public onTurnStart(game: Game, playerId: string): EffectResult[] {
    return this.dispatchForPlayer(game, EffectTrigger.ON_TURN_START, playerId);
  }

  public onTurnEnd(game: Game, playerId: string): EffectResult[] {
    return this.dispatchForPlayer(game, EffectTrigger.ON_TURN_END, playerId);
  }

  private dispatchForPlayer(game: Game, trigger: EffectTrigger, playerId: string): EffectResult[] {
    const owned = this.snapshot().filter(([cardId]) => game.findCardOwner(cardId)?.id === playerId);
    const context: EffectContext = {
      sourceCard: '',
      controller: playerId,
      target: { type: 'none' },
      parameters: {},
      trigger
    };
    return this.dispatch(game, trigger, context, owned);
  }

  private snapshot(): Array<[string, string[]]> {
    return [...this.cardEffects.entries()].map(([cardId, effectIds]) => [cardId, [...effectIds]]);
  }

  private dispatch(
    game: Game,
    trigger: EffectTrigger,
    context: EffectContext,
    entries: Array<[string, string[]]>
  ): EffectResult[] {
    const results: EffectResult[] = [];

    for (const [cardId, effectIds] of entries) {
      for (const effectId of effectIds) {
        const effect = this.effects.get(effectId);
        if (!effect || !effect.triggers.includes(trigger)) {
          continue;
        }

        const bound: EffectContext = {
          ...context,
          parameters: { ...context.parameters },
          sourceCard: cardId,
          controller: game.findCardOwner(cardId)?.id ?? context.controller,
          trigger
        };

        try {
          if (!effect.canApply(game, bound)) {
            results.push({ status: 'skipped', effectId, cardId });
            continue;
          }
          const outcomes = effect.apply(game, bound);
          results.push({ status: 'applied', effectId, cardId, outcomes });
        } catch (error) {
          const effectError = toEffectError(error);
          game.log.warn('[EFFECTS] Effect failed to resolve', {
            effectId,
            cardId,
            trigger,
            kind: effectError.kind,
            message: effectError.message
          });
          results.push({ status: 'failed', effectId, cardId, error: effectError });
        }
      }
    }

    if (results.length > 0) {
      game.log.debug('[EFFECTS] Trigger resolved', { trigger, results: results.length });
    }
    return results;
  }
}
