import { describe, expect, it } from 'vitest';
import { resolveGameRules } from '../game-rules';
import { errorCode } from './fixtures';

describe('resolveGameRules', () => {
  it('fills in defaults', () => {
    expect(resolveGameRules()).toEqual({
      format: 'Standard',
      prizeCards: 6,
      maxHandSize: null,
      turnTimeLimit: null,
      autoShuffle: true
    });
  });

  it('keeps explicit values and freezes the result', () => {
    const rules = resolveGameRules({ format: 'Expanded', prizeCards: 4, maxHandSize: 10, autoShuffle: false });
    expect(rules.prizeCards).toBe(4);
    expect(rules.maxHandSize).toBe(10);
    expect(Object.isFrozen(rules)).toBe(true);
  });

  it('rejects out-of-range values with the offending path', () => {
    expect(errorCode(() => resolveGameRules({ prizeCards: 0 }))).toBe('INVALID_CONFIG');
    expect(() => resolveGameRules({ prizeCards: 0 })).toThrow(/^Invalid game rules: prizeCards: /);
    expect(() => resolveGameRules({ maxHandSize: -2 })).toThrow(/maxHandSize/);
  });

  it('rejects unknown keys', () => {
    const input = { prizeCards: 3, prizeCount: 3 };
    expect(errorCode(() => resolveGameRules(input))).toBe('INVALID_CONFIG');
  });
});
