import { z } from 'zod';
import { ENGINE_DEFAULTS } from './config/engine-defaults';
import { GameStateError } from './errors';

export const GameRulesSchema = z
  .object({
    format: z.string().trim().min(1).default(ENGINE_DEFAULTS.FORMAT),
    prizeCards: z.number().int().min(1).max(60).default(ENGINE_DEFAULTS.PRIZE_CARDS),
    maxHandSize: z.number().int().positive().nullable().default(ENGINE_DEFAULTS.MAX_HAND_SIZE),
    /** Seconds per turn. Carried for the host; the core keeps no timers. */
    turnTimeLimit: z.number().int().positive().nullable().default(ENGINE_DEFAULTS.TURN_TIME_LIMIT),
    autoShuffle: z.boolean().default(ENGINE_DEFAULTS.AUTO_SHUFFLE)
  })
  .strict();

export type GameRules = Readonly<z.infer<typeof GameRulesSchema>>;
export type GameRulesInput = z.input<typeof GameRulesSchema>;

/**
 * Validates per-match rules once. The result is frozen and never changes
 * for the life of the match.
 */
export function resolveGameRules(input: GameRulesInput = {}): GameRules {
  const parsed = GameRulesSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'rules'}: ${issue.message}`)
      .join('; ');
    throw new GameStateError('INVALID_CONFIG', `Invalid game rules: ${details}`);
  }
  return Object.freeze(parsed.data);
}
