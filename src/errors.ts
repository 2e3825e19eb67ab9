export type GameStateErrorCode =
  | 'INVALID_STATE'
  | 'PLAYER_NOT_FOUND'
  | 'CARD_NOT_FOUND'
  | 'INVALID_TARGET'
  | 'OUT_OF_BOUNDS'
  | 'PRECONDITION_FAILED'
  | 'INVALID_CONFIG';

/**
 * Thrown when the engine is driven out of protocol: wrong lifecycle state,
 * unknown ids, out-of-range arguments. Game state is left untouched.
 */
export class GameStateError extends Error {
  readonly code: GameStateErrorCode;

  constructor(code: GameStateErrorCode, message: string) {
    super(message);
    this.name = 'GameStateError';
    this.code = code;
  }
}

export const isGameStateError = (error: unknown): error is GameStateError =>
  error instanceof GameStateError;
