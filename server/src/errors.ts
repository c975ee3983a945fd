import { type ClueRejection } from './types.js';

/** Fatal problem with the inputs to game creation (word corpus, team sizes). */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InvalidClueError extends Error {
  constructor(
    readonly reason: ClueRejection,
    message: string,
  ) {
    super(message);
    this.name = 'InvalidClueError';
  }
}

export class GameNotFoundError extends Error {
  constructor(readonly gameId: string) {
    super('Game not found.');
    this.name = 'GameNotFoundError';
  }
}

/** Another driver already holds the game's lock. */
export class GameLockedError extends Error {
  constructor(readonly gameId: string) {
    super('An automated turn is already running for this game.');
    this.name = 'GameLockedError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
