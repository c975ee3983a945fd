import { GuardedOperative, GuardedSpymaster, RandomOperative, RandomSpymaster } from './agents.js';
import { operativeView, spymasterView } from './board.js';
import { type DebateManager } from './debate.js';
import { errorMessage, GameLockedError, GameNotFoundError, InvalidClueError } from './errors.js';
import { endTurn, getGame, processClue, processGuess } from './gameStore.js';
import { type LlmClient, LlmOperative, LlmSpymaster, PERSONALITIES } from './llmClient.js';
import { log } from './logger.js';
import { type Random } from './random.js';
import {
  END_TURN,
  type AgentRole,
  type ClueRecord,
  type DebateResult,
  type GuessRecord,
  type GuessResult,
  type TeamColor,
  type TeamRoster,
} from './types.js';

export const MAX_CLUE_ATTEMPTS = 5;

const locks = new Map<string, boolean>();

export function acquireLock(gameId: string): boolean {
  if (locks.get(gameId)) return false;
  locks.set(gameId, true);
  return true;
}

export function releaseLock(gameId: string): void {
  locks.delete(gameId);
}

export function isLocked(gameId: string): boolean {
  return locks.get(gameId) === true;
}

/** Runs a background task; failures are logged, never rethrown. */
export function fireAndForget(task: () => Promise<void>, label: string): void {
  void task().catch((err: unknown) => {
    log('ERROR', label, 'Background task failed', { error: errorMessage(err) });
  });
}

// ---------------------------------------------------------------------------
// Rosters
// ---------------------------------------------------------------------------

export interface RosterOptions {
  random: Random;
  /** Model-backed agents; random agents are used when absent. */
  llm?: { client: LlmClient; timeoutMs: number };
  /** Per-role model overrides for this team. */
  models?: Partial<Record<AgentRole, string>>;
}

export function createRoster(team: TeamColor, operativeCount: number, options: RosterOptions): TeamRoster {
  const { random, llm } = options;
  const operativeIds = Array.from({ length: Math.max(1, operativeCount) }, (_, i) => `${team}-operative-${i + 1}`);
  const spymasterId = `${team}-spymaster`;

  if (!llm) {
    return {
      spymaster: new RandomSpymaster(spymasterId, random),
      operatives: operativeIds.map((id) => new RandomOperative(id, random)),
    };
  }

  const guard = { timeoutMs: llm.timeoutMs, random };
  const spymasterClient = llm.client.withModel(options.models?.spymaster);
  const operativeClient = llm.client.withModel(options.models?.operative);
  log('DEBUG', 'deliberation', `Seating ${team} roster`, {
    spymasterModel: spymasterClient.model,
    operativeModel: operativeClient.model,
    operatives: operativeIds.length,
  });
  return {
    spymaster: new GuardedSpymaster(new LlmSpymaster({ id: spymasterId, client: spymasterClient, random }), guard),
    operatives: operativeIds.map(
      (id, i) =>
        new GuardedOperative(
          new LlmOperative({
            id,
            client: operativeClient,
            random,
            personality: PERSONALITIES[i % PERSONALITIES.length],
          }),
          guard,
        ),
    ),
  };
}

// ---------------------------------------------------------------------------
// Turns
// ---------------------------------------------------------------------------

export type TurnEndReason =
  | 'clue_rejected'
  | 'voted_end'
  | 'wrong_guess'
  | 'invalid_guess'
  | 'guess_limit'
  | 'game_over';

export interface TurnSummary {
  team: TeamColor;
  clue?: ClueRecord;
  rejectedClues: string[];
  debates: DebateResult[];
  guesses: Array<{ word: string; result: GuessResult }>;
  endedBy: TurnEndReason;
}

export interface TurnOptions {
  maxClueAttempts?: number;
}

async function obtainClue(
  gameId: string,
  team: TeamColor,
  roster: TeamRoster,
  maxAttempts: number,
  rejected: string[],
): Promise<ClueRecord | undefined> {
  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    const game = getGame(gameId);
    if (!game) throw new GameNotFoundError(gameId);
    const proposal = await roster.spymaster.generateClue(spymasterView(game), [...rejected]);
    try {
      processClue(gameId, proposal.word, proposal.targets, team);
      return game.activeClue;
    } catch (err) {
      if (!(err instanceof InvalidClueError)) throw err;
      rejected.push(proposal.word);
      log('WARN', 'deliberation', `Clue "${proposal.word}" rejected (${err.reason}), retrying`, {
        gameId,
        team,
        attempt,
      });
    }
  }
  return undefined;
}

/**
 * Plays the current team's turn: one clue, then debate-and-guess until the
 * team votes to stop, misses, or uses its count + 1 guesses.
 */
export async function playTurn(
  gameId: string,
  roster: TeamRoster,
  debate: DebateManager,
  options: TurnOptions = {},
): Promise<TurnSummary> {
  const game = getGame(gameId);
  if (!game) throw new GameNotFoundError(gameId);
  const team = game.currentTeam;
  const summary: TurnSummary = { team, rejectedClues: [], debates: [], guesses: [], endedBy: 'game_over' };
  if (game.winner) return summary;

  const clue = await obtainClue(gameId, team, roster, options.maxClueAttempts ?? MAX_CLUE_ATTEMPTS, summary.rejectedClues);
  if (!clue) {
    log('WARN', 'deliberation', `No valid clue from ${roster.spymaster.id}, ending turn`, { gameId, team });
    endTurn(gameId, team);
    return { ...summary, endedBy: 'clue_rejected' };
  }
  summary.clue = clue;

  const maxGuesses = clue.count + 1;
  const history: GuessRecord[] = [];
  let correctSoFar = 0;
  let endedBy: TurnEndReason | undefined;

  while (summary.guesses.length < maxGuesses) {
    const result = await debate.runDebate({
      agents: roster.operatives,
      view: operativeView(game),
      clue: { word: clue.word, count: clue.count },
      correctSoFar,
      history: [...history],
    });
    summary.debates.push(result);

    if (result.finalDecision === END_TURN) {
      endTurn(gameId, team);
      endedBy = 'voted_end';
      break;
    }

    const outcome = processGuess(gameId, result.finalDecision, team);
    summary.guesses.push({ word: result.finalDecision, result: outcome });
    if (!outcome.success) {
      log('WARN', 'deliberation', `Guess "${result.finalDecision}" failed: ${outcome.error}`, { gameId, team });
      endTurn(gameId, team);
      endedBy = 'invalid_guess';
      break;
    }

    history.push(game.guessHistory[game.guessHistory.length - 1]);
    if (outcome.kind === team) correctSoFar += 1;
    if (outcome.gameOver) {
      endedBy = 'game_over';
      break;
    }
    if (outcome.endTurn) {
      endedBy = 'wrong_guess';
      break;
    }
  }

  if (!endedBy) {
    endTurn(gameId, team);
    endedBy = 'guess_limit';
  }
  log('INFO', 'deliberation', `Turn for ${team} ended: ${endedBy}`, {
    gameId,
    clue: clue.word,
    guesses: summary.guesses.map((g) => g.word),
  });
  return { ...summary, endedBy };
}

export interface PlayGameOptions extends TurnOptions {
  debate: DebateManager;
  maxTurns: number;
}

export interface GameOutcome {
  winner: TeamColor | null;
  turnsPlayed: number;
  winReason?: string;
}

/** Drives whole turns under the game's lock until someone wins or `maxTurns` is reached. */
export async function playGame(
  gameId: string,
  rosters: Record<TeamColor, TeamRoster>,
  options: PlayGameOptions,
): Promise<GameOutcome> {
  if (!getGame(gameId)) throw new GameNotFoundError(gameId);
  if (!acquireLock(gameId)) throw new GameLockedError(gameId);
  try {
    let turnsPlayed = 0;
    for (; turnsPlayed < options.maxTurns; turnsPlayed += 1) {
      const game = getGame(gameId);
      if (!game) throw new GameNotFoundError(gameId);
      if (game.winner) break;
      await playTurn(gameId, rosters[game.currentTeam], options.debate, options);
    }
    const game = getGame(gameId);
    if (!game) throw new GameNotFoundError(gameId);
    if (!game.winner) log('WARN', 'deliberation', `Stopped after ${turnsPlayed} turns without a winner`, { gameId });
    return { winner: game.winner ?? null, turnsPlayed, winReason: game.winReason };
  } finally {
    releaseLock(gameId);
  }
}
