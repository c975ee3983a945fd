import { randomUUID } from 'node:crypto';
import {
  countRemaining,
  createCards,
  findCard,
  normalizeWord,
  otherTeam,
} from './board.js';
import { ConfigurationError, InvalidClueError } from './errors.js';
import { log } from './logger.js';
import { mulberry32, seedFromClock } from './random.js';
import { WORD_POOL } from './words.js';
import {
  ROLES,
  TEAMS,
  type AgentRole,
  type Card,
  type ClueRecord,
  type ClueRejection,
  type ClueValidation,
  type CreateGameInput,
  type GamePhase,
  type GameState,
  type GuessResult,
  type TeamColor,
  type TeamModels,
} from './types.js';

// One writer per game id: callers that can interleave (HTTP handlers, the
// autoplay driver) must hold the game's lock from deliberation.ts.
const games = new Map<string, GameState>();

/** Seeds are uint32; the generator would fold anything wider onto this range. */
export const MAX_SEED = 0xffffffff;

function nowIso(): string {
  return new Date().toISOString();
}

function assertTeamSize(team: TeamColor, size: number): void {
  if (!Number.isInteger(size) || size < 1) {
    throw new ConfigurationError(`Team ${team} size must be a positive integer, got ${size}.`);
  }
}

function cleanModels(models: TeamModels = {}): TeamModels {
  const cleaned: TeamModels = {};
  for (const team of TEAMS) {
    const roles: Partial<Record<AgentRole, string>> = {};
    for (const role of ROLES) {
      const model = models[team]?.[role]?.trim();
      if (model) roles[role] = model;
    }
    if (Object.keys(roles).length) cleaned[team] = roles;
  }
  return cleaned;
}

function register(game: GameState): GameState {
  if (games.has(game.id)) throw new Error(`Game id ${game.id} is already registered.`);
  games.set(game.id, game);
  return game;
}

export function createGame(input: CreateGameInput = {}): GameState {
  const teamSizes = { red: input.redTeamSize ?? 2, blue: input.blueTeamSize ?? 2 };
  assertTeamSize('red', teamSizes.red);
  assertTeamSize('blue', teamSizes.blue);

  const seed = input.seed ?? seedFromClock();
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new ConfigurationError(`Seed must be an integer from 0 to ${MAX_SEED}, got ${seed}.`);
  }
  const random = mulberry32(seed);

  const startingTeam: TeamColor = input.startingTeam ?? (random() < 0.5 ? 'red' : 'blue');
  const cards = createCards(input.words ?? WORD_POOL, startingTeam, random);

  const game = register({
    id: randomUUID(),
    createdAt: nowIso(),
    cards,
    remaining: { red: countRemaining(cards, 'red'), blue: countRemaining(cards, 'blue') },
    startingTeam,
    currentTeam: startingTeam,
    turnCount: 0,
    clueHistory: [],
    guessHistory: [],
    randomSeed: seed,
    teamSizes,
    models: cleanModels(input.models),
  });
  log('INFO', 'gameStore', 'Created game', { gameId: game.id, seed, startingTeam, models: game.models });
  return game;
}

/**
 * Registers a game over a hand-built board. Cards are copied; remaining
 * counts come from the unrevealed cards of each team.
 */
export function createGameFromCards(input: {
  cards: readonly Card[];
  startingTeam: TeamColor;
  id?: string;
  seed?: number;
}): GameState {
  const cards = input.cards.map((card) => ({ ...card }));
  return register({
    id: input.id ?? randomUUID(),
    createdAt: nowIso(),
    cards,
    remaining: { red: countRemaining(cards, 'red'), blue: countRemaining(cards, 'blue') },
    startingTeam: input.startingTeam,
    currentTeam: input.startingTeam,
    turnCount: 0,
    clueHistory: [],
    guessHistory: [],
    randomSeed: input.seed ?? 0,
    teamSizes: { red: 1, blue: 1 },
    models: {},
  });
}

export function getGame(gameId: string): GameState | undefined {
  return games.get(gameId);
}

export function listGames(): GameState[] {
  return [...games.values()];
}

export function deleteGame(gameId: string): boolean {
  return games.delete(gameId);
}

export function getPhase(game: GameState): GamePhase {
  if (game.winner) return { phase: 'over', winner: game.winner };
  if (game.activeClue && game.activeClue.team === game.currentTeam) {
    return { phase: 'guess', team: game.currentTeam, clue: game.activeClue };
  }
  return { phase: 'clue', team: game.currentTeam };
}

// --- Clues ---

function reject(reason: ClueRejection, message: string): ClueValidation {
  return { valid: false, reason, message };
}

/** Side-effect free; checks run in a fixed order and the first failure wins. */
export function validateClue(game: GameState, word: unknown, targets: unknown, team: TeamColor): ClueValidation {
  if (typeof word !== 'string' || !word.trim()) return reject('invalid_input', 'Clue must include a word.');
  if (!Array.isArray(targets) || targets.length === 0) {
    return reject('invalid_input', 'Clue must name at least one target word.');
  }
  if (!targets.every((t): t is string => typeof t === 'string' && t.trim().length > 0)) {
    return reject('invalid_input', 'Target words must be non-empty strings.');
  }
  if (game.currentTeam !== team) return reject('not_your_turn', 'Not your turn.');
  if (game.winner) return reject('game_over', 'Game is over.');

  const clueWord = word.trim();
  if (/\s/.test(clueWord)) return reject('not_single_word', 'Clue must be a single word.');
  if (findCard(game.cards, clueWord)) return reject('word_on_board', 'Clue cannot be a word on the board.');

  const seen = new Set<string>();
  for (const target of targets) {
    if (!findCard(game.cards, target)) return reject('unknown_target', `"${target}" is not on the board.`);
  }
  for (const target of targets) {
    const key = normalizeWord(target);
    if (seen.has(key)) return reject('duplicate_target', `"${target}" is listed more than once.`);
    seen.add(key);
  }
  return { valid: true };
}

/**
 * Records a spymaster clue for the current turn. Returns false for an unknown
 * game and throws InvalidClueError when validation fails.
 */
export function processClue(gameId: string, word: string, targets: readonly string[], team: TeamColor): boolean {
  const game = games.get(gameId);
  if (!game) return false;

  const validation = validateClue(game, word, targets, team);
  if (!validation.valid) throw new InvalidClueError(validation.reason, validation.message);

  const clue: ClueRecord = {
    team,
    word: normalizeWord(word),
    count: targets.length,
    targets: targets.map((target) => findCard(game.cards, target)?.word ?? target.trim()),
    turn: game.turnCount,
  };
  game.clueHistory.push(clue);
  game.activeClue = clue;
  log('INFO', 'gameStore', 'Clue accepted', { gameId, team, word: clue.word, count: clue.count });
  return true;
}

// --- Guesses ---

function advanceTurn(game: GameState): void {
  game.turnCount += 1;
  game.currentTeam = otherTeam(game.currentTeam);
  game.activeClue = undefined;
}

function finishGame(game: GameState, winner: TeamColor, reason: string): void {
  game.winner = winner;
  game.winReason = reason;
  game.activeClue = undefined;
  log('INFO', 'gameStore', `Game over, ${winner} wins`, { gameId: game.id, reason });
}

function guessFailure(error: string): GuessResult {
  return { success: false, endTurn: false, error };
}

function resolveGuess(game: GameState, team: TeamColor, card: Card): GuessResult {
  const enemy = otherTeam(team);
  card.revealed = true;
  game.guessHistory.push({
    team,
    word: card.word,
    kind: card.kind,
    correct: card.kind === team,
    turn: game.turnCount,
  });

  let turnOver = true;
  if (card.kind === 'assassin') {
    finishGame(game, enemy, `${team} revealed the assassin`);
  } else if (card.kind === team) {
    game.remaining[team] -= 1;
    if (game.remaining[team] === 0) {
      finishGame(game, team, `${team} found all their words`);
    } else {
      turnOver = false;
    }
  } else if (card.kind === enemy) {
    game.remaining[enemy] -= 1;
    if (game.remaining[enemy] === 0) finishGame(game, enemy, `All ${enemy} words were revealed`);
  }

  if (game.winner) {
    return { success: true, kind: card.kind, endTurn: true, gameOver: true, winner: game.winner };
  }
  if (turnOver) advanceTurn(game);
  return { success: true, kind: card.kind, endTurn: turnOver, gameOver: false };
}

/**
 * Reveals the unrevealed card matching `word` (case-insensitive). Failures
 * come back as `success: false` and leave the game untouched.
 */
export function processGuess(gameId: string, word: string, team: TeamColor): GuessResult {
  const game = games.get(gameId);
  if (!game) return guessFailure('Game not found.');
  if (game.winner) return guessFailure('Game is over.');
  if (game.currentTeam !== team) return guessFailure('Not your turn.');
  if (typeof word !== 'string' || !word.trim()) return guessFailure('Guess must include a word.');

  const card = findCard(game.cards, word);
  if (!card) return guessFailure(`"${word.trim()}" is not on the board.`);
  if (card.revealed) return guessFailure(`"${card.word}" was already revealed.`);

  const result = resolveGuess(game, team, card);
  log('INFO', 'gameStore', `Revealed "${card.word}" -> ${card.kind}`, { gameId, team, endTurn: result.endTurn });
  return result;
}

export function endTurn(gameId: string, team: TeamColor): boolean {
  const game = games.get(gameId);
  if (!game || game.winner || game.currentTeam !== team) return false;
  advanceTurn(game);
  log('INFO', 'gameStore', 'Turn ended', { gameId, team, turnCount: game.turnCount });
  return true;
}
