import cors from 'cors';
import express, { type Express, type Response } from 'express';
import { operativeView, spymasterView } from './board.js';
import { DebateManager } from './debate.js';
import { acquireLock, createRoster, fireAndForget, isLocked, playGame, playTurn, releaseLock } from './deliberation.js';
import { errorMessage, GameLockedError, GameNotFoundError, InvalidClueError } from './errors.js';
import {
  createGame,
  deleteGame,
  endTurn,
  getGame,
  listGames,
  processClue,
  processGuess,
} from './gameStore.js';
import { type LlmClient } from './llmClient.js';
import { log } from './logger.js';
import { mulberry32, seedFromClock, type Random } from './random.js';
import {
  ROLES,
  TEAMS,
  type AgentRole,
  type CreateGameInput,
  type GameState,
  type TeamColor,
  type TeamModels,
} from './types.js';

export interface AppOptions {
  debateRounds?: number;
  maxTurns?: number;
  /** Model-backed agents for autoplay; random agents are used when absent. */
  llm?: { client: LlmClient; timeoutMs: number };
  /** Server-wide model defaults; a game's own `models` take precedence. */
  teamModels?: TeamModels;
  random?: Random;
}

type Body = Record<string, unknown>;

function isBody(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readBody(body: unknown): Body {
  return isBody(body) ? body : {};
}

function parseTeam(value: unknown): TeamColor {
  if (value !== 'red' && value !== 'blue') throw new Error('Team must be red or blue.');
  return value;
}

function optionalNumber(value: unknown): number | undefined {
  return value === undefined || value === null ? undefined : Number(value);
}

function parseModels(value: unknown): TeamModels | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isBody(value)) throw new Error('models must be an object keyed by team.');
  const models: TeamModels = {};
  for (const [key, roles] of Object.entries(value)) {
    const team = parseTeam(key);
    if (!isBody(roles)) throw new Error(`models.${team} must be an object keyed by role.`);
    const entry: Partial<Record<AgentRole, string>> = {};
    for (const role of ROLES) {
      const model = roles[role];
      if (model === undefined) continue;
      if (typeof model !== 'string') throw new Error(`models.${team}.${role} must be a string.`);
      entry[role] = model;
    }
    models[team] = entry;
  }
  return models;
}

function readCreateInput(body: Body): CreateGameInput {
  return {
    redTeamSize: optionalNumber(body.redTeamSize),
    blueTeamSize: optionalNumber(body.blueTeamSize),
    seed: optionalNumber(body.seed),
    startingTeam: body.startingTeam === undefined ? undefined : parseTeam(body.startingTeam),
    models: parseModels(body.models),
  };
}

function requireGame(gameId: string): GameState {
  const game = getGame(gameId);
  if (!game) throw new GameNotFoundError(gameId);
  return game;
}

function requireUnlocked(gameId: string): void {
  if (isLocked(gameId)) throw new GameLockedError(gameId);
}

function sendError(res: Response, error: unknown): void {
  if (error instanceof GameNotFoundError) {
    res.status(404).json({ error: error.message });
  } else if (error instanceof GameLockedError) {
    res.status(409).json({ error: error.message });
  } else if (error instanceof InvalidClueError) {
    res.status(400).json({ error: error.message, reason: error.reason });
  } else {
    res.status(400).json({ error: errorMessage(error) });
  }
}

function summarize(game: GameState) {
  return {
    id: game.id,
    createdAt: game.createdAt,
    currentTeam: game.currentTeam,
    winner: game.winner ?? null,
    turnCount: game.turnCount,
    models: game.models,
  };
}

export function createApp(options: AppOptions = {}): Express {
  const random = options.random ?? mulberry32(seedFromClock());
  const debate = new DebateManager({ rounds: options.debateRounds ?? 2, random });
  const maxTurns = options.maxTurns ?? 20;
  const rosterFor = (game: GameState, team: TeamColor) =>
    createRoster(team, game.teamSizes[team], {
      random,
      llm: options.llm,
      models: { ...options.teamModels?.[team], ...game.models[team] },
    });

  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/api/games', (_req, res) => {
    res.json(listGames().map(summarize));
  });

  app.post('/api/games', (req, res) => {
    try {
      const game = createGame(readCreateInput(readBody(req.body)));
      res.status(201).json(operativeView(game));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/games/:gameId', (req, res) => {
    try {
      const game = requireGame(req.params.gameId);
      const view = req.query.view ?? 'operative';
      if (view === 'spymaster') {
        res.json(spymasterView(game));
      } else if (view === 'operative') {
        res.json(operativeView(game));
      } else {
        res.status(400).json({ error: 'view must be spymaster or operative.' });
      }
    } catch (error) {
      sendError(res, error);
    }
  });

  app.delete('/api/games/:gameId', (req, res) => {
    try {
      requireGame(req.params.gameId);
      requireUnlocked(req.params.gameId);
      deleteGame(req.params.gameId);
      res.status(204).end();
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/games/:gameId/clue', (req, res) => {
    try {
      const body = readBody(req.body);
      const team = parseTeam(body.team);
      const game = requireGame(req.params.gameId);
      requireUnlocked(game.id);
      const word = typeof body.word === 'string' ? body.word : '';
      const targets =
        Array.isArray(body.targets) && body.targets.every((t): t is string => typeof t === 'string') ? body.targets : [];
      processClue(game.id, word, targets, team);
      res.json(spymasterView(game));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/games/:gameId/guess', (req, res) => {
    try {
      const body = readBody(req.body);
      const team = parseTeam(body.team);
      const game = requireGame(req.params.gameId);
      requireUnlocked(game.id);
      const result = processGuess(game.id, typeof body.word === 'string' ? body.word : '', team);
      res.status(result.success ? 200 : 400).json(result);
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/games/:gameId/end-turn', (req, res) => {
    try {
      const team = parseTeam(readBody(req.body).team);
      const game = requireGame(req.params.gameId);
      requireUnlocked(game.id);
      if (!endTurn(game.id, team)) {
        res.status(400).json({ error: game.winner ? 'Game is over.' : 'Not your turn.' });
        return;
      }
      res.json(operativeView(game));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/games/:gameId/teams/:team/autoplay', (req, res) => {
    try {
      const team = parseTeam(req.params.team);
      const game = requireGame(req.params.gameId);
      if (game.winner) throw new Error('Game is over.');
      if (game.currentTeam !== team) throw new Error('Not your turn.');
      if (!acquireLock(game.id)) throw new GameLockedError(game.id);
      res.status(202).json({ status: 'started', gameId: game.id, team });
      fireAndForget(async () => {
        try {
          const summary = await playTurn(game.id, rosterFor(game, team), debate);
          log('INFO', 'autoplay', `Turn finished: ${summary.endedBy}`, { gameId: game.id, team });
        } finally {
          releaseLock(game.id);
        }
      }, 'autoplay');
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/api/games/:gameId/autoplay', (req, res) => {
    try {
      const game = requireGame(req.params.gameId);
      if (game.winner) throw new Error('Game is over.');
      requireUnlocked(game.id);
      const rosters = { red: rosterFor(game, 'red'), blue: rosterFor(game, 'blue') };
      res.status(202).json({ status: 'started', gameId: game.id, teams: TEAMS });
      fireAndForget(async () => {
        const outcome = await playGame(game.id, rosters, { debate, maxTurns });
        log('INFO', 'autoplay', 'Game autoplay finished', { gameId: game.id, ...outcome });
      }, 'autoplay');
    } catch (error) {
      sendError(res, error);
    }
  });

  return app;
}
