import { beforeAll, describe, it, expect } from 'vitest';
import { countRemaining, otherTeam, unrevealedWords } from './board.js';
import { ConfigurationError, InvalidClueError } from './errors.js';
import {
  createGame,
  createGameFromCards,
  deleteGame,
  endTurn,
  getGame,
  getPhase,
  listGames,
  MAX_SEED,
  processClue,
  processGuess,
  validateClue,
} from './gameStore.js';
import { setLogLevel } from './logger.js';
import { mulberry32, pick } from './random.js';
import { TEAMS, type ClueRejection, type GameState, type TeamColor } from './types.js';

const corpus = Array.from({ length: 30 }, (_, i) => `term${i}`);

function fiveCardGame(): GameState {
  return createGameFromCards({
    startingTeam: 'red',
    cards: [
      { word: 'RedA', kind: 'red', revealed: false },
      { word: 'RedB', kind: 'red', revealed: false },
      { word: 'Blue', kind: 'blue', revealed: false },
      { word: 'Neutral', kind: 'neutral', revealed: false },
      { word: 'Assassin', kind: 'assassin', revealed: false },
    ],
  });
}

beforeAll(() => {
  setLogLevel('ERROR');
});

describe('createGame', () => {
  it('builds the same board and starting team from the same seed', () => {
    const a = createGame({ seed: 42, words: corpus });
    const b = createGame({ seed: 42, words: corpus });
    expect(a.id).not.toBe(b.id);
    expect(b.cards).toEqual(a.cards);
    expect(b.startingTeam).toBe(a.startingTeam);
  });

  it('starts with the starting team to move and 9/8 words left', () => {
    const game = createGame({ seed: 7, words: corpus, startingTeam: 'blue' });
    expect(game.startingTeam).toBe('blue');
    expect(game.currentTeam).toBe('blue');
    expect(game.remaining).toEqual({ blue: 9, red: 8 });
    expect(game.turnCount).toBe(0);
    expect(game.randomSeed).toBe(7);
    expect(game.teamSizes).toEqual({ red: 2, blue: 2 });
    expect(getPhase(game)).toEqual({ phase: 'clue', team: 'blue' });
  });

  it('rejects a non-positive team size', () => {
    expect(() => createGame({ redTeamSize: 0, words: corpus })).toThrow(ConfigurationError);
    expect(() => createGame({ blueTeamSize: -1, words: corpus })).toThrow(
      'Team blue size must be a positive integer, got -1.',
    );
  });

  it('rejects a fractional seed', () => {
    expect(() => createGame({ seed: 1.5, words: corpus })).toThrow(
      'Seed must be an integer from 0 to 4294967295, got 1.5.',
    );
  });

  it('rejects seeds outside the uint32 range', () => {
    expect(() => createGame({ seed: 2 ** 32 + 5, words: corpus })).toThrow(ConfigurationError);
    expect(() => createGame({ seed: -1, words: corpus })).toThrow(
      'Seed must be an integer from 0 to 4294967295, got -1.',
    );
    expect(createGame({ seed: MAX_SEED, words: corpus }).randomSeed).toBe(MAX_SEED);
  });

  it('rejects a corpus that is too small', () => {
    expect(() => createGame({ words: corpus.slice(0, 10) })).toThrow(ConfigurationError);
  });

  it('uses the bundled word pool by default', () => {
    const game = createGame({ seed: 3 });
    expect(game.cards).toHaveLength(25);
  });
});

describe('registry', () => {
  it('lists, looks up and deletes games', () => {
    const game = fiveCardGame();
    expect(getGame(game.id)).toBe(game);
    expect(listGames()).toContain(game);
    expect(deleteGame(game.id)).toBe(true);
    expect(getGame(game.id)).toBeUndefined();
    expect(deleteGame(game.id)).toBe(false);
  });

  it('refuses a duplicate id', () => {
    const game = fiveCardGame();
    expect(() =>
      createGameFromCards({ id: game.id, startingTeam: 'red', cards: game.cards }),
    ).toThrow(`Game id ${game.id} is already registered.`);
  });
});

describe('validateClue', () => {
  it('accepts a single off-board word with distinct board targets', () => {
    expect(validateClue(fiveCardGame(), 'colour', ['RedA', 'RedB'], 'red')).toEqual({ valid: true });
  });

  const rejections: Array<[unknown, unknown, TeamColor, ClueRejection]> = [
    ['', ['RedA'], 'red', 'invalid_input'],
    ['colour', [], 'red', 'invalid_input'],
    ['colour', ['RedA', 3], 'red', 'invalid_input'],
    ['colour', ['RedA'], 'blue', 'not_your_turn'],
    ['two words', ['RedA'], 'red', 'not_single_word'],
    ['reda', ['RedB'], 'red', 'word_on_board'],
    ['colour', ['RedA', 'Ghost'], 'red', 'unknown_target'],
    ['colour', ['RedA', 'reda'], 'red', 'duplicate_target'],
  ];

  it.each(rejections)('rejects word=%j targets=%j team=%s with %s', (word, targets, team, reason) => {
    const result = validateClue(fiveCardGame(), word, targets, team);
    expect(result.valid).toBe(false);
    if (!result.valid) expect(result.reason).toBe(reason);
  });

  it('names the offending target', () => {
    expect(validateClue(fiveCardGame(), 'colour', ['RedA', 'Ghost'], 'red')).toEqual({
      valid: false,
      reason: 'unknown_target',
      message: '"Ghost" is not on the board.',
    });
  });

  it('reports game_over once a team has won', () => {
    const game = fiveCardGame();
    processGuess(game.id, 'Assassin', 'red');
    const result = validateClue(game, 'colour', ['RedA'], 'red');
    expect(result.valid).toBe(false);
    if (!result.valid) expect(result.reason).toBe('game_over');
  });
});

describe('processClue', () => {
  it('records the clue and opens the guess phase', () => {
    const game = fiveCardGame();
    expect(processClue(game.id, 'Colour', ['reda', 'RedB'], 'red')).toBe(true);
    const clue = { team: 'red', word: 'colour', count: 2, targets: ['RedA', 'RedB'], turn: 0 };
    expect(game.activeClue).toEqual(clue);
    expect(game.clueHistory).toEqual([clue]);
    expect(getPhase(game)).toEqual({ phase: 'guess', team: 'red', clue });
  });

  it('throws with the rejection reason and records nothing', () => {
    const game = fiveCardGame();
    let caught: unknown;
    try {
      processClue(game.id, 'Neutral', ['RedA'], 'red');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidClueError);
    if (caught instanceof InvalidClueError) expect(caught.reason).toBe('word_on_board');
    expect(game.clueHistory).toEqual([]);
    expect(game.activeClue).toBeUndefined();
  });

  it('returns false for an unknown game', () => {
    expect(processClue('missing', 'colour', ['RedA'], 'red')).toBe(false);
  });
});

describe('processGuess', () => {
  it('wins for red when both red words are found', () => {
    const game = fiveCardGame();
    processClue(game.id, 'colour', ['RedA', 'RedB'], 'red');

    expect(processGuess(game.id, 'RedA', 'red')).toEqual({
      success: true,
      kind: 'red',
      endTurn: false,
      gameOver: false,
    });
    expect(game.remaining.red).toBe(1);
    expect(game.currentTeam).toBe('red');
    expect(game.turnCount).toBe(0);

    expect(processGuess(game.id, 'redb', 'red')).toEqual({
      success: true,
      kind: 'red',
      endTurn: true,
      gameOver: true,
      winner: 'red',
    });
    expect(game.remaining.red).toBe(0);
    expect(getPhase(game)).toEqual({ phase: 'over', winner: 'red' });
  });

  it('hands the game to the other team on the assassin', () => {
    const game = fiveCardGame();
    expect(processGuess(game.id, 'Assassin', 'red')).toEqual({
      success: true,
      kind: 'assassin',
      endTurn: true,
      gameOver: true,
      winner: 'blue',
    });
    expect(game.winReason).toBe('red revealed the assassin');
  });

  it('accepts nothing after the game is over', () => {
    const game = fiveCardGame();
    processGuess(game.id, 'Assassin', 'red');
    expect(processGuess(game.id, 'RedA', 'red')).toEqual({ success: false, endTurn: false, error: 'Game is over.' });
    expect(processGuess(game.id, 'RedA', 'blue')).toEqual({ success: false, endTurn: false, error: 'Game is over.' });
    expect(endTurn(game.id, 'red')).toBe(false);
    expect(game.cards[0].revealed).toBe(false);
  });

  it('passes the turn on a neutral card', () => {
    const game = fiveCardGame();
    processClue(game.id, 'colour', ['RedA'], 'red');
    expect(processGuess(game.id, 'Neutral', 'red')).toEqual({
      success: true,
      kind: 'neutral',
      endTurn: true,
      gameOver: false,
    });
    expect(game.currentTeam).toBe('blue');
    expect(game.turnCount).toBe(1);
    expect(game.activeClue).toBeUndefined();
    expect(getPhase(game)).toEqual({ phase: 'clue', team: 'blue' });
  });

  it('gives the win to the other team when its last word is revealed', () => {
    const game = fiveCardGame();
    expect(processGuess(game.id, 'Blue', 'red')).toEqual({
      success: true,
      kind: 'blue',
      endTurn: true,
      gameOver: true,
      winner: 'blue',
    });
    expect(game.remaining).toEqual({ red: 2, blue: 0 });
  });

  it('records each reveal in the guess history', () => {
    const game = fiveCardGame();
    processGuess(game.id, 'reda', 'red');
    expect(game.guessHistory).toEqual([{ team: 'red', word: 'RedA', kind: 'red', correct: true, turn: 0 }]);
  });

  it('leaves the game untouched on every failure', () => {
    const game = fiveCardGame();
    processGuess(game.id, 'RedA', 'red');
    const before = structuredClone(game);

    expect(processGuess(game.id, 'RedA', 'red')).toEqual({
      success: false,
      endTurn: false,
      error: '"RedA" was already revealed.',
    });
    expect(processGuess(game.id, 'Ghost', 'red')).toEqual({
      success: false,
      endTurn: false,
      error: '"Ghost" is not on the board.',
    });
    expect(processGuess(game.id, 'RedB', 'blue')).toEqual({ success: false, endTurn: false, error: 'Not your turn.' });
    expect(processGuess(game.id, '  ', 'red')).toEqual({
      success: false,
      endTurn: false,
      error: 'Guess must include a word.',
    });
    expect(game).toEqual(before);
  });

  it('reports an unknown game', () => {
    expect(processGuess('missing', 'RedA', 'red')).toEqual({
      success: false,
      endTurn: false,
      error: 'Game not found.',
    });
  });
});

describe('endTurn', () => {
  it('alternates teams and counts turns', () => {
    const game = fiveCardGame();
    expect(endTurn(game.id, 'red')).toBe(true);
    expect(game.currentTeam).toBe('blue');
    expect(game.turnCount).toBe(1);
    expect(endTurn(game.id, 'red')).toBe(false);
    expect(endTurn(game.id, 'blue')).toBe(true);
    expect(game.currentTeam).toBe('red');
    expect(game.turnCount).toBe(2);
  });

  it('returns false for an unknown game', () => {
    expect(endTurn('missing', 'red')).toBe(false);
  });
});

describe('random play', () => {
  it('keeps every turn and end-of-game rule on seeded boards', () => {
    for (let seed = 1; seed <= 20; seed += 1) {
      const game = createGame({ seed, words: corpus });
      const random = mulberry32(seed * 31);
      let guesses = 0;
      while (!game.winner) {
        const guesser = game.currentTeam;
        const turnBefore = game.turnCount;
        const word = pick(unrevealedWords(game.cards), random);
        const result = processGuess(game.id, word, guesser);
        guesses += 1;
        expect(result.success).toBe(true);
        expect(game.remaining.red).toBe(countRemaining(game.cards, 'red'));
        expect(game.remaining.blue).toBe(countRemaining(game.cards, 'blue'));

        const switched = result.endTurn && !result.gameOver;
        expect(game.currentTeam).toBe(switched ? otherTeam(guesser) : guesser);
        expect(game.turnCount).toBe(switched ? turnBefore + 1 : turnBefore);
        if (result.kind === 'assassin') {
          expect(result.gameOver).toBe(true);
          expect(game.winner).toBe(otherTeam(guesser));
        }
      }
      expect(guesses).toBeLessThanOrEqual(25);
      expect(game.activeClue).toBeUndefined();

      const finished = structuredClone(game);
      const leftover = unrevealedWords(game.cards);
      for (const team of TEAMS) {
        if (leftover.length) expect(processGuess(game.id, leftover[0], team).success).toBe(false);
        expect(endTurn(game.id, team)).toBe(false);
      }
      expect(game).toEqual(finished);
    }
  });

  it('ends the game on the assassin whatever the remaining counts', () => {
    for (let seed = 1; seed <= 10; seed += 1) {
      const game = createGame({ seed, words: corpus });
      const random = mulberry32(seed);
      const guesser = game.currentTeam;
      const safe = game.cards.filter((card) => card.kind === guesser).slice(0, Math.floor(random() * 8));
      for (const card of safe) processGuess(game.id, card.word, guesser);

      const assassin = game.cards.find((card) => card.kind === 'assassin');
      expect(assassin).toBeDefined();
      if (!assassin) continue;
      const result = processGuess(game.id, assassin.word, guesser);
      expect(result).toEqual({
        success: true,
        kind: 'assassin',
        endTurn: true,
        gameOver: true,
        winner: otherTeam(guesser),
      });
      expect(game.remaining[guesser]).toBe(9 - safe.length);
      expect(game.remaining[otherTeam(guesser)]).toBe(8);
    }
  });
});
