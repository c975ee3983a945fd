import { ConfigurationError } from './errors.js';
import { shuffle, type Random } from './random.js';
import {
  type Card,
  type CardKind,
  type GameState,
  type OperativeView,
  type SpymasterView,
  type TeamColor,
} from './types.js';

export const BOARD_SIZE = 25;
export const STARTING_TEAM_CARDS = 9;
export const SECOND_TEAM_CARDS = 8;
export const NEUTRAL_CARDS = 7;
export const ASSASSIN_CARDS = 1;

export function otherTeam(team: TeamColor): TeamColor {
  return team === 'red' ? 'blue' : 'red';
}

export function normalizeWord(word: string): string {
  return word.trim().toLowerCase();
}

/** Case-insensitive de-duplication, keeping the first spelling seen. */
export function distinctWords(corpus: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of corpus) {
    const word = raw.trim();
    const key = word.toLowerCase();
    if (!word || seen.has(key)) continue;
    seen.add(key);
    result.push(word);
  }
  return result;
}

export function cardKinds(startingTeam: TeamColor): CardKind[] {
  const kinds: CardKind[] = [];
  for (let i = 0; i < STARTING_TEAM_CARDS; i += 1) kinds.push(startingTeam);
  for (let i = 0; i < SECOND_TEAM_CARDS; i += 1) kinds.push(otherTeam(startingTeam));
  for (let i = 0; i < NEUTRAL_CARDS; i += 1) kinds.push('neutral');
  for (let i = 0; i < ASSASSIN_CARDS; i += 1) kinds.push('assassin');
  return kinds;
}

/**
 * Deals a 25-card board. Words and kinds are shuffled separately with the
 * caller's generator, so the layout depends only on its seed.
 */
export function createCards(corpus: readonly string[], startingTeam: TeamColor, random: Random): Card[] {
  const pool = distinctWords(corpus);
  if (pool.length < BOARD_SIZE) {
    throw new ConfigurationError(`Word corpus needs at least ${BOARD_SIZE} distinct words, got ${pool.length}.`);
  }
  const words = shuffle(pool, random).slice(0, BOARD_SIZE);
  const kinds = shuffle(cardKinds(startingTeam), random);
  return words.map((word, index) => ({ word, kind: kinds[index], revealed: false }));
}

export function countRemaining(cards: readonly Card[], team: TeamColor): number {
  return cards.filter((card) => card.kind === team && !card.revealed).length;
}

export function findCard(cards: readonly Card[], word: string): Card | undefined {
  const key = normalizeWord(word);
  return cards.find((card) => card.word.toLowerCase() === key);
}

export function unrevealedWords(cards: ReadonlyArray<{ word: string; revealed: boolean }>): string[] {
  return cards.filter((card) => !card.revealed).map((card) => card.word);
}

// Views are rebuilt from scratch on every call and share no objects with the
// game, so a later reveal cannot change a snapshot already handed out.

export function spymasterView(game: GameState): SpymasterView {
  return {
    role: 'spymaster',
    gameId: game.id,
    cards: game.cards.map((card) => ({ word: card.word, kind: card.kind, revealed: card.revealed })),
    remaining: { ...game.remaining },
    currentTeam: game.currentTeam,
    winner: game.winner ?? null,
    turnCount: game.turnCount,
    clueHistory: game.clueHistory.map((clue) => ({ ...clue, targets: [...clue.targets] })),
    guessHistory: game.guessHistory.map((guess) => ({ ...guess })),
  };
}

export function operativeView(game: GameState): OperativeView {
  return {
    role: 'operative',
    gameId: game.id,
    cards: game.cards.map((card) => ({
      word: card.word,
      kind: card.revealed ? card.kind : null,
      revealed: card.revealed,
    })),
    remaining: { ...game.remaining },
    currentTeam: game.currentTeam,
    winner: game.winner ?? null,
    turnCount: game.turnCount,
    clueHistory: game.clueHistory.map(({ team, word, count, turn }) => ({ team, word, count, turn })),
    guessHistory: game.guessHistory.map((guess) => ({ ...guess })),
  };
}
