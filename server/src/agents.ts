import { unrevealedWords } from './board.js';
import { errorMessage } from './errors.js';
import { log } from './logger.js';
import { pick, type Random } from './random.js';
import { withTimeout } from './timeout.js';
import {
  END_TURN,
  type ClueProposal,
  type DebateClue,
  type DebateEntry,
  type GuessProposal,
  type GuessRecord,
  type OperativeAgent,
  type OperativeView,
  type SpymasterAgent,
  type SpymasterView,
} from './types.js';

const FALLBACK_CLUE_WORDS = ['hint', 'idea', 'thing', 'maybe', 'something', 'anything'];

export function fallbackGuess(view: OperativeView, random: Random): string {
  const words = unrevealedWords(view.cards);
  return words.length ? pick(words, random).toLowerCase() : END_TURN;
}

function fillerWord(board: ReadonlySet<string>): string {
  const filler = FALLBACK_CLUE_WORDS.find((candidate) => !board.has(candidate));
  if (filler) return filler;
  let n = 1;
  while (board.has(`clue${n}`)) n += 1;
  return `clue${n}`;
}

/**
 * A clue that always passes validation: a filler word not on the board,
 * aimed at one random unrevealed card of the team to move.
 */
export function fallbackClue(view: SpymasterView, random: Random): ClueProposal {
  const board = new Set(view.cards.map((card) => card.word.toLowerCase()));
  const word = fillerWord(board);
  const own = view.cards.filter((card) => card.kind === view.currentTeam && !card.revealed);
  const pool = own.length ? own : view.cards.filter((card) => !card.revealed);
  return { word, targets: pool.length ? [pick(pool, random).word] : [view.cards[0].word] };
}

export interface GuardOptions {
  timeoutMs: number;
  random: Random;
}

/**
 * Wraps an operative so every call is bounded by a timeout and never throws:
 * failures become a random unrevealed word, an empty message, or an `end` vote.
 */
export class GuardedOperative implements OperativeAgent {
  constructor(
    private readonly inner: OperativeAgent,
    private readonly options: GuardOptions,
  ) {}

  get id(): string {
    return this.inner.id;
  }

  async generateGuess(
    view: OperativeView,
    clueWord: string,
    clueCount: number,
    correctSoFar: number,
    history: readonly GuessRecord[],
  ): Promise<GuessProposal> {
    try {
      return await withTimeout(
        this.inner.generateGuess(view, clueWord, clueCount, correctSoFar, history),
        this.options.timeoutMs,
        `${this.id} guess`,
      );
    } catch (err) {
      const guess = fallbackGuess(view, this.options.random);
      log('WARN', 'agents', `Guess from ${this.id} failed, using "${guess}"`, { error: errorMessage(err) });
      return { guess, reasoning: 'No answer in time; picked an unrevealed word at random.' };
    }
  }

  async debateContribution(transcript: readonly DebateEntry[], view: OperativeView, clue: DebateClue): Promise<string> {
    try {
      return await withTimeout(
        this.inner.debateContribution(transcript, view, clue),
        this.options.timeoutMs,
        `${this.id} discussion`,
      );
    } catch (err) {
      log('WARN', 'agents', `Discussion from ${this.id} failed`, { error: errorMessage(err) });
      return '';
    }
  }

  async finalVote(
    transcript: readonly DebateEntry[],
    options: readonly string[],
    view: OperativeView,
    clue: DebateClue,
  ): Promise<string> {
    try {
      const vote = await withTimeout(
        this.inner.finalVote(transcript, options, view, clue),
        this.options.timeoutMs,
        `${this.id} vote`,
      );
      if (options.includes(vote)) return vote;
      log('WARN', 'agents', `Vote "${vote}" from ${this.id} is not an option`, { options });
    } catch (err) {
      log('WARN', 'agents', `Vote from ${this.id} failed`, { error: errorMessage(err) });
    }
    return END_TURN;
  }
}

export class GuardedSpymaster implements SpymasterAgent {
  constructor(
    private readonly inner: SpymasterAgent,
    private readonly options: GuardOptions,
  ) {}

  get id(): string {
    return this.inner.id;
  }

  async generateClue(view: SpymasterView, rejected?: readonly string[]): Promise<ClueProposal> {
    try {
      return await withTimeout(this.inner.generateClue(view, rejected), this.options.timeoutMs, `${this.id} clue`);
    } catch (err) {
      const clue = fallbackClue(view, this.options.random);
      log('WARN', 'agents', `Clue from ${this.id} failed, using "${clue.word}"`, { error: errorMessage(err) });
      return clue;
    }
  }
}

/** Plays without a model: random own-card clues and random guesses. */
export class RandomSpymaster implements SpymasterAgent {
  constructor(
    readonly id: string,
    private readonly random: Random,
  ) {}

  async generateClue(view: SpymasterView): Promise<ClueProposal> {
    return fallbackClue(view, this.random);
  }
}

export class RandomOperative implements OperativeAgent {
  private lastGuess: string = END_TURN;

  constructor(
    readonly id: string,
    private readonly random: Random,
  ) {}

  async generateGuess(view: OperativeView): Promise<GuessProposal> {
    this.lastGuess = fallbackGuess(view, this.random);
    return { guess: this.lastGuess, reasoning: 'Picked an unrevealed word at random.' };
  }

  async debateContribution(): Promise<string> {
    return this.lastGuess === END_TURN ? "Let's end the turn." : `I still like '${this.lastGuess}'.`;
  }

  async finalVote(_transcript: readonly DebateEntry[], options: readonly string[]): Promise<string> {
    return options.includes(this.lastGuess) ? this.lastGuess : END_TURN;
  }
}
