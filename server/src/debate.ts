import { errorMessage } from './errors.js';
import { log } from './logger.js';
import { extractPreference } from './parsing.js';
import { mulberry32, seedFromClock, type Random } from './random.js';
import {
  END_TURN,
  type DebateClue,
  type DebateEntry,
  type DebateResult,
  type GuessRecord,
  type OperativeAgent,
  type OperativeView,
} from './types.js';

export interface DebateOptions {
  /** Total rounds including the proposal round; at least 1. */
  rounds?: number;
  /** Seed for the tie-break generator. Ignored when `random` is given. */
  seed?: number;
  random?: Random;
  /** Upper bound on concurrent proposal calls in round 1. */
  concurrency?: number;
}

export interface DebateInput {
  agents: readonly OperativeAgent[];
  view: OperativeView;
  clue: DebateClue;
  correctSoFar: number;
  history: readonly GuessRecord[];
}

// Each agent call gets its own copy of the view, so one agent can never see
// another's mutations.
function snapshot(view: OperativeView): OperativeView {
  return structuredClone(view);
}

async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const run = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await worker(items[index], index);
    }
  };
  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, run));
  return results;
}

export class DebateManager {
  readonly rounds: number;
  private readonly random: Random;
  private readonly concurrency: number;

  constructor(options: DebateOptions = {}) {
    this.rounds = Math.max(1, Math.floor(options.rounds ?? 2));
    this.random = options.random ?? mulberry32(options.seed ?? seedFromClock());
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 4));
  }

  async runDebate(input: DebateInput): Promise<DebateResult> {
    const { agents, view, clue } = input;
    const transcript: DebateEntry[] = [];
    log('INFO', 'debate', `Starting debate on "${clue.word}" (${clue.count})`, {
      gameId: view.gameId,
      agents: agents.map((agent) => agent.id),
      rounds: this.rounds,
    });

    const proposals = await mapWithConcurrency(agents, this.concurrency, (agent) =>
      this.propose(agent, input),
    );
    proposals.forEach((entry) => transcript.push(entry));

    for (let round = 2; round <= this.rounds; round += 1) {
      for (const agent of agents) {
        transcript.push(await this.discuss(agent, round, transcript, view, clue));
      }
    }

    const options = this.collectOptions(transcript);
    const votes: string[] = [];
    for (const agent of agents) {
      votes.push(await this.vote(agent, transcript, options, view, clue));
    }

    const voteCounts: Record<string, number> = {};
    for (const vote of votes) voteCounts[vote] = (voteCounts[vote] ?? 0) + 1;
    const finalDecision = this.tally(voteCounts);
    const reasoningExcerpt = transcript.filter((entry) => entry.preference === finalDecision).slice(0, 2);

    log('INFO', 'debate', `Final decision: ${finalDecision}`, { gameId: view.gameId, voteCounts });
    return { finalDecision, options, voteCounts, transcript, reasoningExcerpt };
  }

  private async propose(agent: OperativeAgent, input: DebateInput): Promise<DebateEntry> {
    const { view, clue } = input;
    try {
      const { guess, reasoning } = await agent.generateGuess(
        snapshot(view),
        clue.word,
        clue.count,
        input.correctSoFar,
        input.history,
      );
      const message = `I suggest we guess '${guess}'. My reasoning: ${reasoning}`;
      const normalized = guess.trim().toLowerCase();
      const unrevealed = view.cards.filter((card) => !card.revealed).map((card) => card.word.toLowerCase());
      const preference =
        normalized === END_TURN || unrevealed.includes(normalized) ? normalized : this.preferenceFrom(message, view);
      return { round: 1, agentId: agent.id, message, preference };
    } catch (err) {
      log('WARN', 'debate', `Proposal from ${agent.id} failed`, { error: errorMessage(err) });
      return { round: 1, agentId: agent.id, message: '' };
    }
  }

  private async discuss(
    agent: OperativeAgent,
    round: number,
    transcript: readonly DebateEntry[],
    view: OperativeView,
    clue: DebateClue,
  ): Promise<DebateEntry> {
    try {
      const message = await agent.debateContribution([...transcript], snapshot(view), clue);
      return { round, agentId: agent.id, message, preference: this.preferenceFrom(message, view) };
    } catch (err) {
      log('WARN', 'debate', `Discussion from ${agent.id} failed`, { round, error: errorMessage(err) });
      return { round, agentId: agent.id, message: '' };
    }
  }

  private async vote(
    agent: OperativeAgent,
    transcript: readonly DebateEntry[],
    options: readonly string[],
    view: OperativeView,
    clue: DebateClue,
  ): Promise<string> {
    try {
      const raw = await agent.finalVote([...transcript], options, snapshot(view), clue);
      const vote = options.find((option) => option === raw.trim().toLowerCase());
      if (vote) return vote;
      log('WARN', 'debate', `Vote from ${agent.id} is not an option, counting it for "${END_TURN}"`, { vote: raw });
    } catch (err) {
      log('WARN', 'debate', `Vote from ${agent.id} failed, counting it for "${END_TURN}"`, { error: errorMessage(err) });
    }
    return END_TURN;
  }

  private preferenceFrom(message: string, view: OperativeView): string | undefined {
    const parsed = extractPreference(message, view.cards);
    return parsed.ok ? parsed.value : undefined;
  }

  private collectOptions(transcript: readonly DebateEntry[]): string[] {
    const options = new Set<string>([END_TURN]);
    for (const entry of transcript) {
      if (entry.preference) options.add(entry.preference);
    }
    return [...options].sort();
  }

  /** Highest count wins; a tie is settled by the manager's generator over the sorted tied set. */
  private tally(voteCounts: Record<string, number>): string {
    const entries = Object.entries(voteCounts);
    if (entries.length === 0) return END_TURN;
    const best = Math.max(...entries.map(([, count]) => count));
    const tied = entries
      .filter(([, count]) => count === best)
      .map(([option]) => option)
      .sort();
    if (tied.length === 1) return tied[0];
    const choice = tied[Math.floor(this.random() * tied.length)];
    log('INFO', 'debate', `Tie between ${tied.join(', ')}, picked "${choice}"`);
    return choice;
  }
}
