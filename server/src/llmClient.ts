import { fallbackClue, fallbackGuess } from './agents.js';
import { otherTeam, unrevealedWords } from './board.js';
import { log } from './logger.js';
import { extractJson, matchVote, parseClueResponse, parseGuessResponse } from './parsing.js';
import { type Random } from './random.js';
import {
  END_TURN,
  type ClueProposal,
  type DebateClue,
  type DebateEntry,
  type GuessProposal,
  type GuessRecord,
  type LlmConfig,
  type OperativeAgent,
  type OperativeView,
  type SpymasterAgent,
  type SpymasterView,
  type TeamColor,
} from './types.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const GAME_RULES = `## Codenames Rules
Two teams (red & blue) compete to find their team's words on a 25-word board.
Each word secretly belongs to red, blue, neutral, or the assassin. Only spymasters see the assignments.
Each turn the spymaster gives a one-word clue and names the board words it points at; the team may make up to (number of targets + 1) guesses.
Revealing a word shows its owner: your team (keep guessing), other team (turn ends), neutral (turn ends), or assassin (your team loses).
The first team to reveal all of its words wins.`;

/** Debate temperaments handed to operatives in seat order. */
export const PERSONALITIES = [
  'You are cautious. You would rather end the turn than risk a neutral or the assassin.',
  'You are bold and push the team to use every guess the clue allows.',
  'You are the skeptic. You question the favourite word and look for a safer reading of the clue.',
  'You are a peacemaker. You look for the word most teammates can agree on.',
  'You are literal-minded and trust the most direct meaning of the clue.',
];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function buildSystemPrompt(name: string, team: TeamColor, role: 'spymaster' | 'operative', personality?: string): string {
  return [
    `You are ${name}, playing Codenames on team ${team}. Role: ${role}.`,
    personality ?? 'You are a focused, cooperative teammate who wants to win.',
    '',
    GAME_RULES,
  ].join('\n');
}

function wordsOf(view: SpymasterView, kind: string): string[] {
  return view.cards.filter((card) => card.kind === kind && !card.revealed).map((card) => card.word);
}

function formatTranscript(transcript: readonly DebateEntry[]): string {
  if (!transcript.length) return '(nothing said yet)';
  return transcript.map((entry) => `${entry.agentId}: ${entry.message || '(silent)'}`).join('\n\n');
}

function revealedSummary(view: OperativeView): string {
  const revealed = view.cards.filter((card) => card.revealed).map((card) => `${card.word} (${card.kind})`);
  return revealed.length ? revealed.join(', ') : 'none yet';
}

function buildCluePrompt(view: SpymasterView, rejected: readonly string[]): string {
  const team = view.currentTeam;
  const lines = [
    `Your team's words (target these): ${wordsOf(view, team).join(', ')}`,
    `Enemy words (avoid): ${wordsOf(view, otherTeam(team)).join(', ')}`,
    `Neutral words (avoid): ${wordsOf(view, 'neutral').join(', ')}`,
    `Assassin (avoid at all costs): ${wordsOf(view, 'assassin').join(', ')}`,
    `Your team has ${view.remaining[team]} words left; the enemy has ${view.remaining[otherTeam(team)]}.`,
    `The clue must be a SINGLE word that is NOT any word on the board: ${view.cards.map((c) => c.word).join(', ')}`,
  ];
  if (rejected.length) {
    lines.push(`These clues were rejected, pick a different one: ${rejected.join(', ')}`);
  }
  lines.push(
    '',
    'Respond with JSON: {"clue": "WORD", "targets": ["BOARD_WORD", ...], "reasoning": "why the clue fits the targets"}',
    'targets must be your own team\'s words; the number of targets is the clue number.',
  );
  return lines.join('\n');
}

function buildGuessPrompt(
  view: OperativeView,
  clueWord: string,
  clueCount: number,
  correctSoFar: number,
  history: readonly GuessRecord[],
): string {
  const lines = [
    `The spymaster's clue is "${clueWord}" for ${clueCount} words. Your team has ${correctSoFar} correct guesses for it so far.`,
    `Unrevealed words (ONLY guess from this list): ${unrevealedWords(view.cards).join(', ')}`,
    `Revealed words: ${revealedSummary(view)}`,
  ];
  if (history.length) {
    lines.push('Guesses so far this clue:');
    for (const guess of history) lines.push(`- ${guess.word} (${guess.kind}) ${guess.correct ? 'correct' : 'wrong'}`);
  }
  lines.push(
    '',
    `Respond with JSON: {"reasoning": "your analysis", "guess": "ONE unrevealed word or \\"${END_TURN}\\" to stop"}`,
  );
  return lines.join('\n');
}

function buildDebatePrompt(transcript: readonly DebateEntry[], view: OperativeView, clue: DebateClue): string {
  return [
    `Your team is debating the clue "${clue.word}" for ${clue.count} words.`,
    `Unrevealed words: ${unrevealedWords(view.cards).join(', ')}`,
    '',
    'Debate so far:',
    formatTranscript(transcript),
    '',
    'Argue for one word, push back on a teammate, agree with someone, or suggest ending the turn.',
    'Quote the word you back, like \'word\'. 1-3 sentences; do not just repeat others.',
    'Respond with JSON: {"message": "your contribution"}',
  ].join('\n');
}

function buildVotePrompt(
  transcript: readonly DebateEntry[],
  options: readonly string[],
  view: OperativeView,
  clue: DebateClue,
): string {
  return [
    `After debating the clue "${clue.word}" for ${clue.count} words, cast your final vote.`,
    `Unrevealed words: ${unrevealedWords(view.cards).join(', ')}`,
    '',
    'Debate:',
    formatTranscript(transcript),
    '',
    `Options: ${options.join(', ')}`,
    'Respond with JSON: {"vote": "EXACTLY one of the options"}',
  ].join('\n');
}

// ---------------------------------------------------------------------------
// LLM Client
// ---------------------------------------------------------------------------

/** Pulls `choices[0].message.content` out of a chat-completions payload. */
function readContent(payload: unknown): string | undefined {
  if (typeof payload !== 'object' || payload === null || !('choices' in payload)) return undefined;
  if (!Array.isArray(payload.choices)) return undefined;
  const first: unknown = payload.choices[0];
  if (typeof first !== 'object' || first === null || !('message' in first)) return undefined;
  const message: unknown = first.message;
  if (typeof message !== 'object' || message === null || !('content' in message)) return undefined;
  return typeof message.content === 'string' ? message.content : undefined;
}

/** Minimal OpenAI-compatible chat-completions client. */
export class LlmClient {
  constructor(private readonly config: LlmConfig) {}

  get model(): string {
    return this.config.model;
  }

  /** Same endpoint and key, different model; returns this client when no model is given. */
  withModel(model?: string): LlmClient {
    return model && model !== this.config.model ? new LlmClient({ ...this.config, model }) : this;
  }

  async complete(system: string, user: string): Promise<string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) headers.Authorization = `Bearer ${this.config.apiKey}`;

    const url = `${this.config.baseUrl.replace(/\/$/, '')}/chat/completions`;
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers,
        signal: this.config.timeoutMs ? AbortSignal.timeout(this.config.timeoutMs) : undefined,
        body: JSON.stringify({
          model: this.config.model,
          temperature: 0.7,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: system },
            { role: 'user', content: user },
          ],
        }),
      });
    } catch (err) {
      const cause = err instanceof Error ? err.cause ?? err.message : err;
      throw new Error(`Fetch to ${url} failed: ${JSON.stringify(cause)}`);
    }

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`LLM request failed (${response.status}): ${body.slice(0, 300)}`);
    }

    const content = readContent(await response.json());
    if (!content) throw new Error('LLM response missing content');
    return content;
  }
}

export interface LlmAgentOptions {
  id: string;
  client: LlmClient;
  random: Random;
  personality?: string;
}

export class LlmSpymaster implements SpymasterAgent {
  readonly id: string;

  constructor(private readonly options: LlmAgentOptions) {
    this.id = options.id;
  }

  async generateClue(view: SpymasterView, rejected: readonly string[] = []): Promise<ClueProposal> {
    const system = buildSystemPrompt(this.id, view.currentTeam, 'spymaster', this.options.personality);
    const raw = await this.options.client.complete(system, buildCluePrompt(view, rejected));
    const parsed = parseClueResponse(raw);
    if (parsed.ok) return { word: parsed.value.word, targets: parsed.value.targets };

    const clue = fallbackClue(view, this.options.random);
    log('WARN', 'llmClient', `Unreadable clue from ${this.id}, using "${clue.word}"`, {
      reason: parsed.reason,
      raw: parsed.raw.slice(0, 200),
    });
    return clue;
  }
}

export class LlmOperative implements OperativeAgent {
  readonly id: string;

  constructor(private readonly options: LlmAgentOptions) {
    this.id = options.id;
  }

  private system(view: OperativeView): string {
    return buildSystemPrompt(this.id, view.currentTeam, 'operative', this.options.personality);
  }

  async generateGuess(
    view: OperativeView,
    clueWord: string,
    clueCount: number,
    correctSoFar: number,
    history: readonly GuessRecord[],
  ): Promise<GuessProposal> {
    const prompt = buildGuessPrompt(view, clueWord, clueCount, correctSoFar, history);
    const raw = await this.options.client.complete(this.system(view), prompt);
    const parsed = parseGuessResponse(raw, unrevealedWords(view.cards));
    if (parsed.ok) return parsed.value;

    const guess = fallbackGuess(view, this.options.random);
    log('WARN', 'llmClient', `Unreadable guess from ${this.id}, using "${guess}"`, { reason: parsed.reason });
    return { guess, reasoning: parsed.raw.trim() };
  }

  async debateContribution(transcript: readonly DebateEntry[], view: OperativeView, clue: DebateClue): Promise<string> {
    const raw = await this.options.client.complete(this.system(view), buildDebatePrompt(transcript, view, clue));
    const json = extractJson(raw);
    if (json.ok && typeof json.value.message === 'string') return json.value.message.trim();
    return raw.trim();
  }

  async finalVote(
    transcript: readonly DebateEntry[],
    options: readonly string[],
    view: OperativeView,
    clue: DebateClue,
  ): Promise<string> {
    const raw = await this.options.client.complete(this.system(view), buildVotePrompt(transcript, options, view, clue));
    const vote = matchVote(raw, options);
    if (vote.ok) return vote.value;
    log('WARN', 'llmClient', `Unreadable vote from ${this.id}, voting "${END_TURN}"`, { raw: raw.slice(0, 200) });
    return END_TURN;
  }
}
