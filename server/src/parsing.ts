import { END_TURN } from './types.js';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; raw: string; reason: string };

export interface ParsedClue {
  word: string;
  count: number;
  targets: string[];
  reasoning?: string;
}

export interface ParsedGuess {
  guess: string;
  reasoning: string;
}

function ok<T>(value: T): ParseResult<T> {
  return { ok: true, value };
}

function fail<T>(raw: string, reason: string): ParseResult<T> {
  return { ok: false, raw, reason };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function mentionsWord(text: string, word: string): boolean {
  return new RegExp(`\\b${escapeRegExp(word)}\\b`, 'i').test(text);
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Strips reasoning blocks and code fences, then parses the first JSON object in the text. */
export function extractJson(raw: string): ParseResult<Record<string, unknown>> {
  const cleaned = raw.replace(/<think>[\s\S]*?<\/think>/gi, '').trim();
  const candidates: string[] = [];
  if (cleaned.startsWith('{') && cleaned.endsWith('}')) candidates.push(cleaned);
  const fenced = cleaned.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  if (fenced?.[1]) candidates.push(fenced[1].trim());
  const firstBrace = cleaned.indexOf('{');
  const lastBrace = cleaned.lastIndexOf('}');
  if (firstBrace >= 0 && lastBrace > firstBrace) candidates.push(cleaned.slice(firstBrace, lastBrace + 1));

  for (const candidate of candidates) {
    const parsed = tryParse(candidate);
    if (isRecord(parsed)) return ok(parsed);
  }
  return fail(raw, 'no JSON object found');
}

function labelled(raw: string, label: string): string | undefined {
  const match = raw.match(new RegExp(`${label}:\\s*(.*?)(?:\\n|$)`, 'i'));
  const value = match?.[1]?.trim();
  return value ? value : undefined;
}

function stripBrackets(value: string): string {
  return value.replace(/^[\s[("']+|[\s\])"']+$/g, '');
}

/**
 * Reads a clue either as `{"clue", "targets", "reasoning"}` JSON or as
 * `CLUE:` / `NUMBER:` / `TARGETS:` lines. The count always follows the
 * target list; a stated NUMBER that disagrees is dropped.
 */
export function parseClueResponse(raw: string): ParseResult<ParsedClue> {
  let word: string | undefined;
  let targets: string[] = [];
  let reasoning: string | undefined;

  const json = extractJson(raw);
  if (json.ok) {
    const data = json.value;
    const clue = data.clue ?? data.word;
    if (typeof clue === 'string') word = clue.trim();
    if (Array.isArray(data.targets)) {
      targets = data.targets.filter((t): t is string => typeof t === 'string').map((t) => t.trim());
    }
    if (typeof data.reasoning === 'string') reasoning = data.reasoning.trim();
  } else {
    const clueLine = labelled(raw, 'CLUE');
    word = clueLine ? stripBrackets(clueLine) : undefined;
    const targetLine = labelled(raw, 'TARGETS');
    if (targetLine) targets = targetLine.split(',').map(stripBrackets);
  }

  targets = targets.filter((t) => t.length > 0);
  if (!word) return fail(raw, 'missing clue word');
  if (/\s/.test(word)) return fail(raw, `clue "${word}" is not a single word`);
  if (targets.length === 0) return fail(raw, 'missing target words');
  return ok({ word: word.toLowerCase(), count: targets.length, targets, reasoning });
}

/** Maps free text onto one of `candidates` (or the end sentinel). */
export function matchBoardWord(text: string, candidates: readonly string[]): string | undefined {
  const value = text.trim().toLowerCase().replace(/^["'`]+|["'`.!]+$/g, '');
  if (value === END_TURN || value === 'end turn' || value === 'end_turn') return END_TURN;
  const lowered = candidates.map((c) => c.toLowerCase());
  const exact = lowered.find((c) => c === value);
  if (exact) return exact;
  return lowered.find((c) => value.includes(c) || (value.length > 2 && c.includes(value)));
}

/**
 * Reads an operative decision either as `{"guess", "reasoning"}` JSON or as
 * `REASONING:` / `DECISION:` lines. The guess must resolve to an unrevealed
 * word or `end`.
 */
export function parseGuessResponse(raw: string, unrevealed: readonly string[]): ParseResult<ParsedGuess> {
  let decision: string | undefined;
  let reasoning = '';

  const json = extractJson(raw);
  if (json.ok) {
    const guess = json.value.guess ?? json.value.decision;
    if (typeof guess === 'string') decision = guess;
    if (typeof json.value.reasoning === 'string') reasoning = json.value.reasoning.trim();
  } else {
    decision = labelled(raw, 'DECISION');
    const reasoningMatch = raw.match(/REASONING:\s*([\s\S]*?)(?:DECISION:|$)/i);
    reasoning = reasoningMatch?.[1]?.trim() ?? '';
  }

  if (!decision) return fail(raw, 'missing decision');
  const guess = matchBoardWord(decision, unrevealed);
  if (!guess) return fail(raw, `"${decision}" is not an unrevealed board word`);
  return ok({ guess, reasoning: reasoning || raw.trim() });
}

/** Resolves a free-text vote to a member of `options`. */
export function matchVote(raw: string, options: readonly string[]): ParseResult<string> {
  const json = extractJson(raw);
  const text = json.ok && typeof json.value.vote === 'string' ? json.value.vote : raw;
  const value = text.trim().toLowerCase().replace(/^["'`]+|["'`.!]+$/g, '');

  const exact = options.find((option) => option.toLowerCase() === value);
  if (exact) return ok(exact);
  const mentioned = options.find((option) => mentionsWord(value, option));
  if (mentioned) return ok(mentioned);
  return fail(raw, 'vote matches no option');
}

const END_TURN_PHRASES = ['end turn', 'end the turn', 'end our turn', 'ending the turn', 'ending our turn'];

/**
 * Best-effort read of which action a debate message argues for. Priority:
 * an end-turn phrase, then a quoted unrevealed word, then the first
 * unrevealed word (in board order) mentioned on its own.
 */
export function extractPreference(
  message: string,
  cards: ReadonlyArray<{ word: string; revealed: boolean }>,
): ParseResult<string> {
  const lower = message.toLowerCase();
  if (END_TURN_PHRASES.some((phrase) => lower.includes(phrase))) return ok(END_TURN);

  const unrevealed = cards.filter((card) => !card.revealed).map((card) => card.word.toLowerCase());
  for (const match of lower.matchAll(/'([^']*)'|"([^"]*)"/g)) {
    const quoted = (match[1] ?? match[2] ?? '').trim();
    if (unrevealed.includes(quoted)) return ok(quoted);
  }

  const mentioned = unrevealed.find((word) => mentionsWord(lower, word));
  if (mentioned) return ok(mentioned);
  return fail(message, 'no preference stated');
}
