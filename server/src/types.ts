export type TeamColor = 'red' | 'blue';
export type CardKind = TeamColor | 'neutral' | 'assassin';

export const TEAMS: readonly TeamColor[] = ['red', 'blue'];

/** Sentinel a debate resolves to when the team should stop guessing. */
export const END_TURN = 'end';

export interface Card {
  word: string;
  kind: CardKind;
  revealed: boolean;
}

export interface ClueRecord {
  team: TeamColor;
  word: string;
  count: number;
  targets: string[];
  turn: number;
}

export interface GuessRecord {
  team: TeamColor;
  word: string;
  kind: CardKind;
  correct: boolean;
  turn: number;
}

export interface GameState {
  id: string;
  createdAt: string;
  cards: Card[];
  remaining: Record<TeamColor, number>;
  startingTeam: TeamColor;
  currentTeam: TeamColor;
  winner?: TeamColor;
  winReason?: string;
  turnCount: number;
  activeClue?: ClueRecord;
  clueHistory: ClueRecord[];
  guessHistory: GuessRecord[];
  randomSeed: number;
  teamSizes: Record<TeamColor, number>;
  models: TeamModels;
}

export type GamePhase =
  | { phase: 'clue'; team: TeamColor }
  | { phase: 'guess'; team: TeamColor; clue: ClueRecord }
  | { phase: 'over'; winner: TeamColor };

export interface CreateGameInput {
  redTeamSize?: number;
  blueTeamSize?: number;
  seed?: number;
  words?: readonly string[];
  startingTeam?: TeamColor;
  models?: TeamModels;
}

export type ClueRejection =
  | 'invalid_input'
  | 'not_your_turn'
  | 'game_over'
  | 'not_single_word'
  | 'word_on_board'
  | 'unknown_target'
  | 'duplicate_target';

export type ClueValidation =
  | { valid: true }
  | { valid: false; reason: ClueRejection; message: string };

export interface GuessResult {
  success: boolean;
  kind?: CardKind;
  endTurn: boolean;
  gameOver?: boolean;
  winner?: TeamColor;
  error?: string;
}

// --- Views handed to agents and clients ---

export interface SpymasterCardView {
  word: string;
  kind: CardKind;
  revealed: boolean;
}

export interface OperativeCardView {
  word: string;
  kind: CardKind | null;
  revealed: boolean;
}

export interface PublicClue {
  team: TeamColor;
  word: string;
  count: number;
  turn: number;
}

interface ViewBase {
  gameId: string;
  remaining: Record<TeamColor, number>;
  currentTeam: TeamColor;
  winner: TeamColor | null;
  turnCount: number;
  guessHistory: GuessRecord[];
}

export interface SpymasterView extends ViewBase {
  role: 'spymaster';
  cards: SpymasterCardView[];
  clueHistory: ClueRecord[];
}

export interface OperativeView extends ViewBase {
  role: 'operative';
  cards: OperativeCardView[];
  clueHistory: PublicClue[];
}

// --- Debate ---

export interface DebateEntry {
  round: number;
  agentId: string;
  message: string;
  preference?: string;
}

export interface DebateClue {
  word: string;
  count: number;
}

export interface DebateResult {
  finalDecision: string;
  options: string[];
  voteCounts: Record<string, number>;
  transcript: DebateEntry[];
  reasoningExcerpt: DebateEntry[];
}

// --- Agent capabilities ---

export interface ClueProposal {
  word: string;
  targets: string[];
}

export interface GuessProposal {
  guess: string;
  reasoning: string;
}

export interface SpymasterAgent {
  readonly id: string;
  generateClue(view: SpymasterView, rejected?: readonly string[]): Promise<ClueProposal>;
}

export interface OperativeAgent {
  readonly id: string;
  generateGuess(
    view: OperativeView,
    clueWord: string,
    clueCount: number,
    correctSoFar: number,
    history: readonly GuessRecord[],
  ): Promise<GuessProposal>;
  debateContribution(transcript: readonly DebateEntry[], view: OperativeView, clue: DebateClue): Promise<string>;
  finalVote(
    transcript: readonly DebateEntry[],
    options: readonly string[],
    view: OperativeView,
    clue: DebateClue,
  ): Promise<string>;
}

export interface TeamRoster {
  spymaster: SpymasterAgent;
  operatives: OperativeAgent[];
}

export interface LlmConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
  /** Aborts the HTTP request after this many milliseconds. */
  timeoutMs?: number;
}

export type AgentRole = 'spymaster' | 'operative';

export const ROLES: readonly AgentRole[] = ['spymaster', 'operative'];

/** Model overrides per team and role; unset entries use the client's default model. */
export type TeamModels = Partial<Record<TeamColor, Partial<Record<AgentRole, string>>>>;
