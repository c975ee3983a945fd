import { ROLES, TEAMS, type LlmConfig, type TeamModels } from './types.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export type AgentKind = 'llm' | 'random';

export interface ServerConfig {
  port: number;
  /** Which agents autoplay seats; `random` needs no model server. */
  agents: AgentKind;
  llm: LlmConfig;
  /** Per-team, per-role model defaults from RED_SPYMASTER_MODEL and friends. */
  teamModels: TeamModels;
  llmTimeoutMs: number;
  debateRounds: number;
  maxTurns: number;
  logLevel: LogLevel;
}

function intFromEnv(value: string | undefined, fallback: number, min = 0): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) return fallback;
  return parsed;
}

function parseLogLevel(value: string | undefined): LogLevel {
  const upper = value?.trim().toUpperCase();
  if (upper === 'DEBUG' || upper === 'INFO' || upper === 'WARN' || upper === 'ERROR') return upper;
  return 'INFO';
}

function parseAgents(value: string | undefined): AgentKind {
  return value?.trim().toLowerCase() === 'random' ? 'random' : 'llm';
}

function parseTeamModels(env: NodeJS.ProcessEnv): TeamModels {
  const models: TeamModels = {};
  for (const team of TEAMS) {
    for (const role of ROLES) {
      const model = env[`${team.toUpperCase()}_${role.toUpperCase()}_MODEL`]?.trim();
      if (!model) continue;
      const roles = models[team] ?? {};
      roles[role] = model;
      models[team] = roles;
    }
  }
  return models;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: intFromEnv(env.PORT, 3001, 0),
    agents: parseAgents(env.AGENTS),
    llm: {
      baseUrl: env.LLM_BASE_URL || 'http://localhost:8082/v1',
      model: env.LLM_MODEL || 'gpt-4o',
      apiKey: env.LLM_API_KEY || '',
    },
    teamModels: parseTeamModels(env),
    llmTimeoutMs: intFromEnv(env.LLM_TIMEOUT_MS, 30_000, 1),
    debateRounds: intFromEnv(env.DEBATE_ROUNDS, 2, 1),
    maxTurns: intFromEnv(env.MAX_TURNS, 20, 1),
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
