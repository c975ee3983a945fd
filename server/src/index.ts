import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { LlmClient } from './llmClient.js';
import { log, setLogLevel } from './logger.js';

const config = loadConfig();
setLogLevel(config.logLevel);

const app = createApp({
  debateRounds: config.debateRounds,
  maxTurns: config.maxTurns,
  llm:
    config.agents === 'llm'
      ? { client: new LlmClient({ ...config.llm, timeoutMs: config.llmTimeoutMs }), timeoutMs: config.llmTimeoutMs }
      : undefined,
  teamModels: config.teamModels,
});

app.listen(config.port, () => {
  log('INFO', 'server', `Codenames referee running on http://localhost:${config.port}`, {
    agents: config.agents,
    model: config.agents === 'llm' ? config.llm.model : undefined,
    teamModels: config.teamModels,
    debateRounds: config.debateRounds,
  });
});
