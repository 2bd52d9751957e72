import { AgentConfig } from '../../config/agent-config';

export type TestConfigOverrides = {
  [K in keyof AgentConfig]?: Partial<AgentConfig[K]>;
};

const BASE_CONFIG: AgentConfig = {
  aiProvider: 'openai',
  model: { name: 'test-model', apiKey: 'test-secret', baseUrl: undefined },
  weather: {
    apiKey: 'test-secret',
    baseUrl: 'http://weather.test/data/2.5',
    timeoutMs: 1000,
  },
  retrieval: { baseUrl: 'http://retrieval.test', topN: 4, timeoutMs: 1000 },
  search: {
    baseUrl: 'http://search.test/',
    maxConcurrency: 3,
    timeoutMs: 1000,
    maxAttempts: 3,
    retryBaseMs: 0,
  },
  agent: { maxToolCycles: 6, requestTimeoutMs: 5000 },
  sources: { maxSources: 8, retrievalCap: 2, searchCap: 6 },
  tracing: { logPath: '', enabled: false },
  http: { port: 8000, corsOrigins: ['*'] },
};

/**
 * Build an AgentConfig for tests, overriding individual fields per section.
 */
export function createTestConfig(
  overrides: TestConfigOverrides = {},
): AgentConfig {
  return {
    aiProvider: overrides.aiProvider ?? BASE_CONFIG.aiProvider,
    model: { ...BASE_CONFIG.model, ...overrides.model },
    weather: { ...BASE_CONFIG.weather, ...overrides.weather },
    retrieval: { ...BASE_CONFIG.retrieval, ...overrides.retrieval },
    search: { ...BASE_CONFIG.search, ...overrides.search },
    agent: { ...BASE_CONFIG.agent, ...overrides.agent },
    sources: { ...BASE_CONFIG.sources, ...overrides.sources },
    tracing: { ...BASE_CONFIG.tracing, ...overrides.tracing },
    http: { ...BASE_CONFIG.http, ...overrides.http },
  };
}
