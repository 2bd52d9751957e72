import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';

export const AGENT_CONFIG = Symbol('AGENT_CONFIG');

export const AI_PROVIDERS = ['gemini', 'anthropic', 'openai', 'ollama'] as const;
export type AIProvider = (typeof AI_PROVIDERS)[number];

const logger = new Logger('AgentConfig');

const API_KEY_ENV: Record<AIProvider, string> = {
  gemini: 'GOOGLE_GENERATIVE_AI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  ollama: 'OLLAMA_API_KEY',
};

const MODEL_ENV: Record<AIProvider, { env: string; fallback: string }> = {
  gemini: { env: 'GEMINI_MODEL', fallback: 'gemini-1.5-flash' },
  anthropic: { env: 'ANTHROPIC_MODEL', fallback: 'claude-3-5-sonnet-20241022' },
  openai: { env: 'OPENAI_MODEL', fallback: 'gpt-4o' },
  ollama: { env: 'OLLAMA_MODEL', fallback: 'gpt-oss:20b' },
};

/**
 * Positive integer read from an env string, with a default when unset.
 */
const intWithDefault = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

/** Largest delay a Node timer accepts; longer ones fire immediately. */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Timeout in milliseconds, bounded by what setTimeout can represent.
 */
const msWithDefault = (fallback: number) =>
  z.coerce.number().int().positive().max(MAX_TIMER_MS).default(fallback);

const AgentConfigSchema = z
  .object({
    aiProvider: z.enum(AI_PROVIDERS),
    model: z.object({
      name: z.string().min(1),
      apiKey: z.string().optional(),
      baseUrl: z.string().optional(),
    }),
    weather: z.object({
      apiKey: z.string().min(1, 'OPENWEATHERMAP_API_KEY is required'),
      baseUrl: z.string().url(),
      timeoutMs: msWithDefault(10_000),
    }),
    retrieval: z.object({
      baseUrl: z.string().url(),
      topN: intWithDefault(4),
      timeoutMs: msWithDefault(10_000),
    }),
    search: z.object({
      baseUrl: z.string().url(),
      maxConcurrency: z.coerce.number().int(),
      timeoutMs: msWithDefault(10_000),
      maxAttempts: intWithDefault(3),
      retryBaseMs: z.coerce.number().int().nonnegative().default(1000),
    }),
    agent: z.object({
      maxToolCycles: intWithDefault(6),
      requestTimeoutMs: msWithDefault(120_000),
    }),
    sources: z.object({
      maxSources: intWithDefault(8),
      retrievalCap: z.coerce.number().int().nonnegative().default(2),
      searchCap: z.coerce.number().int().nonnegative().default(6),
    }),
    tracing: z.object({
      logPath: z.string(),
      enabled: z.boolean(),
    }),
    http: z.object({
      port: intWithDefault(8000),
      corsOrigins: z.array(z.string()),
    }),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.aiProvider !== 'ollama' && !cfg.model.apiKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['model', 'apiKey'],
        message: `${API_KEY_ENV[cfg.aiProvider]} is required when AI_PROVIDER=${cfg.aiProvider}`,
      });
    }
  })
  .transform((cfg) => ({
    ...cfg,
    search: {
      ...cfg.search,
      maxConcurrency: cfg.search.maxConcurrency > 0 ? cfg.search.maxConcurrency : 3,
    },
  }));

export type AgentConfig = Readonly<z.infer<typeof AgentConfigSchema>>;

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

function isAIProvider(value: string): value is AIProvider {
  return AI_PROVIDERS.some((p) => p === value);
}

/**
 * Resolve the configured provider, falling back to gemini for unknown values.
 */
export function resolveProvider(raw: string | undefined): AIProvider {
  const provider = (raw ?? 'gemini').trim().toLowerCase();
  if (isAIProvider(provider)) {
    return provider;
  }
  logger.warn(`Invalid AI_PROVIDER "${raw}", falling back to gemini`);
  return 'gemini';
}

function trimmed(value: string | undefined): string | undefined {
  const result = value?.trim();
  return result ? result : undefined;
}

/**
 * Reads one raw environment value.
 */
export type EnvReader = (key: string) => string | undefined;

/**
 * Build the immutable agent configuration from the environment.
 *
 * Called once at startup; throws a ConfigurationError listing every
 * missing or malformed field so the process exits before listening.
 */
export function loadAgentConfig(configService: ConfigService): AgentConfig {
  return parseAgentConfig((key) => configService.get<string>(key));
}

export function parseAgentConfig(read: EnvReader): AgentConfig {
  const get = (key: string) => trimmed(read(key));
  const aiProvider = resolveProvider(get('AI_PROVIDER'));
  const modelEnv = MODEL_ENV[aiProvider];

  const result = AgentConfigSchema.safeParse({
    aiProvider,
    model: {
      name: get(modelEnv.env) ?? modelEnv.fallback,
      apiKey: aiProvider === 'ollama' ? undefined : get(API_KEY_ENV[aiProvider]),
      baseUrl:
        aiProvider === 'ollama'
          ? (get('OLLAMA_BASE_URL') ?? 'http://127.0.0.1:11434')
          : undefined,
    },
    weather: {
      apiKey: get('OPENWEATHERMAP_API_KEY') ?? '',
      baseUrl:
        get('OPENWEATHERMAP_BASE_URL') ??
        'https://api.openweathermap.org/data/2.5',
      timeoutMs: get('WEATHER_TIMEOUT_MS'),
    },
    retrieval: {
      baseUrl: get('RETRIEVAL_SERVICE_URL') ?? 'http://localhost:4000',
      topN: get('RETRIEVAL_TOP_N'),
      timeoutMs: get('RETRIEVAL_TIMEOUT_MS'),
    },
    search: {
      baseUrl: get('SEARCH_BASE_URL') ?? 'https://api.duckduckgo.com/',
      maxConcurrency: get('SEARCH_MAX_CONCURRENCY') ?? 3,
      timeoutMs: get('SEARCH_TIMEOUT_MS'),
      maxAttempts: get('SEARCH_MAX_ATTEMPTS'),
      retryBaseMs: get('SEARCH_RETRY_BASE_MS'),
    },
    agent: {
      maxToolCycles: get('AGENT_MAX_TOOL_CYCLES'),
      requestTimeoutMs: get('AGENT_REQUEST_TIMEOUT_MS'),
    },
    sources: {
      maxSources: get('MAX_SOURCES'),
      retrievalCap: get('RETRIEVAL_SOURCE_CAP'),
      searchCap: get('SEARCH_SOURCE_CAP'),
    },
    tracing: {
      logPath: (read('TRACING_LOG_PATH') ?? 'tracing.log').trim(),
      enabled: get('NODE_ENV') !== 'test',
    },
    http: {
      port: get('PORT'),
      corsOrigins: (get('CORS_ALLOW_ORIGINS') ?? '*')
        .split(',')
        .map((o) => o.trim())
        .filter((o) => o.length > 0),
    },
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid agent configuration: ${issues}`);
  }

  return Object.freeze(result.data);
}
