import { z } from 'zod'

const llmProviderSchema = z.enum(['groq', 'openai', 'ollama'])

export type LlmProvider = z.infer<typeof llmProviderSchema>

const PROVIDER_DEFAULTS: Record<LlmProvider, { baseUrl: string; model: string }> = {
  groq: { baseUrl: 'https://api.groq.com/openai/v1', model: 'llama-3.1-8b-instant' },
  openai: { baseUrl: 'https://api.openai.com/v1', model: 'gpt-4o-mini' },
  ollama: { baseUrl: 'http://localhost:11434', model: 'llama3.1:8b' },
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  STORAGE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
  DATABASE_URL: z.string().min(1).optional(),
  LLM_PROVIDER: llmProviderSchema.default('groq'),
  LLM_API_KEY: z.string().min(1).optional(),
  GROQ_API_KEY: z.string().min(1).optional(),
  OPENAI_API_KEY: z.string().min(1).optional(),
  LLM_BASE_URL: z.string().url().optional(),
  LLM_MODEL: z.string().min(1).optional(),
  CLASSIFIER_TIMEOUT_MS: z.coerce.number().int().min(100).default(10_000),
  WS_SWEEP_INTERVAL_MS: z.coerce.number().int().min(1_000).default(300_000),
  WS_SEND_TIMEOUT_MS: z.coerce.number().int().min(100).default(5_000),
  STORE_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  STORE_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(50),
  AUTHORITY_EMAIL_DOMAIN: z.string().min(1).default('campus.example.edu'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
})

export type AppConfig = {
  port: number
  storage: { driver: 'postgres'; databaseUrl: string } | { driver: 'memory' }
  llm: {
    provider: LlmProvider
    baseUrl: string
    model: string
    apiKey: string | null
    timeoutMs: number
  }
  realtime: { sweepIntervalMs: number; sendTimeoutMs: number }
  storeRetry: { attempts: number; baseDelayMs: number }
  authorityEmailDomain: string
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL']
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`)
    this.name = 'ConfigError'
  }
}

function emptyToUndefined(env: NodeJS.ProcessEnv) {
  const cleaned: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value
  }
  return cleaned
}

/**
 * Reads configuration from environment variables. Blank values count as
 * unset so an `.env` copied from `.env.example` works as-is.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(emptyToUndefined(env))
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`),
    )
  }

  const values = parsed.data
  let storage: AppConfig['storage']
  if (values.STORAGE_DRIVER === 'postgres') {
    if (!values.DATABASE_URL) {
      throw new ConfigError(['DATABASE_URL: required when STORAGE_DRIVER is postgres'])
    }
    storage = { driver: 'postgres', databaseUrl: values.DATABASE_URL }
  } else {
    storage = { driver: 'memory' }
  }

  const providerDefaults = PROVIDER_DEFAULTS[values.LLM_PROVIDER]
  const providerKey =
    values.LLM_PROVIDER === 'groq'
      ? values.GROQ_API_KEY
      : values.LLM_PROVIDER === 'openai'
        ? values.OPENAI_API_KEY
        : undefined

  return {
    port: values.PORT,
    storage,
    llm: {
      provider: values.LLM_PROVIDER,
      baseUrl: values.LLM_BASE_URL ?? providerDefaults.baseUrl,
      model: values.LLM_MODEL ?? providerDefaults.model,
      apiKey: values.LLM_API_KEY ?? providerKey ?? null,
      timeoutMs: values.CLASSIFIER_TIMEOUT_MS,
    },
    realtime: { sweepIntervalMs: values.WS_SWEEP_INTERVAL_MS, sendTimeoutMs: values.WS_SEND_TIMEOUT_MS },
    storeRetry: {
      attempts: values.STORE_RETRY_ATTEMPTS,
      baseDelayMs: values.STORE_RETRY_BASE_DELAY_MS,
    },
    authorityEmailDomain: values.AUTHORITY_EMAIL_DOMAIN,
    logLevel: values.LOG_LEVEL,
  }
}
