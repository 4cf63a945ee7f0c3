import { z } from 'zod'
import type { AppConfig, LlmProvider } from '../config.js'
import { ExternalServiceError, errorMessage } from '../lib/errors.js'
import { createLogger } from '../lib/logger.js'

const logger = createLogger('LLM')

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant'
  content: string
}

export interface ChatOptions {
  messages: ChatMessage[]
  temperature?: number
  maxTokens?: number
  /** Ask the provider for a JSON object response. */
  jsonMode?: boolean
}

export type ProviderConfig = AppConfig['llm']

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>

const openAiResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      }),
    )
    .min(1),
})

const ollamaResponseSchema = z.object({
  message: z.object({
    content: z.string(),
  }),
})

/** Ollama runs locally without a key; hosted providers need one. */
export function isProviderConfigured(config: ProviderConfig) {
  return config.provider === 'ollama' || config.apiKey !== null
}

function buildRequest(config: ProviderConfig, options: ChatOptions): { url: string; init: RequestInit } {
  const temperature = options.temperature ?? 0.1
  const maxTokens = options.maxTokens ?? 500

  // Ollama uses a different endpoint and body shape
  if (config.provider === 'ollama') {
    return {
      url: `${config.baseUrl}/api/chat`,
      init: {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: config.model,
          messages: options.messages,
          stream: false,
          ...(options.jsonMode ? { format: 'json' } : {}),
          options: {
            temperature,
            num_predict: maxTokens,
          },
        }),
      },
    }
  }

  // Groq and OpenAI share the chat-completions format
  return {
    url: `${config.baseUrl}/chat/completions`,
    init: {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${config.apiKey ?? ''}`,
      },
      body: JSON.stringify({
        model: config.model,
        messages: options.messages,
        temperature,
        max_tokens: maxTokens,
        ...(options.jsonMode ? { response_format: { type: 'json_object' } } : {}),
      }),
    },
  }
}

function readContent(provider: LlmProvider, payload: unknown): string | null {
  if (provider === 'ollama') {
    const parsed = ollamaResponseSchema.safeParse(payload)
    return parsed.success ? parsed.data.message.content : null
  }
  const parsed = openAiResponseSchema.safeParse(payload)
  return parsed.success ? parsed.data.choices[0].message.content ?? null : null
}

function isTimeout(error: unknown) {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')
}

/**
 * Sends one chat request and returns the assistant's text.
 *
 * The call is bounded by `config.timeoutMs`. Every failure is raised as
 * ExternalServiceError so callers can branch on `reason`.
 */
export async function chatWithLLM(
  config: ProviderConfig,
  options: ChatOptions,
  fetchImpl: FetchLike = fetch,
): Promise<string> {
  const { url, init } = buildRequest(config, options)
  logger.debug(`Provider: ${config.provider} Model: ${config.model}`)

  let response: Response
  try {
    response = await fetchImpl(url, { ...init, signal: AbortSignal.timeout(config.timeoutMs) })
  } catch (error) {
    if (isTimeout(error)) {
      throw new ExternalServiceError('timeout', `${config.provider} did not answer within ${config.timeoutMs}ms`, {
        cause: error,
      })
    }
    throw new ExternalServiceError('request_failed', `${config.provider} request failed: ${errorMessage(error)}`, {
      cause: error,
    })
  }

  logger.debug(`Response status: ${response.status}`)

  if (!response.ok) {
    const errorText = await response.text().catch(() => '')
    throw new ExternalServiceError(
      'request_failed',
      `${config.provider.toUpperCase()} API error ${response.status}: ${errorText.slice(0, 300)}`,
    )
  }

  let payload: unknown
  try {
    payload = await response.json()
  } catch (error) {
    throw new ExternalServiceError('malformed_response', `${config.provider} returned a non-JSON body`, {
      cause: error,
    })
  }

  const content = readContent(config.provider, payload)
  if (!content) {
    throw new ExternalServiceError('malformed_response', `${config.provider} response had no message content`)
  }
  return content
}
