import OpenAI from "openai"
import { setTimeout as sleep } from "node:timers/promises"

import type { AppConfig } from "./config"
import { CompletionError, describeError } from "./errors"
import type { Logger } from "./logger"
import { createLogger } from "./logger"

export type CompletionRequest = {
  system: string
  user: string
}

export interface TextCompletionService {
  complete(request: CompletionRequest): Promise<string>
}

export type ChatCompletionFn = (request: CompletionRequest) => Promise<string | null | undefined>

export type RetryOptions = {
  maxRetries: number
  baseDelayMs?: number
  wait?: (ms: number) => Promise<unknown>
  logger?: Logger
}

const TEMPERATURE = 0.3
const MAX_TOKENS = 2000
const BASE_DELAY_MS = 1000

/**
 * Wraps a chat call with retries and exponential backoff (1s, 2s, 4s, ...).
 */
export class RetryingCompletionService implements TextCompletionService {
  private readonly maxRetries: number
  private readonly baseDelayMs: number
  private readonly wait: (ms: number) => Promise<unknown>
  private readonly logger: Logger

  constructor(
    private readonly chat: ChatCompletionFn,
    options: RetryOptions,
  ) {
    this.maxRetries = Math.max(1, options.maxRetries)
    this.baseDelayMs = options.baseDelayMs ?? BASE_DELAY_MS
    this.wait = options.wait ?? ((ms) => sleep(ms))
    this.logger = options.logger ?? createLogger("completion")
  }

  async complete(request: CompletionRequest): Promise<string> {
    let lastError: unknown

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      try {
        const content = (await this.chat(request))?.trim()
        if (!content) {
          throw new Error("No content returned from the completion service.")
        }
        return content
      } catch (error) {
        lastError = error
        if (attempt < this.maxRetries - 1) {
          const delay = this.baseDelayMs * 2 ** attempt
          this.logger.warn(`attempt ${attempt + 1} failed, retrying in ${delay}ms: ${describeError(error)}`)
          await this.wait(delay)
        }
      }
    }

    throw new CompletionError(
      `Completion failed after ${this.maxRetries} attempts. Last error: ${describeError(lastError)}`,
      this.maxRetries,
      { cause: lastError },
    )
  }
}

export const createOpenAIChat = (settings: AppConfig["openai"] & { apiKey: string }): ChatCompletionFn => {
  const openai = new OpenAI({
    apiKey: settings.apiKey,
    baseURL: settings.baseURL,
    timeout: settings.timeoutMs,
    maxRetries: 0,
  })

  return async ({ system, user }) => {
    const completion = await openai.chat.completions.create({
      model: settings.model,
      messages: [
        { role: "system", content: system },
        { role: "user", content: user },
      ],
      temperature: TEMPERATURE,
      max_tokens: MAX_TOKENS,
    })
    return completion.choices[0]?.message?.content
  }
}

// null without an API key; callers draft offline
export const createCompletionService = (config: AppConfig, logger?: Logger): TextCompletionService | null => {
  const { apiKey } = config.openai
  if (!apiKey) return null
  return new RetryingCompletionService(createOpenAIChat({ ...config.openai, apiKey }), {
    maxRetries: config.openai.maxRetries,
    logger,
  })
}
