import { AppConfigSchema } from "@/types"

import { ConfigurationError } from "./errors"
import type { JobDescriptionLimits } from "./validators"

export type AppConfig = {
  openai: {
    apiKey?: string
    baseURL?: string
    model: string
    timeoutMs: number
    maxRetries: number
  }
  userName: string
  outputDir: string
  jobDescriptionLimits: JobDescriptionLimits
}

/**
 * Reads settings from environment variables. Throws {@link ConfigurationError}
 * listing every invalid variable.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const result = AppConfigSchema.safeParse(env)
  if (!result.success) {
    throw new ConfigurationError(
      "Invalid environment configuration.",
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    )
  }

  const values = result.data
  if (values.MIN_JOB_DESCRIPTION_LENGTH > values.MAX_JOB_DESCRIPTION_LENGTH) {
    throw new ConfigurationError("Invalid environment configuration.", [
      "MIN_JOB_DESCRIPTION_LENGTH must not exceed MAX_JOB_DESCRIPTION_LENGTH",
    ])
  }

  return {
    openai: {
      apiKey: values.OPENAI_API_KEY,
      baseURL: values.OPENAI_BASE_URL,
      model: values.MODEL,
      timeoutMs: values.REQUEST_TIMEOUT_MS,
      maxRetries: values.MAX_RETRIES,
    },
    userName: values.USER_NAME,
    outputDir: values.OUTPUT_DIR,
    jobDescriptionLimits: {
      minLength: values.MIN_JOB_DESCRIPTION_LENGTH,
      maxLength: values.MAX_JOB_DESCRIPTION_LENGTH,
    },
  }
}
