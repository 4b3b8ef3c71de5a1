import { z } from "zod"

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => value || undefined)

export const AppConfigSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.string().trim().url().optional().or(z.literal("").transform(() => undefined)),
  MODEL: z.string().trim().min(1).default("gpt-4o-mini"),
  USER_NAME: z.string().trim().min(1).default("Candidate"),
  OUTPUT_DIR: z.string().trim().min(1).default("output"),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MAX_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  MIN_JOB_DESCRIPTION_LENGTH: z.coerce.number().int().min(0).default(100),
  MAX_JOB_DESCRIPTION_LENGTH: z.coerce.number().int().positive().default(10_000),
})

export type AppConfigEnv = z.infer<typeof AppConfigSchema>
