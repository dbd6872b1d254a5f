import { z } from 'zod'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = typeof LOG_LEVELS[number]

// Case-insensitive; anything unrecognised falls back to info
const logLevelSchema = z
  .preprocess((value) => (typeof value === 'string' ? value.trim().toLowerCase() : value), z.enum(LOG_LEVELS))
  .catch('info')

const envSchema = z.object({
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  LOG_LEVEL: logLevelSchema,
  STEWARD_DATA_ROOT: z.string().min(1).default('data'),
})

export type Env = z.infer<typeof envSchema>

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  // Treat blank values as unset so an empty line in .env falls back to the default
  const cleaned = Object.fromEntries(Object.entries(source).filter(([, value]) => value !== undefined && value !== ''))
  return envSchema.parse(cleaned)
}

// Reads LOG_LEVEL alone and never throws; loggers are created at import time
export function resolveLogLevel(source: NodeJS.ProcessEnv = process.env): LogLevel {
  return logLevelSchema.parse(source.LOG_LEVEL)
}
