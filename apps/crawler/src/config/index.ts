/**
 * Crawler configuration.
 *
 * Read from the environment (after env.ts has loaded .env.local) and
 * validated with zod. Every invalid key is reported in one ConfigError.
 */

import { z } from 'zod'
import { isLogLevel, LOG_LEVELS, type LogLevel } from '@papercode/logger'
import { ConfigError } from '../errors.js'
import { DEFAULT_CHECKPOINT_EVERY, DEFAULT_RECORD_DELAY_MS } from '../pipeline/orchestrator.js'
import { DEFAULT_RETRY_POLICY, DEFAULT_USER_AGENT, DEFAULT_FETCH_OPTIONS } from '../pipeline/types.js'

const emptyToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback))

const nonNegativeInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).default(fallback))

const envSchema = z.object({
  NODE_ENV: z.preprocess(emptyToUndefined, z.string().optional()),
  OUTPUT_DIR: z.preprocess(emptyToUndefined, z.string().default('./output')),
  LOG_LEVEL: z.preprocess(
    value => (typeof value === 'string' ? emptyToUndefined(value.toLowerCase()) : value),
    z.string().refine(isLogLevel, { message: `Expected one of ${Object.keys(LOG_LEVELS).join(', ')}` }).default('info')
  ),
  LOG_FORMAT: z.preprocess(
    value => (typeof value === 'string' ? emptyToUndefined(value.toLowerCase()) : value),
    z.enum(['json', 'pretty']).optional()
  ),
  FETCH_TIMEOUT_MS: positiveInt(DEFAULT_FETCH_OPTIONS.timeoutMs),
  FETCH_MAX_ATTEMPTS: positiveInt(DEFAULT_RETRY_POLICY.maxAttempts),
  FETCH_RETRY_DELAY_MS: nonNegativeInt(DEFAULT_RETRY_POLICY.initialDelayMs),
  RECORD_DELAY_MS: nonNegativeInt(DEFAULT_RECORD_DELAY_MS),
  CHECKPOINT_EVERY: positiveInt(DEFAULT_CHECKPOINT_EVERY),
  USER_AGENT: z.preprocess(emptyToUndefined, z.string().default(DEFAULT_USER_AGENT)),
  GITHUB_TOKEN: z.preprocess(emptyToUndefined, z.string().optional()),
})

export interface CrawlerConfig {
  outputDir: string
  logLevel: LogLevel
  logFormat: 'json' | 'pretty'
  fetch: {
    timeoutMs: number
    maxAttempts: number
    retryDelayMs: number
    userAgent: string
  }
  recordDelayMs: number
  checkpointEvery: number
  githubToken?: string
}

export function loadConfig(env: Record<string, string | undefined> = process.env): CrawlerConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    )
  }

  const values = parsed.data
  return {
    outputDir: values.OUTPUT_DIR,
    logLevel: values.LOG_LEVEL,
    logFormat: values.LOG_FORMAT ?? (values.NODE_ENV === 'production' ? 'json' : 'pretty'),
    fetch: {
      timeoutMs: values.FETCH_TIMEOUT_MS,
      maxAttempts: values.FETCH_MAX_ATTEMPTS,
      retryDelayMs: values.FETCH_RETRY_DELAY_MS,
      userAgent: values.USER_AGENT,
    },
    recordDelayMs: values.RECORD_DELAY_MS,
    checkpointEvery: values.CHECKPOINT_EVERY,
    githubToken: values.GITHUB_TOKEN,
  }
}
