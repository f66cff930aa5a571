import path from 'node:path'
import dotenv from 'dotenv'
import { z } from 'zod'

dotenv.config()

const DEFAULT_PRACTICUM_ENDPOINT = 'https://practicum.yandex.ru/api/user_api/homework_statuses/'

const requiredString = z.preprocess((value) => {
  if (typeof value === 'string' && value.trim().length === 0) return undefined
  return typeof value === 'string' ? value.trim() : value
}, z.string({ required_error: 'is required' }))

const emptyToUndefined = (value: unknown) => {
  if (typeof value === 'string' && value.trim().length === 0) return undefined
  return value
}

const optionalString = z.preprocess(emptyToUndefined, z.string().optional())

const boolSchema = (defaultValue: boolean) => z.preprocess((value) => {
  if (typeof value === 'boolean') return value
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase()
    if (normalized === '') return undefined
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  }
  return value
}, z.boolean().default(defaultValue))

const integerSchema = (defaultValue: number, minValue: number) => z.preprocess((value) => {
  if (typeof value === 'string') {
    if (value.trim().length === 0) return undefined
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : value
  }
  return value
}, z.number().int().min(minValue).default(defaultValue))

const optionalIntegerSchema = (minValue: number) => z.preprocess((value) => {
  if (typeof value === 'string') {
    if (value.trim().length === 0) return undefined
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : value
  }
  return value
}, z.number().int().min(minValue).optional())

const lowercase = (value: unknown) => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase()
    return normalized.length > 0 ? normalized : undefined
  }
  return value
}

const firstStatusPolicySchema = z.preprocess(
  lowercase,
  z.enum(['notify', 'suppress', 'assume-pending']).default('notify'),
)

const logLevelSchema = z.preprocess(lowercase, z.enum(['debug', 'info', 'warn', 'error']).default('info'))

const envSchema = z.object({
  PRACTICUM_TOKEN: requiredString,
  PRACTICUM_ENDPOINT: z.preprocess(emptyToUndefined, z.string().url().default(DEFAULT_PRACTICUM_ENDPOINT)),
  TELEGRAM_TOKEN: requiredString,
  TELEGRAM_CHAT_ID: requiredString,
  TELEGRAM_THREAD_ID: optionalIntegerSchema(1),
  TELEGRAM_DISABLE_NOTIFICATION: boolSchema(false),
  POLL_INTERVAL_SECONDS: integerSchema(600, 1),
  HTTP_TIMEOUT_MS: integerSchema(10000, 1000),
  FIRST_STATUS_POLICY: firstStatusPolicySchema,
  DATA_PATH: z.string().default('.data'),
  LOG_LEVEL: logLevelSchema,
  LOG_SUMMARY_PATH: optionalString,
  LOG_DETAIL_PATH: optionalString,
  TZ: optionalString,
})

export type AppConfig = z.infer<typeof envSchema> & {
  pollIntervalMs: number
  logSummaryPath: string
  logDetailPath: string
}

export class ConfigError extends Error {
  readonly variables: string[]

  constructor(issues: z.ZodIssue[]) {
    const variables = Array.from(new Set(issues.map(issue => issue.path.join('.'))))
    const details = issues.map(issue => `${issue.path.join('.')} ${issue.message}`)
    super(`Invalid configuration: ${details.join('; ')}`)
    this.name = 'ConfigError'
    this.variables = variables
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    throw new ConfigError(result.error.issues)
  }

  const parsed = result.data
  const logsPath = path.join(parsed.DATA_PATH, 'logs')
  return {
    ...parsed,
    pollIntervalMs: parsed.POLL_INTERVAL_SECONDS * 1000,
    logSummaryPath: parsed.LOG_SUMMARY_PATH ?? path.join(logsPath, 'summary.log'),
    logDetailPath: parsed.LOG_DETAIL_PATH ?? path.join(logsPath, 'detail.log'),
  }
}
