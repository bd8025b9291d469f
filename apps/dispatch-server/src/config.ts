import {supportedCharsets, type Charset} from '@switchyard/http'
import {LogLevelSchema, type LogLevel} from '@switchyard/logging'
import {z} from 'zod'

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? value : parsed
}, z.number().int().nonnegative())

const booleanFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value
  }

  const normalized = value.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1') {
    return true
  }
  if (normalized === 'false' || normalized === '0') {
    return false
  }

  return value
}, z.boolean())

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().optional())

const charsetFromEnv = z.preprocess(
  value => (typeof value === 'string' ? value.trim().toLowerCase() : value),
  z.enum(supportedCharsets)
)

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    DISPATCH_SERVER_HOST: z.string().default('0.0.0.0'),
    DISPATCH_SERVER_PORT: numberFromEnv.pipe(z.number().lte(65_535)).default(8080),
    DISPATCH_SERVER_DEFAULT_CHARSET: charsetFromEnv.default('utf-8'),
    DISPATCH_SERVER_UNBINDABLE_ARGUMENT_STATUS: z
      .preprocess(
        value => (typeof value === 'string' ? Number.parseInt(value, 10) : value),
        z.union([z.literal(404), z.literal(400)])
      )
      .default(404),
    DISPATCH_SERVER_KEEP_ALIVE_TIMEOUT_MS: numberFromEnv.default(5_000),
    DISPATCH_SERVER_LOG_LEVEL: z.preprocess(
      value => (typeof value === 'string' ? value.trim().toLowerCase() : value),
      LogLevelSchema.optional()
    ),
    DISPATCH_SERVER_LOG_REDACT_EXTRA_KEYS: optionalString,
    DISPATCH_SERVER_TRACE_BODY_STREAMS: booleanFromEnv.default(false)
  })
  .strict()

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  host: string
  port: number
  defaultCharset: Charset
  unbindableArgumentStatus: 404 | 400
  keepAliveTimeoutMs: number
  logging: {
    level: LogLevel
    redactExtraKeys: string[]
  }
  traceBodyStreams: boolean
}

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  DISPATCH_SERVER_HOST: env.DISPATCH_SERVER_HOST,
  DISPATCH_SERVER_PORT: env.DISPATCH_SERVER_PORT,
  DISPATCH_SERVER_DEFAULT_CHARSET: env.DISPATCH_SERVER_DEFAULT_CHARSET,
  DISPATCH_SERVER_UNBINDABLE_ARGUMENT_STATUS: env.DISPATCH_SERVER_UNBINDABLE_ARGUMENT_STATUS,
  DISPATCH_SERVER_KEEP_ALIVE_TIMEOUT_MS: env.DISPATCH_SERVER_KEEP_ALIVE_TIMEOUT_MS,
  DISPATCH_SERVER_LOG_LEVEL: env.DISPATCH_SERVER_LOG_LEVEL,
  DISPATCH_SERVER_LOG_REDACT_EXTRA_KEYS: env.DISPATCH_SERVER_LOG_REDACT_EXTRA_KEYS,
  DISPATCH_SERVER_TRACE_BODY_STREAMS: env.DISPATCH_SERVER_TRACE_BODY_STREAMS
})

const parseKeyList = (raw: string | undefined) =>
  (raw ?? '')
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0)

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const values = envSchema.parse(toEnvInput(env))

  return {
    nodeEnv: values.NODE_ENV,
    host: values.DISPATCH_SERVER_HOST,
    port: values.DISPATCH_SERVER_PORT,
    defaultCharset: values.DISPATCH_SERVER_DEFAULT_CHARSET,
    unbindableArgumentStatus: values.DISPATCH_SERVER_UNBINDABLE_ARGUMENT_STATUS,
    keepAliveTimeoutMs: values.DISPATCH_SERVER_KEEP_ALIVE_TIMEOUT_MS,
    logging: {
      level: values.DISPATCH_SERVER_LOG_LEVEL ?? (values.NODE_ENV === 'test' ? 'silent' : 'info'),
      redactExtraKeys: parseKeyList(values.DISPATCH_SERVER_LOG_REDACT_EXTRA_KEYS)
    },
    traceBodyStreams: values.DISPATCH_SERVER_TRACE_BODY_STREAMS
  }
}
