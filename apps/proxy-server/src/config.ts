import {LogLevelSchema, type LogLevel} from '@artifact-proxy/logging'
import {BufferAllocatorSchema, type BufferAllocator} from '@artifact-proxy/forwarder'
import {z} from 'zod'

const integerFromEnv = (schema: z.ZodNumber) =>
  z.preprocess(value => {
    if (typeof value !== 'string' || value.trim().length === 0) {
      return value
    }

    const trimmed = value.trim()
    return /^-?\d+$/u.test(trimmed) ? Number.parseInt(trimmed, 10) : value
  }, schema)

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

const DEFAULT_ORIGINS = 'https://repo1.maven.org/maven2'

const parseOrigins = ({raw, envVarName}: {raw: string; envVarName: string}) => {
  const origins = raw
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0)

  if (origins.length === 0) {
    throw new Error(`${envVarName} must name at least one origin`)
  }

  return origins.map(origin => {
    let parsed: URL
    try {
      parsed = new URL(origin)
    } catch {
      throw new Error(`${envVarName} contains an invalid URL origin: ${origin}`)
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new Error(`${envVarName} contains an unsupported origin protocol: ${origin}`)
    }

    return parsed.href.replace(/\/+$/u, '')
  })
}

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    ARTIFACT_PROXY_HOST: z.string().trim().min(1).default('0.0.0.0'),
    ARTIFACT_PROXY_PORT: integerFromEnv(z.number().int().min(0).max(65_535)).default(5956),
    ARTIFACT_PROXY_ORIGINS: optionalString,
    ARTIFACT_PROXY_DOWNLOAD_THREADS: integerFromEnv(z.number().int().min(1).max(1024)).default(24),
    ARTIFACT_PROXY_BACKGROUND_THREADS: integerFromEnv(z.number().int().min(1).max(4096)).default(40),
    ARTIFACT_PROXY_HTTP_COMPRESSION: booleanFromEnv.default(true),
    ARTIFACT_PROXY_BUFFER_ALLOCATOR: BufferAllocatorSchema.default('pooled'),
    ARTIFACT_PROXY_USER_AGENT: z.string().trim().min(1).default('artifact-proxy/1.0'),
    ARTIFACT_PROXY_MAX_CHUNK_SIZE: integerFromEnv(z.number().int().min(1).max(16 * 1024 * 1024)).default(16_384),
    ARTIFACT_PROXY_MAX_REDIRECTS: integerFromEnv(z.number().int().min(0).max(20)).default(5),
    ARTIFACT_PROXY_FETCH_TIMEOUT_MS: integerFromEnv(z.number().int().min(100).max(600_000)).default(30_000),
    ARTIFACT_PROXY_POOL_ACQUIRE_TIMEOUT_MS: integerFromEnv(z.number().int().min(1).max(600_000)).default(30_000),
    ARTIFACT_PROXY_LOG_LEVEL: LogLevelSchema.optional()
  })
  .strict()

type EnvKey = keyof z.input<typeof envSchema>

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  host: string
  port: number
  origins: string[]
  downloadThreads: number
  backgroundThreads: number
  httpCompression: boolean
  bufferAllocator: BufferAllocator
  userAgent: string
  maxChunkSize: number
  maxRedirects: number
  fetchTimeoutMs: number
  poolAcquireTimeoutMs: number
  logging: {
    level: LogLevel
  }
}

/** Command-line flag names, each overriding one environment variable. */
export const CONFIG_FLAGS = {
  host: 'ARTIFACT_PROXY_HOST',
  port: 'ARTIFACT_PROXY_PORT',
  origins: 'ARTIFACT_PROXY_ORIGINS',
  'download.threads': 'ARTIFACT_PROXY_DOWNLOAD_THREADS',
  'background.threads': 'ARTIFACT_PROXY_BACKGROUND_THREADS',
  'http.compression': 'ARTIFACT_PROXY_HTTP_COMPRESSION',
  'buffer.allocator': 'ARTIFACT_PROXY_BUFFER_ALLOCATOR',
  'user.agent': 'ARTIFACT_PROXY_USER_AGENT',
  'max.chunk.size': 'ARTIFACT_PROXY_MAX_CHUNK_SIZE',
  'max.redirects': 'ARTIFACT_PROXY_MAX_REDIRECTS',
  'fetch.timeout.ms': 'ARTIFACT_PROXY_FETCH_TIMEOUT_MS',
  'pool.acquire.timeout.ms': 'ARTIFACT_PROXY_POOL_ACQUIRE_TIMEOUT_MS',
  'log.level': 'ARTIFACT_PROXY_LOG_LEVEL'
} as const satisfies Record<string, Exclude<EnvKey, 'NODE_ENV'>>

const isConfigFlag = (name: string): name is keyof typeof CONFIG_FLAGS => Object.hasOwn(CONFIG_FLAGS, name)

/**
 * Reads `--name value` and `--name=value` pairs. A flag with no value, or one
 * followed directly by another flag, reads as `true`.
 */
export const parseConfigFlags = (argv: readonly string[]) => {
  const overrides: Partial<Record<EnvKey, string>> = {}

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? ''
    if (!arg.startsWith('--') || arg.length === 2) {
      throw new Error(`Unexpected argument: ${arg}`)
    }

    const body = arg.slice(2)
    const separator = body.indexOf('=')
    const name = separator >= 0 ? body.slice(0, separator) : body
    if (!isConfigFlag(name)) {
      throw new Error(`Unknown option --${name}`)
    }

    let value: string
    if (separator >= 0) {
      value = body.slice(separator + 1)
    } else {
      const next = argv[index + 1]
      if (next === undefined || next.startsWith('--')) {
        value = 'true'
      } else {
        value = next
        index += 1
      }
    }

    overrides[CONFIG_FLAGS[name]] = value
  }

  return overrides
}

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  ARTIFACT_PROXY_HOST: env.ARTIFACT_PROXY_HOST,
  ARTIFACT_PROXY_PORT: env.ARTIFACT_PROXY_PORT,
  ARTIFACT_PROXY_ORIGINS: env.ARTIFACT_PROXY_ORIGINS,
  ARTIFACT_PROXY_DOWNLOAD_THREADS: env.ARTIFACT_PROXY_DOWNLOAD_THREADS,
  ARTIFACT_PROXY_BACKGROUND_THREADS: env.ARTIFACT_PROXY_BACKGROUND_THREADS,
  ARTIFACT_PROXY_HTTP_COMPRESSION: env.ARTIFACT_PROXY_HTTP_COMPRESSION,
  ARTIFACT_PROXY_BUFFER_ALLOCATOR: env.ARTIFACT_PROXY_BUFFER_ALLOCATOR,
  ARTIFACT_PROXY_USER_AGENT: env.ARTIFACT_PROXY_USER_AGENT,
  ARTIFACT_PROXY_MAX_CHUNK_SIZE: env.ARTIFACT_PROXY_MAX_CHUNK_SIZE,
  ARTIFACT_PROXY_MAX_REDIRECTS: env.ARTIFACT_PROXY_MAX_REDIRECTS,
  ARTIFACT_PROXY_FETCH_TIMEOUT_MS: env.ARTIFACT_PROXY_FETCH_TIMEOUT_MS,
  ARTIFACT_PROXY_POOL_ACQUIRE_TIMEOUT_MS: env.ARTIFACT_PROXY_POOL_ACQUIRE_TIMEOUT_MS,
  ARTIFACT_PROXY_LOG_LEVEL: env.ARTIFACT_PROXY_LOG_LEVEL
})

export const loadConfig = (
  env: NodeJS.ProcessEnv = process.env,
  argv: readonly string[] = []
): ServiceConfig => {
  const parsed = envSchema.parse({...toEnvInput(env), ...parseConfigFlags(argv)})

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.ARTIFACT_PROXY_HOST,
    port: parsed.ARTIFACT_PROXY_PORT,
    origins: parseOrigins({
      raw: parsed.ARTIFACT_PROXY_ORIGINS ?? DEFAULT_ORIGINS,
      envVarName: 'ARTIFACT_PROXY_ORIGINS'
    }),
    downloadThreads: parsed.ARTIFACT_PROXY_DOWNLOAD_THREADS,
    backgroundThreads: parsed.ARTIFACT_PROXY_BACKGROUND_THREADS,
    httpCompression: parsed.ARTIFACT_PROXY_HTTP_COMPRESSION,
    bufferAllocator: parsed.ARTIFACT_PROXY_BUFFER_ALLOCATOR,
    userAgent: parsed.ARTIFACT_PROXY_USER_AGENT,
    maxChunkSize: parsed.ARTIFACT_PROXY_MAX_CHUNK_SIZE,
    maxRedirects: parsed.ARTIFACT_PROXY_MAX_REDIRECTS,
    fetchTimeoutMs: parsed.ARTIFACT_PROXY_FETCH_TIMEOUT_MS,
    poolAcquireTimeoutMs: parsed.ARTIFACT_PROXY_POOL_ACQUIRE_TIMEOUT_MS,
    logging: {
      level: parsed.ARTIFACT_PROXY_LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'silent' : 'info')
    }
  }
}
