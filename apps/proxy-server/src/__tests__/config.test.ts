import {describe, expect, it} from 'vitest'

import {loadConfig, parseConfigFlags} from '../config'

describe('proxy config', () => {
  it('loads defaults from minimal env input', () => {
    const config = loadConfig({NODE_ENV: 'test'})

    expect(config).toEqual({
      nodeEnv: 'test',
      host: '0.0.0.0',
      port: 5956,
      origins: ['https://repo1.maven.org/maven2'],
      downloadThreads: 24,
      backgroundThreads: 40,
      httpCompression: true,
      bufferAllocator: 'pooled',
      userAgent: 'artifact-proxy/1.0',
      maxChunkSize: 16_384,
      maxRedirects: 5,
      fetchTimeoutMs: 30_000,
      poolAcquireTimeoutMs: 30_000,
      logging: {level: 'silent'}
    })
  })

  it('defaults the log level to info outside tests', () => {
    expect(loadConfig({NODE_ENV: 'production'}).logging.level).toBe('info')
  })

  it('parses explicit env overrides and ignores unrelated env vars', () => {
    const config = loadConfig({
      NODE_ENV: 'development',
      ARTIFACT_PROXY_HOST: '127.0.0.1',
      ARTIFACT_PROXY_PORT: '9100',
      ARTIFACT_PROXY_ORIGINS: 'https://mirror.test/maven2/, http://fallback.test',
      ARTIFACT_PROXY_DOWNLOAD_THREADS: '8',
      ARTIFACT_PROXY_BACKGROUND_THREADS: '16',
      ARTIFACT_PROXY_HTTP_COMPRESSION: 'false',
      ARTIFACT_PROXY_BUFFER_ALLOCATOR: 'unpooled',
      ARTIFACT_PROXY_USER_AGENT: 'custom-agent/2.0',
      ARTIFACT_PROXY_MAX_CHUNK_SIZE: '4096',
      ARTIFACT_PROXY_MAX_REDIRECTS: '0',
      ARTIFACT_PROXY_FETCH_TIMEOUT_MS: '5000',
      ARTIFACT_PROXY_POOL_ACQUIRE_TIMEOUT_MS: '250',
      ARTIFACT_PROXY_LOG_LEVEL: 'debug',
      UNRELATED_ENV: 'ignored'
    })

    expect(config).toEqual({
      nodeEnv: 'development',
      host: '127.0.0.1',
      port: 9100,
      origins: ['https://mirror.test/maven2', 'http://fallback.test'],
      downloadThreads: 8,
      backgroundThreads: 16,
      httpCompression: false,
      bufferAllocator: 'unpooled',
      userAgent: 'custom-agent/2.0',
      maxChunkSize: 4096,
      maxRedirects: 0,
      fetchTimeoutMs: 5000,
      poolAcquireTimeoutMs: 250,
      logging: {level: 'debug'}
    })
  })

  it('lets command-line flags override the environment', () => {
    const config = loadConfig({NODE_ENV: 'test', ARTIFACT_PROXY_PORT: '9100', ARTIFACT_PROXY_HTTP_COMPRESSION: 'false'}, [
      '--port',
      '7000',
      '--download.threads=12',
      '--http.compression'
    ])

    expect(config.port).toBe(7000)
    expect(config.downloadThreads).toBe(12)
    expect(config.httpCompression).toBe(true)
  })

  it('maps flags to env variable names', () => {
    expect(parseConfigFlags(['--buffer.allocator', 'unpooled', '--log.level=warn', '--http.compression', '--port', '1'])).toEqual({
      ARTIFACT_PROXY_BUFFER_ALLOCATOR: 'unpooled',
      ARTIFACT_PROXY_LOG_LEVEL: 'warn',
      ARTIFACT_PROXY_HTTP_COMPRESSION: 'true',
      ARTIFACT_PROXY_PORT: '1'
    })
  })

  it('rejects unknown flags and positional arguments', () => {
    expect(() => parseConfigFlags(['--verbose'])).toThrow('Unknown option --verbose')
    expect(() => parseConfigFlags(['serve'])).toThrow('Unexpected argument: serve')
  })

  it('rejects invalid values', () => {
    expect(() => loadConfig({NODE_ENV: 'test', ARTIFACT_PROXY_PORT: 'http'})).toThrow()
    expect(() => loadConfig({NODE_ENV: 'test', ARTIFACT_PROXY_DOWNLOAD_THREADS: '0'})).toThrow()
    expect(() => loadConfig({NODE_ENV: 'test', ARTIFACT_PROXY_BUFFER_ALLOCATOR: 'arena'})).toThrow()
    expect(() => loadConfig({NODE_ENV: 'test', ARTIFACT_PROXY_ORIGINS: 'ftp://mirror.test'})).toThrow(
      'ARTIFACT_PROXY_ORIGINS contains an unsupported origin protocol: ftp://mirror.test'
    )
    expect(() => loadConfig({NODE_ENV: 'test', ARTIFACT_PROXY_ORIGINS: 'not a url'})).toThrow(
      'ARTIFACT_PROXY_ORIGINS contains an invalid URL origin: not a url'
    )
  })
})
