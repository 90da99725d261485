import {createServer, type Server} from 'node:http'

import {createOutboundClient, type FetchLike, type OutboundClient} from '@artifact-proxy/forwarder'
import {createStructuredLogger, LOG_CHANNELS, type StructuredLogger} from '@artifact-proxy/logging'

import {createAccessRecorder} from './accessRecorder'
import {createOriginArtifactResolver, type ArtifactResolver} from './artifacts'
import type {ServiceConfig} from './config'
import {createErrorReporter} from './errorReporter'
import {createProxyRequestHandler} from './http/requestHandler'
import {createRouter, type HandlerRegistrationInput, type Router} from './http/router'
import {createArtifactRoute} from './http/routes/artifactRoute'
import {handleHealthRoute} from './http/routes/healthRoute'
import {createProxyRuntime} from './runtime'

export const SERVICE_NAME = 'artifact-proxy'

export const createDefaultLogger = (config: ServiceConfig) =>
  createStructuredLogger({
    service: SERVICE_NAME,
    env: config.nodeEnv,
    level: config.logging.level,
    channel: LOG_CHANNELS.server
  })

export const createOutboundClientFromConfig = ({
  config,
  fetchImpl
}: {
  config: ServiceConfig
  fetchImpl?: FetchLike
}) =>
  createOutboundClient({
    options: {
      user_agent: config.userAgent,
      worker_count: config.downloadThreads,
      follow_redirects: true,
      max_redirects: config.maxRedirects,
      max_chunk_size: config.maxChunkSize,
      total_timeout_ms: config.fetchTimeoutMs,
      acquire_timeout_ms: config.poolAcquireTimeoutMs,
      allocator: config.bufferAllocator
    },
    ...(fetchImpl ? {fetchImpl} : {})
  })

export const createRegistrations = ({
  resolver,
  config,
  logger
}: {
  resolver: ArtifactResolver
  config: ServiceConfig
  logger: StructuredLogger
}): HandlerRegistrationInput[] => [
  {
    name: 'health',
    pattern: /^\/healthz$/u,
    methods: ['GET', 'HEAD'],
    priority: 0,
    handler: handleHealthRoute
  },
  {
    name: 'artifact',
    pattern: /^\/(?<path>.+)$/u,
    methods: ['GET', 'HEAD'],
    priority: 100,
    handler: createArtifactRoute({
      resolver,
      compression: config.httpCompression,
      logger: logger.channel(LOG_CHANNELS.download)
    })
  }
]

export type ProxyApp = {
  server: Server
  client: OutboundClient
  router: Router
  start: () => Promise<void>
  stop: () => Promise<void>
}

/**
 * Composes the proxy: outbound client, then error reporter and access
 * recorder, then router, server and runtime. `stop` drains requests before
 * the outbound client closes.
 */
export const createProxyApp = ({
  config,
  logger = createDefaultLogger(config),
  fetchImpl,
  now
}: {
  config: ServiceConfig
  logger?: StructuredLogger
  fetchImpl?: FetchLike
  now?: () => number
}): ProxyApp => {
  const client = createOutboundClientFromConfig({config, ...(fetchImpl ? {fetchImpl} : {})})
  const errorReporter = createErrorReporter({logger})
  const accessRecorder = createAccessRecorder({logger, ...(now ? {now} : {})})
  const resolver = createOriginArtifactResolver({
    client,
    origins: config.origins,
    logger: logger.channel(LOG_CHANNELS.download)
  })
  const router = createRouter({
    registrations: createRegistrations({resolver, config, logger}),
    workerCount: config.backgroundThreads
  })
  const requestHandler = createProxyRequestHandler({
    router,
    errorReporter,
    accessRecorder,
    logger,
    ...(now ? {now} : {})
  })
  const server = createServer((request, response) => {
    void requestHandler(request, response)
  })
  const runtime = createProxyRuntime({server, host: config.host, port: config.port})

  const start = async () => {
    await runtime.start()
    const address = server.address()
    logger.info({
      event: 'server.started',
      component: 'http.server',
      message: 'Artifact proxy listening',
      metadata: {
        address: typeof address === 'string' ? address : address ? `${address.address}:${String(address.port)}` : null,
        origins: config.origins,
        download_threads: config.downloadThreads,
        background_threads: config.backgroundThreads
      }
    })
  }

  const stop = async () => {
    await runtime.stop()
    await client.close()
    logger.info({
      event: 'server.stopped',
      component: 'http.server',
      message: 'Artifact proxy stopped'
    })
  }

  return {
    server,
    client,
    router,
    start,
    stop
  }
}
