import {fileURLToPath} from 'node:url'

import {createStructuredLogger} from '@artifact-proxy/logging'

import {createDefaultLogger, createProxyApp, SERVICE_NAME} from './app'
import {loadConfig} from './config'

export const appName = SERVICE_NAME

export * from './accessRecorder'
export * from './app'
export * from './artifacts'
export * from './config'
export * from './errorReporter'
export * from './errors'
export * from './http'
export * from './http/requestHandler'
export * from './http/router'
export * from './proxyRequest'
export * from './runtime'

const main = async () => {
  const config = loadConfig(process.env, process.argv.slice(2))
  const logger = createDefaultLogger(config)
  const app = createProxyApp({config, logger})

  await app.start()
  logger.info({
    event: 'process.started',
    component: 'process.entrypoint',
    message: 'Artifact proxy started',
    metadata: {pid: process.pid}
  })

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info({
      event: 'process.stopping',
      component: 'process.entrypoint',
      message: `Received ${signal}`
    })
    try {
      await app.stop()
    } catch (error) {
      logger.fatal({
        event: 'process.stop.failed',
        component: 'process.entrypoint',
        message: 'Artifact proxy shutdown failed',
        reason_code: 'shutdown_failed',
        metadata: {
          error
        }
      })
      process.exit(1)
      return
    }

    process.exit(0)
  }

  process.once('SIGINT', signal => {
    void shutdown(signal)
  })
  process.once('SIGTERM', signal => {
    void shutdown(signal)
  })
}

const isMainModule = (() => {
  const currentFile = fileURLToPath(import.meta.url)
  const entryFile = process.argv[1]
  if (!entryFile) {
    return false
  }

  return currentFile === entryFile
})()

if (isMainModule) {
  void main().catch(error => {
    const env = process.env.NODE_ENV === 'production' ? 'production' : process.env.NODE_ENV === 'test' ? 'test' : 'development'
    const startupLogger = createStructuredLogger({
      service: appName,
      env,
      level: 'error'
    })
    startupLogger.fatal({
      event: 'process.startup.failed',
      component: 'process.entrypoint',
      message: 'Artifact proxy startup failed',
      reason_code: 'startup_failed',
      metadata: {
        error
      }
    })
    process.exit(1)
  })
}
