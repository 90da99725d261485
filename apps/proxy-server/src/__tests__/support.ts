import {createServer, type IncomingMessage, type ServerResponse} from 'node:http'

import {createStructuredLogger, type StructuredLogWriter} from '@artifact-proxy/logging'

export type LogLine = {
  level: string
  channel: string
  event: string
  component: string
  request_id: string
  message?: string
  reason_code?: string
  status_code?: number
  duration_ms?: number
  metadata?: Record<string, unknown>
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const toLogLine = (raw: string): LogLine => {
  const parsed: unknown = JSON.parse(raw)
  if (!isRecord(parsed)) {
    throw new Error(`log line is not an object: ${raw}`)
  }

  const text = (key: string) => {
    const value = parsed[key]
    return typeof value === 'string' ? value : undefined
  }
  const count = (key: string) => {
    const value = parsed[key]
    return typeof value === 'number' ? value : undefined
  }
  const metadata = parsed.metadata

  return {
    level: text('level') ?? '',
    channel: text('channel') ?? '',
    event: text('event') ?? '',
    component: text('component') ?? '',
    request_id: text('request_id') ?? '',
    ...(text('message') !== undefined ? {message: text('message')} : {}),
    ...(text('reason_code') !== undefined ? {reason_code: text('reason_code')} : {}),
    ...(count('status_code') !== undefined ? {status_code: count('status_code')} : {}),
    ...(count('duration_ms') !== undefined ? {duration_ms: count('duration_ms')} : {}),
    ...(isRecord(metadata) ? {metadata} : {})
  }
}

/** A real structured logger whose JSON lines are kept in memory, both streams in write order. */
export const createRecordingLogger = () => {
  const lines: LogLine[] = []
  const record = (chunk: string | Uint8Array) => {
    for (const raw of String(chunk).split('\n')) {
      if (raw.trim().length > 0) {
        lines.push(toLogLine(raw))
      }
    }
    return true
  }
  const writer: StructuredLogWriter = {
    stdout: {write: record},
    stderr: {write: record}
  }
  const logger = createStructuredLogger({
    service: 'artifact-proxy',
    env: 'test',
    level: 'debug',
    writer
  })

  return {
    logger,
    lines,
    onChannel: (channel: string) => lines.filter(line => line.channel === channel)
  }
}

export const isListenPermissionError = (error: unknown) =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'EPERM'

/** Serves `listener` on an ephemeral loopback port, or returns null where sockets cannot bind. */
export const listenOnLoopback = async (
  listener: (request: IncomingMessage, response: ServerResponse) => Promise<void>
) => {
  const server = createServer((request, response) => {
    void listener(request, response)
  })

  try {
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(0, '127.0.0.1', () => {
        server.off('error', reject)
        resolve()
      })
    })
  } catch (error) {
    if (isListenPermissionError(error)) {
      return null
    }
    throw error
  }

  const address = server.address()
  if (!address || typeof address === 'string') {
    throw new Error('expected tcp address')
  }

  return {
    baseUrl: `http://127.0.0.1:${String(address.port)}`,
    close: () =>
      new Promise<void>(resolve => {
        server.close(() => resolve())
        server.closeAllConnections()
      })
  }
}

export const createDeferred = <T = void>() => {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>(settle => {
    resolve = settle
  })

  return {promise, resolve}
}
