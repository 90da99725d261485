import {createNoopLogger, type StructuredLogger} from '@artifact-proxy/logging'
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest'
import {createRecordingLogger} from './support'

const originalArgv = [...process.argv]

const flushMicrotasks = async () => {
  await new Promise<void>(resolve => {
    setTimeout(() => resolve(), 0)
  })
}

beforeEach(() => {
  process.argv = [...originalArgv]
})

afterEach(() => {
  process.argv = [...originalArgv]
  vi.restoreAllMocks()
  vi.resetModules()
})

const mockApp = ({
  start,
  stop,
  logger = createNoopLogger()
}: {
  start: () => Promise<void>
  stop: () => Promise<void>
  logger?: StructuredLogger
}) => {
  const createProxyApp = vi.fn(() => ({start, stop}))
  vi.doMock('../app', () => ({
    SERVICE_NAME: 'artifact-proxy',
    createDefaultLogger: () => logger,
    createProxyApp
  }))
  return createProxyApp
}

describe('proxy-server index entrypoint', () => {
  it('does not auto-start when imported as a non-entry module', async () => {
    const createProxyApp = mockApp({start: vi.fn(), stop: vi.fn()})
    const loadConfig = vi.fn()
    vi.doMock('../config', () => ({loadConfig}))
    vi.doMock('node:url', () => ({
      fileURLToPath: vi.fn(() => '/virtual/index.ts')
    }))

    process.argv[1] = '/virtual/other-entry.js'

    const imported = await import('../index')
    await flushMicrotasks()

    expect(imported.appName).toBe('artifact-proxy')
    expect(loadConfig).not.toHaveBeenCalled()
    expect(createProxyApp).not.toHaveBeenCalled()
  }, 15_000)

  it('starts when run as the entry module and stops on SIGINT', async () => {
    const start = vi.fn(() => Promise.resolve())
    const stop = vi.fn(() => Promise.resolve())
    const createProxyApp = mockApp({start, stop})
    const loadConfig = vi.fn(() => ({nodeEnv: 'test'}))
    vi.doMock('../config', () => ({loadConfig}))
    vi.doMock('node:url', () => ({
      fileURLToPath: vi.fn(() => '/virtual/entry.js')
    }))

    process.argv = ['node', '/virtual/entry.js', '--port', '7000']

    const onceSpy = vi.spyOn(process, 'once').mockImplementation(() => process)
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => undefined) as never)

    await import('../index')
    await flushMicrotasks()

    expect(loadConfig).toHaveBeenCalledWith(process.env, ['--port', '7000'])
    expect(createProxyApp).toHaveBeenCalledTimes(1)
    expect(start).toHaveBeenCalledTimes(1)

    const sigintHandler = onceSpy.mock.calls.find(call => call[0] === 'SIGINT')?.[1]
    expect(typeof sigintHandler).toBe('function')
    if (typeof sigintHandler === 'function') {
      sigintHandler('SIGINT')
    }
    await flushMicrotasks()

    expect(stop).toHaveBeenCalledTimes(1)
    expect(exitSpy).toHaveBeenCalledWith(0)
  }, 15_000)

  it('logs a fatal shutdown failure and exits with status 1', async () => {
    const recording = createRecordingLogger()
    const stop = vi.fn(() => Promise.reject(new Error('drain failed')))
    mockApp({start: vi.fn(() => Promise.resolve()), stop, logger: recording.logger})
    vi.doMock('../config', () => ({loadConfig: vi.fn(() => ({nodeEnv: 'test'}))}))
    vi.doMock('node:url', () => ({
      fileURLToPath: vi.fn(() => '/virtual/entry.js')
    }))

    process.argv = ['node', '/virtual/entry.js']

    const onceSpy = vi.spyOn(process, 'once').mockImplementation(() => process)
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => undefined) as never)

    await import('../index')
    await flushMicrotasks()

    const sigtermHandler = onceSpy.mock.calls.find(call => call[0] === 'SIGTERM')?.[1]
    expect(typeof sigtermHandler).toBe('function')
    if (typeof sigtermHandler === 'function') {
      sigtermHandler('SIGTERM')
    }
    await flushMicrotasks()

    expect(stop).toHaveBeenCalledTimes(1)
    expect(exitSpy).toHaveBeenCalledWith(1)
    expect(exitSpy).not.toHaveBeenCalledWith(0)
    expect(recording.lines.find(line => line.event === 'process.stop.failed')).toMatchObject({
      level: 'fatal',
      reason_code: 'shutdown_failed'
    })
  }, 15_000)

  it('logs a fatal startup failure and exits with status 1', async () => {
    mockApp({start: vi.fn(() => Promise.reject(new Error('listen EADDRINUSE'))), stop: vi.fn()})
    vi.doMock('../config', () => ({loadConfig: vi.fn(() => ({nodeEnv: 'test'}))}))
    vi.doMock('node:url', () => ({
      fileURLToPath: vi.fn(() => '/virtual/entry.js')
    }))

    process.argv = ['node', '/virtual/entry.js']

    const written: string[] = []
    vi.spyOn(process.stderr, 'write').mockImplementation(chunk => {
      written.push(String(chunk))
      return true
    })
    vi.spyOn(process, 'once').mockImplementation(() => process)
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => undefined) as never)

    await import('../index')
    await flushMicrotasks()

    expect(exitSpy).toHaveBeenCalledWith(1)
    const fatalLine = written.find(line => line.includes('"process.startup.failed"'))
    expect(fatalLine).toBeDefined()
    expect(JSON.parse(fatalLine ?? '{}')).toMatchObject({level: 'fatal', reason_code: 'startup_failed', service: 'artifact-proxy'})
  }, 15_000)
})
