import type {Server} from 'node:http'

export type ProxyRuntime = {
  server: Server
  start: () => Promise<void>
  /** Stops accepting connections and resolves once in-flight requests finish. */
  stop: () => Promise<void>
}

export const createProxyRuntime = ({
  server,
  host,
  port
}: {
  server: Server
  host: string
  port: number
}): ProxyRuntime => {
  const start = async () =>
    new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(port, host, () => {
        server.off('error', reject)
        resolve()
      })
    })

  const stop = async () =>
    new Promise<void>(resolve => {
      server.close(() => resolve())
      server.closeIdleConnections()
    })

  return {
    server,
    start,
    stop
  }
}
