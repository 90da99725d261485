import {randomUUID} from 'node:crypto'
import type {IncomingMessage} from 'node:http'

/** One inbound call, fixed when the server accepts it. */
export type ProxyRequest = Readonly<{
  requestId: string
  method: string
  path: string
  remoteAddress: string
  startedAtMs: number
}>

export const UNKNOWN_REMOTE_ADDRESS = 'unknown'

const stripQueryAndFragment = (rawUrl: string) => {
  const cut = rawUrl.search(/[?#]/u)
  const path = cut >= 0 ? rawUrl.slice(0, cut) : rawUrl
  return path.length > 0 ? path : '/'
}

export const createProxyRequest = ({
  request,
  now = Date.now
}: {
  request: Pick<IncomingMessage, 'method' | 'url' | 'socket'>
  now?: () => number
}): ProxyRequest =>
  Object.freeze({
    requestId: randomUUID(),
    method: (request.method ?? 'GET').toUpperCase(),
    path: stripQueryAndFragment(request.url ?? '/'),
    remoteAddress: request.socket.remoteAddress ?? UNKNOWN_REMOTE_ADDRESS,
    startedAtMs: now()
  })
