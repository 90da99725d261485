import type {IncomingMessage, ServerResponse} from 'node:http'

import type {ProxyRequest} from '../../proxyRequest'

export type RouteHandlerContext = {
  request: IncomingMessage
  response: ServerResponse
  proxyRequest: ProxyRequest
  /** Named capture groups of the matching registration pattern. */
  params: Readonly<Record<string, string>>
  /** Aborts when the client disconnects before the response finishes. */
  signal: AbortSignal
}

export type RouteLogicHandler = (context: RouteHandlerContext) => void | Promise<void>
