import type {ServerResponse} from 'node:http'

import {z} from 'zod'

const DEFAULT_RESPONSE_HEADERS: Record<string, string> = {
  'x-content-type-options': 'nosniff',
  'cache-control': 'no-store'
}

export const ErrorBodySchema = z
  .object({
    error: z.string().min(1),
    message: z.string(),
    request_id: z.string().min(1)
  })
  .strict()

export type ErrorBody = z.infer<typeof ErrorBodySchema>

const serialize = (value: unknown) => Buffer.from(JSON.stringify(value), 'utf8')

export const sendJson = ({
  response,
  status,
  requestId,
  payload,
  headers
}: {
  response: ServerResponse
  status: number
  requestId: string
  payload: unknown
  headers?: Record<string, string>
}) => {
  const body = serialize(payload)

  response.writeHead(status, {
    ...DEFAULT_RESPONSE_HEADERS,
    'content-type': 'application/json; charset=utf-8',
    'content-length': String(body.length),
    'x-request-id': requestId,
    ...(headers ?? {})
  })

  response.end(body)
}

export const sendError = ({
  response,
  status,
  error,
  message,
  requestId
}: {
  response: ServerResponse
  status: number
  error: string
  message: string
  requestId: string
}) => {
  const payload = ErrorBodySchema.parse({
    error,
    message,
    request_id: requestId
  })

  sendJson({
    response,
    status,
    payload,
    requestId
  })
}

const serverTerminated = new WeakSet<ServerResponse>()

/** Ends a response that can no longer carry a well-formed reply. */
export const terminateResponse = (response: ServerResponse) => {
  serverTerminated.add(response)
  if (!response.destroyed) {
    response.destroy()
  }
}

/** True when the server, not the peer, cut the response short. */
export const wasTerminatedByServer = (response: ServerResponse) => serverTerminated.has(response)
