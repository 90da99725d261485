import {LOG_CHANNELS, type StructuredLogger} from '@artifact-proxy/logging'

import type {ProxyRequest} from './proxyRequest'

/** Status recorded for a request whose client went away before the response finished. */
export const CLIENT_CLOSED_REQUEST_STATUS = 499

export type AccessRecord = Readonly<{
  id: string
  method: string
  address: string
  path: string
  status: number
  dur: number
}>

export type AccessRecorder = {
  onBeforeDispatch: (request: ProxyRequest) => void
  /** Emits the access record for `request`. Later calls for the same request are ignored. */
  onComplete: (request: ProxyRequest, status: number) => AccessRecord | undefined
}

export const createAccessRecorder = ({
  logger,
  now = Date.now
}: {
  logger: StructuredLogger
  now?: () => number
}): AccessRecorder => {
  const accessLogger = logger.channel(LOG_CHANNELS.access)
  const completed = new WeakSet<ProxyRequest>()

  const onComplete = (request: ProxyRequest, status: number) => {
    if (completed.has(request)) {
      return undefined
    }
    completed.add(request)

    const record: AccessRecord = Object.freeze({
      id: request.requestId,
      method: request.method,
      address: request.remoteAddress,
      path: request.path,
      status,
      dur: Math.max(0, Math.round(now() - request.startedAtMs))
    })

    accessLogger.debug({
      event: 'request',
      component: 'access.recorder',
      request_id: record.id,
      status_code: record.status,
      duration_ms: record.dur,
      metadata: record
    })
    return record
  }

  return {
    onBeforeDispatch: () => {},
    onComplete
  }
}
