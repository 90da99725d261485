import type {
  ForwarderError,
  HeaderList,
  OutboundClient,
  OutboundResponse
} from '@artifact-proxy/forwarder'
import type {StructuredLogger} from '@artifact-proxy/logging'

export type ArtifactLookup = {
  /** Request path, still percent-encoded, starting with `/`. */
  path: string
  method: 'GET' | 'HEAD'
  headers?: HeaderList
  signal?: AbortSignal
}

export type ArtifactResolution =
  | {kind: 'found'; origin: string; response: OutboundResponse}
  | {kind: 'missing'}
  | {kind: 'failed'; status: 502 | 504; error: ForwarderError}
  | {kind: 'aborted'}

/** Locates artifact bytes. Storage and mirroring live behind this seam. */
export interface ArtifactResolver {
  resolve(lookup: ArtifactLookup): Promise<ArtifactResolution>
}

const MISSING_STATUSES = new Set([404, 410])
const TIMEOUT_CODES = new Set<ForwarderError['code']>(['upstream_timeout', 'pool_acquire_timeout'])

export const toGatewayStatus = (error: ForwarderError): 502 | 504 =>
  TIMEOUT_CODES.has(error.code) ? 504 : 502

const isMiss = (error: ForwarderError) =>
  error.code === 'upstream_bad_status' && error.status_code !== undefined && MISSING_STATUSES.has(error.status_code)

/**
 * Passes requests through to each origin in turn. A 404 or 410 moves on to
 * the next origin; so does any other failure, and the first such failure is
 * what the caller sees when no origin has the artifact.
 */
export const createOriginArtifactResolver = ({
  client,
  origins,
  logger
}: {
  client: Pick<OutboundClient, 'fetch'>
  origins: readonly string[]
  logger: StructuredLogger
}): ArtifactResolver => {
  if (origins.length === 0) {
    throw new Error('At least one origin is required')
  }

  const resolve = async ({path, method, headers = [], signal}: ArtifactLookup): Promise<ArtifactResolution> => {
    // Bodies are relayed byte for byte, so ask origins not to encode them.
    const outboundHeaders: HeaderList = [
      ...headers.filter(header => header.name.toLowerCase() !== 'accept-encoding'),
      {name: 'accept-encoding', value: 'identity'}
    ]
    let firstFailure: {status: 502 | 504; error: ForwarderError} | undefined

    for (const origin of origins) {
      const url = `${origin}${path}`
      const fetched = await client.fetch(url, {
        method,
        headers: outboundHeaders,
        ...(signal ? {signal} : {})
      })

      if (fetched.ok) {
        logger.debug({
          event: 'origin.fetch.succeeded',
          component: 'artifact.resolver',
          status_code: fetched.value.status_code,
          metadata: {origin, url: fetched.value.url, redirect_count: fetched.value.redirect_count}
        })
        return {kind: 'found', origin, response: fetched.value}
      }

      const error = fetched.error
      if (error.code === 'aborted') {
        return {kind: 'aborted'}
      }

      if (isMiss(error)) {
        logger.debug({
          event: 'origin.fetch.missed',
          component: 'artifact.resolver',
          ...(error.status_code !== undefined ? {status_code: error.status_code} : {}),
          metadata: {origin, url}
        })
        continue
      }

      logger.warn({
        event: 'origin.fetch.failed',
        component: 'artifact.resolver',
        message: error.message,
        reason_code: error.code,
        ...(error.status_code !== undefined ? {status_code: error.status_code} : {}),
        metadata: {origin, url: error.url ?? url}
      })
      firstFailure ??= {status: toGatewayStatus(error), error}
    }

    return firstFailure ? {kind: 'failed', ...firstFailure} : {kind: 'missing'}
  }

  return {resolve}
}
