import type {ServerResponse} from 'node:http'
import {Readable} from 'node:stream'
import {pipeline} from 'node:stream/promises'
import {createGzip} from 'node:zlib'

import {isForwarderStreamError, type OutboundResponse} from '@artifact-proxy/forwarder'
import type {StructuredLogger} from '@artifact-proxy/logging'

import type {ArtifactResolver} from '../../artifacts'
import {badGateway, badRequest, gatewayTimeout, notFound} from '../../errors'
import {terminateResponse} from '../../http'
import type {RouteLogicHandler} from './types'

const FORWARDED_RESPONSE_HEADERS = ['content-type', 'content-length', 'last-modified', 'etag', 'cache-control'] as const

const COMPRESSIBLE_CONTENT_TYPE = /^text\/|[/+](?:xml|json|javascript)\b/iu

export const validateArtifactPath = (path: string) => {
  for (const segment of path.split('/').slice(1)) {
    let decoded: string
    try {
      decoded = decodeURIComponent(segment)
    } catch {
      throw badRequest('path_invalid', 'Artifact path encoding is invalid')
    }

    if (decoded === '..' || decoded === '.' || /[/\\\0]/u.test(decoded)) {
      throw badRequest('path_invalid', 'Artifact path must not contain relative or encoded separator segments')
    }
  }

  return path
}

export const acceptsGzip = (header: string | string[] | undefined) => {
  const raw = Array.isArray(header) ? header.join(',') : (header ?? '')

  return raw.split(',').some(entry => {
    const [coding = '', ...parameters] = entry.split(';').map(part => part.trim().toLowerCase())
    if (coding !== 'gzip' && coding !== '*') {
      return false
    }

    const quality = parameters.find(parameter => parameter.startsWith('q='))
    return quality === undefined || Number.parseFloat(quality.slice(2)) > 0
  })
}

export const isCompressible = (contentType: string | undefined) =>
  contentType !== undefined && COMPRESSIBLE_CONTENT_TYPE.test(contentType)

const buildResponseHeaders = ({
  upstream,
  requestId,
  gzip
}: {
  upstream: OutboundResponse
  requestId: string
  gzip: boolean
}) => {
  // A length is only valid for bytes relayed exactly as the origin sent them.
  const lengthTrusted = !gzip && upstream.headers['content-encoding'] === undefined
  const headers: Record<string, string> = {'x-request-id': requestId}

  for (const name of FORWARDED_RESPONSE_HEADERS) {
    const value = upstream.headers[name]
    if (value === undefined || (name === 'content-length' && !lengthTrusted)) {
      continue
    }

    headers[name] = value
  }

  if (gzip) {
    headers['content-encoding'] = 'gzip'
    headers.vary = 'accept-encoding'
  }

  return headers
}

const relayBody = async ({
  upstream,
  response,
  gzip
}: {
  upstream: OutboundResponse
  response: ServerResponse
  gzip: boolean
}) => {
  const source = Readable.from(upstream.body)
  if (gzip) {
    await pipeline(source, createGzip(), response)
    return
  }

  await pipeline(source, response)
}

export const createArtifactRoute = ({
  resolver,
  compression,
  logger
}: {
  resolver: ArtifactResolver
  compression: boolean
  logger: StructuredLogger
}): RouteLogicHandler => {
  return async ({request, response, proxyRequest, signal}) => {
    const path = validateArtifactPath(proxyRequest.path)
    const method = proxyRequest.method === 'HEAD' ? 'HEAD' : 'GET'
    const accept = request.headers.accept

    const resolution = await resolver.resolve({
      path,
      method,
      ...(accept ? {headers: [{name: 'accept', value: accept}]} : {}),
      signal
    })

    switch (resolution.kind) {
      case 'aborted':
        return
      case 'missing':
        throw notFound('artifact_not_found', `No origin has ${path}`)
      case 'failed':
        throw (resolution.status === 504 ? gatewayTimeout : badGateway)(
          resolution.error.code,
          `Origins could not serve ${path}`
        )
      case 'found':
        break
    }

    const upstream = resolution.response
    const gzip =
      compression &&
      method === 'GET' &&
      isCompressible(upstream.headers['content-type']) &&
      acceptsGzip(request.headers['accept-encoding'])

    response.writeHead(upstream.status_code, buildResponseHeaders({upstream, requestId: proxyRequest.requestId, gzip}))
    if (method === 'HEAD') {
      response.end()
      await upstream.cancel()
      return
    }

    try {
      await relayBody({upstream, response, gzip})
    } catch (error) {
      await upstream.cancel()

      if (isForwarderStreamError(error) && error.code !== 'aborted') {
        logger.warn({
          event: 'origin.stream.failed',
          component: 'artifact.route',
          message: error.message,
          reason_code: error.code,
          metadata: {origin: resolution.origin, url: upstream.url}
        })
        terminateResponse(response)
        return
      }

      if (signal.aborted) {
        return
      }

      throw error
    }
  }
}
