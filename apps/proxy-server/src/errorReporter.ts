import {LOG_CHANNELS, type StructuredLogger} from '@artifact-proxy/logging'

export type ErrorReporter = {
  /** Logs `failure` unless it is the very object reported last. Returns whether it was logged. */
  onError: (failure: unknown) => boolean
}

export const categorizeFailure = (failure: unknown): string => {
  if (failure instanceof Error) {
    return failure.name.length > 0 ? failure.name : failure.constructor.name
  }

  if (typeof failure === 'object' && failure !== null) {
    return failure.constructor?.name ?? 'Object'
  }

  return typeof failure
}

const describeFailure = (failure: unknown) => {
  if (failure instanceof Error) {
    return failure.message
  }

  return typeof failure === 'string' ? failure : `Non-error value thrown: ${categorizeFailure(failure)}`
}

export const createErrorReporter = ({logger}: {logger: StructuredLogger}): ErrorReporter => {
  const errorLogger = logger.channel(LOG_CHANNELS.error)
  let hasReported = false
  let lastReported: unknown

  const onError = (failure: unknown) => {
    // Compare and store happen in one synchronous step.
    if (hasReported && failure === lastReported) {
      return false
    }
    hasReported = true
    lastReported = failure

    const category = categorizeFailure(failure)
    errorLogger.error({
      event: 'handler.failed',
      component: 'error.reporter',
      message: describeFailure(failure),
      reason_code: category,
      metadata: {
        category,
        error: failure
      }
    })
    return true
  }

  return {onError}
}
