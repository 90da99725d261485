import type {IncomingMessage, ServerResponse} from 'node:http';

import {runWithLogContext, type StructuredLogger} from '@artifact-proxy/logging';

import {CLIENT_CLOSED_REQUEST_STATUS, type AccessRecorder} from '../accessRecorder';
import type {ErrorReporter} from '../errorReporter';
import {isAppError} from '../errors';
import {sendError, terminateResponse, wasTerminatedByServer} from '../http';
import {createProxyRequest, UNKNOWN_REMOTE_ADDRESS, type ProxyRequest} from '../proxyRequest';
import type {Router} from './router';

export type ProxyRequestHandler = (request: IncomingMessage, response: ServerResponse) => Promise<void>;

const replyWithError = ({
  response,
  proxyRequest,
  status,
  error,
  message
}: {
  response: ServerResponse;
  proxyRequest: ProxyRequest;
  status: number;
  error: string;
  message: string;
}) => {
  if (response.destroyed) {
    return;
  }

  if (response.headersSent) {
    terminateResponse(response);
    return;
  }

  sendError({response, status, error, message, requestId: proxyRequest.requestId});
};

/**
 * Builds the node:http listener. Every request gets one access record and at
 * most one error report. A response closed before `finish` is recorded once
 * dispatch settles: with the status already sent when the server cut it
 * short, or 499 when the client went away.
 */
export const createProxyRequestHandler = ({
  router,
  errorReporter,
  accessRecorder,
  logger,
  now = Date.now
}: {
  router: Pick<Router, 'dispatch'>;
  errorReporter: ErrorReporter;
  accessRecorder: AccessRecorder;
  logger: StructuredLogger;
  now?: () => number;
}): ProxyRequestHandler => {
  return (request, response) => {
    const proxyRequest = createProxyRequest({request, now});
    const controller = new AbortController();

    let dispatchSettled = false;
    let closedEarly = false;

    const recordEarlyClose = () => {
      accessRecorder.onComplete(
        proxyRequest,
        wasTerminatedByServer(response) ? response.statusCode : CLIENT_CLOSED_REQUEST_STATUS
      );
    };

    response.once('finish', () => {
      accessRecorder.onComplete(proxyRequest, response.statusCode);
    });
    response.once('close', () => {
      if (response.writableFinished) {
        return;
      }

      closedEarly = true;
      controller.abort();
      if (dispatchSettled) {
        recordEarlyClose();
      }
    });

    const handleFailure = (error: unknown) => {
      if (isAppError(error)) {
        logger.warn({
          event: 'request.rejected',
          component: 'http.server',
          message: `Request rejected: ${error.code}`,
          reason_code: error.code,
          status_code: error.status
        });
        replyWithError({
          response,
          proxyRequest,
          status: error.status,
          error: error.code,
          message: error.message
        });
        return;
      }

      errorReporter.onError(error);
      replyWithError({
        response,
        proxyRequest,
        status: 500,
        error: 'internal_error',
        message: 'Unexpected internal error'
      });
    };

    return runWithLogContext(
      {
        request_id: proxyRequest.requestId,
        route: proxyRequest.path,
        method: proxyRequest.method,
        ...(proxyRequest.remoteAddress !== UNKNOWN_REMOTE_ADDRESS ? {remote_address: proxyRequest.remoteAddress} : {})
      },
      async () => {
        accessRecorder.onBeforeDispatch(proxyRequest);

        try {
          await router.dispatch({request, response, proxyRequest, signal: controller.signal});
        } catch (error) {
          handleFailure(error);
        } finally {
          dispatchSettled = true;
          if (closedEarly) {
            recordEarlyClose();
          }
        }
      }
    );
  };
};
