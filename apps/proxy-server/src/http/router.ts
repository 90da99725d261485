import type {IncomingMessage, ServerResponse} from 'node:http';

import {createSlotPool, type SlotPoolStats} from '@artifact-proxy/forwarder';

import {sendError} from '../http';
import type {ProxyRequest} from '../proxyRequest';
import type {RouteLogicHandler} from './routes/types';

const WELL_KNOWN_NOT_FOUND_PATHS = new Set(['/favicon.ico']);
const WELL_KNOWN_METHODS = new Set(['GET', 'HEAD']);

export type HandlerRegistration = Readonly<{
  name: string;
  pattern: RegExp;
  methods: ReadonlySet<string>;
  /** Lower runs first; ties keep registration order. */
  priority: number;
  handler: RouteLogicHandler;
}>;

export type HandlerRegistrationInput = {
  name: string;
  pattern: RegExp;
  methods: readonly string[];
  priority?: number;
  handler: RouteLogicHandler;
};

export type RouteMatch =
  | {kind: 'well_known_not_found'}
  | {
      kind: 'handler';
      registration: HandlerRegistration;
      params: Readonly<Record<string, string>>;
    };

export type DispatchContext = {
  request: IncomingMessage;
  response: ServerResponse;
  proxyRequest: ProxyRequest;
  signal: AbortSignal;
};

export type DispatchOutcome = 'handled' | 'well_known_not_found' | 'route_not_found' | 'aborted';

export type Router = {
  readonly registrations: readonly HandlerRegistration[];
  match: (method: string, path: string) => RouteMatch | null;
  /** Runs the matching handler. Handler failures propagate to the caller. */
  dispatch: (context: DispatchContext) => Promise<DispatchOutcome>;
  stats: () => SlotPoolStats;
};

const toRegistration = (input: HandlerRegistrationInput): HandlerRegistration => {
  if (input.name.trim().length === 0) {
    throw new Error('Handler registration name must not be empty');
  }

  if (input.methods.length === 0) {
    throw new Error(`Handler registration ${input.name} must accept at least one method`);
  }

  const priority = input.priority ?? 0;
  if (!Number.isFinite(priority)) {
    throw new Error(`Handler registration ${input.name} has a non-finite priority`);
  }

  return Object.freeze({
    name: input.name,
    // Stateful flags would make match() depend on previous calls.
    pattern: new RegExp(input.pattern.source, input.pattern.flags.replace(/[gy]/gu, '')),
    methods: new Set(input.methods.map(method => method.toUpperCase())),
    priority,
    handler: input.handler
  });
};

const readParams = (groups: Record<string, string | undefined> | undefined) => {
  const params: Record<string, string> = {};
  for (const [name, value] of Object.entries(groups ?? {})) {
    if (value !== undefined) {
      params[name] = value;
    }
  }

  return Object.freeze(params);
};

/**
 * Builds the request router. Registrations are fixed here; `workerCount`
 * bounds how many handler bodies run at once, the rest wait in arrival order.
 */
export const createRouter = ({
  registrations: inputs,
  workerCount
}: {
  registrations: readonly HandlerRegistrationInput[];
  workerCount: number;
}): Router => {
  const seenNames = new Set<string>();
  const registrations = Object.freeze(
    inputs
      .map((input, index) => {
        if (seenNames.has(input.name)) {
          throw new Error(`Duplicate handler registration name: ${input.name}`);
        }
        seenNames.add(input.name);
        return {registration: toRegistration(input), index};
      })
      .sort((left, right) => left.registration.priority - right.registration.priority || left.index - right.index)
      .map(({registration}) => registration)
  );
  const workers = createSlotPool(workerCount);

  const match: Router['match'] = (method, path) => {
    const normalizedMethod = method.toUpperCase();
    if (WELL_KNOWN_NOT_FOUND_PATHS.has(path) && WELL_KNOWN_METHODS.has(normalizedMethod)) {
      return {kind: 'well_known_not_found'};
    }

    for (const registration of registrations) {
      if (!registration.methods.has(normalizedMethod)) {
        continue;
      }

      const matched = registration.pattern.exec(path);
      if (matched) {
        return {kind: 'handler', registration, params: readParams(matched.groups)};
      }
    }

    return null;
  };

  const dispatch: Router['dispatch'] = async ({request, response, proxyRequest, signal}) => {
    const matched = match(proxyRequest.method, proxyRequest.path);
    if (matched === null || matched.kind === 'well_known_not_found') {
      sendError({
        response,
        status: 404,
        error: 'not_found',
        message: `No resource at ${proxyRequest.path}`,
        requestId: proxyRequest.requestId
      });
      return matched === null ? 'route_not_found' : 'well_known_not_found';
    }

    const lease = await workers.acquire({signal});
    if (!lease.ok) {
      return 'aborted';
    }

    try {
      await matched.registration.handler({
        request,
        response,
        proxyRequest,
        params: matched.params,
        signal
      });
      return 'handled';
    } finally {
      lease.value.release();
    }
  };

  return {
    registrations,
    match,
    dispatch,
    stats: workers.stats
  };
};
