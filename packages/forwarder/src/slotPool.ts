import {err, ok, type ForwarderResult} from './errors';

export type SlotLease = {
  /** Returns the slot to the pool. Safe to call more than once. */
  release: () => void;
};

export type SlotPoolStats = {
  capacity: number;
  inUse: number;
  waiting: number;
};

export type SlotPool = {
  acquire: (input?: {timeoutMs?: number; signal?: AbortSignal}) => Promise<ForwarderResult<SlotLease>>;
  /** Resolves once no slot is leased and nobody is waiting. */
  drain: () => Promise<void>;
  stats: () => SlotPoolStats;
};

type Waiter = {
  grant: () => void;
};

/**
 * Bounded FIFO pool of concurrency slots. Callers beyond capacity wait in
 * arrival order until a lease is released, the optional acquisition deadline
 * passes, or their signal aborts.
 */
export const createSlotPool = (capacity: number): SlotPool => {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Slot pool capacity must be a positive integer, received ${capacity}`);
  }

  let inUse = 0;
  const waiters: Waiter[] = [];
  let idleResolvers: Array<() => void> = [];

  const notifyIfIdle = () => {
    if (inUse > 0 || waiters.length > 0) {
      return;
    }

    const resolvers = idleResolvers;
    idleResolvers = [];
    for (const resolve of resolvers) {
      resolve();
    }
  };

  const createLease = (): SlotLease => {
    let released = false;
    return {
      release: () => {
        if (released) {
          return;
        }

        released = true;
        const next = waiters.shift();
        if (next) {
          // The slot passes straight to the next waiter; inUse is unchanged.
          next.grant();
          return;
        }

        inUse -= 1;
        notifyIfIdle();
      }
    };
  };

  const acquire: SlotPool['acquire'] = ({timeoutMs, signal} = {}) => {
    if (signal?.aborted) {
      return Promise.resolve(err('aborted', 'Slot acquisition was aborted before it started'));
    }

    if (inUse < capacity && waiters.length === 0) {
      inUse += 1;
      return Promise.resolve(ok(createLease()));
    }

    return new Promise(resolve => {
      let timer: NodeJS.Timeout | undefined;

      const cleanup = () => {
        if (timer) {
          clearTimeout(timer);
        }
        signal?.removeEventListener('abort', onAbort);
      };

      const leave = (result: ForwarderResult<SlotLease>) => {
        const index = waiters.indexOf(waiter);
        if (index >= 0) {
          waiters.splice(index, 1);
        }
        cleanup();
        resolve(result);
        notifyIfIdle();
      };

      const onAbort = () => leave(err('aborted', 'Slot acquisition was aborted'));

      const waiter: Waiter = {
        grant: () => {
          cleanup();
          resolve(ok(createLease()));
        }
      };

      waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, {once: true});
      if (timeoutMs !== undefined) {
        timer = setTimeout(
          () => leave(err('pool_acquire_timeout', `No pool slot became free within ${timeoutMs}ms`)),
          timeoutMs
        );
      }
    });
  };

  const drain = () =>
    new Promise<void>(resolve => {
      idleResolvers.push(resolve);
      notifyIfIdle();
    });

  return {
    acquire,
    drain,
    stats: () => ({capacity, inUse, waiting: waiters.length})
  };
};
