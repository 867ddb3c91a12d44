import { PipelineError } from '@/lib/errors';

export interface FlightResult<T> {
  value: T;
  /** False for the caller that started the flight, true for callers that joined it. */
  shared: boolean;
}

interface Flight<T> {
  promise: Promise<T>;
  controller: AbortController;
  waiters: number;
}

function flightCancelled(key: string): PipelineError {
  return new PipelineError({ code: 'CANCELLED', message: `Wait for ${key} was cancelled.`, retryable: false });
}

/**
 * At most one in-flight execution per key. Callers arriving while a flight is
 * running join it and receive the same value or rejection.
 *
 * The flight runs on its own signal. A caller whose signal aborts stops waiting
 * with CANCELLED; the flight itself is aborted only once every caller has left.
 */
export class SingleFlight<T> {
  private readonly inflight = new Map<string, Flight<T>>();

  isInFlight(key: string): boolean {
    return this.inflight.has(key);
  }

  async run(
    key: string,
    fn: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal
  ): Promise<FlightResult<T>> {
    if (signal?.aborted) {
      throw flightCancelled(key);
    }

    const existing = this.inflight.get(key);
    const joinable = existing && !existing.controller.signal.aborted ? existing : undefined;
    const flight = joinable ?? this.start(key, fn);
    flight.waiters += 1;

    let left = false;
    const leave = () => {
      if (!left) {
        left = true;
        flight.waiters -= 1;
      }
    };

    let onAbort: (() => void) | undefined;
    const cancelled = new Promise<never>((_, reject) => {
      if (!signal) {
        return;
      }
      onAbort = () => {
        leave();
        if (flight.waiters === 0) {
          flight.controller.abort();
        }
        reject(flightCancelled(key));
      };
      signal.addEventListener('abort', onAbort, { once: true });
    });

    try {
      const value = await Promise.race([flight.promise, cancelled]);
      return { value, shared: joinable !== undefined };
    } finally {
      if (signal && onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
      leave();
    }
  }

  private start(key: string, fn: (signal: AbortSignal) => Promise<T>): Flight<T> {
    const controller = new AbortController();
    const flight: Flight<T> = {
      promise: (async () => fn(controller.signal))(),
      controller,
      waiters: 0
    };
    this.inflight.set(key, flight);

    const settle = () => {
      if (this.inflight.get(key) === flight) {
        this.inflight.delete(key);
      }
    };
    void flight.promise.then(settle, settle);
    return flight;
  }
}
