/**
 * Runs `worker` over `items` with at most `limit` calls in flight and yields each result
 * as soon as it settles, so output order is completion order, not input order.
 *
 * Items are admitted as slots free up, independent of how fast the consumer pulls.
 * If the consumer stops early (`break` / `return()`), no further items are admitted;
 * calls already in flight run to completion and their results are discarded.
 */
export async function* mapInCompletionOrder<T, R>(
  items: Iterable<T>,
  limit: number,
  worker: (item: T) => Promise<R>
): AsyncGenerator<R, void, undefined> {
  const source = items[Symbol.iterator]();
  const maxInFlight = Math.max(1, Math.floor(limit));
  const settled: Array<{ value: R }> = [];
  const state: {
    inFlight: number;
    exhausted: boolean;
    stopped: boolean;
    failure: { error: unknown } | null;
    wake: (() => void) | null;
  } = { inFlight: 0, exhausted: false, stopped: false, failure: null, wake: null };

  const notify = () => {
    const resolve = state.wake;
    state.wake = null;
    resolve?.();
  };

  const admit = () => {
    while (!state.stopped && !state.exhausted && state.inFlight < maxInFlight) {
      const item = source.next();
      if (item.done) {
        state.exhausted = true;
        break;
      }

      state.inFlight += 1;
      let pending: Promise<R>;
      try {
        pending = worker(item.value);
      } catch (error) {
        pending = Promise.reject(error);
      }

      void pending.then(
        (result) => {
          state.inFlight -= 1;
          if (!state.stopped) {
            settled.push({ value: result });
          }
          admit();
          notify();
        },
        (error: unknown) => {
          state.inFlight -= 1;
          state.failure ??= { error };
          notify();
        }
      );
    }
  };

  try {
    admit();
    while (true) {
      if (state.failure) {
        throw state.failure.error;
      }

      const next = settled.shift();
      if (next) {
        yield next.value;
        continue;
      }

      if (state.exhausted && state.inFlight === 0) {
        return;
      }

      await new Promise<void>((resolve) => {
        state.wake = resolve;
      });
    }
  } finally {
    state.stopped = true;
  }
}
