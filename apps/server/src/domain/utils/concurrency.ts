/**
 * Bounded-parallelism fan-out over a lazy source.
 *
 * Pulls items from an async iterable only when a slot is free, so a
 * source backed by paginated queries never materialises more than
 * `concurrency` in-flight items plus one page.
 */

export interface FanOutOptions {
  /** Maximum handlers running at once */
  concurrency: number;
  /** Stop dispatching new items once aborted; in-flight handlers still finish */
  signal?: AbortSignal;
}

export interface FanOutSummary {
  /** Items handed to the handler */
  dispatched: number;
  /** Handlers that rejected (the handler is expected to capture its own errors) */
  rejected: Error[];
  /** Whether dispatching stopped because the signal fired */
  aborted: boolean;
}

export async function forEachBounded<T>(
  source: AsyncIterable<T>,
  handler: (item: T) => Promise<void>,
  options: FanOutOptions
): Promise<FanOutSummary> {
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
  }

  const inFlight = new Set<Promise<void>>();
  const rejected: Error[] = [];
  let dispatched = 0;
  let aborted = false;

  try {
    for await (const item of source) {
      if (options.signal?.aborted) {
        aborted = true;
        break;
      }

      // Backpressure: wait for a free slot before accepting more
      if (inFlight.size >= options.concurrency) {
        await Promise.race(inFlight);
      }

      if (options.signal?.aborted) {
        aborted = true;
        break;
      }

      const task: Promise<void> = handler(item).then(
        () => undefined,
        (error: unknown) => {
          rejected.push(error instanceof Error ? error : new Error(String(error)));
        }
      );
      dispatched++;
      inFlight.add(task);
      void task.finally(() => inFlight.delete(task));
    }
  } finally {
    // Drain in-flight handlers even when the source itself failed
    await Promise.allSettled(inFlight);
  }

  return { dispatched, rejected, aborted };
}
