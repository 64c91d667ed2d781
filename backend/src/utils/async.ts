import { CapabilityTimeoutError } from '../errors';

/**
 * Runs `worker` over `items` in chunks of `concurrency`, waiting for a whole
 * chunk before starting the next. Results keep the input order.
 */
export async function mapInChunks<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const chunkSize = Math.max(1, Math.floor(concurrency));
  const results: R[] = [];

  for (let start = 0; start < items.length; start += chunkSize) {
    const chunk = items.slice(start, start + chunkSize);
    const settled = await Promise.all(
      chunk.map((item, offset) => worker(item, start + offset)),
    );
    results.push(...settled);
  }

  return results;
}

export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  capability: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new CapabilityTimeoutError(capability, timeoutMs)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
