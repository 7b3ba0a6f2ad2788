import { randomUUID } from 'node:crypto';

export const id = () => randomUUID();

/**
 * Lazily builds a shared handle. Concurrent first callers await the same
 * construction; a rejected construction is forgotten so the next call retries.
 */
export function singleFlight<T>(factory: () => T | Promise<T>): () => Promise<T> {
  let pending: Promise<T> | undefined;
  return () => {
    if (!pending) {
      pending = Promise.resolve()
        .then(factory)
        .catch((err: unknown) => {
          pending = undefined;
          throw err;
        });
    }
    return pending;
  };
}
