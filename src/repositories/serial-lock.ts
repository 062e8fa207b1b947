/**
 * Runs async sections one after another. The in-memory repositories use it
 * to give transaction() the isolation a row lock gives on PostgreSQL.
 */
export function createSerialLock(): <T>(fn: () => Promise<T>) => Promise<T> {
  let tail: Promise<void> = Promise.resolve();

  return <T>(fn: () => Promise<T>): Promise<T> => {
    const run = tail.then(fn);
    // The caller observes run's rejection; the chain only waits for it.
    tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  };
}
