// Runs session operations one at a time, in arrival order. The session store
// has no isolation of its own; a place-order run must not interleave with a
// cart edit.
export class SessionLock {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // a failed task must not wedge the queue; its error still reaches the caller via `result`
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
