/**
 * In-process mutual exclusion for read-modify-write sequences.
 *
 * Tasks run one at a time in submission order. A failing task rejects its
 * own promise only; the queue moves on to the next task.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
