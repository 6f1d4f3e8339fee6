/**
 * Runs tasks one at a time per owner; different owners run independently.
 * An owner's entry is dropped once its last queued task settles.
 */
export class OwnerQueue {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(owner: string, task: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(owner) ?? Promise.resolve();
    const next = prev.then(task);
    // failures reach the caller through `next`; the chain only needs ordering
    const tail: Promise<void> = next
      .then(
        () => undefined,
        () => undefined
      )
      .then(() => {
        if (this.tails.get(owner) === tail) this.tails.delete(owner);
      });
    this.tails.set(owner, tail);
    return next;
  }

  /** Owners with a task running or waiting. */
  get size(): number {
    return this.tails.size;
  }
}
