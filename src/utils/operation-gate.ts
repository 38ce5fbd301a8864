/**
 * Serializes async operations: each `run` starts only after every earlier one has settled.
 *
 * Used to keep refresh and delete from interleaving on the shared cache tree.
 */
export class OperationGate {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(operation: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(operation);
    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );
    return result;
  }

  /** Operations queued or running. */
  get size(): number {
    return this.pending;
  }
}
