/**
 * Serializes document mutations per user. Tasks for one user run one after
 * another in submission order; different users never wait on each other.
 */
export class UserTaskQueue {
  private readonly tails = new Map<string, Promise<unknown>>();

  run<T>(userId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(userId) ?? Promise.resolve();
    const result = previous.then(task, task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(userId, tail);
    void tail.then(() => {
      if (this.tails.get(userId) === tail) {
        this.tails.delete(userId);
      }
    });
    return result;
  }

  isBusy(userId: string): boolean {
    return this.tails.has(userId);
  }
}
