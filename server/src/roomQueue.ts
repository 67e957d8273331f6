/**
 * Per-room task queue. Tasks for the same room run one at a time in arrival
 * order; tasks for different rooms never wait on each other.
 */
export class RoomQueue {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(roomId: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(roomId) ?? Promise.resolve();
    let release: (() => void) | undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const queued = previous.then(() => current);
    this.tails.set(roomId, queued);

    await previous;
    try {
      return await task();
    } finally {
      release?.();
      if (this.tails.get(roomId) === queued) {
        this.tails.delete(roomId);
      }
    }
  }
}
