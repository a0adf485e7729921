function queueKey(guildId: string, userId: string): string {
  return `${guildId}:${userId}`;
}

/**
 * Runs session writes for one user strictly one after another.
 * Different users proceed in parallel.
 *
 * Voice events also advance a sequence number, so a reconciliation that took
 * its live-state snapshot earlier can tell that a user has moved on since.
 */
export class UserTaskQueue {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly lastEvent = new Map<string, number>();
  private sequence = 0;

  /**
   * Current position in the event stream
   */
  checkpoint(): number {
    return this.sequence;
  }

  /**
   * Whether a voice event for the user was queued after the checkpoint
   */
  changedSince(guildId: string, userId: string, checkpoint: number): boolean {
    return (this.lastEvent.get(queueKey(guildId, userId)) ?? 0) > checkpoint;
  }

  /**
   * Queue a voice event for the user
   */
  runEvent<T>(guildId: string, userId: string, task: () => Promise<T>): Promise<T> {
    this.sequence++;
    this.lastEvent.set(queueKey(guildId, userId), this.sequence);
    return this.run(guildId, userId, task);
  }

  /**
   * Queue work for the user behind everything already queued for them.
   * The returned promise settles with the task's own result or error.
   */
  run<T>(guildId: string, userId: string, task: () => Promise<T>): Promise<T> {
    const key = queueKey(guildId, userId);
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    // The chain only orders tasks; failures reach the caller through result
    const settled = (): void => undefined;
    const tail: Promise<void> = result.then(settled, settled).then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    this.tails.set(key, tail);

    return result;
  }

  /**
   * Users with queued or running work
   */
  get pendingUsers(): number {
    return this.tails.size;
  }
}

export const userTaskQueue = new UserTaskQueue();
