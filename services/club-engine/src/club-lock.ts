/**
 * Club Lock
 *
 * One writer per club at a time. Each club gets its own single-concurrency
 * queue; tasks for different clubs do not wait on each other.
 */

import PQueue from "p-queue";
import { clubEngineLogger as logger } from "@coinvest/shared";

const lockLogger = logger.child({ component: "club-lock" });

export class ClubLock {
  private readonly queues: Map<string, PQueue> = new Map();

  /**
   * Run `task` once every earlier task for the same club has settled.
   * Resolves or rejects with the task's own outcome.
   */
  async run<T>(clubId: string, task: () => T | Promise<T>): Promise<T> {
    const queue = this.queueFor(clubId);
    try {
      return await queue.add(async () => task(), { throwOnTimeout: true });
    } finally {
      if (queue.size === 0 && queue.pending === 0) {
        this.queues.delete(clubId);
      }
    }
  }

  /**
   * Number of clubs with queued or running work
   */
  get activeClubs(): number {
    return this.queues.size;
  }

  private queueFor(clubId: string): PQueue {
    let queue = this.queues.get(clubId);
    if (!queue) {
      queue = new PQueue({ concurrency: 1 });
      this.queues.set(clubId, queue);
      lockLogger.debug({ clubId }, "Club queue created");
    }
    return queue;
  }
}

/**
 * Factory function
 */
export function createClubLock(): ClubLock {
  return new ClubLock();
}
