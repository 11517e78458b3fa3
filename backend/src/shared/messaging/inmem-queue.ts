/**
 * src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Tests need to inspect what messages the flows enqueued without running
 *   real email infrastructure.
 * - drain() is the test contract: call it after the request completes.
 *
 * RULES:
 * - Implements Queue interface only — no extra methods visible to services.
 * - drain() is only used by tests; production code never calls it.
 */

import type { Queue, QueueMessage } from './queue';

export class InMemQueue implements Queue {
  private readonly messages: QueueMessage[] = [];

  enqueue(message: QueueMessage): Promise<void> {
    this.messages.push(message);
    return Promise.resolve();
  }

  drain(): QueueMessage[] {
    return this.messages.splice(0, this.messages.length);
  }
}
