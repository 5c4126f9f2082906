import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { DeliveryFailureError } from './errors/task.errors';
import { TaskRecord } from './interfaces/task-record.interface';
import { TaskSubscriber } from './interfaces/task-subscriber.interface';
import { TaskRegistry } from './task-registry.service';

/**
 * SubscriberHub: task id → set of attached subscribers, with fan-out.
 *
 * Delivery rules:
 * - attach() pushes the current snapshot straight to the new subscriber,
 *   if the task exists. Unknown ids are fine: the subscriber just waits.
 * - broadcast() sends to a copy of the set taken when it starts, so
 *   attach/detach during an in-flight broadcast never corrupt iteration.
 *   A subscriber attached mid-broadcast gets the next one instead.
 * - Any send failure detaches that subscriber only; the others still
 *   receive the message and nothing propagates to the caller.
 */
@Injectable()
export class SubscriberHub implements OnApplicationShutdown {
  private readonly logger = new Logger(SubscriberHub.name);

  private readonly subscribers = new Map<string, Set<TaskSubscriber>>();

  constructor(private readonly registry: TaskRegistry) {}

  /**
   * Registers `subscriber` for `taskId` and sends it the current snapshot.
   * @returns false when that snapshot send failed and the subscriber was
   *   detached again
   */
  async attach(taskId: string, subscriber: TaskSubscriber): Promise<boolean> {
    let taskSubscribers = this.subscribers.get(taskId);
    if (!taskSubscribers) {
      taskSubscribers = new Set();
      this.subscribers.set(taskId, taskSubscribers);
    }
    taskSubscribers.add(subscriber);

    this.logger.debug(
      `Subscriber ${subscriber.id} attached to task ${taskId} (${taskSubscribers.size} total)`,
    );

    const snapshot = this.registry.get(taskId);
    if (!snapshot) return true;

    return this.deliver(taskId, subscriber, snapshot);
  }

  /** Idempotent. Returns whether the subscriber was attached. */
  detach(taskId: string, subscriber: TaskSubscriber): boolean {
    const taskSubscribers = this.subscribers.get(taskId);
    if (!taskSubscribers?.delete(subscriber)) return false;

    if (taskSubscribers.size === 0) {
      this.subscribers.delete(taskId);
    }

    this.logger.debug(`Subscriber ${subscriber.id} detached from task ${taskId}`);
    return true;
  }

  /**
   * Sends `record` to every subscriber currently attached to `taskId`.
   * @returns number of successful deliveries
   */
  async broadcast(taskId: string, record: TaskRecord): Promise<number> {
    const taskSubscribers = this.subscribers.get(taskId);
    if (!taskSubscribers) return 0;

    const targets = [...taskSubscribers];
    const results = await Promise.all(
      targets.map((subscriber) => this.deliver(taskId, subscriber, record)),
    );
    const delivered = results.filter(Boolean).length;

    this.logger.debug(
      `Broadcast for task ${taskId} (stage ${record.stageIndex}): ${delivered}/${targets.length} delivered`,
    );

    return delivered;
  }

  subscriberCount(taskId: string): number {
    return this.subscribers.get(taskId)?.size ?? 0;
  }

  onApplicationShutdown(): void {
    this.subscribers.clear();
  }

  private async deliver(
    taskId: string,
    subscriber: TaskSubscriber,
    record: TaskRecord,
  ): Promise<boolean> {
    try {
      await subscriber.send(record);
      return true;
    } catch (err: unknown) {
      const failure = new DeliveryFailureError(taskId, subscriber.id, err);
      this.logger.warn(`${failure.message}. Detaching.`);
      this.detach(taskId, subscriber);
      return false;
    }
  }
}
