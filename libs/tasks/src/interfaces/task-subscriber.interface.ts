import { TaskRecord } from './task-record.interface';

/**
 * A live observer channel for one task id.
 *
 * The transport (socket.io, SSE) owns the channel; the hub only keeps a
 * reference for delivery. `send` may throw or reject when the channel is
 * closed or broken; the hub then detaches the subscriber.
 */
export interface TaskSubscriber {
  /** Stable identifier used in logs */
  readonly id: string;

  send(record: TaskRecord): void | Promise<void>;
}
