import type { Socket } from 'socket.io';
import { TaskRecord, TaskSubscriber } from '@bagtrack/tasks';

/** socket.io event carrying a TaskRecord snapshot to the client. */
export const TASK_STATUS_EVENT = 'task-status';

/** The parts of a socket.io client the tasks gateway relies on. */
export interface TaskClient {
  readonly id: Socket['id'];
  readonly connected: boolean;
  readonly handshake: Pick<Socket['handshake'], 'query'>;
  emit(event: typeof TASK_STATUS_EVENT, record: TaskRecord): boolean;
}

/**
 * Delivers task snapshots to one socket.io client.
 *
 * A disconnected socket makes send() throw so the hub detaches it.
 */
export class SocketTaskSubscriber implements TaskSubscriber {
  readonly id: string;

  constructor(private readonly client: TaskClient) {
    this.id = `ws:${client.id}`;
  }

  send(record: TaskRecord): void {
    if (!this.client.connected) {
      throw new Error(`Socket ${this.client.id} is disconnected`);
    }
    this.client.emit(TASK_STATUS_EVENT, record);
  }
}
