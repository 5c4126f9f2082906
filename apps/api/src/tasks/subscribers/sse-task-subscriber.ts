import { TaskRecord, TaskSubscriber } from '@bagtrack/tasks';

/**
 * The parts of an HTTP response an SSE stream writes to.
 * Express's Response satisfies it.
 */
export interface SseResponse {
  readonly writableEnded: boolean;
  readonly destroyed: boolean;
  write(chunk: string): boolean;
  end(): void;
  on(event: 'close', listener: () => void): unknown;
}

/**
 * Writes task snapshots as SSE frames:
 *
 *   id: <counter>\n
 *   event: status\n
 *   data: <json>\n
 *   \n
 */
export class SseTaskSubscriber implements TaskSubscriber {
  private eventCounter = 0;

  constructor(
    readonly id: string,
    private readonly res: SseResponse,
    private readonly onDelivered?: (record: TaskRecord) => void,
  ) {}

  get isOpen(): boolean {
    return !this.res.writableEnded && !this.res.destroyed;
  }

  send(record: TaskRecord): void {
    if (!this.isOpen) {
      throw new Error(`SSE stream ${this.id} is closed`);
    }

    this.eventCounter += 1;
    this.res.write(
      `id: ${this.eventCounter}\nevent: status\ndata: ${JSON.stringify(record)}\n\n`,
    );
    this.onDelivered?.(record);
  }
}
