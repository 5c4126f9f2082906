import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SubscriberHub, TaskStatus } from '@bagtrack/tasks';
import { SseResponse, SseTaskSubscriber } from './subscribers/sse-task-subscriber';

/**
 * Retry directive sent in the first SSE frame (ms).
 * Tells the browser's EventSource to reconnect after this delay upon disconnect.
 */
const SSE_RETRY_MS = 3_000;

const DEFAULT_HEARTBEAT_SECONDS = 25;

/** StreamContext: all mutable state for a single SSE connection. */
interface StreamContext {
  readonly taskId: string;
  readonly res: SseResponse;
  readonly subscriber: SseTaskSubscriber;
  heartbeatTimer: ReturnType<typeof setInterval> | null;
  closed: boolean;
}

/**
 * TaskStreamService: bridges the SubscriberHub to HTTP Server-Sent Events.
 *
 * Lifecycle of a single SSE stream:
 *
 * 1. **Retry directive**: `retry: 3000` so EventSource reconnects quickly.
 * 2. **Attach**: an SseTaskSubscriber is attached to the hub. If the task
 *    exists its snapshot is written at once; an unknown task keeps the
 *    stream open and silent until a broadcast arrives (or forever).
 * 3. **Heartbeat**: a `: heartbeat` comment keeps proxies from dropping
 *    the idle connection.
 * 4. **Cleanup**: after a Completed snapshot, on client disconnect, or
 *    when a write fails (the hub detaches the subscriber). Releases the
 *    timer, the hub slot and the response exactly once.
 */
@Injectable()
export class TaskStreamService {
  private readonly logger = new Logger(TaskStreamService.name);

  private readonly heartbeatMs: number;

  private streamCounter = 0;

  constructor(
    private readonly hub: SubscriberHub,
    private readonly configService: ConfigService,
  ) {
    const heartbeatSeconds = Number(
      this.configService.get<string>('SSE_HEARTBEAT_SECONDS', String(DEFAULT_HEARTBEAT_SECONDS)),
    );
    this.heartbeatMs =
      (Number.isFinite(heartbeatSeconds) && heartbeatSeconds > 0
        ? heartbeatSeconds
        : DEFAULT_HEARTBEAT_SECONDS) * 1000;
  }

  /**
   * Opens an SSE stream for `taskId` on an already flushed response.
   * The caller should not touch `res` afterwards.
   */
  async streamStatus(taskId: string, res: SseResponse): Promise<void> {
    this.streamCounter += 1;
    const streamId = `sse:${this.streamCounter}`;

    const subscriber = new SseTaskSubscriber(streamId, res, (record) => {
      if (record.status === TaskStatus.COMPLETED) {
        this.logger.log(`Task ${taskId} completed. Closing SSE stream ${streamId}.`);
        this.cleanup(ctx);
      }
    });

    const ctx: StreamContext = {
      taskId,
      res,
      subscriber,
      heartbeatTimer: null,
      closed: false,
    };

    res.write(`retry: ${SSE_RETRY_MS}\n\n`);

    ctx.heartbeatTimer = setInterval(() => {
      this.writeHeartbeat(ctx);
    }, this.heartbeatMs);

    res.on('close', () => {
      this.logger.log(`Client disconnected from SSE stream ${streamId} (task ${taskId})`);
      this.cleanup(ctx);
    });

    this.logger.log(`SSE stream ${streamId} opened for task ${taskId}`);
    const attached = await this.hub.attach(taskId, subscriber);

    // The snapshot write failed and the hub already dropped the subscriber.
    if (!attached) {
      this.cleanup(ctx);
    }
  }

  // ── Private helpers ──────────────────────────────────────

  /**
   * Writes an SSE comment (`:`) as a keepalive.
   * Comments are ignored by EventSource but keep the TCP connection alive.
   */
  private writeHeartbeat(ctx: StreamContext): void {
    if (ctx.closed) return;

    if (!ctx.subscriber.isOpen) {
      this.cleanup(ctx);
      return;
    }

    try {
      ctx.res.write(`: heartbeat\n\n`);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Failed to write heartbeat for task ${ctx.taskId}: ${message}`);
      this.cleanup(ctx);
    }
  }

  /**
   * Deterministic cleanup: clears the heartbeat, detaches from the hub and
   * ends the HTTP response. Safe to call multiple times.
   */
  private cleanup(ctx: StreamContext): void {
    if (ctx.closed) return;
    ctx.closed = true;

    if (ctx.heartbeatTimer) {
      clearInterval(ctx.heartbeatTimer);
      ctx.heartbeatTimer = null;
    }

    this.hub.detach(ctx.taskId, ctx.subscriber);

    if (!ctx.res.writableEnded) {
      ctx.res.end();
    }
  }
}
