import {
  BeforeApplicationShutdown,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { TaskNotFoundError } from './errors/task.errors';
import {
  StageDelayRange,
  TaskPipelineConfig,
} from './interfaces/task-pipeline-config.interface';
import { SubscriberHub } from './subscriber-hub.service';
import { TaskRegistry } from './task-registry.service';
import { TASK_PIPELINE_CONFIG } from './tasks.constants';

/** Draws a whole number of seconds in [min, max] and returns it in ms. */
export function drawStageDelayMs(
  range: StageDelayRange,
  random: () => number = Math.random,
): number {
  const span = range.maxSeconds - range.minSeconds + 1;
  return (range.minSeconds + Math.floor(random() * span)) * 1000;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

interface RunHandle {
  readonly controller: AbortController;
  readonly done: Promise<void>;
}

/**
 * StageRunner: drives each task through its ordered stages.
 *
 * Per processing stage k:
 *   1. registry.advance(id, k)
 *   2. hub.broadcast(id, snapshot)
 *   3. sleep for a delay drawn from stageDelays[k]
 *
 * Then: registry.complete(id), broadcast the final snapshot, and schedule
 * eviction after the retention window.
 *
 * A single run drives a given id serially, so its broadcasts are ordered by
 * stage index. If the record disappears mid-run (evicted externally), the
 * registry throws TaskNotFoundError and the run ends quietly.
 *
 * Every run started via start() is tracked until it settles. On shutdown
 * the pending delays are aborted, so a run stops before its next transition
 * and never in the middle of a broadcast. All runs are then awaited.
 */
@Injectable()
export class StageRunner implements BeforeApplicationShutdown {
  private readonly logger = new Logger(StageRunner.name);

  private readonly runs = new Map<string, RunHandle>();

  constructor(
    private readonly registry: TaskRegistry,
    private readonly hub: SubscriberHub,

    @Inject(TASK_PIPELINE_CONFIG)
    private readonly config: TaskPipelineConfig,
  ) {}

  get activeCount(): number {
    return this.runs.size;
  }

  isRunning(taskId: string): boolean {
    return this.runs.has(taskId);
  }

  /**
   * Launches a tracked background run for `taskId`.
   *
   * The returned promise settles when the run ends and never rejects;
   * unexpected errors are logged here. A second start() for a task that is
   * still running returns the existing run.
   */
  start(taskId: string): Promise<void> {
    const existing = this.runs.get(taskId);
    if (existing) {
      this.logger.warn(`Task ${taskId} already has an active stage run`);
      return existing.done;
    }

    const controller = new AbortController();
    const done = this.run(taskId, controller.signal)
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`Stage run for task ${taskId} failed: ${message}`);
      })
      .finally(() => {
        this.runs.delete(taskId);
      });

    this.runs.set(taskId, { controller, done });
    return done;
  }

  async run(taskId: string, signal?: AbortSignal): Promise<void> {
    const processingStages = this.registry.processingStageCount;

    this.logger.log(
      `Starting stage run for task ${taskId} (${processingStages} processing stages)`,
    );

    try {
      for (let stage = 0; stage < processingStages; stage++) {
        if (signal?.aborted) {
          this.logger.warn(`Stage run for task ${taskId} cancelled before stage ${stage}`);
          return;
        }

        const snapshot = this.registry.advance(taskId, stage);
        this.logger.debug(
          `Task ${taskId}: stage ${stage} "${snapshot.stageName}" (${snapshot.progressPercent}%)`,
        );
        await this.hub.broadcast(taskId, snapshot);

        await sleep(drawStageDelayMs(this.config.stageDelays[stage]), signal);
      }

      if (signal?.aborted) {
        this.logger.warn(`Stage run for task ${taskId} cancelled before completion`);
        return;
      }

      const completed = this.registry.complete(taskId);
      await this.hub.broadcast(taskId, completed);
      this.registry.scheduleEviction(taskId, this.config.retentionMs);
    } catch (err: unknown) {
      if (err instanceof TaskNotFoundError) {
        this.logger.warn(`Task ${taskId} was evicted during its stage run; stopping`);
        return;
      }
      throw err;
    }
  }

  /** Aborts pending delays of every active run and waits for them to end. */
  async drain(): Promise<void> {
    const handles = [...this.runs.values()];
    if (handles.length === 0) return;

    this.logger.log(`Draining ${handles.length} active stage run(s)`);
    for (const handle of handles) {
      handle.controller.abort();
    }
    await Promise.all(handles.map((handle) => handle.done));
  }

  async beforeApplicationShutdown(): Promise<void> {
    await this.drain();
  }
}
