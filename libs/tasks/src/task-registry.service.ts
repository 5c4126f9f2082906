import { Inject, Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { TaskStatus } from './enums/task-status.enum';
import {
  DuplicateTaskError,
  InvalidStageTransitionError,
  TaskNotFoundError,
} from './errors/task.errors';
import { TaskPipelineConfig } from './interfaces/task-pipeline-config.interface';
import { TaskPayload, TaskRecord } from './interfaces/task-record.interface';
import { TASK_PIPELINE_CONFIG } from './tasks.constants';

/** Freezes `value` and every object reachable from it. */
function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * TaskRegistry: owns the map from task id to current TaskRecord.
 *
 * Records are frozen and replaced on every mutation, so a snapshot handed
 * to a subscriber can never observe a later change. All operations are
 * synchronous: on Node's event loop each one runs to completion before any
 * other registry call, which gives per-id mutual exclusion between
 * advance/complete and eviction.
 *
 * Once evicted, an id is gone for good: advance/complete on it throw
 * TaskNotFoundError instead of recreating the record.
 */
@Injectable()
export class TaskRegistry implements OnApplicationShutdown {
  private readonly logger = new Logger(TaskRegistry.name);

  private readonly tasks = new Map<string, TaskRecord>();

  /** Pending eviction timers, one per completed task */
  private readonly evictionTimers = new Map<string, ReturnType<typeof setTimeout>>();

  constructor(
    @Inject(TASK_PIPELINE_CONFIG)
    private readonly config: TaskPipelineConfig,
  ) {}

  /** Number of non-terminal stages. */
  get processingStageCount(): number {
    return this.config.stages.length - 1;
  }

  get size(): number {
    return this.tasks.size;
  }

  has(taskId: string): boolean {
    return this.tasks.has(taskId);
  }

  create(taskId: string, payload: TaskPayload = {}): TaskRecord {
    if (this.tasks.has(taskId)) {
      throw new DuplicateTaskError(taskId);
    }

    const now = Date.now();
    const record = this.store({
      id: taskId,
      stageIndex: 0,
      stageName: this.config.stages[0],
      progressPercent: 0,
      status: TaskStatus.PROCESSING,
      startedAt: new Date(now).toISOString(),
      estimatedCompletionAt: new Date(
        now + this.config.estimatedDurationMs,
      ).toISOString(),
      // Detached from the caller's objects; nothing inside can change later.
      payload: deepFreeze(structuredClone(payload)),
    });

    this.logger.log(`Task ${taskId} created`);
    return record;
  }

  get(taskId: string): TaskRecord | null {
    return this.tasks.get(taskId) ?? null;
  }

  getOrThrow(taskId: string): TaskRecord {
    const record = this.tasks.get(taskId);
    if (!record) {
      throw new TaskNotFoundError(taskId);
    }
    return record;
  }

  /**
   * Moves a processing task to `stageIndex`.
   * Re-applying the current index is allowed; going backwards is not.
   */
  advance(taskId: string, stageIndex: number): TaskRecord {
    const current = this.getOrThrow(taskId);

    if (current.status === TaskStatus.COMPLETED) {
      throw new InvalidStageTransitionError(taskId, 'task is already completed');
    }

    if (
      !Number.isInteger(stageIndex) ||
      stageIndex < current.stageIndex ||
      stageIndex >= this.processingStageCount
    ) {
      throw new InvalidStageTransitionError(
        taskId,
        `cannot move from stage ${current.stageIndex} to stage ${stageIndex}`,
      );
    }

    return this.store({
      ...current,
      stageIndex,
      stageName: this.config.stages[stageIndex],
      progressPercent: (stageIndex / this.processingStageCount) * 100,
    });
  }

  complete(taskId: string): TaskRecord {
    const current = this.getOrThrow(taskId);

    if (current.status === TaskStatus.COMPLETED) {
      throw new InvalidStageTransitionError(taskId, 'task is already completed');
    }

    const terminalIndex = this.config.stages.length - 1;
    const record = this.store({
      ...current,
      stageIndex: terminalIndex,
      stageName: this.config.stages[terminalIndex],
      progressPercent: 100,
      status: TaskStatus.COMPLETED,
      completedAt: new Date().toISOString(),
    });

    this.logger.log(`Task ${taskId} completed`);
    return record;
  }

  /**
   * Removes the record after `delayMs`, unconditionally.
   * A second call for the same id keeps the original timer.
   */
  scheduleEviction(taskId: string, delayMs: number): void {
    if (this.evictionTimers.has(taskId)) {
      this.logger.debug(`Eviction already scheduled for task ${taskId}`);
      return;
    }

    const timer = setTimeout(() => {
      this.evictionTimers.delete(taskId);
      if (this.tasks.delete(taskId)) {
        this.logger.log(`Task ${taskId} evicted after ${delayMs} ms retention`);
      }
    }, delayMs);

    this.evictionTimers.set(taskId, timer);
    this.logger.debug(`Task ${taskId} scheduled for eviction in ${delayMs} ms`);
  }

  onApplicationShutdown(): void {
    for (const timer of this.evictionTimers.values()) {
      clearTimeout(timer);
    }
    this.evictionTimers.clear();
    this.tasks.clear();
  }

  private store(record: TaskRecord): TaskRecord {
    const frozen = Object.freeze(record);
    this.tasks.set(frozen.id, frozen);
    return frozen;
  }
}
