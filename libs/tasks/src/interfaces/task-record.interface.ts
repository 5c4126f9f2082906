import { TaskStatus } from '../enums/task-status.enum';

/** Domain fields attached to a task at creation. Opaque to the core. */
export type TaskPayload = Readonly<Record<string, unknown>>;

/**
 * TaskRecord: frozen snapshot of one task's state.
 *
 * This is also the wire contract: every status push (socket.io, SSE) and
 * every point-in-time status query serializes a TaskRecord as-is.
 *
 * Invariants:
 *   - stageIndex and progressPercent never decrease
 *   - progressPercent is 100 only for the terminal stage
 *   - completedAt is present iff status === COMPLETED
 */
export interface TaskRecord {
  readonly id: string;

  /** 0-based index into the configured stage list */
  readonly stageIndex: number;

  readonly stageName: string;

  /** stageIndex / processingStageCount * 100, pinned to 100 when completed */
  readonly progressPercent: number;

  readonly status: TaskStatus;

  /** ISO 8601 UTC timestamps */
  readonly startedAt: string;
  readonly estimatedCompletionAt: string;
  readonly completedAt?: string;

  readonly payload: TaskPayload;
}
