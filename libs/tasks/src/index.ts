/**
 * @bagtrack/tasks
 *
 * Task lifecycle core: registry of task state, per-task subscriber fan-out
 * and the stage runner that ties them together.
 */
export { TasksCoreModule } from './tasks-core.module';
export { TaskRegistry } from './task-registry.service';
export { SubscriberHub } from './subscriber-hub.service';
export { StageRunner, drawStageDelayMs } from './stage-runner.service';
export { TASK_PIPELINE_CONFIG } from './tasks.constants';

// ── Types & enums ───────────────────────────────────────────
export { TaskStatus } from './enums/task-status.enum';
export type { TaskRecord, TaskPayload } from './interfaces/task-record.interface';
export type { TaskSubscriber } from './interfaces/task-subscriber.interface';
export type {
  TaskPipelineConfig,
  StageDelayRange,
} from './interfaces/task-pipeline-config.interface';

// ── Config ──────────────────────────────────────────────────
export {
  DEFAULT_STAGE_NAMES,
  DEFAULT_STAGE_DELAYS,
  parseStageNames,
  parseStageDelays,
  pipelineConfigFromEnv,
  validatePipelineConfig,
} from './config/pipeline.config';

// ── Errors ──────────────────────────────────────────────────
export {
  TaskError,
  TaskNotFoundError,
  DuplicateTaskError,
  InvalidStageTransitionError,
  DeliveryFailureError,
  InvalidPipelineConfigError,
} from './errors/task.errors';
