/**
 * Domain errors raised by the task core.
 *
 * These are transport-agnostic; the api app maps the ones that reach a
 * client (TaskNotFoundError) onto HttpException subclasses.
 */
export abstract class TaskError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The task id is unknown or its record was already evicted.
 * Expected during eviction races; never fatal for a stage run.
 */
export class TaskNotFoundError extends TaskError {
  readonly code = 'TASK_NOT_FOUND';

  constructor(readonly taskId: string) {
    super(`Task ${taskId} not found`);
  }
}

/** A record with this id already exists. Indicates an id generation bug. */
export class DuplicateTaskError extends TaskError {
  readonly code = 'DUPLICATE_TASK';

  constructor(readonly taskId: string) {
    super(`Task ${taskId} already exists`);
  }
}

export class InvalidStageTransitionError extends TaskError {
  readonly code = 'INVALID_STAGE_TRANSITION';

  constructor(
    readonly taskId: string,
    reason: string,
  ) {
    super(`Invalid transition for task ${taskId}: ${reason}`);
  }
}

/** A single subscriber send failed. Local to that subscriber. */
export class DeliveryFailureError extends TaskError {
  readonly code = 'DELIVERY_FAILURE';

  constructor(
    readonly taskId: string,
    readonly subscriberId: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      `Delivery to subscriber ${subscriberId} for task ${taskId} failed: ${detail}`,
      { cause },
    );
  }
}

export class InvalidPipelineConfigError extends TaskError {
  readonly code = 'INVALID_PIPELINE_CONFIG';

  constructor(reason: string) {
    super(`Invalid task pipeline configuration: ${reason}`);
  }
}
