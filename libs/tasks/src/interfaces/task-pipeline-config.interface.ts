/** Inclusive range, in whole seconds, for one stage's simulated duration. */
export interface StageDelayRange {
  readonly minSeconds: number;
  readonly maxSeconds: number;
}

/**
 * Pipeline configuration consumed by the registry and the stage runner.
 *
 * `stages` lists every stage in order; the last entry is the terminal
 * "complete" stage. `stageDelays` has one range per processing stage,
 * i.e. `stages.length - 1` entries.
 */
export interface TaskPipelineConfig {
  readonly stages: readonly string[];
  readonly stageDelays: readonly StageDelayRange[];

  /** How long a completed record stays queryable before eviction */
  readonly retentionMs: number;

  /** Horizon used for estimatedCompletionAt at creation */
  readonly estimatedDurationMs: number;
}
