/**
 * Lifecycle status of a tracked task.
 *
 * Transitions:
 *   PROCESSING → COMPLETED
 *
 * The transition happens exactly once and never reverses.
 */
export enum TaskStatus {
  /** A stage runner is driving the task through its processing stages */
  PROCESSING = 'Processing',

  /** Terminal stage reached; the record is retained until eviction */
  COMPLETED = 'Completed',
}
