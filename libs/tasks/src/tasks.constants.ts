/** Injection token for the validated TaskPipelineConfig. */
export const TASK_PIPELINE_CONFIG = 'TASK_PIPELINE_CONFIG';
