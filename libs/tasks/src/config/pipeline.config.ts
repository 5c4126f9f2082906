import { ConfigService } from '@nestjs/config';
import { InvalidPipelineConfigError } from '../errors/task.errors';
import {
  StageDelayRange,
  TaskPipelineConfig,
} from '../interfaces/task-pipeline-config.interface';

// ── Defaults ────────────────────────────────────────────────

export const DEFAULT_STAGE_NAMES: readonly string[] = [
  'Baggage Check-in',
  'Security Screening',
  'Baggage Sorting',
  'Loading onto Aircraft',
  'Processing Complete',
];

/** One `min-max` range in seconds per processing stage. */
export const DEFAULT_STAGE_DELAYS = '20-30,25-35,20-30,25-35';

export const DEFAULT_RETENTION_SECONDS = 300;

export const DEFAULT_ESTIMATED_DURATION_SECONDS = 120;

const MS_PER_SECOND = 1000;

// ── Parsing ─────────────────────────────────────────────────

/** Splits a comma-separated stage list, trimming blanks. */
export function parseStageNames(raw: string): string[] {
  return raw
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

/**
 * Parses `"20-30,25-35"` into delay ranges.
 * A single number (`"5"`) is a fixed delay of that many seconds.
 */
export function parseStageDelays(raw: string): StageDelayRange[] {
  return raw
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => {
      const bounds = part.split('-').map((bound) => bound.trim());
      if (bounds.length > 2) {
        throw new InvalidPipelineConfigError(`malformed delay range "${part}"`);
      }
      const minSeconds = parseSeconds(bounds[0], part);
      const maxSeconds =
        bounds.length === 2 ? parseSeconds(bounds[1], part) : minSeconds;
      return { minSeconds, maxSeconds };
    });
}

function parseSeconds(raw: string, context: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new InvalidPipelineConfigError(
      `"${context}" is not a range of whole seconds`,
    );
  }
  return Number(raw);
}

/**
 * Checks the structural invariants the stage runner relies on and returns
 * the config unchanged.
 */
export function validatePipelineConfig(
  config: TaskPipelineConfig,
): TaskPipelineConfig {
  const processingStages = config.stages.length - 1;

  if (processingStages < 1) {
    throw new InvalidPipelineConfigError(
      'at least one processing stage and a terminal stage are required',
    );
  }

  if (config.stageDelays.length !== processingStages) {
    throw new InvalidPipelineConfigError(
      `expected ${processingStages} stage delay ranges, got ${config.stageDelays.length}`,
    );
  }

  config.stageDelays.forEach((range, index) => {
    if (range.minSeconds < 0 || range.minSeconds > range.maxSeconds) {
      throw new InvalidPipelineConfigError(
        `stage ${index} delay range ${range.minSeconds}-${range.maxSeconds} is not ordered`,
      );
    }
  });

  if (config.retentionMs < 0 || config.estimatedDurationMs < 0) {
    throw new InvalidPipelineConfigError('durations must not be negative');
  }

  return config;
}

// ── ConfigService factory ───────────────────────────────────

function readSeconds(
  configService: ConfigService,
  key: string,
  fallback: number,
): number {
  const raw = configService.get<string>(key);
  if (raw === undefined || raw === '') return fallback;
  return parseSeconds(String(raw).trim(), key);
}

/**
 * Builds the pipeline config from environment variables:
 *
 *   TASK_STAGE_NAMES                 comma-separated, last is terminal
 *   TASK_STAGE_DELAYS_SECONDS        e.g. "20-30,25-35,20-30,25-35"
 *   TASK_RETENTION_SECONDS           default 300
 *   TASK_ESTIMATED_DURATION_SECONDS  default 120
 */
export function pipelineConfigFromEnv(
  configService: ConfigService,
): TaskPipelineConfig {
  const stageNames = configService.get<string>('TASK_STAGE_NAMES');
  const stageDelays = configService.get<string>(
    'TASK_STAGE_DELAYS_SECONDS',
    DEFAULT_STAGE_DELAYS,
  );

  return validatePipelineConfig({
    stages: stageNames ? parseStageNames(stageNames) : DEFAULT_STAGE_NAMES,
    stageDelays: parseStageDelays(stageDelays),
    retentionMs:
      readSeconds(configService, 'TASK_RETENTION_SECONDS', DEFAULT_RETENTION_SECONDS) *
      MS_PER_SECOND,
    estimatedDurationMs:
      readSeconds(
        configService,
        'TASK_ESTIMATED_DURATION_SECONDS',
        DEFAULT_ESTIMATED_DURATION_SECONDS,
      ) * MS_PER_SECOND,
  });
}
