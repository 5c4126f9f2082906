import { TaskStatus } from './enums/task-status.enum';
import { TaskPipelineConfig } from './interfaces/task-pipeline-config.interface';
import { TaskRecord } from './interfaces/task-record.interface';
import { TaskSubscriber } from './interfaces/task-subscriber.interface';
import { drawStageDelayMs, StageRunner } from './stage-runner.service';
import { SubscriberHub } from './subscriber-hub.service';
import { TaskRegistry } from './task-registry.service';

const zeroDelayConfig: TaskPipelineConfig = {
  stages: ['Check-in', 'Screening', 'Sorting', 'Loading', 'Complete'],
  stageDelays: [
    { minSeconds: 0, maxSeconds: 0 },
    { minSeconds: 0, maxSeconds: 0 },
    { minSeconds: 0, maxSeconds: 0 },
    { minSeconds: 0, maxSeconds: 0 },
  ],
  retentionMs: 300_000,
  estimatedDurationMs: 120_000,
};

class RecordingSubscriber implements TaskSubscriber {
  readonly received: TaskRecord[] = [];

  constructor(
    readonly id: string,
    private readonly onReceive?: (record: TaskRecord) => void,
  ) {}

  send(record: TaskRecord): void {
    this.received.push(record);
    this.onReceive?.(record);
  }
}

function createRunner(config: TaskPipelineConfig = zeroDelayConfig) {
  const registry = new TaskRegistry(config);
  const hub = new SubscriberHub(registry);
  const runner = new StageRunner(registry, hub, config);
  return { registry, hub, runner };
}

describe('drawStageDelayMs', () => {
  it('maps the random draw onto whole seconds within the range', () => {
    const range = { minSeconds: 20, maxSeconds: 30 };

    expect(drawStageDelayMs(range, () => 0)).toBe(20_000);
    expect(drawStageDelayMs(range, () => 0.5)).toBe(25_000);
    expect(drawStageDelayMs(range, () => 0.999)).toBe(30_000);
  });

  it('returns zero for a zero range', () => {
    expect(drawStageDelayMs({ minSeconds: 0, maxSeconds: 0 })).toBe(0);
  });
});

describe('StageRunner', () => {
  let registry: TaskRegistry;
  let hub: SubscriberHub;
  let runner: StageRunner;

  beforeEach(() => {
    ({ registry, hub, runner } = createRunner());
  });

  afterEach(async () => {
    await runner.drain();
    registry.onApplicationShutdown();
  });

  it('advances through every stage and completes the task', async () => {
    registry.create('T1');

    await runner.run('T1');

    const record = registry.get('T1');
    expect(record?.status).toBe(TaskStatus.COMPLETED);
    expect(record?.progressPercent).toBe(100);
    expect(record?.stageName).toBe('Complete');
  });

  it('broadcasts each transition in stage order', async () => {
    registry.create('T1');
    const subscriber = new RecordingSubscriber('a');
    await hub.attach('T1', subscriber);

    await runner.run('T1');

    expect(subscriber.received.map((record) => record.stageIndex)).toEqual([
      0, 0, 1, 2, 3, 4,
    ]);
    expect(subscriber.received.map((record) => record.progressPercent)).toEqual([
      0, 0, 25, 50, 75, 100,
    ]);
    expect(subscriber.received.map((record) => record.status)).toEqual([
      TaskStatus.PROCESSING,
      TaskStatus.PROCESSING,
      TaskStatus.PROCESSING,
      TaskStatus.PROCESSING,
      TaskStatus.PROCESSING,
      TaskStatus.COMPLETED,
    ]);
  });

  it('schedules eviction after the retention window', async () => {
    const scheduleEviction = jest.spyOn(registry, 'scheduleEviction');
    registry.create('T1');

    await runner.run('T1');

    expect(scheduleEviction).toHaveBeenCalledTimes(1);
    expect(scheduleEviction).toHaveBeenCalledWith('T1', 300_000);
  });

  it('stops quietly when the task is evicted mid-run', async () => {
    registry.create('T1');
    const subscriber = new RecordingSubscriber('a', (record) => {
      if (record.stageIndex === 1) {
        registry.scheduleEviction('T1', 0);
      }
    });
    await hub.attach('T1', subscriber);

    await expect(runner.run('T1')).resolves.toBeUndefined();

    expect(registry.get('T1')).toBeNull();
    expect(subscriber.received.map((record) => record.stageIndex)).toEqual([0, 0, 1]);
  });

  it('treats an unknown task as a no-op', async () => {
    await expect(runner.run('missing')).resolves.toBeUndefined();
    expect(registry.has('missing')).toBe(false);
  });

  describe('start', () => {
    it('tracks the run until it settles', async () => {
      registry.create('T1');

      const done = runner.start('T1');
      expect(runner.isRunning('T1')).toBe(true);
      expect(runner.activeCount).toBe(1);

      await done;
      expect(runner.isRunning('T1')).toBe(false);
      expect(runner.activeCount).toBe(0);
    });

    it('reuses the active run for the same task', () => {
      registry.create('T1');

      const first = runner.start('T1');

      expect(runner.start('T1')).toBe(first);
      expect(runner.activeCount).toBe(1);
    });

    it('logs unexpected failures instead of rejecting', async () => {
      registry.create('T1');
      jest.spyOn(hub, 'broadcast').mockRejectedValueOnce(new Error('boom'));

      await expect(runner.start('T1')).resolves.toBeUndefined();
      expect(registry.get('T1')?.status).toBe(TaskStatus.PROCESSING);
      expect(runner.isRunning('T1')).toBe(false);
    });
  });

  describe('drain', () => {
    it('cancels pending delays without completing the task', async () => {
      const slow = createRunner({
        ...zeroDelayConfig,
        stageDelays: zeroDelayConfig.stageDelays.map(() => ({
          minSeconds: 60,
          maxSeconds: 60,
        })),
      });
      slow.registry.create('T1');
      void slow.runner.start('T1');

      await slow.runner.drain();

      expect(slow.runner.activeCount).toBe(0);
      expect(slow.registry.get('T1')?.status).toBe(TaskStatus.PROCESSING);
      expect(slow.registry.get('T1')?.stageIndex).toBe(0);
      slow.registry.onApplicationShutdown();
    });
  });
});
