import { EventEmitter } from 'node:events';
import { ConfigService } from '@nestjs/config';
import { SubscriberHub, TaskPipelineConfig, TaskRegistry } from '@bagtrack/tasks';
import { SseResponse } from './subscribers/sse-task-subscriber';
import { TaskStreamService } from './task-stream.service';

const config: TaskPipelineConfig = {
  stages: ['Check-in', 'Screening', 'Complete'],
  stageDelays: [
    { minSeconds: 0, maxSeconds: 0 },
    { minSeconds: 0, maxSeconds: 0 },
  ],
  retentionMs: 1000,
  estimatedDurationMs: 60_000,
};

class FakeSseResponse extends EventEmitter implements SseResponse {
  readonly chunks: string[] = [];
  writableEnded = false;
  destroyed = false;

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  end(): void {
    this.writableEnded = true;
  }
}

function frame(id: number, record: unknown): string {
  return `id: ${id}\nevent: status\ndata: ${JSON.stringify(record)}\n\n`;
}

describe('TaskStreamService', () => {
  let registry: TaskRegistry;
  let hub: SubscriberHub;
  let service: TaskStreamService;
  let res: FakeSseResponse;

  beforeEach(() => {
    registry = new TaskRegistry(config);
    hub = new SubscriberHub(registry);
    service = new TaskStreamService(hub, new ConfigService({ SSE_HEARTBEAT_SECONDS: '1' }));
    res = new FakeSseResponse();
  });

  afterEach(() => {
    res.emit('close');
    registry.onApplicationShutdown();
  });

  it('writes the retry directive and the current snapshot', async () => {
    const record = registry.create('T1');

    await service.streamStatus('T1', res);

    expect(res.chunks).toEqual(['retry: 3000\n\n', frame(1, record)]);
    expect(hub.subscriberCount('T1')).toBe(1);
  });

  it('keeps a stream for an unknown task open until data arrives', async () => {
    await service.streamStatus('T1', res);

    expect(res.chunks).toEqual(['retry: 3000\n\n']);
    expect(res.writableEnded).toBe(false);

    const record = registry.create('T1');
    await hub.broadcast('T1', record);

    expect(res.chunks).toEqual(['retry: 3000\n\n', frame(1, record)]);
  });

  it('numbers frames and closes after the completed snapshot', async () => {
    const first = registry.create('T1');
    await service.streamStatus('T1', res);

    const second = registry.advance('T1', 1);
    await hub.broadcast('T1', second);
    const completed = registry.complete('T1');
    await hub.broadcast('T1', completed);

    expect(res.chunks).toEqual([
      'retry: 3000\n\n',
      frame(1, first),
      frame(2, second),
      frame(3, completed),
    ]);
    expect(res.writableEnded).toBe(true);
    expect(hub.subscriberCount('T1')).toBe(0);
  });

  it('detaches from the hub when the client disconnects', async () => {
    await service.streamStatus('T1', res);

    res.emit('close');

    expect(hub.subscriberCount('T1')).toBe(0);
    expect(res.writableEnded).toBe(true);
  });

  it('is dropped by the hub once the response is destroyed', async () => {
    await service.streamStatus('T1', res);
    res.destroyed = true;

    const delivered = await hub.broadcast('T1', registry.create('T1'));

    expect(delivered).toBe(0);
    expect(hub.subscriberCount('T1')).toBe(0);
    expect(res.chunks).toEqual(['retry: 3000\n\n']);
  });

  it('sends heartbeat comments and stops them on close', async () => {
    jest.useFakeTimers();
    try {
      await service.streamStatus('T1', res);

      jest.advanceTimersByTime(1000);
      expect(res.chunks).toEqual(['retry: 3000\n\n', ': heartbeat\n\n']);

      res.emit('close');
      expect(jest.getTimerCount()).toBe(0);
    } finally {
      jest.useRealTimers();
    }
  });
});
