import { randomUUID } from 'node:crypto';
import { Injectable, Logger } from '@nestjs/common';
import { StageRunner, TaskRecord, TaskRegistry } from '@bagtrack/tasks';
import { BaggageDetailsFactory } from './baggage/baggage-details.factory';
import { SubmitTaskDto } from './dto/submit-task.dto';
import { SubmitTaskResponseDto } from './dto/submit-task-response.dto';
import { TaskNotFoundException } from './exceptions/task.exceptions';

/**
 * TasksService: submission and point-in-time status queries.
 *
 * submit() returns as soon as the record is registered; the stage run
 * continues in the background, tracked by StageRunner.
 */
@Injectable()
export class TasksService {
  private readonly logger = new Logger(TasksService.name);

  constructor(
    private readonly registry: TaskRegistry,
    private readonly runner: StageRunner,
    private readonly baggageDetailsFactory: BaggageDetailsFactory,
  ) {}

  submit(dto: SubmitTaskDto): SubmitTaskResponseDto {
    const taskId = randomUUID();
    const baggageDetails = this.baggageDetailsFactory.create({
      destination: dto.destination,
      priority: dto.priority,
    });

    this.registry.create(taskId, { baggageDetails });
    void this.runner.start(taskId);

    this.logger.log(
      `Baggage ${baggageDetails.baggageId} (${baggageDetails.flightNumber} → ${baggageDetails.destination}) submitted as task ${taskId}`,
    );

    return {
      taskId,
      message: 'Baggage processing started',
      subscribeAddress: `/tasks?taskId=${taskId}`,
      streamUrl: `/tasks/${taskId}/stream`,
      statusUrl: `/tasks/${taskId}/status`,
      instruction:
        'Connect to the socket.io namespace at subscribeAddress, or open streamUrl as an EventSource, to receive real-time status updates',
    };
  }

  getStatus(taskId: string): TaskRecord {
    const record = this.registry.get(taskId);
    if (!record) {
      throw new TaskNotFoundException(taskId);
    }
    return record;
  }
}
