import { Module } from '@nestjs/common';
import { TasksCoreModule } from '@bagtrack/tasks';
import { BaggageDetailsFactory } from './baggage/baggage-details.factory';
import { TaskStreamService } from './task-stream.service';
import { TasksController } from './tasks.controller';
import { TasksGateway } from './tasks.gateway';
import { TasksService } from './tasks.service';

/**
 * TasksModule: feature module for baggage processing tasks.
 *
 * Imports:
 *   - TasksCoreModule.forRootAsync(): registry, hub and stage runner,
 *     configured from TASK_* environment variables.
 *
 * Provides:
 *   - POST /tasks, GET /tasks/:taskId/status, GET /tasks/:taskId/stream
 *   - socket.io namespace /tasks
 */
@Module({
  imports: [TasksCoreModule.forRootAsync()],
  controllers: [TasksController],
  providers: [TasksService, TaskStreamService, TasksGateway, BaggageDetailsFactory],
})
export class TasksModule {}
