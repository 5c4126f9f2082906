import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  Req,
  Res,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { TaskRecord } from '@bagtrack/tasks';
import { SubmitTaskDto } from './dto/submit-task.dto';
import { SubmitTaskResponseDto } from './dto/submit-task-response.dto';
import { TaskStreamService } from './task-stream.service';
import { TasksService } from './tasks.service';

/**
 * REST surface for baggage processing tasks.
 *
 * Routes:
 *   POST /tasks                   start a task, returns its id and channels
 *   GET  /tasks/:taskId/status    current snapshot, 404 once evicted
 *   GET  /tasks/:taskId/stream    Server-Sent Events status stream
 *
 * Live updates are also available over socket.io, see TasksGateway.
 */
@Controller('tasks')
export class TasksController {
  private readonly logger = new Logger(TasksController.name);

  constructor(
    private readonly tasksService: TasksService,
    private readonly taskStreamService: TaskStreamService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  submit(@Body() dto: SubmitTaskDto): SubmitTaskResponseDto {
    return this.tasksService.submit(dto);
  }

  @Get(':taskId/status')
  getStatus(@Param('taskId') taskId: string): TaskRecord {
    return this.tasksService.getStatus(taskId);
  }

  /**
   * GET /tasks/:taskId/stream
   *
   * Headers set before handing off to the stream service:
   *   Content-Type: text/event-stream
   *   Cache-Control: no-cache
   *   Connection: keep-alive
   *   X-Accel-Buffering: no    disables nginx response buffering
   *
   * Unknown task ids still get an open stream; data flows once the task
   * exists, which may be never.
   */
  @Get(':taskId/stream')
  async streamStatus(
    @Param('taskId') taskId: string,
    @Req() req: Request,
    @Res() res: Response,
  ): Promise<void> {
    this.logger.log(`SSE connection request for task ${taskId} from ${req.ip ?? 'unknown'}`);

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    await this.taskStreamService.streamStatus(taskId, res);
  }
}
