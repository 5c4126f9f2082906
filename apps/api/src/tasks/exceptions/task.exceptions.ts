import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when a status query targets an unknown or already evicted task.
 * Maps to HTTP 404 Not Found.
 */
export class TaskNotFoundException extends HttpException {
  constructor(taskId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: `Task ${taskId} not found`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}
