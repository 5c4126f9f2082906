/**
 * Response body for POST /tasks (HTTP 201 Created).
 */
export class SubmitTaskResponseDto {
  /** UUID of the new task, the key for every status channel */
  taskId!: string;

  message!: string;

  /**
   * socket.io address for live updates: namespace `/tasks` with the task id
   * in the handshake query, e.g. `/tasks?taskId=<uuid>`.
   */
  subscribeAddress!: string;

  /** Server-Sent Events alternative to the socket.io channel */
  streamUrl!: string;

  /** Point-in-time status endpoint */
  statusUrl!: string;

  instruction!: string;
}
