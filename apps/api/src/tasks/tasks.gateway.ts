import { Logger, UsePipes, ValidationPipe } from '@nestjs/common';
import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  SubscribeMessage,
  WebSocketGateway,
} from '@nestjs/websockets';
import { SubscriberHub } from '@bagtrack/tasks';
import { SubscribeTaskDto } from './dto/subscribe-task.dto';
import { SocketTaskSubscriber, TaskClient } from './subscribers/socket-task-subscriber';

export interface SubscriptionAck {
  status: 'subscribed' | 'unsubscribed' | 'failed';
  taskId: string;
}

/**
 * WebSocket gateway for live task status.
 *
 * Clients either connect with `?taskId=<id>` in the handshake query to be
 * subscribed straight away, or emit `subscribe` / `unsubscribe` with
 * `{ taskId }`. Snapshots arrive as `task-status` events. One socket may
 * watch several tasks; disconnecting detaches all of them.
 *
 * CORS for the namespace comes from CorsIoAdapter.
 */
@WebSocketGateway({ namespace: '/tasks' })
@UsePipes(new ValidationPipe({ transform: true, whitelist: true }))
export class TasksGateway implements OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(TasksGateway.name);

  /** socket id → task id → subscriber */
  private readonly subscriptions = new Map<string, Map<string, SocketTaskSubscriber>>();

  constructor(private readonly hub: SubscriberHub) {}

  /** Task ids the given socket is currently subscribed to. */
  subscribedTaskIds(clientId: string): string[] {
    return [...(this.subscriptions.get(clientId)?.keys() ?? [])];
  }

  async handleConnection(client: TaskClient): Promise<void> {
    this.logger.log(`Client connected via WebSocket: ${client.id}`);

    const { taskId } = client.handshake.query;
    if (typeof taskId === 'string' && taskId.length > 0) {
      await this.subscribe(client, taskId);
    }
  }

  handleDisconnect(client: TaskClient): void {
    const clientSubscriptions = this.subscriptions.get(client.id);
    this.subscriptions.delete(client.id);

    if (clientSubscriptions) {
      for (const [taskId, subscriber] of clientSubscriptions) {
        this.hub.detach(taskId, subscriber);
      }
    }

    this.logger.log(
      `Client disconnected from WebSocket: ${client.id} (${clientSubscriptions?.size ?? 0} subscription(s) released)`,
    );
  }

  @SubscribeMessage('subscribe')
  async handleSubscribe(
    @ConnectedSocket() client: TaskClient,
    @MessageBody() payload: SubscribeTaskDto,
  ): Promise<SubscriptionAck> {
    const attached = await this.subscribe(client, payload.taskId);
    return { status: attached ? 'subscribed' : 'failed', taskId: payload.taskId };
  }

  @SubscribeMessage('unsubscribe')
  handleUnsubscribe(
    @ConnectedSocket() client: TaskClient,
    @MessageBody() payload: SubscribeTaskDto,
  ): SubscriptionAck {
    const clientSubscriptions = this.subscriptions.get(client.id);
    const subscriber = clientSubscriptions?.get(payload.taskId);

    if (subscriber) {
      this.forget(client.id, payload.taskId);
      this.hub.detach(payload.taskId, subscriber);
      this.logger.log(`Client ${client.id} unsubscribed from task ${payload.taskId}`);
    }

    return { status: 'unsubscribed', taskId: payload.taskId };
  }

  /** Resolves false when the snapshot could not be sent to the client. */
  private async subscribe(client: TaskClient, taskId: string): Promise<boolean> {
    let clientSubscriptions = this.subscriptions.get(client.id);
    if (!clientSubscriptions) {
      clientSubscriptions = new Map();
      this.subscriptions.set(client.id, clientSubscriptions);
    }

    // Re-subscribing re-attaches the same subscriber and resends the snapshot.
    let subscriber = clientSubscriptions.get(taskId);
    if (!subscriber) {
      subscriber = new SocketTaskSubscriber(client);
      clientSubscriptions.set(taskId, subscriber);
    }

    const attached = await this.hub.attach(taskId, subscriber);
    if (!attached) {
      // The hub already dropped it.
      this.forget(client.id, taskId);
      this.logger.warn(`Client ${client.id} could not be subscribed to task ${taskId}`);
      return false;
    }

    this.logger.log(`Client ${client.id} subscribed to task ${taskId}`);
    return true;
  }

  private forget(clientId: string, taskId: string): void {
    const clientSubscriptions = this.subscriptions.get(clientId);
    if (!clientSubscriptions) return;

    clientSubscriptions.delete(taskId);
    if (clientSubscriptions.size === 0) {
      this.subscriptions.delete(clientId);
    }
  }
}
