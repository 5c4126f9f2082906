import { IsNotEmpty, IsString } from 'class-validator';

/** Payload of the `subscribe` / `unsubscribe` socket.io messages. */
export class SubscribeTaskDto {
  @IsString()
  @IsNotEmpty()
  taskId!: string;
}
