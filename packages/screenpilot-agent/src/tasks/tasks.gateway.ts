import {
  WebSocketGateway,
  WebSocketServer,
  SubscribeMessage,
  OnGatewayConnection,
  OnGatewayDisconnect,
} from '@nestjs/websockets';
import { Server, Socket } from 'socket.io';
import { Injectable, Logger } from '@nestjs/common';
import { AgentEvent } from '@screenpilot/shared';
import { TaskSummary } from './tasks.types';

export const taskRoom = (taskId: string) => `task_${taskId}`;

@Injectable()
@WebSocketGateway({
  cors: {
    origin: '*',
    methods: ['GET', 'POST'],
  },
})
export class TasksGateway implements OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(TasksGateway.name);

  @WebSocketServer()
  server!: Server;

  handleConnection(client: Socket) {
    this.logger.debug(`Client connected: ${client.id}`);
  }

  handleDisconnect(client: Socket) {
    this.logger.debug(`Client disconnected: ${client.id}`);
  }

  @SubscribeMessage('join_task')
  async handleJoinTask(client: Socket, taskId: string) {
    await client.join(taskRoom(taskId));
    this.logger.debug(`Client ${client.id} joined task ${taskId}`);
  }

  @SubscribeMessage('leave_task')
  async handleLeaveTask(client: Socket, taskId: string) {
    await client.leave(taskRoom(taskId));
    this.logger.debug(`Client ${client.id} left task ${taskId}`);
  }

  emitAgentEvent(event: AgentEvent) {
    this.server.to(taskRoom(event.taskId)).emit('agent_event', event);
  }

  emitTaskCreated(task: TaskSummary) {
    this.server.emit('task_created', task);
  }
}
