import { Module } from '@nestjs/common';
import { AgentModule } from '../agent/agent.module';
import { TasksController } from './tasks.controller';
import { TasksService } from './tasks.service';
import { TasksGateway } from './tasks.gateway';

@Module({
  imports: [AgentModule],
  controllers: [TasksController],
  providers: [TasksService, TasksGateway],
  exports: [TasksService],
})
export class TasksModule {}
