import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { AgentModule } from './agent/agent.module';
import { BridgeModule } from './bridge/bridge.module';
import { AgentConfigModule } from './config/agent-config.module';
import { LoggerModule } from './logger/logger.module';
import { TasksModule } from './tasks/tasks.module';
import { AppController } from './app.controller';

@Module({
  imports: [
    EventEmitterModule.forRoot(),
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    LoggerModule,
    AgentConfigModule,
    AgentModule,
    TasksModule,
    BridgeModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
