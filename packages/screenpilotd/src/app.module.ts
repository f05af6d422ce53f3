import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ComputerUseModule } from './computer-use/computer-use.module';
import { DisplayModule } from './display/display.module';
import { LoggerModule } from './logger/logger.module';
import { AppController } from './app.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    LoggerModule,
    DisplayModule,
    ComputerUseModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
