import { Module } from '@nestjs/common';
import { ModelsModule } from '../models/models.module';
import { BridgeController } from './bridge.controller';
import { BridgeService } from './bridge.service';

@Module({
  imports: [ModelsModule],
  controllers: [BridgeController],
  providers: [BridgeService],
})
export class BridgeModule {}
