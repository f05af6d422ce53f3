import { Module } from '@nestjs/common';
import { DesktopModule } from '../desktop/desktop.module';
import { HardwareService } from '../hardware/hardware.service';
import { ResolutionMapperService } from '../mapping/resolution-mapper.service';
import { ModelsModule } from '../models/models.module';
import { AgentOrchestrator } from './agent.orchestrator';
import { ScreenshotStoreService } from './screenshot-store.service';

@Module({
  imports: [DesktopModule, ModelsModule],
  providers: [
    AgentOrchestrator,
    ScreenshotStoreService,
    HardwareService,
    ResolutionMapperService,
  ],
  exports: [AgentOrchestrator, ScreenshotStoreService],
})
export class AgentModule {}
