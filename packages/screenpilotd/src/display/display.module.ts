import { Module } from '@nestjs/common';
import { DisplayController } from './display.controller';
import { DisplayGeometryService } from './display-geometry.service';
import { ScreenCaptureService } from './screen-capture.service';

@Module({
  controllers: [DisplayController],
  providers: [DisplayGeometryService, ScreenCaptureService],
  exports: [DisplayGeometryService, ScreenCaptureService],
})
export class DisplayModule {}
