import { Module } from '@nestjs/common';
import { DesktopService } from './desktop.service';
import { DESKTOP_CONNECTOR } from './desktop.types';

@Module({
  providers: [
    DesktopService,
    { provide: DESKTOP_CONNECTOR, useExisting: DesktopService },
  ],
  exports: [DesktopService, DESKTOP_CONNECTOR],
})
export class DesktopModule {}
