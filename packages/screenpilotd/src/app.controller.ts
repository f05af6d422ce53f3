import { Controller, Get, Logger } from '@nestjs/common';

@Controller()
export class AppController {
  private readonly logger = new Logger(AppController.name);
  private healthCheckCount = 0;

  @Get('health')
  getHealth() {
    this.healthCheckCount++;

    // every 10th check only, pollers hit this constantly
    if (this.healthCheckCount % 10 === 0) {
      this.logger.debug(`Health check #${this.healthCheckCount}`);
    }

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'screenpilotd',
      uptime: process.uptime(),
    };
  }
}
