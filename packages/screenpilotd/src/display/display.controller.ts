import {
  Body,
  Controller,
  Get,
  HttpCode,
  Logger,
  Post,
  ValidationPipe,
} from '@nestjs/common';
import { CaptureResponse, Monitor, errorMessage } from '@screenpilot/shared';
import { DisplayGeometryService } from './display-geometry.service';
import { ScreenCaptureService } from './screen-capture.service';
import { CaptureRequestDto } from './dto/capture-request.dto';
import { toHttpException } from '../utils/http-errors';

@Controller('display')
export class DisplayController {
  private readonly logger = new Logger(DisplayController.name);

  constructor(
    private readonly displayGeometry: DisplayGeometryService,
    private readonly screenCapture: ScreenCaptureService,
  ) {}

  @Get('monitors')
  async monitors(): Promise<Monitor[]> {
    try {
      return await this.displayGeometry.enumerate();
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Post('capture')
  @HttpCode(200)
  async capture(
    @Body(new ValidationPipe({ whitelist: true })) body: CaptureRequestDto,
  ): Promise<CaptureResponse> {
    try {
      const { image, ...capture } = await this.screenCapture.capture(
        body.monitorIds ?? [],
      );
      return { ...capture, image: image.toString('base64') };
    } catch (error) {
      this.logger.error(`Capture failed: ${errorMessage(error)}`);
      throw toHttpException(error);
    }
  }
}
