import { Injectable, Logger } from '@nestjs/common';
import sharp from 'sharp';
import {
  Capture,
  CaptureUnavailableError,
  CoordinateTransform,
  ScaledCapture,
  errorMessage,
  fitToPixelBudget,
} from '@screenpilot/shared';
import { AgentConfigService } from '../config/agent-config.service';
import { HardwareService } from '../hardware/hardware.service';

@Injectable()
export class ResolutionMapperService {
  private readonly logger = new Logger(ResolutionMapperService.name);

  constructor(
    private readonly agentConfig: AgentConfigService,
    private readonly hardware: HardwareService,
  ) {}

  /**
   * The configured budget, or the hardware preset when none is set.
   */
  async pixelBudget(): Promise<number> {
    const configured = this.agentConfig.config.pixelBudget;
    if (configured !== undefined) {
      return configured;
    }
    const preset = await this.hardware.capturePreset();
    return preset.pixelBudget;
  }

  /**
   * Shrinks a capture to fit the pixel budget and returns it with the
   * transform back to screen space. Captures already within budget keep
   * their bytes.
   */
  async downsample(
    capture: Capture,
    maxPixelBudget: number,
  ): Promise<ScaledCapture> {
    const size = fitToPixelBudget(
      { width: capture.realWidth, height: capture.realHeight },
      maxPixelBudget,
    );

    let image = capture.image;
    if (size.width !== capture.realWidth || size.height !== capture.realHeight) {
      try {
        image = await sharp(capture.image)
          .resize(size.width, size.height, { fit: 'fill' })
          .png()
          .toBuffer();
      } catch (error) {
        throw new CaptureUnavailableError(
          `Could not downsample the capture: ${errorMessage(error)}`,
        );
      }
    }

    this.logger.debug(
      `Downsampled ${capture.realWidth}x${capture.realHeight} to ${size.width}x${size.height} (budget ${maxPixelBudget})`,
    );

    return {
      capture,
      image,
      downsampledWidth: size.width,
      downsampledHeight: size.height,
      transform: CoordinateTransform.fromCapture(capture, size),
    };
  }
}
