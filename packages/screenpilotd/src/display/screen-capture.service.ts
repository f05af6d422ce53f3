import { Injectable, Logger } from '@nestjs/common';
import sharp from 'sharp';
import {
  Capture,
  CaptureUnavailableError,
  errorMessage,
  virtualBounds,
} from '@screenpilot/shared';
import { DisplayGeometryService, grabScreen } from './display-geometry.service';

@Injectable()
export class ScreenCaptureService {
  private readonly logger = new Logger(ScreenCaptureService.name);

  constructor(private readonly displayGeometry: DisplayGeometryService) {}

  /**
   * Captures the given monitors (all of them when `monitorIds` is empty) as
   * one PNG laid out like the virtual desktop. Gaps between monitors are
   * black.
   */
  async capture(monitorIds: string[] = []): Promise<Capture> {
    const { monitors, screenIds } =
      await this.displayGeometry.snapshot(monitorIds);

    const unknown = monitorIds.filter(
      (id) => !monitors.some((monitor) => monitor.id === id),
    );
    if (unknown.length > 0) {
      throw new CaptureUnavailableError(
        `Unknown monitor id(s): ${unknown.join(', ')}`,
      );
    }

    const selected =
      monitorIds.length === 0
        ? monitors
        : monitors.filter((monitor) => monitorIds.includes(monitor.id));
    const bounds = virtualBounds(selected);

    const tiles: sharp.OverlayOptions[] = [];
    for (const monitor of selected) {
      const screenId = screenIds.get(monitor.id) ?? monitor.id;
      const frame = await grabScreen(screenId);
      try {
        // HiDPI frames come back in physical pixels
        const input = await sharp(frame)
          .resize(monitor.width, monitor.height, { fit: 'fill' })
          .png()
          .toBuffer();
        tiles.push({
          input,
          left: monitor.origin.x - bounds.x,
          top: monitor.origin.y - bounds.y,
        });
      } catch (error) {
        throw new CaptureUnavailableError(
          `Could not decode the frame of monitor ${monitor.id}: ${errorMessage(error)}`,
        );
      }
    }

    let image: Buffer;
    try {
      image = await sharp({
        create: {
          width: bounds.width,
          height: bounds.height,
          channels: 3,
          background: { r: 0, g: 0, b: 0 },
        },
      })
        .composite(tiles)
        .png()
        .toBuffer();
    } catch (error) {
      throw new CaptureUnavailableError(
        `Could not compose the capture: ${errorMessage(error)}`,
      );
    }

    this.logger.debug(
      `Captured ${selected.length} monitor(s) as ${bounds.width}x${bounds.height}`,
    );

    return {
      image,
      sourceMonitors: selected,
      origin: { x: bounds.x, y: bounds.y },
      realWidth: bounds.width,
      realHeight: bounds.height,
      timestamp: new Date().toISOString(),
    };
  }
}
