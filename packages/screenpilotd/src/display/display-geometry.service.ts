import { Injectable, Logger } from '@nestjs/common';
import screenshot from 'screenshot-desktop';
import sharp from 'sharp';
import { z } from 'zod';
import {
  Monitor,
  NoDisplayFoundError,
  CaptureUnavailableError,
  assertValidLayout,
  errorMessage,
  findOverlap,
  orderMonitors,
} from '@screenpilot/shared';

export type ScreenId = string | number;

export type DisplaySnapshot = {
  monitors: Monitor[];
  // monitor id -> id understood by screenshot-desktop
  screenIds: Map<string, ScreenId>;
};

const displaySchema = z.object({
  id: z.union([z.string(), z.number()]),
  name: z.string().optional(),
  left: z.number().optional(),
  top: z.number().optional(),
  offsetX: z.number().optional(),
  offsetY: z.number().optional(),
  width: z.number().positive().optional(),
  height: z.number().positive().optional(),
  primary: z.boolean().optional(),
  dpiScale: z.number().positive().optional(),
});

type ListedDisplay = z.infer<typeof displaySchema>;

/**
 * Grabs one display as PNG bytes.
 */
export async function grabScreen(screen: ScreenId): Promise<Buffer> {
  let frame: unknown;
  try {
    frame = await screenshot({ screen, format: 'png' });
  } catch (error) {
    throw new CaptureUnavailableError(
      `Screenshot of display ${String(screen)} failed: ${errorMessage(error)}`,
    );
  }
  if (!Buffer.isBuffer(frame)) {
    throw new CaptureUnavailableError(
      `Screenshot of display ${String(screen)} returned no image data`,
    );
  }
  return frame;
}

@Injectable()
export class DisplayGeometryService {
  private readonly logger = new Logger(DisplayGeometryService.name);
  private lastSnapshot: DisplaySnapshot | null = null;

  async enumerate(): Promise<Monitor[]> {
    const { monitors } = await this.refresh();
    return monitors;
  }

  /**
   * Geometry from the last probe. Probes again only when there is none yet
   * or `monitorIds` names a monitor it does not know.
   */
  async snapshot(monitorIds: string[] = []): Promise<DisplaySnapshot> {
    const known = this.lastSnapshot;
    if (
      known &&
      monitorIds.every((id) => known.monitors.some((monitor) => monitor.id === id))
    ) {
      return known;
    }
    return this.refresh();
  }

  private async refresh(): Promise<DisplaySnapshot> {
    this.lastSnapshot = await this.probe();
    return this.lastSnapshot;
  }

  /**
   * Queries the attached displays. Monitors come back primary first, then
   * left-to-right, then top-to-bottom.
   */
  async probe(): Promise<DisplaySnapshot> {
    let listed: unknown;
    try {
      listed = await screenshot.listDisplays();
    } catch (error) {
      throw new NoDisplayFoundError(`Display probe failed: ${errorMessage(error)}`);
    }

    const parsed = z.array(displaySchema).safeParse(listed);
    if (!parsed.success) {
      throw new NoDisplayFoundError(
        `Display probe returned an unrecognized list: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      );
    }
    if (parsed.data.length === 0) {
      throw new NoDisplayFoundError();
    }

    const candidates = parsed.data.every(hasGeometry)
      ? parsed.data.map((display, index) => toMonitor(display, index))
      : await this.layOutInRow(parsed.data);

    const kept: Array<{ monitor: Monitor; display: ListedDisplay }> = [];
    candidates.forEach((monitor, index) => {
      const mirrored = kept.find(
        (entry) => findOverlap([entry.monitor, monitor]) !== null,
      );
      if (mirrored) {
        this.logger.warn(
          `Display ${monitor.id} overlaps ${mirrored.monitor.id}; treating it as a mirror and skipping it`,
        );
        return;
      }
      kept.push({ monitor, display: parsed.data[index] });
    });

    let primaryIndex = kept.findIndex((entry) => entry.display.primary === true);
    if (primaryIndex < 0) {
      primaryIndex = 0;
    }
    const monitors = orderMonitors(
      kept.map((entry, index) => ({
        ...entry.monitor,
        primary: index === primaryIndex,
      })),
    );
    assertValidLayout(monitors);

    const screenIds = new Map<string, ScreenId>();
    for (const { monitor, display } of kept) {
      screenIds.set(monitor.id, display.id);
    }

    this.logger.debug(
      `Found ${monitors.length} monitor(s): ${monitors
        .map((m) => `${m.id} ${m.width}x${m.height}@(${m.origin.x},${m.origin.y})${m.primary ? '*' : ''}`)
        .join(', ')}`,
    );
    return { monitors, screenIds };
  }

  // Some platforms list displays without bounds; measure each frame instead.
  private async layOutInRow(displays: ListedDisplay[]): Promise<Monitor[]> {
    this.logger.warn('Display list has no geometry; laying monitors out in a row');
    const monitors: Monitor[] = [];
    let nextX = 0;
    for (const [index, display] of displays.entries()) {
      const { width, height } = await sharp(await grabScreen(display.id)).metadata();
      if (!width || !height) {
        throw new NoDisplayFoundError(
          `Could not measure display ${String(display.id)}`,
        );
      }
      monitors.push({
        ...toMonitor({ ...display, width, height }, index),
        origin: { x: nextX, y: 0 },
      });
      nextX += width;
    }
    return monitors;
  }
}

function hasGeometry(display: ListedDisplay): boolean {
  return display.width !== undefined && display.height !== undefined;
}

function toMonitor(display: ListedDisplay, index: number): Monitor {
  return {
    id: String(display.id),
    name: display.name ?? `Display ${index + 1}`,
    origin: {
      x: display.left ?? display.offsetX ?? 0,
      y: display.top ?? display.offsetY ?? 0,
    },
    width: display.width ?? 0,
    height: display.height ?? 0,
    scaleFactor: display.dpiScale ?? 1,
    primary: display.primary === true,
  };
}
