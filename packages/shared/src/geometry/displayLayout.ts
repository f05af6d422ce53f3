import { Coordinates, Monitor, MonitorRegion, Rect } from "../types/geometry.types";
import { NoDisplayFoundError } from "../errors/agent.errors";

export function monitorRect(monitor: Monitor): Rect {
  return {
    x: monitor.origin.x,
    y: monitor.origin.y,
    width: monitor.width,
    height: monitor.height,
  };
}

/**
 * Primary first, then left-to-right, then top-to-bottom. Ties fall back to the
 * id so the order never depends on probe order.
 */
export function orderMonitors(monitors: readonly Monitor[]): Monitor[] {
  return [...monitors].sort((a, b) => {
    if (a.primary !== b.primary) {
      return a.primary ? -1 : 1;
    }
    if (a.origin.x !== b.origin.x) {
      return a.origin.x - b.origin.x;
    }
    if (a.origin.y !== b.origin.y) {
      return a.origin.y - b.origin.y;
    }
    return a.id.localeCompare(b.id);
  });
}

export function intersectionArea(a: Rect, b: Rect): number {
  const width = Math.min(a.x + a.width, b.x + b.width) - Math.max(a.x, b.x);
  const height = Math.min(a.y + a.height, b.y + b.height) - Math.max(a.y, b.y);
  if (width <= 0 || height <= 0) {
    return 0;
  }
  return width * height;
}

export function findOverlap(
  monitors: readonly Monitor[],
): [Monitor, Monitor] | null {
  for (let i = 0; i < monitors.length; i++) {
    for (let j = i + 1; j < monitors.length; j++) {
      if (
        intersectionArea(monitorRect(monitors[i]), monitorRect(monitors[j])) > 0
      ) {
        return [monitors[i], monitors[j]];
      }
    }
  }
  return null;
}

export function assertValidLayout(monitors: readonly Monitor[]): void {
  if (monitors.length === 0) {
    throw new NoDisplayFoundError();
  }

  const primaries = monitors.filter((monitor) => monitor.primary);
  if (primaries.length !== 1) {
    throw new Error(
      `Display layout must have exactly one primary monitor, found ${primaries.length}`,
    );
  }

  const overlap = findOverlap(monitors);
  if (overlap) {
    throw new Error(
      `Monitors ${overlap[0].id} and ${overlap[1].id} overlap in virtual-desktop space`,
    );
  }
}

export function virtualBounds(monitors: readonly Monitor[]): Rect {
  if (monitors.length === 0) {
    throw new NoDisplayFoundError();
  }

  const left = Math.min(...monitors.map((m) => m.origin.x));
  const top = Math.min(...monitors.map((m) => m.origin.y));
  const right = Math.max(...monitors.map((m) => m.origin.x + m.width));
  const bottom = Math.max(...monitors.map((m) => m.origin.y + m.height));

  return { x: left, y: top, width: right - left, height: bottom - top };
}

/**
 * Placement of each monitor inside an image whose pixel (0, 0) shows the
 * virtual-desktop point `imageOrigin`. Keeps the order of `monitors`.
 */
export function buildRegions(
  monitors: readonly Monitor[],
  imageOrigin: Coordinates,
): MonitorRegion[] {
  return monitors.map((monitor) => ({
    monitorId: monitor.id,
    screen: monitorRect(monitor),
    image: {
      x: monitor.origin.x - imageOrigin.x,
      y: monitor.origin.y - imageOrigin.y,
      width: monitor.width,
      height: monitor.height,
    },
  }));
}

export function containsPoint(rect: Rect, point: Coordinates): boolean {
  return (
    point.x >= rect.x &&
    point.x < rect.x + rect.width &&
    point.y >= rect.y &&
    point.y < rect.y + rect.height
  );
}

/**
 * Picks the rect that overlaps `footprint` the most. Exact ties go to the
 * earliest rect. Returns -1 when nothing overlaps.
 */
export function largestOverlapIndex(
  footprint: Rect,
  rects: readonly Rect[],
): number {
  let best = -1;
  let bestArea = 0;
  rects.forEach((rect, index) => {
    const area = intersectionArea(footprint, rect);
    if (area > bestArea) {
      best = index;
      bestArea = area;
    }
  });
  return best;
}
