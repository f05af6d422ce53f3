import {
  Coordinates,
  MonitorRegion,
  Rect,
  Size,
} from "../types/geometry.types";
import { Action, Decision } from "../types/decision.types";
import { Capture } from "../types/capture.types";
import { OutOfBoundsCoordinateError } from "../errors/agent.errors";
import {
  buildRegions,
  containsPoint,
  largestOverlapIndex,
} from "./displayLayout";

/**
 * Largest size with the same aspect ratio that fits inside a square of side
 * `floor(sqrt(maxPixelBudget))`. The product of the returned dimensions never
 * exceeds the budget and the input is never enlarged.
 */
export function fitToPixelBudget(size: Size, maxPixelBudget: number): Size {
  if (!Number.isFinite(maxPixelBudget) || maxPixelBudget < 1) {
    throw new RangeError(`Pixel budget must be at least 1, got ${maxPixelBudget}`);
  }
  if (size.width < 1 || size.height < 1) {
    throw new RangeError(
      `Cannot downsample an empty image (${size.width}x${size.height})`,
    );
  }

  const side = Math.floor(Math.sqrt(maxPixelBudget));
  if (Math.max(size.width, size.height) <= side) {
    return { width: size.width, height: size.height };
  }

  if (size.width >= size.height) {
    return {
      width: side,
      height: Math.max(1, Math.floor((size.height * side) / size.width)),
    };
  }

  return {
    width: Math.max(1, Math.floor((size.width * side) / size.height)),
    height: side,
  };
}

/**
 * Affine map between real screen coordinates and a downsampled capture.
 * Regions are kept in DisplayGeometry order, which decides seam ties.
 */
export class CoordinateTransform {
  readonly scaleX: number;
  readonly scaleY: number;

  constructor(
    readonly regions: readonly MonitorRegion[],
    readonly realSize: Size,
    readonly scaledSize: Size,
  ) {
    if (regions.length === 0) {
      throw new RangeError("A transform needs at least one monitor region");
    }
    this.scaleX = scaledSize.width / realSize.width;
    this.scaleY = scaledSize.height / realSize.height;
  }

  static fromCapture(
    capture: Pick<Capture, "sourceMonitors" | "origin" | "realWidth" | "realHeight">,
    scaledSize: Size,
  ): CoordinateTransform {
    return new CoordinateTransform(
      buildRegions(capture.sourceMonitors, capture.origin),
      { width: capture.realWidth, height: capture.realHeight },
      scaledSize,
    );
  }

  /**
   * Real screen point to the downsampled pixel that shows it.
   */
  forward(point: Coordinates): Coordinates {
    this.assertFinite(point);
    const region = this.regions.find((candidate) =>
      containsPoint(candidate.screen, point),
    );
    if (!region) {
      throw new OutOfBoundsCoordinateError(
        `Screen point (${point.x}, ${point.y}) is outside every captured monitor`,
      );
    }

    const rawX = point.x - region.screen.x + region.image.x;
    const rawY = point.y - region.screen.y + region.image.y;

    return {
      x: clamp(Math.round(rawX * this.scaleX), 0, this.scaledSize.width - 1),
      y: clamp(Math.round(rawY * this.scaleY), 0, this.scaledSize.height - 1),
    };
  }

  /**
   * Downsampled image point to a real screen pixel. The point is attributed
   * to one monitor before the offsets are undone.
   */
  inverse(point: Coordinates): Coordinates {
    const region = this.regionAt(point);

    const rawX = point.x / this.scaleX;
    const rawY = point.y / this.scaleY;
    const screenX = Math.round(rawX - region.image.x + region.screen.x);
    const screenY = Math.round(rawY - region.image.y + region.screen.y);

    return {
      x: clamp(
        screenX,
        region.screen.x,
        region.screen.x + region.screen.width - 1,
      ),
      y: clamp(
        screenY,
        region.screen.y,
        region.screen.y + region.screen.height - 1,
      ),
    };
  }

  /**
   * The monitor whose image area overlaps the one-pixel footprint centered on
   * `point` the most.
   */
  regionAt(point: Coordinates): MonitorRegion {
    this.assertFinite(point);
    const footprint: Rect = {
      x: point.x - 0.5,
      y: point.y - 0.5,
      width: 1,
      height: 1,
    };
    const index = largestOverlapIndex(
      footprint,
      this.regions.map((region) => this.scaledImageRect(region)),
    );
    if (index < 0) {
      throw new OutOfBoundsCoordinateError(
        `Image point (${point.x}, ${point.y}) is outside every monitor region of the ${this.scaledSize.width}x${this.scaledSize.height} capture`,
      );
    }
    return this.regions[index];
  }

  private scaledImageRect(region: MonitorRegion): Rect {
    return {
      x: region.image.x * this.scaleX,
      y: region.image.y * this.scaleY,
      width: region.image.width * this.scaleX,
      height: region.image.height * this.scaleY,
    };
  }

  private assertFinite(point: Coordinates): void {
    if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) {
      throw new OutOfBoundsCoordinateError(
        `Coordinates must be finite numbers, got (${point.x}, ${point.y})`,
      );
    }
  }
}

export type ScaledCapture = {
  capture: Capture;
  image: Buffer;
  downsampledWidth: number;
  downsampledHeight: number;
  transform: CoordinateTransform;
};

/**
 * Maps every point of an executable decision into screen space. Decisions
 * that do nothing on the desktop map to null.
 */
export function mapDecision(
  decision: Decision,
  transform: CoordinateTransform,
): Action | null {
  switch (decision.kind) {
    case "click":
      return {
        action: "click",
        coordinates: transform.inverse(decision.point),
        button: decision.button,
        clickCount: decision.clickCount,
      };
    case "move":
      return { action: "move", coordinates: transform.inverse(decision.point) };
    case "drag":
      return {
        action: "drag",
        from: transform.inverse(decision.from),
        to: transform.inverse(decision.to),
        button: decision.button,
      };
    case "scroll":
      return {
        action: "scroll",
        coordinates: transform.inverse(decision.point),
        delta: { ...decision.delta },
      };
    case "type":
      return { action: "type", text: decision.text };
    case "keyCombo":
      return { action: "key_combo", keys: [...decision.keys] };
    case "wait":
      return { action: "wait", durationMs: decision.durationMs };
    case "done":
    case "replan":
    case "subgoal":
      return null;
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
