import { Coordinates, Monitor } from "./geometry.types";

/**
 * A raw screenshot. `origin` is the virtual-desktop point drawn at image
 * pixel (0, 0).
 */
export type Capture = {
  image: Buffer;
  sourceMonitors: Monitor[];
  origin: Coordinates;
  realWidth: number;
  realHeight: number;
  timestamp: string;
};

// JSON form of a Capture as served by the desktop daemon.
export type CaptureResponse = Omit<Capture, "image"> & {
  image: string;
};
