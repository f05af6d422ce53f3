export type Coordinates = { x: number; y: number };

export type Size = { width: number; height: number };

export type Rect = Coordinates & Size;

/**
 * A physical display in virtual-desktop space. `origin` is the top-left pixel
 * of the monitor relative to the primary monitor's top-left corner.
 */
export type Monitor = {
  id: string;
  name: string;
  origin: Coordinates;
  width: number;
  height: number;
  scaleFactor: number;
  primary: boolean;
};

/**
 * A monitor's placement inside a captured image and inside the virtual
 * desktop. Both rects describe the same pixels.
 */
export type MonitorRegion = {
  monitorId: string;
  screen: Rect;
  image: Rect;
};
