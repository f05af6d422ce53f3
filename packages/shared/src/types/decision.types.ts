import { Coordinates } from "./geometry.types";

export type MouseButton = "left" | "right" | "middle";
export type ScrollDirection = "up" | "down" | "left" | "right";

/**
 * Scroll amount in wheel steps. Positive `y` scrolls down, positive `x`
 * scrolls right.
 */
export type ScrollDelta = { x: number; y: number };

// Decisions carry points in downsampled image space.
export type ClickDecision = {
  kind: "click";
  point: Coordinates;
  button: MouseButton;
  clickCount: number;
};

export type MoveDecision = {
  kind: "move";
  point: Coordinates;
};

export type DragDecision = {
  kind: "drag";
  from: Coordinates;
  to: Coordinates;
  button: MouseButton;
};

export type TypeDecision = {
  kind: "type";
  text: string;
};

export type KeyComboDecision = {
  kind: "keyCombo";
  keys: string[];
};

export type ScrollDecision = {
  kind: "scroll";
  point: Coordinates;
  delta: ScrollDelta;
};

export type WaitDecision = {
  kind: "wait";
  durationMs: number;
};

export type DoneDecision = {
  kind: "done";
  summary?: string;
};

export type ReplanDecision = {
  kind: "replan";
  reason: string;
};

export type SubgoalDecision = {
  kind: "subgoal";
  instruction: string;
};

export type Decision =
  | ClickDecision
  | MoveDecision
  | DragDecision
  | TypeDecision
  | KeyComboDecision
  | ScrollDecision
  | WaitDecision
  | DoneDecision
  | ReplanDecision
  | SubgoalDecision;

export type DecisionKind = Decision["kind"];

export type CoordinateDecision =
  | ClickDecision
  | MoveDecision
  | DragDecision
  | ScrollDecision;

// Actions carry points in real screen space.
export type ClickAction = {
  action: "click";
  coordinates: Coordinates;
  button: MouseButton;
  clickCount: number;
};

export type MoveAction = {
  action: "move";
  coordinates: Coordinates;
};

export type DragAction = {
  action: "drag";
  from: Coordinates;
  to: Coordinates;
  button: MouseButton;
};

export type TypeAction = {
  action: "type";
  text: string;
};

export type KeyComboAction = {
  action: "key_combo";
  keys: string[];
};

export type ScrollAction = {
  action: "scroll";
  coordinates: Coordinates;
  delta: ScrollDelta;
};

export type WaitAction = {
  action: "wait";
  durationMs: number;
};

export type Action =
  | ClickAction
  | MoveAction
  | DragAction
  | TypeAction
  | KeyComboAction
  | ScrollAction
  | WaitAction;

export type ActionType = Action["action"];

export type Outcome = { status: "ok" } | { status: "failed"; reason: string };
