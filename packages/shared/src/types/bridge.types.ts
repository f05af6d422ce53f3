import { Coordinates, Size } from "./geometry.types";
import { MouseButton, ScrollDelta } from "./decision.types";
import { ModelRole } from "./agentEvent.types";

export type WireDecisionKind =
  | "click"
  | "move"
  | "drag"
  | "type"
  | "keyCombo"
  | "scroll"
  | "wait"
  | "done"
  | "replan"
  | "subgoal";

export type WirePayload = {
  point?: Coordinates;
  from?: Coordinates;
  to?: Coordinates;
  button?: MouseButton;
  clickCount?: number;
  text?: string;
  keys?: string[];
  delta?: ScrollDelta;
  durationMs?: number;
  summary?: string;
  reason?: string;
  instruction?: string;
};

export type WireDecision = {
  decisionKind: WireDecisionKind;
  payload: WirePayload;
};

export type WireOutcome = { status: "ok" } | { status: "failed"; reason: string };

export type WireHistoryItem = {
  decision: WireDecision | null;
  outcome: WireOutcome;
  subgoal?: string;
};

export type InferenceRequestBody = Size & {
  image: string;
  instruction: string;
  history: WireHistoryItem[];
  role?: ModelRole;
};

export type InferenceErrorBody = {
  error: "InferenceMalformed" | "InferenceUnavailable" | "BadRequest";
  message: string;
};
