import { Action, Decision, Outcome } from "./decision.types";

export enum AgentState {
  Idle = "Idle",
  Capturing = "Capturing",
  Inferring = "Inferring",
  Mapping = "Mapping",
  Executing = "Executing",
  Verifying = "Verifying",
  Done = "Done",
  Failed = "Failed",
  Cancelled = "Cancelled",
}

export const TERMINAL_STATES: ReadonlySet<AgentState> = new Set([
  AgentState.Done,
  AgentState.Failed,
  AgentState.Cancelled,
]);

export type TaskStatus = "queued" | "running" | "done" | "failed" | "cancelled";

export type FailureKind =
  | "NoDisplayFound"
  | "CaptureUnavailable"
  | "InferenceUnavailable"
  | "LimitExceeded"
  | "InternalError";

export type StepErrorKind =
  | "InferenceMalformed"
  | "OutOfBoundsCoordinate"
  | "ExecutionFailed";

export type AgentError = {
  kind: StepErrorKind | FailureKind;
  message: string;
};

export type HistoryEntry = {
  iteration: number;
  decision: Decision | null;
  action: Action | null;
  outcome: Outcome;
  subgoal?: string;
  error?: AgentError;
  screenshotRef?: string;
  timestamp: string;
};

// The part of a history entry a model gets to see.
export type HistoryItem = Pick<HistoryEntry, "decision" | "outcome" | "subgoal">;

export type ModelRole = "planner" | "actor" | "unified";

export type ReplanHistoryPolicy = "keep" | "discard" | "recent";

export type TaskLimits = {
  maxIterations: number;
  maxElapsedMs: number;
  maxCost: number;
};

export type AgentEventKind = "state" | "step" | "terminal";

export type AgentEvent = {
  taskId: string;
  sequence: number;
  kind: AgentEventKind;
  state: AgentState;
  iteration: number;
  screenshotRef: string | null;
  decision: Decision | null;
  action: Action | null;
  outcome: Outcome | null;
  error?: AgentError;
  status?: TaskStatus;
  cost: number;
  timestamp: string;
};

export type TaskOutcome = {
  taskId: string;
  status: Extract<TaskStatus, "done" | "failed" | "cancelled">;
  iterations: number;
  cost: number;
  summary?: string;
  error?: AgentError;
};
