import {
  Action,
  CoordinateDecision,
  Decision,
  DecisionKind,
  Outcome,
} from "../types/decision.types";

export const COORDINATE_DECISION_KINDS: ReadonlySet<DecisionKind> = new Set<DecisionKind>([
  "click",
  "move",
  "drag",
  "scroll",
]);

export const TEXT_DECISION_KINDS: ReadonlySet<DecisionKind> = new Set<DecisionKind>([
  "type",
  "keyCombo",
]);

export function hasCoordinates(
  decision: Decision,
): decision is CoordinateDecision {
  return COORDINATE_DECISION_KINDS.has(decision.kind);
}

/**
 * One-line label used in logs and in the history sent back to models.
 */
export function describeDecision(decision: Decision): string {
  switch (decision.kind) {
    case "click": {
      const times = decision.clickCount > 1 ? ` x${decision.clickCount}` : "";
      return `click ${decision.button}${times} at (${decision.point.x}, ${decision.point.y})`;
    }
    case "move":
      return `move to (${decision.point.x}, ${decision.point.y})`;
    case "drag":
      return `drag from (${decision.from.x}, ${decision.from.y}) to (${decision.to.x}, ${decision.to.y})`;
    case "type":
      return `type "${truncate(decision.text, 60)}"`;
    case "keyCombo":
      return `press ${decision.keys.join("+")}`;
    case "scroll":
      return `scroll (${decision.delta.x}, ${decision.delta.y}) at (${decision.point.x}, ${decision.point.y})`;
    case "wait":
      return `wait ${decision.durationMs}ms`;
    case "done":
      return decision.summary ? `done: ${decision.summary}` : "done";
    case "replan":
      return `replan: ${decision.reason}`;
    case "subgoal":
      return `subgoal: ${decision.instruction}`;
  }
}

export function describeAction(action: Action): string {
  switch (action.action) {
    case "click":
      return `click ${action.button} at (${action.coordinates.x}, ${action.coordinates.y})`;
    case "move":
      return `move to (${action.coordinates.x}, ${action.coordinates.y})`;
    case "drag":
      return `drag (${action.from.x}, ${action.from.y}) -> (${action.to.x}, ${action.to.y})`;
    case "type":
      return `type ${action.text.length} chars`;
    case "key_combo":
      return `press ${action.keys.join("+")}`;
    case "scroll":
      return `scroll (${action.delta.x}, ${action.delta.y}) at (${action.coordinates.x}, ${action.coordinates.y})`;
    case "wait":
      return `wait ${action.durationMs}ms`;
  }
}

export function describeOutcome(outcome: Outcome): string {
  return outcome.status === "ok" ? "ok" : `failed: ${outcome.reason}`;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
