import {
  Action,
  AgentError,
  AgentEvent,
  AgentState,
  Decision,
  HistoryEntry,
  Monitor,
  Outcome,
  TaskLimits,
  TaskOutcome,
} from '@screenpilot/shared';
import { DesktopPort } from '../desktop/desktop.types';

export interface RunTaskOptions {
  maxIterations?: number;
  maxElapsedMs?: number;
  maxCost?: number;
  /** Monitors to capture; all of them when omitted. */
  monitorIds?: string[];
  desktopBaseUrl?: string;
}

export interface TaskHandle {
  taskId: string;
  /** Every event of the task from the first, ending after the terminal one. */
  events: AsyncIterable<AgentEvent>;
  completion: Promise<TaskOutcome>;
}

/**
 * Mutable per-task state. Owned by the orchestrator and dropped when the task
 * ends.
 */
export interface SessionState {
  taskId: string;
  instruction: string;
  desktop: DesktopPort;
  limits: TaskLimits;
  requestedMonitorIds?: string[];
  monitors: Monitor[];
  history: HistoryEntry[];
  // first history index the models get to see
  windowStart: number;
  iterationCount: number;
  startTime: number;
  cost: number;
  state: AgentState;
  sequence: number;
  cancelled: boolean;
  // set when the maxElapsedMs deadline fires
  timedOut: boolean;
  abortController: AbortController;
  lastScreenshotRef: string | null;
  lastDecision: Decision | null;
  lastAction: Action | null;
  lastOutcome: Outcome | null;
  lastError?: AgentError;
}

export const AGENT_EVENT = 'agent.event';
