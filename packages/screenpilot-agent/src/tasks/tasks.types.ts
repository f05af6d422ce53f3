import {
  AgentError,
  AgentState,
  TaskStatus,
} from '@screenpilot/shared';

export interface TaskSummary {
  id: string;
  instruction: string;
  status: TaskStatus;
  state: AgentState;
  iterations: number;
  cost: number;
  lastScreenshotRef: string | null;
  summary?: string;
  error?: AgentError;
  createdAt: string;
  updatedAt: string;
}
