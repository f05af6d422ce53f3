import {
  Decision,
  HistoryItem,
  ModelRole,
  Size,
} from '@screenpilot/shared';
import { ModelProvider } from '../config/agent.config';

/**
 * What a client may emit. The orchestrator checks every decision against
 * these before acting on it.
 */
export interface ModelCapabilities {
  canEmitCoordinateActions: boolean;
  canEmitTextActions: boolean;
  canDelegate: boolean;
  canComplete: boolean;
}

export const ROLE_CAPABILITIES: Record<ModelRole, ModelCapabilities> = {
  planner: {
    canEmitCoordinateActions: false,
    canEmitTextActions: false,
    canDelegate: true,
    canComplete: true,
  },
  actor: {
    canEmitCoordinateActions: true,
    canEmitTextActions: true,
    canDelegate: false,
    canComplete: true,
  },
  unified: {
    canEmitCoordinateActions: true,
    canEmitTextActions: true,
    canDelegate: false,
    canComplete: true,
  },
};

export interface InferenceRequest {
  /** Downsampled PNG. Decision coordinates are pixels of this image. */
  image: Buffer;
  size: Size;
  instruction: string;
  /** Overall task, when `instruction` is a delegated sub-goal. */
  context?: string;
  history: readonly HistoryItem[];
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface InferenceResult {
  decision: Decision;
  usage: TokenUsage;
  /** USD spent on this call. */
  cost: number;
  raw?: string;
}

export interface ModelClient {
  readonly role: ModelRole;
  /** `provider:model`, for logs and events. */
  readonly label: string;
  readonly capabilities: ModelCapabilities;
  infer(request: InferenceRequest, signal?: AbortSignal): Promise<InferenceResult>;
}

export interface AgentModel {
  provider: ModelProvider;
  name: string;
  title: string;
  contextWindow?: number;
  // USD per token
  inputCost?: number;
  outputCost?: number;
}

export interface CompletionRequest {
  model: string;
  system: string;
  prompt: string;
  image: Buffer;
  maxTokens: number;
}

export interface Completion {
  text: string;
  usage: TokenUsage;
}

/**
 * One provider SDK behind a single text-and-image completion call.
 */
export interface CompletionProvider {
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<Completion>;
}

export type ModelLineup =
  | { kind: 'unified'; client: ModelClient }
  | { kind: 'split'; planner: ModelClient; actor: ModelClient };

export interface ModelLineupProvider {
  lineup(): ModelLineup;
}

export const MODEL_LINEUP_PROVIDER = Symbol('MODEL_LINEUP_PROVIDER');
