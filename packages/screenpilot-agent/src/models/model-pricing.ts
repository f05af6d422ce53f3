import { ANTHROPIC_MODELS } from '../anthropic/anthropic.constants';
import { GOOGLE_MODELS } from '../google/google.constants';
import { OPENAI_MODELS } from '../openai/openai.constants';
import { ModelSpec } from '../config/agent.config';
import { AgentModel, TokenUsage } from './model.types';

const KNOWN_MODELS: AgentModel[] = [
  ...ANTHROPIC_MODELS,
  ...OPENAI_MODELS,
  ...GOOGLE_MODELS,
];

export function findModel(spec: ModelSpec): AgentModel | undefined {
  return KNOWN_MODELS.find(
    (model) => model.provider === spec.provider && model.name === spec.name,
  );
}

/**
 * USD for one call. Self-hosted and unlisted models cost nothing.
 */
export function usageCost(model: AgentModel | undefined, usage: TokenUsage): number {
  if (!model) {
    return 0;
  }
  return (
    usage.inputTokens * (model.inputCost ?? 0) +
    usage.outputTokens * (model.outputCost ?? 0)
  );
}
