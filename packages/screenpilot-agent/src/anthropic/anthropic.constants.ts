import { AgentModel } from '../models/model.types';

/**
 * Anthropic has no pricing endpoint; prices are USD per token.
 */
export const ANTHROPIC_MODELS: AgentModel[] = [
  {
    provider: 'anthropic',
    name: 'claude-3-5-sonnet-20241022',
    title: 'Claude 3.5 Sonnet',
    contextWindow: 200000,
    inputCost: 0.000003,
    outputCost: 0.000015,
  },
  {
    provider: 'anthropic',
    name: 'claude-3-5-haiku-20241022',
    title: 'Claude 3.5 Haiku',
    contextWindow: 200000,
    inputCost: 0.0000008,
    outputCost: 0.000004,
  },
  {
    provider: 'anthropic',
    name: 'claude-3-opus-20240229',
    title: 'Claude 3 Opus',
    contextWindow: 200000,
    inputCost: 0.000015,
    outputCost: 0.000075,
  },
  {
    provider: 'anthropic',
    name: 'claude-3-haiku-20240307',
    title: 'Claude 3 Haiku',
    contextWindow: 200000,
    inputCost: 0.00000025,
    outputCost: 0.00000125,
  },
];

export const DEFAULT_MODEL = ANTHROPIC_MODELS[0];
