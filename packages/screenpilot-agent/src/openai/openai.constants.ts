import { AgentModel } from '../models/model.types';

// Prices are USD per token.
export const OPENAI_MODELS: AgentModel[] = [
  {
    provider: 'openai',
    name: 'gpt-4o',
    title: 'GPT-4o',
    contextWindow: 128000,
    inputCost: 0.0000025,
    outputCost: 0.00001,
  },
  {
    provider: 'openai',
    name: 'gpt-4o-mini',
    title: 'GPT-4o Mini',
    contextWindow: 128000,
    inputCost: 0.00000015,
    outputCost: 0.0000006,
  },
  // GPT-4.1 series (April 2025)
  {
    provider: 'openai',
    name: 'gpt-4.1',
    title: 'GPT-4.1',
    contextWindow: 1047576,
    inputCost: 0.000002,
    outputCost: 0.000008,
  },
  {
    provider: 'openai',
    name: 'gpt-4.1-mini',
    title: 'GPT-4.1 Mini',
    contextWindow: 1047576,
    inputCost: 0.0000004,
    outputCost: 0.0000016,
  },
];

export const DEFAULT_MODEL = OPENAI_MODELS[0]; // gpt-4o
