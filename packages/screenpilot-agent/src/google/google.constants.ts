import { AgentModel } from '../models/model.types';

// Prices are USD per token.
export const GOOGLE_MODELS: AgentModel[] = [
  {
    provider: 'google',
    name: 'gemini-2.0-flash',
    title: 'Gemini 2.0 Flash',
    contextWindow: 1000000,
    inputCost: 0.0000001,
    outputCost: 0.0000004,
  },
  // Gemini 1.5 series
  {
    provider: 'google',
    name: 'gemini-1.5-pro',
    title: 'Gemini 1.5 Pro',
    contextWindow: 2000000,
    inputCost: 0.00000125,
    outputCost: 0.000005,
  },
  {
    provider: 'google',
    name: 'gemini-1.5-flash',
    title: 'Gemini 1.5 Flash',
    contextWindow: 1000000,
    inputCost: 0.000000075,
    outputCost: 0.0000003,
  },
];

export const DEFAULT_MODEL = GOOGLE_MODELS[0];
