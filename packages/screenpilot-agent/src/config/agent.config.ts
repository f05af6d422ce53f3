import { z } from 'zod';

export const MODEL_PROVIDERS = [
  'anthropic',
  'openai',
  'google',
  'proxy',
  'uitars',
  'showui',
  'bridge',
] as const;

export type ModelProvider = (typeof MODEL_PROVIDERS)[number];

export type ModelSpec = { provider: ModelProvider; name: string };

export const DEFAULT_UNIFIED_MODEL = 'anthropic:claude-3-5-sonnet-20241022';

const providerSchema = z.enum(MODEL_PROVIDERS);

/**
 * Parses `provider:name`. Everything after the first colon is the model name,
 * so names such as `proxy:ollama/qwen2.5-vl:7b` survive.
 */
export const modelSpecSchema = z.string().transform((value, ctx): ModelSpec => {
  const separator = value.indexOf(':');
  const provider = providerSchema.safeParse(
    separator < 0 ? value : value.slice(0, separator),
  );
  const name = separator < 0 ? '' : value.slice(separator + 1).trim();

  if (!provider.success || name.length === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Expected "<provider>:<model>" with provider one of ${MODEL_PROVIDERS.join(', ')}, got "${value}"`,
    });
    return z.NEVER;
  }
  return { provider: provider.data, name };
});

const count = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

export const agentConfigSchema = z.object({
  desktopBaseUrl: z.string().url().default('http://localhost:9990'),
  pixelBudget: z.coerce.number().int().min(1).optional(),
  limits: z.object({
    maxIterations: count(25, 1),
    maxElapsedMs: count(600_000, 1),
    maxCost: z.coerce.number().min(0).default(5),
  }),
  retry: z
    .object({
      attempts: count(3, 1),
      baseDelayMs: count(1000),
      maxDelayMs: count(15_000),
    })
    .refine((retry) => retry.maxDelayMs >= retry.baseDelayMs, {
      message: 'SCREENPILOT_RETRY_MAX_DELAY_MS must not be below the base delay',
      path: ['maxDelayMs'],
    }),
  historyWindow: count(8),
  replanHistory: z.enum(['keep', 'discard', 'recent']).default('keep'),
  replanKeepRecent: count(2),
  captureRetries: count(0),
  models: z
    .object({
      unified: modelSpecSchema.optional(),
      planner: modelSpecSchema.optional(),
      actor: modelSpecSchema.optional(),
      bridge: modelSpecSchema.optional(),
    })
    .refine((models) => !models.planner === !models.actor, {
      message:
        'SCREENPILOT_PLANNER_MODEL and SCREENPILOT_ACTOR_MODEL must be set together',
    }),
  endpoints: z.object({
    llmProxyUrl: z.string().url().optional(),
    uitarsUrl: z.string().url().optional(),
    showuiUrl: z.string().url().optional(),
    bridgeUrl: z.string().url().optional(),
  }),
});

export type AgentConfig = z.infer<typeof agentConfigSchema>;

export type RetryPolicy = AgentConfig['retry'];

/**
 * Builds the typed agent configuration from environment-style lookups.
 * Blank values count as unset.
 */
export function loadAgentConfig(
  read: (key: string) => string | undefined,
): AgentConfig {
  const env = (key: string): string | undefined => {
    const value = read(key);
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  };

  const hasSplitModels =
    env('SCREENPILOT_PLANNER_MODEL') !== undefined ||
    env('SCREENPILOT_ACTOR_MODEL') !== undefined;

  const result = agentConfigSchema.safeParse({
    desktopBaseUrl: env('SCREENPILOT_DESKTOP_BASE_URL'),
    pixelBudget: env('SCREENPILOT_PIXEL_BUDGET'),
    limits: {
      maxIterations: env('SCREENPILOT_MAX_ITERATIONS'),
      maxElapsedMs: env('SCREENPILOT_MAX_ELAPSED_MS'),
      maxCost: env('SCREENPILOT_MAX_COST'),
    },
    retry: {
      attempts: env('SCREENPILOT_RETRY_ATTEMPTS'),
      baseDelayMs: env('SCREENPILOT_RETRY_BASE_DELAY_MS'),
      maxDelayMs: env('SCREENPILOT_RETRY_MAX_DELAY_MS'),
    },
    historyWindow: env('SCREENPILOT_HISTORY_WINDOW'),
    replanHistory: env('SCREENPILOT_REPLAN_HISTORY'),
    replanKeepRecent: env('SCREENPILOT_REPLAN_KEEP_RECENT'),
    captureRetries: env('SCREENPILOT_CAPTURE_RETRIES'),
    models: {
      unified:
        env('SCREENPILOT_UNIFIED_MODEL') ??
        (hasSplitModels ? undefined : DEFAULT_UNIFIED_MODEL),
      planner: env('SCREENPILOT_PLANNER_MODEL'),
      actor: env('SCREENPILOT_ACTOR_MODEL'),
      bridge: env('SCREENPILOT_BRIDGE_MODEL'),
    },
    endpoints: {
      llmProxyUrl: env('SCREENPILOT_LLM_PROXY_URL'),
      uitarsUrl: env('SCREENPILOT_UITARS_URL'),
      showuiUrl: env('SCREENPILOT_SHOWUI_URL'),
      bridgeUrl: env('SCREENPILOT_BRIDGE_URL'),
    },
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid agent configuration: ${issues}`);
  }
  return result.data;
}
