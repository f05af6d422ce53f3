import { z } from 'zod';
import {
  Decision,
  InferenceMalformedError,
  ScrollDelta,
  ScrollDirection,
  errorMessage,
} from '@screenpilot/shared';
import {
  extractJsonObject,
  isRecord,
  stripCodeFence,
  stripTrailingCommas,
} from './response-text';

export const DEFAULT_SCROLL_STEPS = 3;

const button = z.enum(['left', 'right', 'middle']).default('left');
const point = z.object({ x: z.number(), y: z.number() });

const canonicalActionSchema = z.discriminatedUnion('action', [
  z.object({
    action: z.literal('click'),
    x: z.number(),
    y: z.number(),
    button,
    clicks: z.number().int().min(1).default(1),
  }),
  z.object({ action: z.literal('double_click'), x: z.number(), y: z.number() }),
  z.object({ action: z.literal('move'), x: z.number(), y: z.number() }),
  z.object({ action: z.literal('drag'), from: point, to: point, button }),
  z.object({ action: z.literal('type'), text: z.string() }),
  z.object({
    action: z.literal('key'),
    keys: z.union([z.array(z.string().min(1)).min(1), z.string().min(1)]),
  }),
  z.object({
    action: z.literal('scroll'),
    x: z.number(),
    y: z.number(),
    direction: z.enum(['up', 'down', 'left', 'right']),
    amount: z.number().int().min(1).default(DEFAULT_SCROLL_STEPS),
  }),
  z.object({
    action: z.literal('wait'),
    ms: z.number().int().min(0).default(1000),
  }),
  z.object({ action: z.literal('done'), summary: z.string().optional() }),
  z.object({ action: z.literal('replan'), reason: z.string().default('') }),
  z.object({ action: z.literal('subgoal'), instruction: z.string().min(1) }),
]);

type CanonicalAction = z.infer<typeof canonicalActionSchema>;

export function scrollDelta(
  direction: ScrollDirection,
  amount: number,
): ScrollDelta {
  switch (direction) {
    case 'up':
      return { x: 0, y: -amount };
    case 'down':
      return { x: 0, y: amount };
    case 'left':
      return { x: -amount, y: 0 };
    case 'right':
      return { x: amount, y: 0 };
  }
}

/**
 * Reads the canonical `{"action": ...}` object out of a chat response.
 * Code fences, prose around the object and trailing commas are tolerated.
 */
export function parseCanonicalResponse(raw: string): Decision {
  const json = extractJsonObject(stripCodeFence(raw));
  if (json === null) {
    throw new InferenceMalformedError('No JSON object found in model response', raw);
  }

  let value: unknown;
  try {
    value = JSON.parse(stripTrailingCommas(json));
  } catch (error) {
    throw new InferenceMalformedError(
      `Model response is not valid JSON: ${errorMessage(error)}`,
      raw,
    );
  }

  if (isRecord(value) && typeof value.action === 'string') {
    value = { ...value, action: value.action.trim().toLowerCase() };
  }

  const result = canonicalActionSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InferenceMalformedError(
      `Invalid action object: ${issue.path.join('.') || '(root)'}: ${issue.message}`,
      raw,
    );
  }
  return toDecision(result.data);
}

function splitKeys(keys: string[] | string): string[] {
  if (Array.isArray(keys)) {
    return keys;
  }
  const parts = keys
    .split('+')
    .map((key) => key.trim())
    .filter((key) => key.length > 0);
  // "+" on its own is the plus key
  return parts.length > 0 ? parts : [keys];
}

function toDecision(action: CanonicalAction): Decision {
  switch (action.action) {
    case 'click':
      return {
        kind: 'click',
        point: { x: action.x, y: action.y },
        button: action.button,
        clickCount: action.clicks,
      };
    case 'double_click':
      return {
        kind: 'click',
        point: { x: action.x, y: action.y },
        button: 'left',
        clickCount: 2,
      };
    case 'move':
      return { kind: 'move', point: { x: action.x, y: action.y } };
    case 'drag':
      return {
        kind: 'drag',
        from: action.from,
        to: action.to,
        button: action.button,
      };
    case 'type':
      return { kind: 'type', text: action.text };
    case 'key':
      return { kind: 'keyCombo', keys: splitKeys(action.keys) };
    case 'scroll':
      return {
        kind: 'scroll',
        point: { x: action.x, y: action.y },
        delta: scrollDelta(action.direction, action.amount),
      };
    case 'wait':
      return { kind: 'wait', durationMs: action.ms };
    case 'done':
      return action.summary === undefined
        ? { kind: 'done' }
        : { kind: 'done', summary: action.summary };
    case 'replan':
      return { kind: 'replan', reason: action.reason };
    case 'subgoal':
      return { kind: 'subgoal', instruction: action.instruction };
  }
}
