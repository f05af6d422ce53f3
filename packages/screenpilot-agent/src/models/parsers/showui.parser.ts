import { z } from 'zod';
import {
  Coordinates,
  Decision,
  InferenceMalformedError,
  Size,
  errorMessage,
} from '@screenpilot/shared';
import { scrollDelta } from './canonical.parser';
import { parsePythonLiteral } from './python-literal';
import { isRecord, isScrollDirection, stripCodeFence } from './response-text';

export const SHOWUI_SCROLL_STEPS = 10;

export const SHOWUI_ACTIONS = [
  'CLICK',
  'TAP',
  'HOVER',
  'PRESS',
  'INPUT',
  'ANSWER',
  'ENTER',
  'ESC',
  'ESCAPE',
  'HOTKEY',
  'SCROLL',
  'SWIPE',
  'STOP',
] as const;

type ShowUiAction = (typeof SHOWUI_ACTIONS)[number];

const itemSchema = z.object({
  action: z
    .string()
    .transform((action) => action.trim().toUpperCase())
    .pipe(z.enum(SHOWUI_ACTIONS)),
  value: z.unknown().optional(),
  text: z.unknown().optional(),
  position: z.unknown().optional(),
  position_mode: z.string().nullish(),
  position_source: z.string().nullish(),
  source: z.string().nullish(),
  is_absolute: z.boolean().nullish(),
});

type ShowUiItem = z.infer<typeof itemSchema>;

/**
 * Reads ShowUI output, a Python or JSON literal holding one action dict or a
 * list of them, e.g. `[{'action': 'CLICK', 'value': None, 'position': [0.83, 0.15]}]`.
 * Only the first action is used; STOP ends the task.
 */
export function parseShowUiResponse(raw: string, image: Size): Decision {
  let value = readLiteral(stripCodeFence(raw), raw);

  // chat wrappers: {'content': "[...]", 'role': 'assistant'}
  if (isRecord(value) && !('action' in value) && typeof value.content === 'string') {
    value = readLiteral(value.content.trim(), raw);
  }

  const items = Array.isArray(value) ? value : [value];
  if (items.length === 0) {
    throw new InferenceMalformedError('ShowUI returned no actions', raw);
  }

  const result = itemSchema.safeParse(items[0]);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InferenceMalformedError(
      `Invalid ShowUI action: ${issue.path.join('.') || '(root)'}: ${issue.message}`,
      raw,
    );
  }

  try {
    return toDecision(result.data.action, result.data, image);
  } catch (error) {
    throw new InferenceMalformedError(errorMessage(error), raw);
  }
}

function readLiteral(text: string, raw: string): unknown {
  if (text.length === 0) {
    throw new InferenceMalformedError('Empty ShowUI response', raw);
  }
  try {
    return JSON.parse(text);
  } catch {
    // not JSON, try the Python spelling
  }
  try {
    return parsePythonLiteral(text);
  } catch (error) {
    throw new InferenceMalformedError(
      `ShowUI output is not a list or dict: ${errorMessage(error)}`,
      raw,
    );
  }
}

function toDecision(
  action: ShowUiAction,
  item: ShowUiItem,
  image: Size,
): Decision {
  switch (action) {
    case 'CLICK':
    case 'TAP':
    // press-and-hold has no action of its own
    case 'PRESS':
      return {
        kind: 'click',
        point: requirePosition(action, item, image),
        button: 'left',
        clickCount: 1,
      };
    case 'HOVER':
      return { kind: 'move', point: requirePosition(action, item, image) };
    case 'INPUT':
      if (typeof item.value !== 'string') {
        throw new Error('INPUT action requires a text value');
      }
      return { kind: 'type', text: item.value };
    case 'ANSWER': {
      const answer = item.value ?? item.text;
      if (typeof answer !== 'string') {
        throw new Error('ANSWER action requires textual value');
      }
      return { kind: 'type', text: answer };
    }
    case 'ENTER':
      return { kind: 'keyCombo', keys: ['enter'] };
    case 'ESC':
    case 'ESCAPE':
      return { kind: 'keyCombo', keys: ['escape'] };
    case 'HOTKEY':
      return { kind: 'keyCombo', keys: hotkeyKeys(item.value) };
    case 'SCROLL':
      return scrollDecision(item, image);
    case 'SWIPE': {
      const path = item.position;
      if (!Array.isArray(path) || path.length !== 2) {
        throw new Error('SWIPE action requires start and end positions');
      }
      return {
        kind: 'drag',
        from: resolvePosition(item, path[0], image),
        to: resolvePosition(item, path[1], image),
        button: 'left',
      };
    }
    case 'STOP':
      return { kind: 'done' };
  }
}

function hotkeyKeys(value: unknown): string[] {
  let keys: string[];
  if (typeof value === 'string') {
    keys = value.split('+');
  } else if (Array.isArray(value)) {
    keys = value.map((key) => String(key));
  } else {
    throw new Error('Hotkey value must be a string or list of keys');
  }

  keys = keys.map((key) => key.trim().toLowerCase()).filter((key) => key !== '');
  if (keys.length === 0) {
    throw new Error('Hotkey value is empty');
  }
  return keys;
}

function scrollDecision(item: ShowUiItem, image: Size): Decision {
  let direction: unknown;
  let amount: unknown = SHOWUI_SCROLL_STEPS;
  const { value } = item;

  if (isRecord(value)) {
    direction = value.direction;
    if (value.amount !== undefined && value.amount !== null) {
      amount = value.amount;
    }
  } else if (Array.isArray(value) && value.length > 0) {
    direction = value[0];
    if (typeof value[1] === 'number') {
      amount = value[1];
    }
  } else if (typeof value === 'string') {
    direction = value;
  }

  if (!direction) {
    throw new Error('Scroll direction missing or invalid');
  }
  const normalized = String(direction).toLowerCase();
  if (!isScrollDirection(normalized)) {
    throw new Error(`Scroll direction ${normalized} not supported`);
  }
  const steps = Math.trunc(Number(amount));
  if (!Number.isFinite(steps)) {
    throw new Error(`Scroll amount must be numeric: ${String(amount)}`);
  }

  const point =
    item.position === undefined || item.position === null
      ? { x: Math.floor(image.width / 2), y: Math.floor(image.height / 2) }
      : resolvePosition(item, item.position, image);

  return { kind: 'scroll', point, delta: scrollDelta(normalized, steps) };
}

function requirePosition(
  action: ShowUiAction,
  item: ShowUiItem,
  image: Size,
): Coordinates {
  if (item.position === undefined || item.position === null) {
    throw new Error(`Action ${action} requires a position but none was provided`);
  }
  return resolvePosition(item, item.position, image);
}

/**
 * Positions are fractions of the image unless marked absolute or outside
 * 0..1, in which case they are image pixels.
 */
function resolvePosition(
  item: ShowUiItem,
  position: unknown,
  image: Size,
): Coordinates {
  if (!Array.isArray(position) || position.length !== 2) {
    throw new Error(`Invalid position payload: ${JSON.stringify(position)}`);
  }
  const x = toNumber(position[0]);
  const y = toNumber(position[1]);
  if (x === null || y === null) {
    throw new Error(
      `Position values must be numeric: ${JSON.stringify(position)}`,
    );
  }

  const mode = (item.position_mode ?? '').toLowerCase();
  let absolute = item.is_absolute === true || mode === 'absolute';
  if ((item.position_source ?? '').toLowerCase() === 'absolute') {
    absolute = true;
  }
  if ((item.source ?? '').toLowerCase() === 'absolute') {
    absolute = true;
  }
  if (mode === 'normalized' || mode === 'relative') {
    absolute = false;
  }
  if (!absolute && (x > 1 || y > 1 || x < 0 || y < 0)) {
    absolute = true;
  }

  if (absolute) {
    return { x: Math.round(x), y: Math.round(y) };
  }
  return {
    x: clamp(Math.round(clamp(x, 0, 1) * image.width), 0, image.width - 1),
    y: clamp(Math.round(clamp(y, 0, 1) * image.height), 0, image.height - 1),
  };
}

function toNumber(value: unknown): number | null {
  const number =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && value.trim() !== ''
        ? Number(value)
        : NaN;
  return Number.isFinite(number) ? number : null;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
