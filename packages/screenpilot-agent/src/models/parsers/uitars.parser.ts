import {
  Coordinates,
  Decision,
  InferenceMalformedError,
  Size,
} from '@screenpilot/shared';
import { scrollDelta } from './canonical.parser';
import { isScrollDirection } from './response-text';

// UI-TARS scroll and wait carry no amount.
export const UITARS_SCROLL_STEPS = 10;
export const UITARS_WAIT_MS = 5000;
export const CALL_USER_SUMMARY =
  'Stopped: the task needs help from the user to continue';

const NUMBER = '(-?\\d+(?:\\.\\d+)?)';
const BOX = `\\(?\\s*${NUMBER}\\s*,\\s*${NUMBER}\\s*\\)?`;

const POINT_ACTION = new RegExp(
  `^(click|left_single|left_double|right_single|hover|press)\\(start_box='${BOX}'\\)$`,
);
const DRAG_ACTION = new RegExp(
  `^drag\\(start_box='${BOX}'\\s*,\\s*end_box='${BOX}'\\)$`,
);
const BOX_POINT = new RegExp(`^${BOX}$`);
const HOTKEY_ACTION = /^hotkey\(key='([^']+)'\)$/;
const TYPE_ACTION = /^type\(content='([\s\S]*)'\)$/;
const SCROLL_ACTION =
  /^scroll\(start_box='([^']*)'\s*,\s*direction='(down|up|left|right)'\)$/;
const FINISHED_ACTION = /^finished\((?:content='([\s\S]*)')?\)$/;

/**
 * Reads one UI-TARS action line such as
 * `Action: click(start_box='<|box_start|>(512,300)<|box_end|>')`.
 * Box coordinates are pixels of the image the model was shown.
 */
export function parseUiTarsResponse(raw: string, image: Size): Decision {
  const line = actionLine(raw);

  const pointMatch = POINT_ACTION.exec(line);
  if (pointMatch) {
    const [, name, x, y] = pointMatch;
    const point = toImagePoint(x, y, image);
    switch (name) {
      case 'hover':
        return { kind: 'move', point };
      case 'left_double':
        return { kind: 'click', point, button: 'left', clickCount: 2 };
      case 'right_single':
        return { kind: 'click', point, button: 'right', clickCount: 1 };
      default:
        return { kind: 'click', point, button: 'left', clickCount: 1 };
    }
  }

  const dragMatch = DRAG_ACTION.exec(line);
  if (dragMatch) {
    const [, x1, y1, x2, y2] = dragMatch;
    return {
      kind: 'drag',
      from: toImagePoint(x1, y1, image),
      to: toImagePoint(x2, y2, image),
      button: 'left',
    };
  }

  const hotkeyMatch = HOTKEY_ACTION.exec(line);
  if (hotkeyMatch) {
    const key = hotkeyMatch[1].trim().toLowerCase();
    if (key === 'enter') {
      return { kind: 'keyCombo', keys: ['enter'] };
    }
    if (key === 'esc') {
      return { kind: 'keyCombo', keys: ['escape'] };
    }
    const keys = key.split(/[\s+]+/).filter((part) => part.length > 0);
    if (keys.length === 0) {
      throw new InferenceMalformedError('Hotkey value is empty', raw);
    }
    return { kind: 'keyCombo', keys };
  }

  const typeMatch = TYPE_ACTION.exec(line);
  if (typeMatch) {
    return { kind: 'type', text: unescapeContent(typeMatch[1]) };
  }

  const scrollMatch = SCROLL_ACTION.exec(line);
  if (scrollMatch) {
    const [, box, direction] = scrollMatch;
    const boxMatch = BOX_POINT.exec(box.trim());
    const point = boxMatch
      ? toImagePoint(boxMatch[1], boxMatch[2], image)
      : center(image);
    if (isScrollDirection(direction)) {
      return {
        kind: 'scroll',
        point,
        delta: scrollDelta(direction, UITARS_SCROLL_STEPS),
      };
    }
  }

  const finishedMatch = FINISHED_ACTION.exec(line);
  if (finishedMatch) {
    return finishedMatch[1] === undefined
      ? { kind: 'done' }
      : { kind: 'done', summary: unescapeContent(finishedMatch[1]) };
  }

  if (line === 'wait()') {
    return { kind: 'wait', durationMs: UITARS_WAIT_MS };
  }
  if (line === 'call_user()') {
    return { kind: 'done', summary: CALL_USER_SUMMARY };
  }

  throw new InferenceMalformedError(
    `Unrecognized UI-TARS action: ${line.slice(0, 120)}`,
    raw,
  );
}

// Text after the last "Action:" marker, or the whole response.
function actionLine(raw: string): string {
  const text = raw.replace(/<\|box_(?:start|end)\|>/g, '').trim();
  const marker = text.lastIndexOf('Action:');
  return (marker < 0 ? text : text.slice(marker + 'Action:'.length)).trim();
}

function toImagePoint(x: string, y: string, image: Size): Coordinates {
  return {
    x: clamp(Math.round(Number(x)), 0, image.width - 1),
    y: clamp(Math.round(Number(y)), 0, image.height - 1),
  };
}

function center(image: Size): Coordinates {
  return { x: Math.floor(image.width / 2), y: Math.floor(image.height / 2) };
}

function unescapeContent(content: string): string {
  return content.replace(/\\(n|'|"|\\)/g, (_, escaped: string) =>
    escaped === 'n' ? '\n' : escaped,
  );
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
