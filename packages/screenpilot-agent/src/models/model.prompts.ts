import {
  HistoryItem,
  ModelRole,
  Size,
  describeDecision,
  describeOutcome,
} from '@screenpilot/shared';

export type ResponseFormat = 'canonical' | 'uitars' | 'showui';

const CANONICAL_ACTIONS = `
{"action": "click", "x": <int>, "y": <int>, "button": "left" | "right" | "middle", "clicks": <int>}
{"action": "double_click", "x": <int>, "y": <int>}
{"action": "move", "x": <int>, "y": <int>}
{"action": "drag", "from": {"x": <int>, "y": <int>}, "to": {"x": <int>, "y": <int>}}
{"action": "scroll", "x": <int>, "y": <int>, "direction": "up" | "down" | "left" | "right", "amount": <int>}
{"action": "type", "text": "<text>"}
{"action": "key", "keys": ["ctrl", "l"]}`.trim();

const CONTROL_ACTIONS = `
{"action": "wait", "ms": <int>}
{"action": "done", "summary": "<what was achieved>"}
{"action": "replan", "reason": "<why the current approach is not working>"}`.trim();

const SUBGOAL_ACTION = `{"action": "subgoal", "instruction": "<one concrete step for the executor>"}`;

function canonicalPrompt(role: ModelRole, size: Size): string {
  const screen = `The screenshot is ${size.width}x${size.height} pixels. Coordinates are pixels of the screenshot, origin top-left.`;

  if (role === 'planner') {
    return `You are the planner of a desktop automation agent. You look at the screen and decide the next step toward the user's task. You never operate the mouse or keyboard yourself: an executor carries out the sub-goals you hand it.

Reply with exactly one JSON object and nothing else, one of:
${SUBGOAL_ACTION}
${CONTROL_ACTIONS}

Give one small, checkable sub-goal at a time, e.g. "Click the Save button in the toolbar". Reply done only when the screen shows the task is complete.`;
  }

  const intro =
    role === 'actor'
      ? 'You are the executor of a desktop automation agent. You carry out one sub-goal at a time by operating the mouse and keyboard.'
      : "You are a desktop automation agent. You complete the user's task by operating the mouse and keyboard, one action at a time.";

  return `${intro}

${screen}

Reply with exactly one JSON object and nothing else, one of:
${CANONICAL_ACTIONS}
${CONTROL_ACTIONS}

Aim for the center of the element you act on. After each action you get a fresh screenshot, so check the effect of the previous step before repeating it.`;
}

const UITARS_PROMPT = `You are a GUI agent. You are given a task and your action history, with screenshots. You need to perform the next action to complete the task.

## Output Format
Thought: ...
Action: ...

## Action Space
click(start_box='<|box_start|>(x1,y1)<|box_end|>')
left_double(start_box='<|box_start|>(x1,y1)<|box_end|>')
right_single(start_box='<|box_start|>(x1,y1)<|box_end|>')
drag(start_box='<|box_start|>(x1,y1)<|box_end|>', end_box='<|box_start|>(x3,y3)<|box_end|>')
hotkey(key='')
type(content='') #If you want to submit your input, use "\\n" at the end of \`content\`.
scroll(start_box='<|box_start|>(x1,y1)<|box_end|>', direction='down or up or right or left')
wait() #Sleep for 5s and take a screenshot to check for any changes.
finished(content='')
call_user() # Submit the task and call the user when the task is unsolvable, or when you need the user's help.

## Note
- Write a short plan in the Thought part.
- Coordinates are pixels of the screenshot.`;

const SHOWUI_PROMPT = `You are an assistant trained to navigate the computer screen. Given a task instruction, a screen observation and an action history sequence, output the next action.

Here is the action space:
1. CLICK: Click on an element, value is not applicable and the position [x,y] is required.
2. HOVER: Hover on an element, value is not applicable and the position [x,y] is required.
3. INPUT: Type a string into an element, value is the string to type and the position [x,y] is not applicable.
4. ENTER: Press the enter key, value and position are not applicable.
5. ESC: Press the escape key, value and position are not applicable.
6. HOTKEY: Press a key combination, value is the list of keys, e.g. ['ctrl', 'c'], and the position is not applicable.
7. SCROLL: Scroll the screen, value is the direction ('up', 'down', 'left', 'right') and the position [x,y] is optional.
8. SWIPE: Drag from the first position to the second, position is [[x1,y1],[x2,y2]].
9. STOP: The task is complete.

Positions are relative coordinates on the screenshot, scaled from 0 to 1.
Format the action as a dictionary: {'action': 'ACTION_TYPE', 'value': 'element', 'position': [x,y]}`;

export function systemPrompt(
  format: ResponseFormat,
  role: ModelRole,
  size: Size,
): string {
  switch (format) {
    case 'canonical':
      return canonicalPrompt(role, size);
    case 'uitars':
      return UITARS_PROMPT;
    case 'showui':
      return SHOWUI_PROMPT;
  }
}

/**
 * Numbered, one line per step, oldest first.
 */
export function historyText(history: readonly HistoryItem[]): string {
  if (history.length === 0) {
    return 'No previous actions.';
  }
  return history
    .map((item, index) => {
      const decision = item.decision ? describeDecision(item.decision) : 'no action';
      const subgoal = item.subgoal ? ` [sub-goal: ${item.subgoal}]` : '';
      return `${index + 1}. ${decision} -> ${describeOutcome(item.outcome)}${subgoal}`;
    })
    .join('\n');
}

export function userPrompt(
  instruction: string,
  history: readonly HistoryItem[],
  context?: string,
): string {
  const task = context
    ? `Overall task: ${context}\nCurrent sub-goal: ${instruction}`
    : `Task: ${instruction}`;
  return `${task}\n\nAction history:\n${historyText(history)}`;
}
