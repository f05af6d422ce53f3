import { InferenceMalformedError } from '@screenpilot/shared';
import { parseCanonicalResponse } from './canonical.parser';

describe('parseCanonicalResponse', () => {
  it('reads a click with defaults', () => {
    expect(parseCanonicalResponse('{"action": "click", "x": 500, "y": 281}')).toEqual({
      kind: 'click',
      point: { x: 500, y: 281 },
      button: 'left',
      clickCount: 1,
    });
  });

  it('reads an object wrapped in a code fence with prose around it', () => {
    const raw = [
      'The search box is at the top.',
      '```json',
      '{"action": "TYPE", "text": "hello {world}",}',
      '```',
    ].join('\n');

    expect(parseCanonicalResponse(raw)).toEqual({
      kind: 'type',
      text: 'hello {world}',
    });
  });

  it('splits key strings on plus', () => {
    expect(
      parseCanonicalResponse('{"action": "key", "keys": "ctrl+shift+t"}'),
    ).toEqual({ kind: 'keyCombo', keys: ['ctrl', 'shift', 't'] });
    expect(parseCanonicalResponse('{"action": "key", "keys": "+"}')).toEqual({
      kind: 'keyCombo',
      keys: ['+'],
    });
  });

  it('turns scroll direction and amount into a delta', () => {
    expect(
      parseCanonicalResponse(
        '{"action": "scroll", "x": 10, "y": 20, "direction": "up"}',
      ),
    ).toEqual({ kind: 'scroll', point: { x: 10, y: 20 }, delta: { x: 0, y: -3 } });
    expect(
      parseCanonicalResponse(
        '{"action": "scroll", "x": 10, "y": 20, "direction": "right", "amount": 5}',
      ),
    ).toEqual({ kind: 'scroll', point: { x: 10, y: 20 }, delta: { x: 5, y: 0 } });
  });

  it('reads control decisions', () => {
    expect(parseCanonicalResponse('{"action": "done", "summary": "Saved"}')).toEqual({
      kind: 'done',
      summary: 'Saved',
    });
    expect(parseCanonicalResponse('{"action": "replan"}')).toEqual({
      kind: 'replan',
      reason: '',
    });
    expect(
      parseCanonicalResponse('{"action": "subgoal", "instruction": "Open settings"}'),
    ).toEqual({ kind: 'subgoal', instruction: 'Open settings' });
    expect(parseCanonicalResponse('{"action": "wait"}')).toEqual({
      kind: 'wait',
      durationMs: 1000,
    });
  });

  it('reads double clicks and drags', () => {
    expect(parseCanonicalResponse('{"action": "double_click", "x": 1, "y": 2}')).toEqual({
      kind: 'click',
      point: { x: 1, y: 2 },
      button: 'left',
      clickCount: 2,
    });
    expect(
      parseCanonicalResponse(
        '{"action": "drag", "from": {"x": 1, "y": 2}, "to": {"x": 3, "y": 4}}',
      ),
    ).toEqual({
      kind: 'drag',
      from: { x: 1, y: 2 },
      to: { x: 3, y: 4 },
      button: 'left',
    });
  });

  it('rejects responses without an object', () => {
    expect(() => parseCanonicalResponse('I will click the button')).toThrow(
      new InferenceMalformedError('No JSON object found in model response'),
    );
  });

  it('rejects unknown actions and keeps the raw text', () => {
    const raw = '{"action": "teleport"}';
    let caught: unknown;
    try {
      parseCanonicalResponse(raw);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InferenceMalformedError);
    expect(caught).toMatchObject({ raw });
    expect(caught).toHaveProperty(
      'message',
      expect.stringMatching(/^Invalid action object: action: /),
    );
  });

  it('rejects a click without coordinates', () => {
    expect(() => parseCanonicalResponse('{"action": "click", "x": 5}')).toThrow(
      'Invalid action object: y: Required',
    );
  });
});
