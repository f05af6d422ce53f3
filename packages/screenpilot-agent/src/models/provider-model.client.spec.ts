import { InferenceMalformedError } from '@screenpilot/shared';
import { ANTHROPIC_MODELS } from '../anthropic/anthropic.constants';
import { CompletionProvider, InferenceRequest } from './model.types';
import { ProviderModelClient } from './provider-model.client';

describe('ProviderModelClient', () => {
  const request: InferenceRequest = {
    image: Buffer.from('png'),
    size: { width: 1000, height: 562 },
    instruction: 'Open the settings',
    history: [],
  };

  const providerReturning = (text: string) => {
    const complete = jest.fn().mockResolvedValue({
      text,
      usage: { inputTokens: 1000, outputTokens: 100 },
    });
    const provider: CompletionProvider = { complete };
    return { provider, complete };
  };

  it('parses canonical responses and prices the call', async () => {
    const { provider, complete } = providerReturning(
      '{"action": "click", "x": 500, "y": 281}',
    );
    const client = new ProviderModelClient(
      'unified',
      { provider: 'anthropic', name: 'claude-3-5-sonnet-20241022' },
      provider,
      ANTHROPIC_MODELS[0],
    );

    const result = await client.infer(request);

    expect(result.decision).toEqual({
      kind: 'click',
      point: { x: 500, y: 281 },
      button: 'left',
      clickCount: 1,
    });
    // 1000 * 0.000003 + 100 * 0.000015
    expect(result.cost).toBeCloseTo(0.0045, 10);
    expect(complete).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'claude-3-5-sonnet-20241022',
        prompt: 'Task: Open the settings\n\nAction history:\nNo previous actions.',
        maxTokens: 1024,
      }),
      undefined,
    );
  });

  it('uses the UI-TARS format for uitars models', async () => {
    const { provider, complete } = providerReturning(
      "Action: click(start_box='(10,20)')",
    );
    const client = new ProviderModelClient(
      'actor',
      { provider: 'uitars', name: 'ui-tars-7b' },
      provider,
    );

    const result = await client.infer(request);

    expect(result.decision).toEqual({
      kind: 'click',
      point: { x: 10, y: 20 },
      button: 'left',
      clickCount: 1,
    });
    expect(result.cost).toBe(0);
    expect(complete.mock.calls[0][0].system).toContain('You are a GUI agent.');
  });

  it('attaches the spent cost to malformed responses', async () => {
    const { provider } = providerReturning('I am not sure what to do.');
    const client = new ProviderModelClient(
      'unified',
      { provider: 'anthropic', name: 'claude-3-5-sonnet-20241022' },
      provider,
      ANTHROPIC_MODELS[0],
    );

    const error = await client.infer(request).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(InferenceMalformedError);
    expect(error).toMatchObject({
      message: 'No JSON object found in model response',
      raw: 'I am not sure what to do.',
    });
    expect(error).toHaveProperty('cost', expect.closeTo(0.0045, 10));
  });

  it('declares capabilities by role', () => {
    const { provider } = providerReturning('');
    const planner = new ProviderModelClient(
      'planner',
      { provider: 'openai', name: 'gpt-4o' },
      provider,
    );

    expect(planner.label).toBe('openai:gpt-4o');
    expect(planner.capabilities).toEqual({
      canEmitCoordinateActions: false,
      canEmitTextActions: false,
      canDelegate: true,
      canComplete: true,
    });
  });
});
