const mockCreate = jest.fn();

jest.mock('@anthropic-ai/sdk', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({
    messages: { create: mockCreate },
  })),
  APIUserAbortError: class APIUserAbortError extends Error {},
}));

import { ConfigService } from '@nestjs/config';
import Anthropic, { APIUserAbortError } from '@anthropic-ai/sdk';
import {
  AgentInterrupt,
  InferenceUnavailableError,
} from '@screenpilot/shared';
import { AnthropicService } from './anthropic.service';

describe('AnthropicService', () => {
  const request = {
    model: 'claude-3-5-sonnet-20241022',
    system: 'system prompt',
    prompt: 'Task: open settings',
    image: Buffer.from('png-bytes'),
    maxTokens: 1024,
  };

  const createService = () =>
    new AnthropicService(new ConfigService({ ANTHROPIC_API_KEY: 'test-key' }));

  beforeEach(() => {
    mockCreate.mockReset();
    jest.mocked(Anthropic).mockClear();
  });

  it('turns off the SDK retries', () => {
    createService();

    expect(Anthropic).toHaveBeenCalledWith({
      apiKey: 'test-key',
      maxRetries: 0,
    });
  });

  it('sends the image before the prompt and joins text blocks', async () => {
    mockCreate.mockResolvedValue({
      content: [
        { type: 'text', text: '{"action":' },
        { type: 'text', text: '"done"}' },
      ],
      usage: { input_tokens: 1500, output_tokens: 12 },
    });

    const result = await createService().complete(request);

    expect(result).toEqual({
      text: '{"action":\n"done"}',
      usage: { inputTokens: 1500, outputTokens: 12 },
    });
    const [body] = mockCreate.mock.calls[0];
    expect(body.system).toBe('system prompt');
    expect(body.messages[0].content[0]).toEqual({
      type: 'image',
      source: {
        type: 'base64',
        media_type: 'image/png',
        data: Buffer.from('png-bytes').toString('base64'),
      },
    });
  });

  it('turns a user abort into an interrupt', async () => {
    mockCreate.mockRejectedValue(new APIUserAbortError());

    await expect(createService().complete(request)).rejects.toBeInstanceOf(
      AgentInterrupt,
    );
  });

  it('reports API errors as unavailable', async () => {
    mockCreate.mockRejectedValue(
      Object.assign(new Error('Overloaded'), { status: 529 }),
    );

    await expect(createService().complete(request)).rejects.toEqual(
      new InferenceUnavailableError('Anthropic request failed: Overloaded', 529),
    );
  });
});
