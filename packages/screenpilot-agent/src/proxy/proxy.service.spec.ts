const mockCreate = jest.fn();

jest.mock('openai', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({
    chat: { completions: { create: mockCreate } },
  })),
  APIUserAbortError: class APIUserAbortError extends Error {},
}));

import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import {
  AgentInterrupt,
  InferenceUnavailableError,
} from '@screenpilot/shared';
import { AgentConfigService } from '../config/agent-config.service';
import { ProxyService } from './proxy.service';

describe('ProxyService', () => {
  const request = {
    model: 'ui-tars-7b',
    system: 'system prompt',
    prompt: 'Task: open settings',
    image: Buffer.from('png-bytes'),
    maxTokens: 256,
  };

  const createService = () =>
    new ProxyService(
      new AgentConfigService(
        new ConfigService({
          SCREENPILOT_UITARS_URL: 'http://localhost:8000/v1',
          SCREENPILOT_SHOWUI_URL: 'http://localhost:8001/v1',
        }),
      ),
    );

  beforeEach(() => {
    mockCreate.mockReset();
    jest.mocked(OpenAI).mockClear();
  });

  it('sends the screenshot as a data URL and returns text with usage', async () => {
    mockCreate.mockResolvedValue({
      choices: [{ message: { content: "Action: click(start_box='(1,2)')" } }],
      usage: { prompt_tokens: 1200, completion_tokens: 14 },
    });

    const result = await createService()
      .endpoint('uitars')
      .complete(request);

    expect(result).toEqual({
      text: "Action: click(start_box='(1,2)')",
      usage: { inputTokens: 1200, outputTokens: 14 },
    });
    expect(OpenAI).toHaveBeenCalledWith({
      apiKey: 'dummy-key-for-proxy',
      baseURL: 'http://localhost:8000/v1',
      maxRetries: 0,
    });

    const [body] = mockCreate.mock.calls[0];
    expect(body.messages[0]).toEqual({ role: 'system', content: 'system prompt' });
    expect(body.messages[1].content[1].image_url.url).toBe(
      `data:image/png;base64,${Buffer.from('png-bytes').toString('base64')}`,
    );
  });

  it('keeps one client per endpoint', async () => {
    mockCreate.mockResolvedValue({ choices: [{ message: { content: '' } }] });
    const service = createService();

    await service.complete('showui', request);
    await service.complete('showui', request);
    await service.complete('uitars', request);

    expect(OpenAI).toHaveBeenCalledTimes(2);
  });

  it('reports provider failures as unavailable with the status', async () => {
    mockCreate.mockRejectedValue(
      Object.assign(new Error('Bad gateway'), { status: 502 }),
    );

    const error = await createService()
      .complete('uitars', request)
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(InferenceUnavailableError);
    expect(error).toMatchObject({
      message: 'uitars endpoint request failed: Bad gateway',
      status: 502,
    });
  });

  it('turns an aborted call into an interrupt', async () => {
    const controller = new AbortController();
    controller.abort();
    mockCreate.mockRejectedValue(new Error('Request was aborted.'));

    await expect(
      createService().complete('uitars', request, controller.signal),
    ).rejects.toBeInstanceOf(AgentInterrupt);
  });
});
