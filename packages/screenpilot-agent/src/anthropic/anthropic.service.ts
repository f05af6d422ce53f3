import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Anthropic, { APIUserAbortError } from '@anthropic-ai/sdk';
import { AgentInterrupt } from '@screenpilot/shared';
import {
  Completion,
  CompletionProvider,
  CompletionRequest,
} from '../models/model.types';
import { SDK_MAX_RETRIES, toInferenceError } from '../models/provider-errors';

@Injectable()
export class AnthropicService implements CompletionProvider {
  private anthropic: Anthropic | null = null;
  private currentApiKey: string | null = null;
  private hasLoggedMissingKey = false;
  private readonly logger = new Logger(AnthropicService.name);

  constructor(private readonly configService: ConfigService) {
    this.initializeClient();
  }

  async complete(
    request: CompletionRequest,
    signal?: AbortSignal,
  ): Promise<Completion> {
    try {
      const anthropicClient = this.getAnthropicClient();

      const response = await anthropicClient.messages.create(
        {
          model: request.model,
          max_tokens: request.maxTokens,
          temperature: 0,
          system: request.system,
          messages: [
            {
              role: 'user',
              content: [
                {
                  type: 'image',
                  source: {
                    type: 'base64',
                    media_type: 'image/png',
                    data: request.image.toString('base64'),
                  },
                },
                { type: 'text', text: request.prompt },
              ],
            },
          ],
        },
        { signal },
      );

      const text = response.content
        .flatMap((block) => (block.type === 'text' ? [block.text] : []))
        .join('\n');

      return {
        text,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
      };
    } catch (error) {
      if (error instanceof APIUserAbortError) {
        this.logger.log('Anthropic API call aborted');
        throw new AgentInterrupt();
      }
      const mapped = toInferenceError('Anthropic', error, signal);
      this.logger.error(mapped.message);
      throw mapped;
    }
  }

  private initializeClient() {
    const apiKey = this.configService.get<string>('ANTHROPIC_API_KEY');

    if (!apiKey) {
      this.logMissingKey();
      this.anthropic = new Anthropic({
        apiKey: 'dummy-key-for-initialization',
        maxRetries: SDK_MAX_RETRIES,
      });
      this.currentApiKey = null;
      return;
    }

    this.anthropic = new Anthropic({ apiKey, maxRetries: SDK_MAX_RETRIES });
    this.currentApiKey = apiKey;
    this.hasLoggedMissingKey = false;
  }

  private getAnthropicClient(): Anthropic {
    const apiKey = this.configService.get<string>('ANTHROPIC_API_KEY');

    if (apiKey && apiKey !== this.currentApiKey) {
      this.anthropic = new Anthropic({ apiKey, maxRetries: SDK_MAX_RETRIES });
      this.currentApiKey = apiKey;
      this.hasLoggedMissingKey = false;
    }

    if (!this.anthropic) {
      this.anthropic = new Anthropic({
        apiKey: 'dummy-key-for-initialization',
        maxRetries: SDK_MAX_RETRIES,
      });
    }
    if (!apiKey) {
      this.logMissingKey();
      this.currentApiKey = null;
    }

    return this.anthropic;
  }

  private logMissingKey() {
    if (!this.hasLoggedMissingKey) {
      this.logger.warn(
        'ANTHROPIC_API_KEY is not set. AnthropicService will not work properly.',
      );
      this.hasLoggedMissingKey = true;
    }
  }
}
