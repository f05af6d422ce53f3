import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI, { APIUserAbortError } from 'openai';
import { AgentInterrupt } from '@screenpilot/shared';
import {
  Completion,
  CompletionProvider,
  CompletionRequest,
} from '../models/model.types';
import { SDK_MAX_RETRIES, toInferenceError } from '../models/provider-errors';
import { fromChatCompletion, toChatMessages } from './chat-completion.util';

@Injectable()
export class OpenAIService implements CompletionProvider {
  private openai: OpenAI | null = null;
  private currentApiKey: string | null = null;
  private hasLoggedMissingKey = false;
  private readonly logger = new Logger(OpenAIService.name);

  constructor(private readonly configService: ConfigService) {
    this.initializeClient();
  }

  async complete(
    request: CompletionRequest,
    signal?: AbortSignal,
  ): Promise<Completion> {
    try {
      const openaiClient = this.getOpenAIClient();
      const completion = await openaiClient.chat.completions.create(
        {
          model: request.model,
          messages: toChatMessages(request),
          max_tokens: request.maxTokens,
          temperature: 0,
        },
        { signal },
      );
      return fromChatCompletion(completion);
    } catch (error) {
      if (error instanceof APIUserAbortError) {
        this.logger.log('OpenAI API call aborted');
        throw new AgentInterrupt();
      }
      const mapped = toInferenceError('OpenAI', error, signal);
      this.logger.error(mapped.message);
      throw mapped;
    }
  }

  private initializeClient() {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');

    if (!apiKey) {
      this.logMissingKey();
      this.openai = new OpenAI({
        apiKey: 'dummy-key-for-initialization',
        maxRetries: SDK_MAX_RETRIES,
      });
      this.currentApiKey = null;
      return;
    }

    this.openai = new OpenAI({ apiKey, maxRetries: SDK_MAX_RETRIES });
    this.currentApiKey = apiKey;
    this.hasLoggedMissingKey = false;
  }

  private getOpenAIClient(): OpenAI {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');

    if (apiKey && apiKey !== this.currentApiKey) {
      this.openai = new OpenAI({ apiKey, maxRetries: SDK_MAX_RETRIES });
      this.currentApiKey = apiKey;
      this.hasLoggedMissingKey = false;
    }

    if (!this.openai) {
      this.openai = new OpenAI({
        apiKey: 'dummy-key-for-initialization',
        maxRetries: SDK_MAX_RETRIES,
      });
    }
    if (!apiKey) {
      this.logMissingKey();
      this.currentApiKey = null;
    }

    return this.openai;
  }

  private logMissingKey() {
    if (!this.hasLoggedMissingKey) {
      this.logger.warn(
        'OPENAI_API_KEY is not set. OpenAIService will not work properly.',
      );
      this.hasLoggedMissingKey = true;
    }
  }
}
