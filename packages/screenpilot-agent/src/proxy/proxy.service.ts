import { Injectable, Logger } from '@nestjs/common';
import OpenAI, { APIUserAbortError } from 'openai';
import { AgentInterrupt } from '@screenpilot/shared';
import { AgentConfigService } from '../config/agent-config.service';
import {
  Completion,
  CompletionProvider,
  CompletionRequest,
} from '../models/model.types';
import { SDK_MAX_RETRIES, toInferenceError } from '../models/provider-errors';
import {
  fromChatCompletion,
  toChatMessages,
} from '../openai/chat-completion.util';

/** OpenAI-compatible servers the agent can talk to. */
export type ChatEndpoint = 'proxy' | 'uitars' | 'showui';

const ENDPOINT_SETTINGS: Record<ChatEndpoint, string> = {
  proxy: 'SCREENPILOT_LLM_PROXY_URL',
  uitars: 'SCREENPILOT_UITARS_URL',
  showui: 'SCREENPILOT_SHOWUI_URL',
};

/**
 * Chat Completions against self-hosted endpoints: a LiteLLM-style proxy and
 * UI-TARS or ShowUI model servers.
 */
@Injectable()
export class ProxyService {
  private readonly clients = new Map<ChatEndpoint, OpenAI>();
  private readonly logger = new Logger(ProxyService.name);

  constructor(private readonly agentConfig: AgentConfigService) {}

  endpoint(endpoint: ChatEndpoint): CompletionProvider {
    return {
      complete: (request, signal) => this.complete(endpoint, request, signal),
    };
  }

  async complete(
    endpoint: ChatEndpoint,
    request: CompletionRequest,
    signal?: AbortSignal,
  ): Promise<Completion> {
    try {
      const completion = await this.getClient(endpoint).chat.completions.create(
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
        this.logger.log('Chat Completion API call aborted');
        throw new AgentInterrupt();
      }
      const mapped = toInferenceError(`${endpoint} endpoint`, error, signal);
      this.logger.error(mapped.message);
      throw mapped;
    }
  }

  private baseUrl(endpoint: ChatEndpoint): string | undefined {
    const { endpoints } = this.agentConfig.config;
    switch (endpoint) {
      case 'proxy':
        return endpoints.llmProxyUrl;
      case 'uitars':
        return endpoints.uitarsUrl;
      case 'showui':
        return endpoints.showuiUrl;
    }
  }

  private getClient(endpoint: ChatEndpoint): OpenAI {
    const existing = this.clients.get(endpoint);
    if (existing) {
      return existing;
    }

    const baseURL = this.baseUrl(endpoint);
    if (!baseURL) {
      this.logger.warn(
        `${ENDPOINT_SETTINGS[endpoint]} is not set. Requests to the ${endpoint} endpoint will fail.`,
      );
    }
    const client = new OpenAI({
      apiKey: 'dummy-key-for-proxy',
      baseURL,
      maxRetries: SDK_MAX_RETRIES,
    });
    this.clients.set(endpoint, client);
    return client;
  }
}
