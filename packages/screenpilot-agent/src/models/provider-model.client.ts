import { Logger } from '@nestjs/common';
import {
  Decision,
  InferenceMalformedError,
  ModelRole,
  Size,
} from '@screenpilot/shared';
import { ModelSpec } from '../config/agent.config';
import {
  AgentModel,
  CompletionProvider,
  InferenceRequest,
  InferenceResult,
  ModelCapabilities,
  ModelClient,
  ROLE_CAPABILITIES,
} from './model.types';
import { ResponseFormat, systemPrompt, userPrompt } from './model.prompts';
import { usageCost } from './model-pricing';
import { parseCanonicalResponse } from './parsers/canonical.parser';
import { parseShowUiResponse } from './parsers/showui.parser';
import { parseUiTarsResponse } from './parsers/uitars.parser';

const MAX_TOKENS: Record<ResponseFormat, number> = {
  canonical: 1024,
  uitars: 256,
  showui: 256,
};

export function responseFormat(spec: ModelSpec): ResponseFormat {
  switch (spec.provider) {
    case 'uitars':
      return 'uitars';
    case 'showui':
      return 'showui';
    default:
      return 'canonical';
  }
}

function parseResponse(format: ResponseFormat, raw: string, size: Size): Decision {
  switch (format) {
    case 'canonical':
      return parseCanonicalResponse(raw);
    case 'uitars':
      return parseUiTarsResponse(raw, size);
    case 'showui':
      return parseShowUiResponse(raw, size);
  }
}

/**
 * A model reached through one of the provider SDK services. Prompts and
 * parsing follow the model's response format.
 */
export class ProviderModelClient implements ModelClient {
  private readonly logger = new Logger(ProviderModelClient.name);
  readonly label: string;
  readonly capabilities: ModelCapabilities;
  private readonly format: ResponseFormat;

  constructor(
    readonly role: ModelRole,
    private readonly spec: ModelSpec,
    private readonly provider: CompletionProvider,
    private readonly pricing?: AgentModel,
  ) {
    this.label = `${spec.provider}:${spec.name}`;
    this.capabilities = ROLE_CAPABILITIES[role];
    this.format = responseFormat(spec);
  }

  async infer(
    request: InferenceRequest,
    signal?: AbortSignal,
  ): Promise<InferenceResult> {
    const completion = await this.provider.complete(
      {
        model: this.spec.name,
        system: systemPrompt(this.format, this.role, request.size),
        prompt: userPrompt(request.instruction, request.history, request.context),
        image: request.image,
        maxTokens: MAX_TOKENS[this.format],
      },
      signal,
    );

    const cost = usageCost(this.pricing, completion.usage);
    this.logger.debug(
      `${this.label} (${this.role}) used ${completion.usage.inputTokens}/${completion.usage.outputTokens} tokens`,
    );

    try {
      return {
        decision: parseResponse(this.format, completion.text, request.size),
        usage: completion.usage,
        cost,
        raw: completion.text,
      };
    } catch (error) {
      if (error instanceof InferenceMalformedError) {
        throw new InferenceMalformedError(error.message, completion.text, cost);
      }
      throw error;
    }
  }
}
