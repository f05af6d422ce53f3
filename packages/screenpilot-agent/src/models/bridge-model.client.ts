import { Logger } from '@nestjs/common';
import {
  AgentInterrupt,
  InferenceMalformedError,
  InferenceUnavailableError,
  ModelRole,
  errorMessage,
  fromWireDecision,
  toInferenceRequestBody,
} from '@screenpilot/shared';
import {
  InferenceRequest,
  InferenceResult,
  ModelCapabilities,
  ModelClient,
  ROLE_CAPABILITIES,
} from './model.types';

/**
 * A model served by another agent's `POST /inference` endpoint. The remote
 * side owns provider keys and pricing, so calls cost nothing here.
 */
export class BridgeModelClient implements ModelClient {
  private readonly logger = new Logger(BridgeModelClient.name);
  readonly label: string;
  readonly capabilities: ModelCapabilities;

  constructor(
    readonly role: ModelRole,
    private readonly baseUrl: string,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.label = `bridge:${this.baseUrl}`;
    this.capabilities = ROLE_CAPABILITIES[role];
  }

  async infer(
    request: InferenceRequest,
    signal?: AbortSignal,
  ): Promise<InferenceResult> {
    // the wire has no context field; fold it into the instruction
    const instruction = request.context
      ? `${request.instruction}\n\nOverall task: ${request.context}`
      : request.instruction;

    const body = toInferenceRequestBody({
      image: request.image.toString('base64'),
      width: request.size.width,
      height: request.size.height,
      instruction,
      history: request.history,
      role: this.role,
    });

    let response: Response;
    let text: string;
    try {
      response = await fetch(`${this.baseUrl}/inference`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal,
      });
      text = await response.text();
    } catch (error) {
      if (signal?.aborted) {
        throw new AgentInterrupt();
      }
      throw new InferenceUnavailableError(
        `Inference bridge unreachable at ${this.baseUrl}: ${errorMessage(error)}`,
      );
    }

    if (response.status >= 500 || response.status === 429) {
      throw new InferenceUnavailableError(
        `Inference bridge returned ${response.status}: ${text.slice(0, 200)}`,
        response.status,
      );
    }
    if (!response.ok) {
      this.logger.warn(`Inference bridge rejected the request (${response.status})`);
      throw new InferenceMalformedError(
        `Inference bridge returned ${response.status}: ${text.slice(0, 200)}`,
        text,
      );
    }

    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      throw new InferenceMalformedError(
        `Inference bridge returned invalid JSON: ${errorMessage(error)}`,
        text,
      );
    }

    return {
      decision: fromWireDecision(value),
      usage: { inputTokens: 0, outputTokens: 0 },
      cost: 0,
      raw: text,
    };
  }
}
