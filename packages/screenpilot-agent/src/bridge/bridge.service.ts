import { Injectable } from '@nestjs/common';
import {
  ModelRole,
  ParsedInferenceRequest,
  WireDecision,
  toWireDecision,
} from '@screenpilot/shared';
import { ModelRegistryService } from '../models/model-registry.service';
import { ModelClient } from '../models/model.types';

/**
 * Serves this agent's own model over the wire so other agents can use it as a
 * `bridge:` model. Nothing is kept between requests apart from the clients.
 */
@Injectable()
export class BridgeService {
  private readonly clients = new Map<ModelRole, ModelClient>();

  constructor(private readonly modelRegistry: ModelRegistryService) {}

  async infer(
    request: ParsedInferenceRequest,
    signal?: AbortSignal,
  ): Promise<WireDecision> {
    const client = this.client(request.role ?? 'unified');
    const result = await client.infer(
      {
        image: Buffer.from(request.image, 'base64'),
        size: { width: request.width, height: request.height },
        instruction: request.instruction,
        history: request.history,
      },
      signal,
    );
    return toWireDecision(result.decision);
  }

  private client(role: ModelRole): ModelClient {
    let client = this.clients.get(role);
    if (!client) {
      client = this.modelRegistry.bridgeClient(role);
      this.clients.set(role, client);
    }
    return client;
  }
}
