import { Injectable, Logger } from '@nestjs/common';
import { ModelRole } from '@screenpilot/shared';
import { AnthropicService } from '../anthropic/anthropic.service';
import { AgentConfigService } from '../config/agent-config.service';
import { ModelSpec } from '../config/agent.config';
import { GoogleService } from '../google/google.service';
import { OpenAIService } from '../openai/openai.service';
import { ProxyService } from '../proxy/proxy.service';
import { BridgeModelClient } from './bridge-model.client';
import { findModel } from './model-pricing';
import {
  CompletionProvider,
  ModelClient,
  ModelLineup,
  ModelLineupProvider,
} from './model.types';
import { ProviderModelClient } from './provider-model.client';

/**
 * Builds model clients from the configured `provider:name` specs.
 */
@Injectable()
export class ModelRegistryService implements ModelLineupProvider {
  private readonly logger = new Logger(ModelRegistryService.name);
  private cachedLineup: ModelLineup | null = null;

  constructor(
    private readonly agentConfig: AgentConfigService,
    private readonly anthropicService: AnthropicService,
    private readonly openaiService: OpenAIService,
    private readonly googleService: GoogleService,
    private readonly proxyService: ProxyService,
  ) {}

  lineup(): ModelLineup {
    if (this.cachedLineup) {
      return this.cachedLineup;
    }

    const { models } = this.agentConfig.config;
    if (models.planner && models.actor) {
      this.cachedLineup = {
        kind: 'split',
        planner: this.createClient('planner', models.planner),
        actor: this.createClient('actor', models.actor),
      };
    } else if (models.unified) {
      this.cachedLineup = {
        kind: 'unified',
        client: this.createClient('unified', models.unified),
      };
    } else {
      throw new Error('No model configured');
    }
    return this.cachedLineup;
  }

  /**
   * The model this agent serves on its own `POST /inference` endpoint:
   * SCREENPILOT_BRIDGE_MODEL, else the unified or actor model.
   */
  bridgeClient(role: ModelRole): ModelClient {
    const { models } = this.agentConfig.config;
    const spec = models.bridge ?? models.unified ?? models.actor;
    if (!spec) {
      throw new Error('No model configured for the inference bridge');
    }
    if (spec.provider === 'bridge') {
      throw new Error('The inference bridge cannot relay to another bridge');
    }
    return this.createClient(role, spec);
  }

  createClient(role: ModelRole, spec: ModelSpec): ModelClient {
    if (spec.provider === 'bridge') {
      const baseUrl = this.agentConfig.config.endpoints.bridgeUrl ?? spec.name;
      this.logger.log(`${role}: remote inference bridge at ${baseUrl}`);
      return new BridgeModelClient(role, baseUrl);
    }

    const pricing = findModel(spec);
    if (!pricing && ['anthropic', 'openai', 'google'].includes(spec.provider)) {
      this.logger.warn(
        `No pricing known for ${spec.provider}:${spec.name}; its calls will not count toward the cost limit`,
      );
    }
    this.logger.log(`${role}: ${spec.provider}:${spec.name}`);
    return new ProviderModelClient(role, spec, this.providerFor(spec), pricing);
  }

  private providerFor(spec: ModelSpec): CompletionProvider {
    switch (spec.provider) {
      case 'anthropic':
        return this.anthropicService;
      case 'openai':
        return this.openaiService;
      case 'google':
        return this.googleService;
      case 'proxy':
      case 'uitars':
      case 'showui':
        return this.proxyService.endpoint(spec.provider);
      case 'bridge':
        throw new Error('Bridge models are not served by a provider SDK');
    }
  }
}
