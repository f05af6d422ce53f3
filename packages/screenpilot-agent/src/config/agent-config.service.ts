import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AgentConfig, loadAgentConfig } from './agent.config';

@Injectable()
export class AgentConfigService {
  private readonly logger = new Logger(AgentConfigService.name);
  readonly config: AgentConfig;

  constructor(configService: ConfigService) {
    this.config = loadAgentConfig((key) => configService.get<string>(key));

    const { models, limits } = this.config;
    const lineup =
      models.planner && models.actor
        ? `planner ${models.planner.provider}:${models.planner.name}, actor ${models.actor.provider}:${models.actor.name}`
        : `unified ${models.unified?.provider}:${models.unified?.name}`;
    this.logger.log(
      `Models: ${lineup}; limits: ${limits.maxIterations} iterations, ${limits.maxElapsedMs}ms, $${limits.maxCost}`,
    );
  }
}
