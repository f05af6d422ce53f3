import { Injectable } from '@nestjs/common';
import { AgentConfigService } from '../config/agent-config.service';
import { DesktopClient } from './desktop.client';
import { DesktopConnector } from './desktop.types';

@Injectable()
export class DesktopService implements DesktopConnector {
  private readonly clients = new Map<string, DesktopClient>();

  constructor(private readonly agentConfig: AgentConfigService) {}

  connect(baseUrl?: string): DesktopClient {
    const url = (baseUrl ?? this.agentConfig.config.desktopBaseUrl).replace(
      /\/+$/,
      '',
    );
    let client = this.clients.get(url);
    if (!client) {
      client = new DesktopClient(url);
      this.clients.set(url, client);
    }
    return client;
  }
}
