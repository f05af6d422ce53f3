import { Module } from '@nestjs/common';
import { AnthropicModule } from '../anthropic/anthropic.module';
import { GoogleModule } from '../google/google.module';
import { OpenAIModule } from '../openai/openai.module';
import { ProxyModule } from '../proxy/proxy.module';
import { ModelRegistryService } from './model-registry.service';
import { MODEL_LINEUP_PROVIDER } from './model.types';

@Module({
  imports: [AnthropicModule, OpenAIModule, GoogleModule, ProxyModule],
  providers: [
    ModelRegistryService,
    { provide: MODEL_LINEUP_PROVIDER, useExisting: ModelRegistryService },
  ],
  exports: [ModelRegistryService, MODEL_LINEUP_PROVIDER],
})
export class ModelsModule {}
