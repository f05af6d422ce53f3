import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GenerateContentResponse, GoogleGenAI } from '@google/genai';
import { AgentInterrupt, errorMessage } from '@screenpilot/shared';
import {
  Completion,
  CompletionProvider,
  CompletionRequest,
} from '../models/model.types';
import { toInferenceError } from '../models/provider-errors';

@Injectable()
export class GoogleService implements CompletionProvider {
  private google: GoogleGenAI | null = null;
  private currentApiKey: string | null = null;
  private hasLoggedMissingKey = false;
  private readonly logger = new Logger(GoogleService.name);

  constructor(private readonly configService: ConfigService) {
    this.initializeClient();
  }

  async complete(
    request: CompletionRequest,
    signal?: AbortSignal,
  ): Promise<Completion> {
    try {
      const googleClient = this.getGoogleClient();

      const response: GenerateContentResponse =
        await googleClient.models.generateContent({
          model: request.model,
          contents: [
            {
              role: 'user',
              parts: [
                {
                  inlineData: {
                    mimeType: 'image/png',
                    data: request.image.toString('base64'),
                  },
                },
                { text: request.prompt },
              ],
            },
          ],
          config: {
            maxOutputTokens: request.maxTokens,
            temperature: 0,
            systemInstruction: request.system,
            abortSignal: signal,
          },
        });

      return {
        text: response.text ?? '',
        usage: {
          inputTokens: response.usageMetadata?.promptTokenCount ?? 0,
          outputTokens: response.usageMetadata?.candidatesTokenCount ?? 0,
        },
      };
    } catch (error) {
      if (errorMessage(error).includes('AbortError')) {
        throw new AgentInterrupt();
      }
      const mapped = toInferenceError('Google Gemini', error, signal);
      this.logger.error(mapped.message);
      throw mapped;
    }
  }

  private initializeClient() {
    const apiKey = this.configService.get<string>('GEMINI_API_KEY');

    if (!apiKey) {
      this.logMissingKey();
      this.google = new GoogleGenAI({
        apiKey: 'dummy-key-for-initialization',
      });
      this.currentApiKey = null;
      return;
    }

    this.google = new GoogleGenAI({ apiKey });
    this.currentApiKey = apiKey;
    this.hasLoggedMissingKey = false;
  }

  private getGoogleClient(): GoogleGenAI {
    const apiKey = this.configService.get<string>('GEMINI_API_KEY');

    if (apiKey && apiKey !== this.currentApiKey) {
      this.google = new GoogleGenAI({ apiKey });
      this.currentApiKey = apiKey;
      this.hasLoggedMissingKey = false;
    }

    if (!this.google) {
      this.google = new GoogleGenAI({
        apiKey: 'dummy-key-for-initialization',
      });
    }
    if (!apiKey) {
      this.logMissingKey();
      this.currentApiKey = null;
    }

    return this.google;
  }

  private logMissingKey() {
    if (!this.hasLoggedMissingKey) {
      this.logger.warn(
        'GEMINI_API_KEY is not set. GoogleService will not work properly.',
      );
      this.hasLoggedMissingKey = true;
    }
  }
}
