import OpenAI from 'openai';
import { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { Completion, CompletionRequest } from '../models/model.types';

export function toChatMessages(
  request: CompletionRequest,
): ChatCompletionMessageParam[] {
  return [
    { role: 'system', content: request.system },
    {
      role: 'user',
      content: [
        { type: 'text', text: request.prompt },
        {
          type: 'image_url',
          image_url: {
            url: `data:image/png;base64,${request.image.toString('base64')}`,
            detail: 'high',
          },
        },
      ],
    },
  ];
}

export function fromChatCompletion(
  completion: OpenAI.Chat.ChatCompletion,
): Completion {
  const choice = completion.choices[0];
  if (!choice || !choice.message) {
    throw new Error('No valid response from Chat Completion API');
  }
  return {
    text: choice.message.content ?? '',
    usage: {
      inputTokens: completion.usage?.prompt_tokens ?? 0,
      outputTokens: completion.usage?.completion_tokens ?? 0,
    },
  };
}
