import { Logger, Module } from '@nestjs/common';
import { ChatOpenAI } from '@langchain/openai';
import {
  envOptional,
  openAiApiKey,
  openAiModel,
  timeouts,
} from '../config/app.config';
import {
  FREQUENCY_PENALTY,
  MAX_TOKENS,
  PRESENCE_PENALTY,
  TEMPERATURE,
} from '../config/constants';
import { OpenAiChatService } from './openai-chat.service';
import { COMPLETION_MODEL, CompletionModel } from './openai.constants';

export function createCompletionModel(): CompletionModel | null {
  const logger = new Logger('CompletionModel');
  const apiKey = openAiApiKey();

  if (!apiKey) {
    logger.warn(
      'OPENAI_API_KEY not set; chat requests will fail until it is configured',
    );
    return null;
  }

  const model = openAiModel();
  const baseURL = envOptional('OPENAI_BASE_URL');
  logger.log(`Initializing ChatOpenAI with model=${model}, temperature=${TEMPERATURE}`);

  return new ChatOpenAI({
    apiKey,
    model,
    temperature: TEMPERATURE,
    maxTokens: MAX_TOKENS,
    presencePenalty: PRESENCE_PENALTY,
    frequencyPenalty: FREQUENCY_PENALTY,
    timeout: timeouts().apiMs,
    maxRetries: 1,
    ...(baseURL ? { configuration: { baseURL } } : {}),
  });
}

@Module({
  providers: [
    { provide: COMPLETION_MODEL, useFactory: createCompletionModel },
    OpenAiChatService,
  ],
  exports: [OpenAiChatService],
})
export class OpenAiModule {}
