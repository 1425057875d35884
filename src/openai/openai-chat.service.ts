import {
  HttpException,
  HttpStatus,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import {
  AIMessage,
  BaseMessage,
  HumanMessage,
  SystemMessage,
} from '@langchain/core/messages';
import { openAiModel } from '../config/app.config';
import { errorMessage, errorStack } from '../common/utils/error.util';
import { CRYPTO_SYSTEM_PROMPT } from './prompts';
import { messageText } from './message-text';
import { COMPLETION_MODEL, ChatTurn, CompletionModel } from './openai.constants';

@Injectable()
export class OpenAiChatService {
  private readonly logger = new Logger(OpenAiChatService.name);

  constructor(
    @Inject(COMPLETION_MODEL)
    private readonly model: CompletionModel | null,
  ) {}

  isConfigured(): boolean {
    return this.model !== null;
  }

  get modelName(): string {
    return openAiModel();
  }

  /** System prompt, prior turns, then the new user message. */
  buildMessages(history: ChatTurn[], userMessage: string): BaseMessage[] {
    return [
      new SystemMessage(CRYPTO_SYSTEM_PROMPT),
      ...history.map((turn) =>
        turn.role === 'assistant'
          ? new AIMessage(turn.content)
          : new HumanMessage(turn.content),
      ),
      new HumanMessage(userMessage),
    ];
  }

  async complete(messages: BaseMessage[]): Promise<string> {
    const model = this.requireModel();
    this.logger.debug(
      `Requesting completion (${messages.length} messages, model=${this.modelName})`,
    );

    try {
      const response = await model.invoke(messages);
      const text = messageText(response.content);
      this.logger.debug(`Completion received (${text.length} chars)`);
      return text;
    } catch (err) {
      throw this.toHttpError(err);
    }
  }

  async *streamCompletion(messages: BaseMessage[]): AsyncGenerator<string> {
    const model = this.requireModel();
    this.logger.debug(
      `Streaming completion (${messages.length} messages, model=${this.modelName})`,
    );

    try {
      const stream = await model.stream(messages);
      for await (const chunk of stream) {
        const text = messageText(chunk.content);
        if (text) yield text;
      }
    } catch (err) {
      throw this.toHttpError(err);
    }
  }

  private requireModel(): CompletionModel {
    if (!this.model) {
      throw new HttpException(
        'OpenAI client not initialized',
        HttpStatus.INTERNAL_SERVER_ERROR,
      );
    }
    return this.model;
  }

  private toHttpError(err: unknown): HttpException {
    if (err instanceof HttpException) return err;

    this.logger.error('Error generating completion', errorStack(err));
    const msg = errorMessage(err) || 'Failed to generate AI response.';
    const lower = msg.toLowerCase();

    if (lower.includes('quota')) {
      return new HttpException(
        'Daily API limit reached. Try again later.',
        HttpStatus.TOO_MANY_REQUESTS,
      );
    }
    if (lower.includes('rate limit') || lower.includes('rate_limit')) {
      return new HttpException(
        'Too many requests. Please wait a moment.',
        HttpStatus.TOO_MANY_REQUESTS,
      );
    }
    return new HttpException(
      `An error occurred: ${msg}`,
      HttpStatus.BAD_GATEWAY,
    );
  }
}
