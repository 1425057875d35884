import {
  BadRequestException,
  Injectable,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import type { BaseMessage } from '@langchain/core/messages';
import { CoinGeckoService } from '../coingecko/coingecko.service';
import { ERROR_MESSAGES, MAX_HISTORY_MESSAGES } from '../config/constants';
import { OpenAiChatService } from '../openai/openai-chat.service';
import type { ChatTurn } from '../openai/openai.constants';
import { ChatMessageDto } from './dto/message.dto';
import {
  ChatResponseDto,
  ChatResponseKind,
  ChatStreamEvent,
} from './dto/chat-response.dto';
import { isGreeting, pickGreeting } from './greetings';
import {
  formatOverview,
  formatPrices,
  mentionedCoins,
  mentionsCrypto,
} from './market-context';

type PreparedChat =
  | { kind: 'instant'; text: string }
  | { kind: 'completion'; messages: BaseMessage[]; marketDataIncluded: boolean };

function isChatTurn(turn: unknown): turn is ChatTurn {
  return (
    typeof turn === 'object' &&
    turn !== null &&
    'role' in turn &&
    'content' in turn &&
    (turn.role === 'user' || turn.role === 'assistant') &&
    typeof turn.content === 'string'
  );
}

interface EnhancedMessage {
  text: string;
  marketDataIncluded: boolean;
}

@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);

  constructor(
    private readonly openAi: OpenAiChatService,
    private readonly coinGecko: CoinGeckoService,
  ) {}

  async processMessage(
    dto: ChatMessageDto | undefined,
  ): Promise<ChatResponseDto> {
    const prepared = await this.prepare(dto);

    if (prepared.kind === 'instant') {
      return this.buildResponse(prepared.text, 'instant', false);
    }

    const text = await this.openAi.complete(prepared.messages);
    return this.buildResponse(text, 'completion', prepared.marketDataIncluded);
  }

  /**
   * Same pipeline as processMessage, yielding content deltas then a final
   * `done` event. Errors before the first delta propagate to the caller.
   */
  async *streamMessage(
    dto: ChatMessageDto | undefined,
  ): AsyncGenerator<ChatStreamEvent> {
    const prepared = await this.prepare(dto);

    if (prepared.kind === 'instant') {
      yield { content: prepared.text };
      yield { done: true, ...this.meta('instant', false) };
      return;
    }

    for await (const content of this.openAi.streamCompletion(
      prepared.messages,
    )) {
      yield { content };
    }
    yield { done: true, ...this.meta('completion', prepared.marketDataIncluded) };
  }

  private async prepare(
    dto: ChatMessageDto | undefined,
  ): Promise<PreparedChat> {
    const raw = dto?.message;
    if (typeof raw !== 'string') {
      throw new BadRequestException(ERROR_MESSAGES.noMessage);
    }
    const message = raw.trim();
    if (!message) {
      throw new BadRequestException(ERROR_MESSAGES.emptyMessage);
    }

    if (isGreeting(message)) {
      this.logger.debug(`Instant greeting for "${message}"`);
      return { kind: 'instant', text: pickGreeting() };
    }

    if (!this.openAi.isConfigured()) {
      throw new InternalServerErrorException(ERROR_MESSAGES.apiKeyMissing);
    }

    const enhanced = await this.enhanceWithMarketData(message);
    const turns = dto?.history;
    const history = this.recentHistory(Array.isArray(turns) ? turns : []);

    this.logger.debug(
      `Chat request: history=${history.length}, marketData=${enhanced.marketDataIncluded}`,
    );

    return {
      kind: 'completion',
      messages: this.openAi.buildMessages(history, enhanced.text),
      marketDataIncluded: enhanced.marketDataIncluded,
    };
  }

  /** Appends live figures when the message is about crypto markets. */
  private async enhanceWithMarketData(
    message: string,
  ): Promise<EnhancedMessage> {
    if (!mentionsCrypto(message)) {
      return { text: message, marketDataIncluded: false };
    }

    const coins = mentionedCoins(message);
    const [overview, prices] = await Promise.all([
      this.coinGecko.tryGetGlobalOverview(),
      this.coinGecko.tryGetSimplePrice(coins.map((coin) => coin.id)),
    ]);

    const lines: string[] = [];
    if (overview) lines.push(formatOverview(overview));
    if (prices) {
      const priceLine = formatPrices(coins, prices);
      if (priceLine) lines.push(priceLine);
    }

    if (!lines.length) return { text: message, marketDataIncluded: false };
    return {
      text: `${message}\n\n${lines.join('\n')}`,
      marketDataIncluded: true,
    };
  }

  private recentHistory(history: unknown[]): ChatTurn[] {
    // Socket clients bypass the validation pipe, so re-check the shape here.
    return history
      .filter(isChatTurn)
      .slice(-MAX_HISTORY_MESSAGES)
      .map(({ role, content }) => ({ role, content }));
  }

  private meta(kind: ChatResponseKind, marketDataIncluded: boolean) {
    return {
      kind,
      model: kind === 'instant' ? 'instant' : this.openAi.modelName,
      marketDataIncluded,
      timestamp: new Date().toISOString(),
    };
  }

  private buildResponse(
    response: string,
    kind: ChatResponseKind,
    marketDataIncluded: boolean,
  ): ChatResponseDto {
    return { response, ...this.meta(kind, marketDataIncluded) };
  }
}
