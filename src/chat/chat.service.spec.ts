import {
  BadRequestException,
  InternalServerErrorException,
} from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ChatService } from './chat.service';
import { OpenAiChatService } from '../openai/openai-chat.service';
import { CoinGeckoService } from '../coingecko/coingecko.service';
import { GREETING_RESPONSES } from './greetings';
import { ChatStreamEvent } from './dto/chat-response.dto';
import {
  MarketOverview,
  SimplePriceResponse,
} from '../coingecko/dto/coingecko.types';

describe('ChatService', () => {
  let service: ChatService;

  const openAi = {
    modelName: 'gpt-4-turbo-preview',
    isConfigured: jest.fn(() => true),
    buildMessages: jest.fn(
      (_history: Array<{ content: string }>, _text: string) => [
        'built-messages',
      ],
    ),
    complete: jest.fn(async () => 'mock-ai-response'),
    streamCompletion: jest.fn(async function* () {
      yield 'Bit';
      yield 'coin';
    }),
  };

  const coinGecko = {
    tryGetGlobalOverview: jest.fn<Promise<MarketOverview | null>, []>(
      async () => ({
        totalMarketCapUsd: 1000,
        totalVolumeUsd: 50,
        marketCapChange24h: null,
        activeCryptocurrencies: null,
        dominance: {},
      }),
    ),
    tryGetSimplePrice: jest.fn<Promise<SimplePriceResponse | null>, [string[]]>(
      async () => ({
        bitcoin: { usd: 64000, usd_24h_change: 2.5 },
      }),
    ),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    openAi.isConfigured.mockReturnValue(true);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChatService,
        { provide: OpenAiChatService, useValue: openAi },
        { provide: CoinGeckoService, useValue: coinGecko },
      ],
    }).compile();

    service = module.get<ChatService>(ChatService);
  });

  it('answers greetings instantly without calling the model', async () => {
    const res = await service.processMessage({ message: 'Hello!' });

    expect(res.kind).toBe('instant');
    expect(res.model).toBe('instant');
    expect(GREETING_RESPONSES).toContain(res.response);
    expect(openAi.complete).not.toHaveBeenCalled();
  });

  it('rejects a payload without a message', async () => {
    await expect(service.processMessage(undefined)).rejects.toThrow(
      new BadRequestException('No message provided'),
    );
    await expect(
      service.processMessage(JSON.parse('{"history":[]}')),
    ).rejects.toThrow(new BadRequestException('No message provided'));
  });

  it('rejects a blank message', async () => {
    await expect(service.processMessage({ message: '   ' })).rejects.toThrow(
      new BadRequestException('Message cannot be empty'),
    );
  });

  it('fails with a configuration error when no API key is set', async () => {
    openAi.isConfigured.mockReturnValue(false);

    await expect(
      service.processMessage({ message: 'Explain staking' }),
    ).rejects.toThrow(
      new InternalServerErrorException(
        'API key not configured. Please set OPENAI_API_KEY environment variable.',
      ),
    );
  });

  it('appends live market data to crypto questions', async () => {
    const res = await service.processMessage({
      message: 'What is the BTC price?',
    });

    expect(coinGecko.tryGetSimplePrice).toHaveBeenCalledWith(['bitcoin']);
    expect(openAi.buildMessages).toHaveBeenCalledWith(
      [],
      'What is the BTC price?\n\n' +
        'Live Market Data: Total Market Cap: $1,000, 24h Vol: $50\n' +
        'Prices: Bitcoin (BTC): $64,000.00, 24h +2.50%',
    );
    expect(openAi.complete).toHaveBeenCalledWith(['built-messages']);
    expect(res).toEqual(
      expect.objectContaining({
        response: 'mock-ai-response',
        kind: 'completion',
        model: 'gpt-4-turbo-preview',
        marketDataIncluded: true,
      }),
    );
  });

  it('sends the message unchanged when market data is unavailable', async () => {
    coinGecko.tryGetGlobalOverview.mockResolvedValueOnce(null);
    coinGecko.tryGetSimplePrice.mockResolvedValueOnce(null);

    const res = await service.processMessage({ message: 'Is the market up?' });

    expect(openAi.buildMessages).toHaveBeenCalledWith([], 'Is the market up?');
    expect(res.marketDataIncluded).toBe(false);
  });

  it('skips market data for unrelated questions', async () => {
    await service.processMessage({ message: 'Tell me a joke' });

    expect(coinGecko.tryGetGlobalOverview).not.toHaveBeenCalled();
    expect(openAi.buildMessages).toHaveBeenCalledWith([], 'Tell me a joke');
  });

  it('keeps only the last ten history turns', async () => {
    const history = Array.from({ length: 12 }, (_, i) => ({
      role: i % 2 === 0 ? ('user' as const) : ('assistant' as const),
      content: `m${i}`,
    }));

    await service.processMessage({ message: 'Tell me a joke', history });

    const [sentHistory] = openAi.buildMessages.mock.calls[0];
    expect(sentHistory).toHaveLength(10);
    expect(sentHistory[0].content).toBe('m2');
    expect(sentHistory[9].content).toBe('m11');
  });

  it('drops malformed history turns from unvalidated payloads', async () => {
    const payload = JSON.parse(
      '{"message":"Tell me a joke","history":' +
        '[null,"text",{"role":"system","content":"x"},{"role":"user","content":"a"}]}',
    );

    await service.processMessage(payload);

    expect(openAi.buildMessages).toHaveBeenCalledWith(
      [{ role: 'user', content: 'a' }],
      'Tell me a joke',
    );
  });

  it('streams deltas followed by a done event', async () => {
    const events: ChatStreamEvent[] = [];
    for await (const event of service.streamMessage({
      message: 'Tell me a joke',
    })) {
      events.push(event);
    }

    expect(events.slice(0, 2)).toEqual([
      { content: 'Bit' },
      { content: 'coin' },
    ]);
    expect(events[2]).toEqual(
      expect.objectContaining({
        done: true,
        kind: 'completion',
        marketDataIncluded: false,
      }),
    );
  });
});
