import { BadGatewayException, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ChartService } from './chart.service';
import { CoinGeckoService } from '../coingecko/coingecko.service';
import { CoinGeckoError } from '../coingecko/coingecko.error';

const DAY = 86_400_000;

describe('ChartService', () => {
  let service: ChartService;
  const coinGecko = { getMarketChart: jest.fn() };
  const saved = { ...process.env };

  beforeEach(async () => {
    jest.clearAllMocks();
    process.env.CHART_MIN_INTERVAL_MS = '0';
    process.env.CHART_RETRY_DELAY_MS = '0';

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChartService,
        { provide: CoinGeckoService, useValue: coinGecko },
      ],
    }).compile();

    service = module.get<ChartService>(ChartService);
  });

  afterAll(() => {
    process.env = saved;
  });

  it('builds chart data and summary from the market chart', async () => {
    coinGecko.getMarketChart.mockResolvedValue({
      prices: [
        [0, 50],
        [DAY, 55],
      ],
      total_volumes: [
        [0, 1000],
        [DAY, 1200],
      ],
    });

    const res = await service.getChartData('bitcoin', '30');

    expect(coinGecko.getMarketChart).toHaveBeenCalledWith(
      'bitcoin',
      '30',
      undefined,
    );
    expect(res.cryptoId).toBe('bitcoin');
    expect(res.currentPrice).toBe(55);
    expect(res.priceChange24h).toBeCloseTo(10);
    expect(res.volume24h).toBe(1200);
    expect(res.chartData.data[1].marker.color).toEqual(['#2ca02c', '#2ca02c']);
    expect(res.note).toBeUndefined();
  });

  it('asks for daily points on long ranges', async () => {
    coinGecko.getMarketChart.mockResolvedValue({ prices: [[0, 1]] });

    await service.getChartData('ethereum');

    expect(coinGecko.getMarketChart).toHaveBeenCalledWith(
      'ethereum',
      '1825',
      'daily',
    );
  });

  it('retries once after a 429', async () => {
    coinGecko.getMarketChart
      .mockRejectedValueOnce(new CoinGeckoError('API error: 429 - ', 429))
      .mockResolvedValueOnce({ prices: [[0, 3]] });

    const res = await service.getChartData('solana', '7');

    expect(coinGecko.getMarketChart).toHaveBeenCalledTimes(2);
    expect(res.currentPrice).toBe(3);
  });

  it('falls back to sample data when still rate limited', async () => {
    coinGecko.getMarketChart.mockRejectedValue(
      new CoinGeckoError('API error: 429 - ', 429),
    );

    const res = await service.getChartData('dogecoin', '7');

    expect(coinGecko.getMarketChart).toHaveBeenCalledTimes(2);
    expect(res.note).toBe('Mock data (API rate limited)');
    expect(res.chartData.data[0].y).toHaveLength(1826);
  });

  it('reports unknown coins as not found', async () => {
    coinGecko.getMarketChart.mockRejectedValue(
      new CoinGeckoError('API error: 404 - ', 404),
    );

    await expect(service.getChartData('nope', '7')).rejects.toThrow(
      new NotFoundException('Cryptocurrency "nope" not found'),
    );
  });

  it('reports an empty series as missing data', async () => {
    coinGecko.getMarketChart.mockResolvedValue({ prices: [] });

    await expect(service.getChartData('bitcoin', '7')).rejects.toThrow(
      new NotFoundException('No price data available'),
    );
  });

  it('surfaces other upstream failures as bad gateway', async () => {
    coinGecko.getMarketChart.mockRejectedValue(
      new CoinGeckoError('API error: 500 - oops', 500),
    );

    await expect(service.getChartData('bitcoin', '7')).rejects.toThrow(
      new BadGatewayException('Failed to fetch chart data: API error: 500 - oops'),
    );
  });

  it('lists supported coins and timeframes', () => {
    const options = service.getOptions();

    expect(options.cryptocurrencies).toHaveLength(10);
    expect(options.timeframes.map((t) => t.value)).toEqual([
      '1D',
      '1W',
      '1M',
      '3M',
      '1Y',
      '5Y',
    ]);
  });
});
