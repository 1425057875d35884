import {
  BadGatewayException,
  HttpException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { setTimeout as sleep } from 'timers/promises';
import { CoinGeckoError } from '../coingecko/coingecko.error';
import { CoinGeckoService } from '../coingecko/coingecko.service';
import { MarketChartResponse } from '../coingecko/dto/coingecko.types';
import { SUPPORTED_COINS } from '../coingecko/supported-coins';
import { chartSettings } from '../config/app.config';
import { ERROR_MESSAGES } from '../config/constants';
import { errorMessage } from '../common/utils/error.util';
import {
  ChartPoint,
  buildChartFigure,
  summarize,
  toChartPoints,
} from './chart-figure';
import {
  ChartDataResponseDto,
  ChartOptionsResponseDto,
} from './dto/chart-response.dto';
import { generateMockSeries } from './mock-series';
import { RequestSpacer } from './request-spacer';
import { DEFAULT_CHART_DAYS, TIMEFRAME_OPTIONS } from './timeframes';

const RATE_LIMITED = Symbol('rate-limited');

@Injectable()
export class ChartService {
  private readonly logger = new Logger(ChartService.name);
  private readonly spacer: RequestSpacer;
  private readonly retryDelayMs: number;

  constructor(private readonly coinGecko: CoinGeckoService) {
    const settings = chartSettings();
    this.spacer = new RequestSpacer(settings.minIntervalMs);
    this.retryDelayMs = settings.retryDelayMs;
    this.logger.log(
      `ChartService initialized (min interval ${settings.minIntervalMs}ms)`,
    );
  }

  /**
   * Historical price and volume for one coin. Long ranges default to daily
   * points; shorter ones let CoinGecko pick the granularity.
   */
  async getChartData(
    cryptoId: string,
    days: string = DEFAULT_CHART_DAYS,
    interval?: string,
  ): Promise<ChartDataResponseDto> {
    const effectiveInterval =
      interval ?? (days === 'max' || Number(days) >= 90 ? 'daily' : undefined);

    this.logger.log(`Fetching chart data for ${cryptoId} (${days} days)`);
    const chart = await this.fetchChart(cryptoId, days, effectiveInterval);

    if (chart === RATE_LIMITED) {
      this.logger.warn(
        `Still rate limited for ${cryptoId}; serving generated sample data`,
      );
      return this.getMockChartData(cryptoId);
    }

    const prices = chart.prices ?? [];
    if (!prices.length) {
      throw new NotFoundException('No price data available');
    }

    const points = toChartPoints(prices, chart.total_volumes ?? []);
    this.logger.log(`Chart data generated successfully for ${cryptoId}`);
    return this.buildResult(cryptoId, days, points);
  }

  getMockChartData(cryptoId: string): ChartDataResponseDto {
    this.logger.log(`Generating mock chart data for ${cryptoId}`);
    const result = this.buildResult(
      cryptoId,
      DEFAULT_CHART_DAYS,
      generateMockSeries(cryptoId),
    );
    return { ...result, note: 'Mock data (API rate limited)' };
  }

  getOptions(): ChartOptionsResponseDto {
    return {
      cryptocurrencies: SUPPORTED_COINS,
      timeframes: TIMEFRAME_OPTIONS,
    };
  }

  private async fetchChart(
    cryptoId: string,
    days: string,
    interval: string | undefined,
    attempt = 0,
  ): Promise<MarketChartResponse | typeof RATE_LIMITED> {
    const waited = await this.spacer.acquire();
    if (waited > 0) {
      this.logger.log(`Rate limiting: waited ${waited}ms`);
    }

    try {
      return await this.coinGecko.getMarketChart(cryptoId, days, interval);
    } catch (err) {
      if (err instanceof CoinGeckoError && err.isRateLimited) {
        if (attempt > 0) return RATE_LIMITED;
        this.logger.warn(
          `Rate limit hit (429). Retrying in ${this.retryDelayMs}ms`,
        );
        await sleep(this.retryDelayMs);
        return this.fetchChart(cryptoId, days, interval, attempt + 1);
      }
      throw this.toHttpError(cryptoId, err);
    }
  }

  private toHttpError(cryptoId: string, err: unknown): HttpException {
    if (err instanceof CoinGeckoError) {
      if (err.isNotFound) {
        return new NotFoundException(`Cryptocurrency "${cryptoId}" not found`);
      }
      if (err.isNetworkError) {
        return new BadGatewayException(ERROR_MESSAGES.networkError);
      }
    }
    this.logger.error(`Chart data error: ${errorMessage(err)}`);
    return new BadGatewayException(
      `Failed to fetch chart data: ${errorMessage(err)}`,
    );
  }

  private buildResult(
    cryptoId: string,
    days: string,
    points: ChartPoint[],
  ): ChartDataResponseDto {
    return {
      cryptoId,
      days,
      chartData: buildChartFigure(points),
      ...summarize(points),
      timestamp: new Date().toISOString(),
    };
  }
}
