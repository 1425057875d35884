import { Injectable, Logger } from '@nestjs/common';
import { coinGeckoApiBase, timeouts } from '../config/app.config';
import { ERROR_MESSAGES } from '../config/constants';
import { errorMessage, errorStack } from '../common/utils/error.util';
import { CoinGeckoError } from './coingecko.error';
import {
  CoinDetail,
  CoinMarket,
  GlobalResponse,
  MarketChartResponse,
  MarketOverview,
  SimplePriceResponse,
} from './dto/coingecko.types';

type QueryParams = Record<string, string | number>;

const PRICE_DATA_PARAMS: QueryParams = {
  vs_currencies: 'usd',
  include_market_cap: 'true',
  include_24hr_vol: 'true',
  include_24hr_change: 'true',
};

const MARKET_DATA_PARAMS: QueryParams = {
  vs_currency: 'usd',
  order: 'market_cap_desc',
  per_page: 10,
  page: 1,
  sparkline: 'false',
};

const CRYPTO_DETAIL_PARAMS: QueryParams = {
  localization: 'false',
  tickers: 'false',
  market_data: 'true',
  community_data: 'true',
  developer_data: 'true',
};

@Injectable()
export class CoinGeckoService {
  private readonly logger = new Logger(CoinGeckoService.name);

  async getSimplePrice(ids: string[]): Promise<SimplePriceResponse> {
    return this.request<SimplePriceResponse>('/simple/price', {
      ids: ids.join(','),
      ...PRICE_DATA_PARAMS,
    });
  }

  async getGlobalOverview(): Promise<MarketOverview> {
    const body = await this.request<GlobalResponse>('/global');
    const data = body.data ?? {};

    return {
      totalMarketCapUsd: data.total_market_cap?.usd ?? 0,
      totalVolumeUsd: data.total_volume?.usd ?? 0,
      marketCapChange24h: data.market_cap_change_percentage_24h_usd ?? null,
      activeCryptocurrencies: data.active_cryptocurrencies ?? null,
      dominance: data.market_cap_percentage ?? {},
    };
  }

  async getTopMarkets(): Promise<CoinMarket[]> {
    return this.request<CoinMarket[]>('/coins/markets', MARKET_DATA_PARAMS);
  }

  async getCoinDetail(cryptoId: string): Promise<CoinDetail> {
    return this.request<CoinDetail>(
      `/coins/${encodeURIComponent(cryptoId)}`,
      CRYPTO_DETAIL_PARAMS,
    );
  }

  async getMarketChart(
    cryptoId: string,
    days: string,
    interval?: string,
  ): Promise<MarketChartResponse> {
    const params: QueryParams = { vs_currency: 'usd', days };
    if (interval) params.interval = interval;

    return this.request<MarketChartResponse>(
      `/coins/${encodeURIComponent(cryptoId)}/market_chart`,
      params,
      timeouts().apiMs,
    );
  }

  /** Overview for prompt enrichment; null when the upstream call fails. */
  async tryGetGlobalOverview(): Promise<MarketOverview | null> {
    try {
      return await this.getGlobalOverview();
    } catch (err) {
      this.logger.error(`Error fetching market data: ${errorMessage(err)}`);
      return null;
    }
  }

  async tryGetSimplePrice(ids: string[]): Promise<SimplePriceResponse | null> {
    if (!ids.length) return null;
    try {
      return await this.getSimplePrice(ids);
    } catch (err) {
      this.logger.error(`Error fetching crypto data: ${errorMessage(err)}`);
      return null;
    }
  }

  private async request<T>(
    path: string,
    params: QueryParams = {},
    timeoutMs = timeouts().marketDataMs,
  ): Promise<T> {
    const query = new URLSearchParams(
      Object.entries(params).map(
        ([k, v]): [string, string] => [k, String(v)],
      ),
    ).toString();
    const url = `${coinGeckoApiBase()}${path}${query ? `?${query}` : ''}`;

    this.logger.debug(`GET ${url}`);

    let resp: Response;
    try {
      resp = await fetch(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      this.logger.error(`CoinGecko request failed: ${path}`, errorStack(err));
      throw new CoinGeckoError(ERROR_MESSAGES.networkError, 0);
    }

    if (!resp.ok) {
      const text = await resp.text().catch(() => '');
      const snippet = text.slice(0, 100);
      this.logger.warn(`CoinGecko ${resp.status} for ${path}: ${snippet}`);
      throw new CoinGeckoError(
        `API error: ${resp.status} - ${snippet}`,
        resp.status,
      );
    }

    return (await resp.json()) as T;
  }
}
