export interface SimplePriceEntry {
  usd?: number;
  usd_market_cap?: number;
  usd_24h_vol?: number;
  usd_24h_change?: number;
}

export type SimplePriceResponse = Record<string, SimplePriceEntry>;

export interface GlobalMarketData {
  active_cryptocurrencies?: number;
  markets?: number;
  total_market_cap?: Record<string, number>;
  total_volume?: Record<string, number>;
  market_cap_percentage?: Record<string, number>;
  market_cap_change_percentage_24h_usd?: number;
  updated_at?: number;
}

export interface GlobalResponse {
  data?: GlobalMarketData;
}

export interface MarketOverview {
  totalMarketCapUsd: number;
  totalVolumeUsd: number;
  marketCapChange24h: number | null;
  activeCryptocurrencies: number | null;
  dominance: Record<string, number>;
}

/** One row of /coins/markets. Only the fields the page reads are typed. */
export interface CoinMarket {
  id: string;
  symbol: string;
  name: string;
  image?: string;
  current_price: number | null;
  market_cap: number | null;
  market_cap_rank: number | null;
  total_volume: number | null;
  price_change_percentage_24h: number | null;
  [key: string]: unknown;
}

export interface CoinDetail {
  id: string;
  symbol: string;
  name: string;
  [key: string]: unknown;
}

/** Series of [timestampMs, value] pairs. */
export type Series = Array<[number, number]>;

export interface MarketChartResponse {
  prices?: Series;
  market_caps?: Series;
  total_volumes?: Series;
}
