import type { ChartFigure } from '../chart-figure';
import type { SupportedCoin } from '../../coingecko/supported-coins';
import type { TimeframeOption } from '../timeframes';

export interface ChartDataResponseDto {
  cryptoId: string;
  days: string;
  chartData: ChartFigure;
  currentPrice: number;
  priceChange24h: number;
  volume24h: number;
  timestamp: string;
  /** Set when the series is generated sample data rather than market data. */
  note?: string;
}

export interface ChartOptionsResponseDto {
  cryptocurrencies: readonly SupportedCoin[];
  timeframes: readonly TimeframeOption[];
}
