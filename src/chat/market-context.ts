import { MarketOverview, SimplePriceResponse } from '../coingecko/dto/coingecko.types';
import { SUPPORTED_COINS, SupportedCoin } from '../coingecko/supported-coins';

export const CRYPTO_KEYWORDS = [
  'bitcoin', 'btc', 'ethereum', 'eth', 'price', 'market', 'crypto',
  'cryptocurrency', 'altcoin', 'defi', 'nft', 'blockchain', 'trading', 'pump',
  'dump', 'moon', 'hodl', 'whale', 'bull', 'bear', 'market cap', 'volume',
  'doge', 'ada', 'bnb', 'sol', 'matic', 'avax', 'dot', 'link', 'uni', 'sushi',
];

const usdWhole = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });
const usdCents = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});
const usdSmall = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 6,
});

/** Substring match, so "eth" also fires on "ethereum" and "something". */
export function mentionsCrypto(message: string): boolean {
  const lower = message.toLowerCase();
  return CRYPTO_KEYWORDS.some((keyword) => lower.includes(keyword));
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Supported coins named in the message by id, name or symbol as a whole word. */
export function mentionedCoins(message: string): SupportedCoin[] {
  return SUPPORTED_COINS.filter((coin) =>
    [coin.id, coin.name, coin.symbol].some((term) =>
      new RegExp(`(^|[^a-z0-9-])${escapeRegExp(term)}($|[^a-z0-9-])`, 'i').test(
        message,
      ),
    ),
  );
}

export function formatUsd(value: number): string {
  if (Math.abs(value) >= 1) return `$${usdCents.format(value)}`;
  return `$${usdSmall.format(value)}`;
}

export function formatChange(percent: number): string {
  const sign = percent > 0 ? '+' : '';
  return `${sign}${percent.toFixed(2)}%`;
}

export function formatOverview(overview: MarketOverview): string {
  return `Live Market Data: Total Market Cap: $${usdWhole.format(
    overview.totalMarketCapUsd,
  )}, 24h Vol: $${usdWhole.format(overview.totalVolumeUsd)}`;
}

export function formatPrices(
  coins: SupportedCoin[],
  prices: SimplePriceResponse,
): string | null {
  const parts = coins.flatMap((coin) => {
    const entry = prices[coin.id];
    if (!entry || typeof entry.usd !== 'number') return [];
    const change =
      typeof entry.usd_24h_change === 'number'
        ? `, 24h ${formatChange(entry.usd_24h_change)}`
        : '';
    return [`${coin.name} (${coin.symbol}): ${formatUsd(entry.usd)}${change}`];
  });

  return parts.length ? `Prices: ${parts.join('; ')}` : null;
}
