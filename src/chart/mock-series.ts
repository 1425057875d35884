import { ChartPoint } from './chart-figure';

const DAY_MS = 86_400_000;
const MOCK_DAYS = 1825;
const SEED = 42;

const BASE_PRICES: Record<string, number> = {
  bitcoin: 45000,
  ethereum: 2800,
  solana: 100,
  binancecoin: 300,
  cardano: 0.5,
  ripple: 0.6,
  'avalanche-2': 35,
  'matic-network': 0.8,
  dogecoin: 0.08,
  polkadot: 7,
};

export function basePriceFor(cryptoId: string): number {
  return BASE_PRICES[cryptoId] ?? 100;
}

/** mulberry32: small seeded PRNG returning floats in [0, 1). */
function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function normalSampler(random: () => number): () => number {
  return () => {
    const u = 1 - random();
    const v = random();
    return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
  };
}

/**
 * Five years of daily sample points ending at `end`: upward trend, 2% daily
 * noise, a two-cycle seasonal wave, floored at 10% of the base price. The
 * same seed is used for every call, so output depends only on the inputs.
 */
export function generateMockSeries(
  cryptoId: string,
  end: Date = new Date(),
): ChartPoint[] {
  const base = basePriceFor(cryptoId);
  const normal = normalSampler(seededRandom(SEED));
  const n = MOCK_DAYS + 1;
  const start = end.getTime() - MOCK_DAYS * DAY_MS;

  const prices: number[] = [];
  for (let i = 0; i < n; i++) {
    const progress = i / (n - 1);
    const trend = 2 * progress;
    const noise = 0.02 * normal();
    const seasonal = 0.1 * Math.sin(4 * Math.PI * progress);
    prices.push(Math.max(base * (1 + trend + noise + seasonal), base * 0.1));
  }

  return prices.map((price, i) => {
    const move = i === 0 ? 0 : Math.abs(price - prices[i - 1]);
    const volume = Math.exp(15 + 0.5 * normal()) * (1 + 0.5 * move);
    return { timestamp: start + i * DAY_MS, price, volume };
  });
}
