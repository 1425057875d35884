import {
  buildChartFigure,
  summarize,
  toChartPoints,
  volumeColors,
} from './chart-figure';
import { generateMockSeries } from './mock-series';

const DAY = 86_400_000;

describe('chart-figure', () => {
  const points = toChartPoints(
    [
      [0, 100],
      [DAY, 110],
      [2 * DAY, 110],
      [3 * DAY, 99],
    ],
    [
      [0, 5],
      [DAY, 6],
      [2 * DAY, 7],
    ],
  );

  it('pairs volumes by index and fills missing ones with zero', () => {
    expect(points.map((p) => p.volume)).toEqual([5, 6, 7, 0]);
  });

  it('colours volume bars by price direction', () => {
    expect(volumeColors(points)).toEqual([
      '#2ca02c',
      '#2ca02c',
      '#2ca02c',
      '#d62728',
    ]);
  });

  it('builds a price line and a volume bar trace on the second axis', () => {
    const figure = buildChartFigure(points);
    const [price, volume] = figure.data;

    expect(price.x[0]).toBe('1970-01-01T00:00:00.000Z');
    expect(price.y).toEqual([100, 110, 110, 99]);
    expect(price.line).toEqual({ color: '#1f77b4', width: 2 });
    expect(volume.yaxis).toBe('y2');
    expect(volume.y).toEqual([5, 6, 7, 0]);
    expect(figure.layout.height).toBe(300);
  });

  it('summarizes the last two points', () => {
    const summary = summarize(points);

    expect(summary.currentPrice).toBe(99);
    expect(summary.priceChange24h).toBeCloseTo(-10);
    expect(summary.volume24h).toBe(0);
  });

  it('reports no change for a single point', () => {
    expect(summarize(toChartPoints([[0, 42]]))).toEqual({
      currentPrice: 42,
      priceChange24h: 0,
      volume24h: 0,
    });
  });
});

describe('generateMockSeries', () => {
  const end = new Date('2025-01-01T00:00:00.000Z');

  it('produces five years of daily points ending at the given date', () => {
    const series = generateMockSeries('bitcoin', end);

    expect(series).toHaveLength(1826);
    expect(series[series.length - 1].timestamp).toBe(end.getTime());
    expect(series[1].timestamp - series[0].timestamp).toBe(DAY);
  });

  it('is deterministic for the same inputs', () => {
    expect(generateMockSeries('solana', end)).toEqual(
      generateMockSeries('solana', end),
    );
  });

  it('trends from the base price towards three times it', () => {
    const series = generateMockSeries('ethereum', end);

    expect(series[0].price).toBeGreaterThan(2800 * 0.9);
    expect(series[0].price).toBeLessThan(2800 * 1.1);
    expect(series[series.length - 1].price).toBeGreaterThan(2800 * 2.7);
    expect(series[series.length - 1].price).toBeLessThan(2800 * 3.3);
    expect(series.every((p) => p.volume > 0)).toBe(true);
  });

  it('uses a base of 100 for coins without a known price', () => {
    const first = generateMockSeries('unknown-coin', end)[0];
    expect(first.price).toBeGreaterThan(90);
    expect(first.price).toBeLessThan(110);
  });
});
