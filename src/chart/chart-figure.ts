import { Series } from '../coingecko/dto/coingecko.types';

const PRICE_COLOR = '#1f77b4';
const UP_COLOR = '#2ca02c';
const DOWN_COLOR = '#d62728';

export interface PriceTrace {
  type: 'scatter';
  x: string[];
  y: number[];
  mode: 'lines';
  name: 'Price';
  line: { color: string; width: number };
  fill: 'tonexty';
  fillcolor: string;
}

export interface VolumeTrace {
  type: 'bar';
  x: string[];
  y: number[];
  name: 'Volume';
  marker: { color: string[] };
  opacity: number;
  yaxis: 'y2';
}

const AXIS_STYLE = {
  title: null,
  showgrid: true,
  gridcolor: 'rgba(0,0,0,0.1)',
  gridwidth: 1,
  showline: true,
  linecolor: 'rgba(0,0,0,0.2)',
  linewidth: 1,
};

export const CHART_LAYOUT = {
  title: null,
  xaxis: { ...AXIS_STYLE, rangeslider: { visible: false } },
  yaxis: { ...AXIS_STYLE, side: 'right' },
  yaxis2: {
    title: null,
    showgrid: false,
    showline: false,
    side: 'left',
    overlaying: 'y',
    showticklabels: false,
  },
  plot_bgcolor: 'white',
  paper_bgcolor: 'white',
  margin: { l: 50, r: 50, t: 30, b: 50 },
  height: 300,
  showlegend: false,
  hovermode: 'x unified',
  hoverlabel: {
    bgcolor: 'white',
    bordercolor: 'rgba(0,0,0,0.2)',
    font: { size: 12 },
  },
} as const;

/** Plotly figure description; the page passes it straight to Plotly.newPlot. */
export interface ChartFigure {
  data: [PriceTrace, VolumeTrace];
  layout: typeof CHART_LAYOUT;
}

/** A price point and the volume traded at the same index (0 when absent). */
export interface ChartPoint {
  timestamp: number;
  price: number;
  volume: number;
}

export function toChartPoints(prices: Series, volumes: Series = []): ChartPoint[] {
  return prices.map(([timestamp, price], i) => ({
    timestamp,
    price,
    volume: volumes[i]?.[1] ?? 0,
  }));
}

/** Green when the price held or rose against the previous point; first bar green. */
export function volumeColors(points: ChartPoint[]): string[] {
  return points.map((point, i) =>
    i === 0 || point.price >= points[i - 1].price ? UP_COLOR : DOWN_COLOR,
  );
}

export function buildChartFigure(points: ChartPoint[]): ChartFigure {
  const x = points.map((p) => new Date(p.timestamp).toISOString());

  return {
    data: [
      {
        type: 'scatter',
        x,
        y: points.map((p) => p.price),
        mode: 'lines',
        name: 'Price',
        line: { color: PRICE_COLOR, width: 2 },
        fill: 'tonexty',
        fillcolor: 'rgba(31, 119, 180, 0.1)',
      },
      {
        type: 'bar',
        x,
        y: points.map((p) => p.volume),
        name: 'Volume',
        marker: { color: volumeColors(points) },
        opacity: 0.6,
        yaxis: 'y2',
      },
    ],
    layout: CHART_LAYOUT,
  };
}

export interface ChartSummary {
  currentPrice: number;
  priceChange24h: number;
  volume24h: number;
}

/** Last price, percent change over the last two points, last volume. */
export function summarize(points: ChartPoint[]): ChartSummary {
  const last = points[points.length - 1];
  const prev = points.length > 1 ? points[points.length - 2] : undefined;

  return {
    currentPrice: last.price,
    priceChange24h:
      prev && prev.price !== 0
        ? ((last.price - prev.price) / prev.price) * 100
        : 0,
    volume24h: last.volume,
  };
}
