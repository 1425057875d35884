export interface TimeframeOption {
  value: string;
  label: string;
  days: string;
}

export const TIMEFRAME_OPTIONS: readonly TimeframeOption[] = [
  { value: '1D', label: '1 Day', days: '1' },
  { value: '1W', label: '1 Week', days: '7' },
  { value: '1M', label: '1 Month', days: '30' },
  { value: '3M', label: '3 Months', days: '90' },
  { value: '1Y', label: '1 Year', days: '365' },
  { value: '5Y', label: '5 Years', days: '1825' },
];

export const DEFAULT_CHART_DAYS = '1825';

export function daysForTimeframe(value: string): string | undefined {
  return TIMEFRAME_OPTIONS.find((option) => option.value === value)?.days;
}
