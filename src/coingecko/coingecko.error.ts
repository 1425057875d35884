/**
 * Failure talking to CoinGecko. `status` is the upstream HTTP status, or 0 when
 * no response arrived (timeout, DNS, connection reset).
 */
export class CoinGeckoError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = 'CoinGeckoError';
  }

  get isNotFound(): boolean {
    return this.status === 404;
  }

  get isRateLimited(): boolean {
    return this.status === 429;
  }

  get isNetworkError(): boolean {
    return this.status === 0;
  }
}
