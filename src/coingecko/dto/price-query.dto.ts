import { IsOptional, Matches } from 'class-validator';

export class PriceQueryDto {
  /** Comma-separated CoinGecko ids; defaults to bitcoin. */
  @IsOptional()
  @Matches(/^[a-z0-9-]+(,[a-z0-9-]+){0,24}$/, {
    message: 'ids must be a comma-separated list of crypto IDs',
  })
  ids?: string;
}
