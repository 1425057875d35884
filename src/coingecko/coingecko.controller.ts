import {
  BadGatewayException,
  Controller,
  Get,
  HttpException,
  Logger,
  NotFoundException,
  Param,
  Query,
  SetMetadata,
} from '@nestjs/common';
import { CryptoIdPipe } from '../common/pipes/crypto-id.pipe';
import { errorMessage } from '../common/utils/error.util';
import { ERROR_MESSAGES } from '../config/constants';
import { CoinGeckoError } from './coingecko.error';
import { CoinGeckoService } from './coingecko.service';
import { PriceQueryDto } from './dto/price-query.dto';

@Controller('api')
export class CoinGeckoController {
  private readonly logger = new Logger(CoinGeckoController.name);

  constructor(private readonly coinGecko: CoinGeckoService) {}

  /** Top ten coins by market cap. */
  @SetMetadata('response_message', 'Market data fetched successfully.')
  @Get('market-data')
  async marketData() {
    try {
      const coins = await this.coinGecko.getTopMarkets();
      return { coins, timestamp: new Date().toISOString() };
    } catch (err) {
      throw this.upstreamError('Failed to fetch market data', err);
    }
  }

  @SetMetadata('response_message', 'Market overview fetched successfully.')
  @Get('market-overview')
  async marketOverview() {
    try {
      const overview = await this.coinGecko.getGlobalOverview();
      return { overview, timestamp: new Date().toISOString() };
    } catch (err) {
      throw this.upstreamError('Failed to fetch market data', err);
    }
  }

  @SetMetadata('response_message', 'Prices fetched successfully.')
  @Get('price')
  async price(@Query() query: PriceQueryDto) {
    const ids = (query.ids ?? 'bitcoin').split(',');
    try {
      const prices = await this.coinGecko.getSimplePrice(ids);
      return { prices, timestamp: new Date().toISOString() };
    } catch (err) {
      throw this.upstreamError('Failed to fetch crypto data', err);
    }
  }

  @SetMetadata('response_message', 'Crypto details fetched successfully.')
  @Get('crypto/:cryptoId')
  async cryptoDetail(@Param('cryptoId', CryptoIdPipe) cryptoId: string) {
    try {
      const coin = await this.coinGecko.getCoinDetail(cryptoId);
      return { coin, timestamp: new Date().toISOString() };
    } catch (err) {
      if (err instanceof CoinGeckoError && err.isNotFound) {
        throw new NotFoundException(ERROR_MESSAGES.cryptoNotFound);
      }
      throw this.upstreamError('Failed to fetch crypto data', err);
    }
  }

  private upstreamError(prefix: string, err: unknown): HttpException {
    this.logger.error(`${prefix}: ${errorMessage(err)}`);
    return new BadGatewayException(`${prefix}: ${errorMessage(err)}`);
  }
}
