import { Controller, Get, Param, Query, SetMetadata } from '@nestjs/common';
import { CryptoIdPipe } from '../common/pipes/crypto-id.pipe';
import { ChartService } from './chart.service';
import { ChartQueryDto } from './dto/chart-query.dto';
import { DEFAULT_CHART_DAYS, daysForTimeframe } from './timeframes';

@Controller('api/chart')
export class ChartController {
  constructor(private readonly chartService: ChartService) {}

  @SetMetadata('response_message', 'Chart options fetched successfully.')
  @Get('options')
  options() {
    return this.chartService.getOptions();
  }

  @SetMetadata('response_message', 'Chart data fetched successfully.')
  @Get(':cryptoId')
  chart(
    @Param('cryptoId', CryptoIdPipe) cryptoId: string,
    @Query() query: ChartQueryDto,
  ) {
    const days =
      query.days ??
      (query.timeframe ? daysForTimeframe(query.timeframe) : undefined) ??
      DEFAULT_CHART_DAYS;
    return this.chartService.getChartData(cryptoId, days, query.interval);
  }
}
