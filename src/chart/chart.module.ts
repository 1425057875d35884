import { Module } from '@nestjs/common';
import { CoinGeckoModule } from '../coingecko/coingecko.module';
import { ChartController } from './chart.controller';
import { ChartService } from './chart.service';

@Module({
  imports: [CoinGeckoModule],
  controllers: [ChartController],
  providers: [ChartService],
})
export class ChartModule {}
