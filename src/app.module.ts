import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerModule } from '@nestjs/throttler';
import { AppController } from './app.controller';
import { ChartModule } from './chart/chart.module';
import { ChatModule } from './chat/chat.module';
import { CoinGeckoModule } from './coingecko/coingecko.module';
import { envNumber } from './config/app.config';
import { OpenAiModule } from './openai/openai.module';
import { CustomThrottlerGuard } from './throttling/custom-throttler.guard';

@Module({
  imports: [
    ThrottlerModule.forRoot([
      {
        name: 'global',
        ttl: envNumber('THROTTLE_TTL_MS', 60_000),
        limit: envNumber('THROTTLE_LIMIT', 60),
      },
    ]),
    OpenAiModule,
    CoinGeckoModule,
    ChatModule,
    ChartModule,
  ],
  controllers: [AppController],
  providers: [
    {
      provide: APP_GUARD,
      useClass: CustomThrottlerGuard,
    },
  ],
})
export class AppModule {}
