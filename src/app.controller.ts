import { Controller, Get, SetMetadata } from '@nestjs/common';
import { APP_INFO } from './config/constants';
import { HealthResponse } from './common/interfaces/health.interface';
import { OpenAiChatService } from './openai/openai-chat.service';

@Controller()
export class AppController {
  constructor(private readonly openAi: OpenAiChatService) {}

  /**
   * Health check for load balancers and monitoring.
   *
   * GET /health
   */
  @SetMetadata('response_message', 'Service is healthy')
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'healthy',
      model: this.openAi.modelName,
      llmConfigured: this.openAi.isConfigured(),
      timestamp: new Date().toISOString(),
      version: APP_INFO.version,
      uptime: process.uptime(),
    };
  }

  /** GET /api/info */
  @Get('api/info')
  getInfo() {
    return {
      ...APP_INFO,
      model: this.openAi.modelName,
      endpoints: {
        chat: 'POST /api/chat',
        chatStream: 'POST /api/chat/stream',
        marketData: 'GET /api/market-data',
        marketOverview: 'GET /api/market-overview',
        price: 'GET /api/price?ids=bitcoin',
        crypto: 'GET /api/crypto/:cryptoId',
        chart: 'GET /api/chart/:cryptoId?timeframe=1M',
        chartOptions: 'GET /api/chart/options',
        health: 'GET /health',
      },
    };
  }
}
