import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from './app.controller';
import { OpenAiChatService } from './openai/openai-chat.service';

describe('AppController', () => {
  let controller: AppController;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [
        {
          provide: OpenAiChatService,
          useValue: {
            modelName: 'gpt-4-turbo-preview',
            isConfigured: () => false,
          },
        },
      ],
    }).compile();

    controller = module.get<AppController>(AppController);
  });

  it('reports health with the configured model', () => {
    const health = controller.getHealth();

    expect(health.status).toBe('healthy');
    expect(health.model).toBe('gpt-4-turbo-preview');
    expect(health.llmConfigured).toBe(false);
    expect(health.version).toBe('2.0.0');
  });

  it('lists the app metadata and endpoints', () => {
    const info = controller.getInfo();

    expect(info.name).toBe('Crypto Research Assistant');
    expect(info.endpoints.chat).toBe('POST /api/chat');
  });
});
