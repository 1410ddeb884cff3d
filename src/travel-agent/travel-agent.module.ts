import { MiddlewareConsumer, Module, NestModule, RequestMethod } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { json } from 'express';
import { TravelAgentController } from './travel-agent.controller';
import { TravelAgentService } from './travel-agent.service';
import { ILlmClient } from './llm/llm-client.interface';
import { GeminiLlmClient } from './llm/gemini-llm.client';
import { OpenAiLlmClient } from './llm/openai-llm.client';
import { MockLlmClient } from './llm/mock-llm.client';

/** Query length is not capped by the gateway; the parser limit only bounds memory. */
export const REQUEST_BODY_LIMIT = '10mb';

@Module({
  imports: [ConfigModule, HttpModule],
  controllers: [TravelAgentController],
  providers: [
    TravelAgentService,
    GeminiLlmClient,
    OpenAiLlmClient,
    MockLlmClient,
    {
      provide: 'ILlmClient',
      useFactory: (
        config: ConfigService,
        geminiClient: GeminiLlmClient,
        openAiClient: OpenAiLlmClient,
        mockClient: MockLlmClient,
      ): ILlmClient => {
        const provider = config.get<string>('LLM_PROVIDER') ?? 'gemini';
        if (provider === 'mock') {
          return mockClient;
        }
        if (provider === 'openai') {
          return openAiClient;
        }
        return geminiClient;
      },
      inject: [ConfigService, GeminiLlmClient, OpenAiLlmClient, MockLlmClient],
    },
  ],
})
export class TravelAgentModule implements NestModule {
  // The application is created with `bodyParser: false`; only POST bodies get
  // decoded, whatever their content type.
  configure(consumer: MiddlewareConsumer): void {
    consumer
      .apply(json({ type: () => true, limit: REQUEST_BODY_LIMIT }))
      .forRoutes({ path: 'travelAgent', method: RequestMethod.POST });
  }
}
