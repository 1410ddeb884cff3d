import { Injectable } from '@nestjs/common';
import { ILlmClient, ModelRequest, ModelResponse } from './llm-client.interface';

/** Offline stand-in selected with `LLM_PROVIDER=mock`. Never calls tools. */
@Injectable()
export class MockLlmClient implements ILlmClient {
  async generate(request: ModelRequest): Promise<ModelResponse> {
    const text = [
      'This is a demo response from the travel agent.',
      'We are currently running in offline mode with no connection to any external LLM.',
      `I received: "${request.prompt}". In a real environment, the assistant would look up flights and hotels for you.`,
    ].join('\n\n');

    return { text, toolCalls: [] };
  }
}
