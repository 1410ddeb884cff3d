import { Inject, Injectable, Logger } from '@nestjs/common';
import type { TravelQuery } from './dto/travel-agent-request.dto';
import { ModelInvocationError, describeError } from './errors/travel-agent.errors';
import { ILlmClient, ModelRequest, ModelResponse } from './llm/llm-client.interface';
import { TRAVEL_AGENT_TOOLS } from './tools/travel-tools';
import {
  TRAVEL_AGENT_SYSTEM_PROMPT,
  renderTravelAgentPrompt,
} from './travel-agent-system-prompt';

const LLM_OPTS = { temperature: 0.3, maxTokens: 1024 };

@Injectable()
export class TravelAgentService {
  private readonly logger = new Logger(TravelAgentService.name);

  constructor(@Inject('ILlmClient') private readonly llmClient: ILlmClient) {}

  /** One model invocation per query; failures are not retried. */
  async run(query: TravelQuery): Promise<string> {
    const request: ModelRequest = {
      system: TRAVEL_AGENT_SYSTEM_PROMPT,
      prompt: renderTravelAgentPrompt(query),
      tools: TRAVEL_AGENT_TOOLS,
      options: LLM_OPTS,
    };

    let response: ModelResponse;
    try {
      response = await this.llmClient.generate(request);
    } catch (error) {
      if (error instanceof ModelInvocationError) {
        throw error;
      }
      throw new ModelInvocationError(describeError(error));
    }

    this.logger.log(
      `Model answered after ${response.toolCalls.length} tool call(s)` +
        (response.toolCalls.length ? `: ${response.toolCalls.map((c) => c.name).join(', ')}` : ''),
    );
    return response.text;
  }
}
