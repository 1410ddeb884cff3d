import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { ModelInvocationError, describeError } from '../errors/travel-agent.errors';
import { invokeTool } from '../tools/tool.types';
import type { ToolCallRecord, ToolInputSchema, ToolRegistry } from '../tools/tool.types';
import { ILlmClient, MAX_TOOL_TURNS, ModelRequest, ModelResponse } from './llm-client.interface';

interface OpenAiToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

type OpenAiChatMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: string | null; tool_calls?: OpenAiToolCall[] }
  | { role: 'tool'; tool_call_id: string; content: string };

interface OpenAiTool {
  type: 'function';
  function: { name: string; description: string; parameters: ToolInputSchema };
}

interface OpenAiChoice {
  message?: { content?: string | null; tool_calls?: OpenAiToolCall[] };
  finish_reason?: string;
}

interface OpenAiChatCompletion {
  choices?: OpenAiChoice[];
}

function toOpenAiTools(tools: ToolRegistry): OpenAiTool[] {
  return [...tools.values()].map((tool) => ({
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.inputSchema,
    },
  }));
}

function parseArguments(call: OpenAiToolCall): unknown {
  try {
    return JSON.parse(call.function.arguments || '{}');
  } catch (error) {
    throw new ModelInvocationError(
      `OpenAI sent malformed arguments for tool "${call.function.name}": ${describeError(error)}`,
    );
  }
}

@Injectable()
export class OpenAiLlmClient implements ILlmClient {
  private readonly logger = new Logger(OpenAiLlmClient.name);
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;

  constructor(
    private readonly http: HttpService,
    private readonly config: ConfigService,
  ) {
    this.apiKey = this.config.get<string>('OPENAI_API_KEY') ?? '';
    this.model = this.config.get<string>('OPENAI_MODEL') ?? 'gpt-4o';
    this.baseUrl = this.config.get<string>('OPENAI_BASE_URL') ?? 'https://api.openai.com/v1';

    if (!this.apiKey) {
      this.logger.warn(
        'OPENAI_API_KEY is not set. LLM calls will fail until it is configured.',
      );
    }
  }

  async generate(request: ModelRequest): Promise<ModelResponse> {
    if (!this.apiKey) {
      throw new ModelInvocationError('LLM is not configured (missing OPENAI_API_KEY).');
    }

    const messages: OpenAiChatMessage[] = [
      { role: 'system', content: request.system },
      { role: 'user', content: request.prompt },
    ];
    const toolCalls: ToolCallRecord[] = [];
    let turns = 0;

    for (;;) {
      const choice = await this.complete(request, messages);
      const message = choice.message ?? {};
      const calls = message.tool_calls ?? [];

      if (calls.length === 0) {
        const text = message.content?.trim() ?? '';
        if (!text) {
          const reason = choice.finish_reason ? ` (${choice.finish_reason})` : '';
          this.logger.warn(`Empty response from OpenAI${reason}`);
          throw new ModelInvocationError(`LLM returned an empty response${reason}.`);
        }
        return { text, toolCalls };
      }

      if (turns >= MAX_TOOL_TURNS) {
        throw new ModelInvocationError(
          `OpenAI exceeded the maximum of ${MAX_TOOL_TURNS} tool-call turns.`,
        );
      }
      turns++;

      messages.push({ role: 'assistant', content: message.content ?? null, tool_calls: calls });
      for (const call of calls) {
        const record = invokeTool(request.tools, call.function.name, parseArguments(call));
        toolCalls.push(record);
        messages.push({ role: 'tool', tool_call_id: call.id, content: record.output });
      }
    }
  }

  private async complete(
    request: ModelRequest,
    messages: OpenAiChatMessage[],
  ): Promise<OpenAiChoice> {
    let data: OpenAiChatCompletion;
    try {
      const response = await firstValueFrom(
        this.http.post<OpenAiChatCompletion>(
          `${this.baseUrl}/chat/completions`,
          {
            model: this.model,
            messages: [...messages],
            tools: toOpenAiTools(request.tools),
            temperature: request.options?.temperature ?? 0.3,
            max_tokens: request.options?.maxTokens,
          },
          {
            headers: {
              Authorization: `Bearer ${this.apiKey}`,
              'Content-Type': 'application/json',
            },
          },
        ),
      );
      data = response.data;
    } catch (error) {
      this.logger.error('Error calling OpenAI', error instanceof Error ? error.stack : undefined);
      throw new ModelInvocationError(`OpenAI request failed: ${describeError(error)}`);
    }

    const choice = data.choices?.[0];
    if (!choice?.message) {
      throw new ModelInvocationError('OpenAI returned no choices.');
    }
    return choice;
  }
}
