import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { ModelInvocationError, describeError } from '../errors/travel-agent.errors';
import { invokeTool } from '../tools/tool.types';
import type { ToolCallRecord, ToolInputSchema, ToolRegistry } from '../tools/tool.types';
import { ILlmClient, MAX_TOOL_TURNS, ModelRequest, ModelResponse } from './llm-client.interface';

interface GeminiFunctionCall {
  name: string;
  args?: Record<string, unknown>;
}

interface GeminiPart {
  text?: string;
  functionCall?: GeminiFunctionCall;
  functionResponse?: { name: string; response: { output: string } };
}

interface GeminiContent {
  role: 'user' | 'model';
  parts: GeminiPart[];
}

interface GeminiFunctionDeclaration {
  name: string;
  description: string;
  parameters: ToolInputSchema;
}

interface GeminiCandidate {
  content?: Partial<GeminiContent>;
  finishReason?: string;
}

interface GeminiGenerateResponse {
  candidates?: GeminiCandidate[];
  promptFeedback?: { blockReason?: string };
}

function toFunctionDeclarations(tools: ToolRegistry): GeminiFunctionDeclaration[] {
  return [...tools.values()].map((tool) => ({
    name: tool.name,
    description: tool.description,
    parameters: tool.inputSchema,
  }));
}

@Injectable()
export class GeminiLlmClient implements ILlmClient {
  private readonly logger = new Logger(GeminiLlmClient.name);
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;

  constructor(
    private readonly http: HttpService,
    private readonly config: ConfigService,
  ) {
    this.apiKey =
      this.config.get<string>('GEMINI_API_KEY') ??
      this.config.get<string>('GOOGLE_API_KEY') ??
      '';
    this.model = this.config.get<string>('GEMINI_MODEL') ?? 'gemini-2.5-flash';
    this.baseUrl =
      this.config.get<string>('GEMINI_BASE_URL') ??
      'https://generativelanguage.googleapis.com/v1beta/models';

    if (!this.apiKey) {
      this.logger.warn(
        'GEMINI_API_KEY is not set. Gemini calls will fail until it is configured.',
      );
    }
  }

  async generate(request: ModelRequest): Promise<ModelResponse> {
    if (!this.apiKey) {
      throw new ModelInvocationError('Gemini is not configured (missing GEMINI_API_KEY).');
    }

    const contents: GeminiContent[] = [{ role: 'user', parts: [{ text: request.prompt }] }];
    const toolCalls: ToolCallRecord[] = [];
    let turns = 0;

    for (;;) {
      const candidate = await this.generateContent(request, contents);
      const parts = candidate.content?.parts ?? [];
      const calls = parts.flatMap((p) => (p.functionCall ? [p.functionCall] : []));

      if (calls.length === 0) {
        const text = parts
          .map((p) => p.text ?? '')
          .join('')
          .trim();
        if (!text) {
          const reason = candidate.finishReason ? ` (${candidate.finishReason})` : '';
          this.logger.warn(`Empty response from Gemini${reason}`);
          throw new ModelInvocationError(`Gemini returned an empty response${reason}.`);
        }
        return { text, toolCalls };
      }

      if (turns >= MAX_TOOL_TURNS) {
        throw new ModelInvocationError(
          `Gemini exceeded the maximum of ${MAX_TOOL_TURNS} tool-call turns.`,
        );
      }
      turns++;

      contents.push({ role: 'model', parts });
      const responses: GeminiPart[] = calls.map((call) => {
        const record = invokeTool(request.tools, call.name, call.args ?? {});
        toolCalls.push(record);
        return { functionResponse: { name: call.name, response: { output: record.output } } };
      });
      contents.push({ role: 'user', parts: responses });
    }
  }

  private async generateContent(
    request: ModelRequest,
    contents: GeminiContent[],
  ): Promise<GeminiCandidate> {
    const body = {
      systemInstruction: { parts: [{ text: request.system }] },
      contents: [...contents],
      tools: [{ functionDeclarations: toFunctionDeclarations(request.tools) }],
      generationConfig: {
        temperature: request.options?.temperature ?? 0.3,
        maxOutputTokens: request.options?.maxTokens ?? 1024,
      },
    };

    const url = `${this.baseUrl}/${this.model}:generateContent?key=${this.apiKey}`;

    let data: GeminiGenerateResponse;
    try {
      const response = await firstValueFrom(
        this.http.post<GeminiGenerateResponse>(url, body, {
          headers: {
            'Content-Type': 'application/json',
          },
        }),
      );
      data = response.data;
    } catch (error) {
      this.logger.error('Error calling Gemini', error instanceof Error ? error.stack : undefined);
      throw new ModelInvocationError(`Gemini request failed: ${describeError(error)}`);
    }

    const blockReason = data.promptFeedback?.blockReason;
    if (blockReason) {
      throw new ModelInvocationError(`Gemini blocked the prompt: ${blockReason}`);
    }
    const candidate = data.candidates?.[0];
    if (!candidate) {
      throw new ModelInvocationError('Gemini returned no candidates.');
    }
    return candidate;
  }
}
