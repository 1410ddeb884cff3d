import type { ToolCallRecord, ToolRegistry } from '../tools/tool.types';

/** Clients give up once the model keeps asking for tools after this many rounds. */
export const MAX_TOOL_TURNS = 5;

export interface LlmOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface ModelRequest {
  system: string;
  prompt: string;
  tools: ToolRegistry;
  options?: LlmOptions;
}

export interface ModelResponse {
  text: string;
  toolCalls: ToolCallRecord[];
}

/**
 * A hosted model that may call back into `request.tools` any number of times
 * before answering. Failures are reported as `ModelInvocationError`.
 */
export interface ILlmClient {
  generate(request: ModelRequest): Promise<ModelResponse>;
}
