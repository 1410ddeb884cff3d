/**
 * Tool catalog handed to the model. The provider decides which tools to call,
 * how often and in what order; this side only describes them and runs the
 * calls it is asked to run.
 */
import { ModelInvocationError, describeError } from '../errors/travel-agent.errors';

export interface StringPropertySchema {
  type: 'string';
  description: string;
}

/** JSON-schema subset understood by both the Gemini and OpenAI tool APIs. */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, StringPropertySchema>;
  required: string[];
}

export interface ToolOutputSchema {
  type: 'string';
}

export type ToolArgs = Record<string, unknown>;

export interface InvocableTool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  readonly outputSchema: ToolOutputSchema;
  invoke(args: unknown): string;
}

export type ToolRegistry = ReadonlyMap<string, InvocableTool>;

export interface ToolDefinition<TInput> {
  name: string;
  description: string;
  /** Property name to description; every property is a required string. */
  input: Record<string, string>;
  parseInput(args: ToolArgs): TInput;
  run(input: TInput): string;
}

/** One executed tool call, as reported back by a model client. */
export interface ToolCallRecord {
  name: string;
  input: unknown;
  output: string;
}

export class ToolInputError extends Error {}

export function isToolArgs(value: unknown): value is ToolArgs {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function requireString(args: ToolArgs, key: string): string {
  const value = args[key];
  if (typeof value !== 'string') {
    throw new ToolInputError(`argument "${key}" must be a string`);
  }
  return value;
}

export function defineTool<TInput>(definition: ToolDefinition<TInput>): InvocableTool {
  const properties: Record<string, StringPropertySchema> = {};
  for (const [key, description] of Object.entries(definition.input)) {
    properties[key] = { type: 'string', description };
  }

  const tool: InvocableTool = {
    name: definition.name,
    description: definition.description,
    inputSchema: { type: 'object', properties, required: Object.keys(properties) },
    outputSchema: { type: 'string' },
    invoke(args: unknown): string {
      if (!isToolArgs(args)) {
        throw new ToolInputError('arguments must be a JSON object');
      }
      return definition.run(definition.parseInput(args));
    },
  };
  return Object.freeze(tool);
}

export function createToolRegistry(tools: InvocableTool[]): ToolRegistry {
  return new Map(tools.map((tool) => [tool.name, tool]));
}

/**
 * Runs a call requested by the model. Unknown tools and arguments that do not
 * match the declared schema fail the whole invocation.
 */
export function invokeTool(registry: ToolRegistry, name: string, args: unknown): ToolCallRecord {
  const tool = registry.get(name);
  if (!tool) {
    throw new ModelInvocationError(`Model requested unknown tool "${name}".`);
  }
  try {
    return { name, input: args, output: tool.invoke(args) };
  } catch (error) {
    throw new ModelInvocationError(`Tool "${name}" failed: ${describeError(error)}`);
  }
}
