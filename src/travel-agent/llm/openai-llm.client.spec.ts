import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { of } from 'rxjs';
import { TRAVEL_AGENT_TOOLS } from '../tools/travel-tools';
import { ModelRequest } from './llm-client.interface';
import { OpenAiLlmClient } from './openai-llm.client';

const HOTEL_OUTPUT = 'The Park Hyatt is a great choice with stunning city views.';

function completion(message: Record<string, unknown>) {
  return of({ data: { choices: [{ message }] } });
}

function hotelCall(args: string) {
  return {
    id: 'call_1',
    type: 'function',
    function: { name: 'suggestHotel', arguments: args },
  };
}

describe('OpenAiLlmClient', () => {
  const post = jest.fn();
  const request: ModelRequest = {
    system: 'You are a travel agent.',
    prompt: "The user's request is: Where should I stay in Tokyo?",
    tools: TRAVEL_AGENT_TOOLS,
    options: { temperature: 0.3, maxTokens: 1024 },
  };

  async function createClient(env: Record<string, string | undefined>): Promise<OpenAiLlmClient> {
    const moduleRef = await Test.createTestingModule({
      providers: [
        OpenAiLlmClient,
        { provide: HttpService, useValue: { post } },
        { provide: ConfigService, useValue: { get: (key: string) => env[key] } },
      ],
    }).compile();
    return moduleRef.get(OpenAiLlmClient);
  }

  beforeEach(() => {
    post.mockReset();
  });

  it('runs tool calls and feeds the results back', async () => {
    post
      .mockReturnValueOnce(completion({ content: null, tool_calls: [hotelCall('{"destination":"Tokyo"}')] }))
      .mockReturnValueOnce(completion({ content: 'Try the Park Hyatt. ' }));
    const client = await createClient({ OPENAI_API_KEY: 'test-key' });

    await expect(client.generate(request)).resolves.toEqual({
      text: 'Try the Park Hyatt.',
      toolCalls: [{ name: 'suggestHotel', input: { destination: 'Tokyo' }, output: HOTEL_OUTPUT }],
    });

    const [url, firstBody, config] = post.mock.calls[0];
    expect(url).toBe('https://api.openai.com/v1/chat/completions');
    expect(config.headers.Authorization).toBe('Bearer test-key');
    expect(firstBody.model).toBe('gpt-4o');
    expect(firstBody.max_tokens).toBe(1024);
    expect(firstBody.messages).toEqual([
      { role: 'system', content: 'You are a travel agent.' },
      { role: 'user', content: "The user's request is: Where should I stay in Tokyo?" },
    ]);
    expect(firstBody.tools[1]).toEqual({
      type: 'function',
      function: {
        name: 'suggestHotel',
        description: 'Suggests a popular and well-rated hotel in a given destination.',
        parameters: {
          type: 'object',
          properties: { destination: { type: 'string', description: 'Destination city' } },
          required: ['destination'],
        },
      },
    });

    const secondMessages = post.mock.calls[1][1].messages;
    expect(secondMessages).toHaveLength(4);
    expect(secondMessages[3]).toEqual({ role: 'tool', tool_call_id: 'call_1', content: HOTEL_OUTPUT });
  });

  it('fails without an API key', async () => {
    const client = await createClient({});

    await expect(client.generate(request)).rejects.toThrow(
      'LLM is not configured (missing OPENAI_API_KEY).',
    );
  });

  it('rejects malformed tool arguments', async () => {
    post.mockReturnValueOnce(completion({ content: null, tool_calls: [hotelCall('{bad')] }));
    const client = await createClient({ OPENAI_API_KEY: 'test-key' });

    await expect(client.generate(request)).rejects.toThrow(
      /^OpenAI sent malformed arguments for tool "suggestHotel": /,
    );
  });

  it('rejects arguments missing a required field', async () => {
    post.mockReturnValueOnce(completion({ content: null, tool_calls: [hotelCall('{}')] }));
    const client = await createClient({ OPENAI_API_KEY: 'test-key' });

    await expect(client.generate(request)).rejects.toThrow(
      'Tool "suggestHotel" failed: argument "destination" must be a string',
    );
  });

  it('rejects empty answers', async () => {
    post.mockReturnValueOnce(completion({ content: '   ' }));
    const client = await createClient({ OPENAI_API_KEY: 'test-key' });

    await expect(client.generate(request)).rejects.toThrow('LLM returned an empty response.');
  });

  it('names the finish reason of an empty answer', async () => {
    post.mockReturnValueOnce(
      of({ data: { choices: [{ message: { content: null }, finish_reason: 'length' }] } }),
    );
    const client = await createClient({ OPENAI_API_KEY: 'test-key' });

    await expect(client.generate(request)).rejects.toThrow(
      'LLM returned an empty response (length).',
    );
  });

  it('rejects a response without choices', async () => {
    post.mockReturnValueOnce(of({ data: { choices: [] } }));
    const client = await createClient({ OPENAI_API_KEY: 'test-key', OPENAI_MODEL: 'gpt-test' });

    await expect(client.generate(request)).rejects.toThrow('OpenAI returned no choices.');
    expect(post.mock.calls[0][1].model).toBe('gpt-test');
  });
});
