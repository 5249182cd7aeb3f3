import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OpenAIChatTransport, translateRequest, translateResponse, translateStream } from './index.js';
import { AzureChatTransport } from '../azure/index.js';
import type { ChatCompletionChunk, ChatRequest } from '../../types/index.js';
import { SchemaMismatchError } from '../../types/index.js';
import type { SSEEvent } from '../../utils/sse.js';

const completionBody = {
  id: 'chatcmpl-123',
  object: 'chat.completion',
  created: 1700000000,
  model: 'gpt-3.5-turbo',
  choices: [
    { index: 0, message: { role: 'assistant', content: 'hi' }, finish_reason: 'stop' },
    { index: 1, message: { role: 'assistant', content: 'yo' }, finish_reason: 'length' },
  ],
  usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
};

const baseRequest: ChatRequest = {
  model: 'gpt-3.5-turbo',
  messages: [
    { role: 'system', content: 'Be brief.' },
    { role: 'user', content: 'hello' },
  ],
  options: { max_tokens: 50 },
};

function sseResponse(frames: string[]): globalThis.Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const frame of frames) {
        controller.enqueue(encoder.encode(`data: ${frame}\n\n`));
      }
      controller.close();
    },
  });
  return new Response(body, { status: 200, headers: { 'Content-Type': 'text/event-stream' } });
}

function chunkFrame(content: string | null, finishReason: string | null = null): string {
  return JSON.stringify({
    id: 'chatcmpl-123',
    object: 'chat.completion.chunk',
    created: 1700000000,
    model: 'gpt-3.5-turbo',
    choices: [{ index: 0, delta: content === null ? {} : { content }, finish_reason: finishReason }],
  });
}

async function collect(iterable: AsyncIterable<ChatCompletionChunk>): Promise<ChatCompletionChunk[]> {
  const chunks: ChatCompletionChunk[] = [];
  for await (const chunk of iterable) {
    chunks.push(chunk);
  }
  return chunks;
}

function lastFetchInit(): RequestInit | undefined {
  return vi.mocked(globalThis.fetch).mock.calls[0]?.[1];
}

function lastFetchBody(): unknown {
  const body = lastFetchInit()?.body;
  expect(typeof body).toBe('string');
  return JSON.parse(String(body));
}

describe('translateRequest', () => {
  it('puts model, messages and stream next to the options', () => {
    const body = translateRequest(baseRequest, { streaming: false, includeModel: true });

    expect(body).toEqual({
      max_tokens: 50,
      model: 'gpt-3.5-turbo',
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'hello' },
      ],
      stream: false,
    });
  });

  it('passes unknown options through untouched', () => {
    const body = translateRequest(
      { ...baseRequest, options: { logprobs: true, response_format: { type: 'json_object' } } },
      { streaming: true, includeModel: true },
    );

    expect(body['logprobs']).toBe(true);
    expect(body['response_format']).toEqual({ type: 'json_object' });
    expect(body['stream']).toBe(true);
  });

  it('adds functions with function_call auto', () => {
    const body = translateRequest(
      {
        ...baseRequest,
        functions: [{ name: 'get_weather', parameters: { type: 'object', properties: {} } }],
      },
      { streaming: false, includeModel: true },
    );

    expect(body['functions']).toEqual([{ name: 'get_weather', parameters: { type: 'object', properties: {} } }]);
    expect(body['function_call']).toBe('auto');
  });

  it('keeps an explicit function_call option', () => {
    const body = translateRequest(
      {
        ...baseRequest,
        options: { function_call: { name: 'get_weather' } },
        functions: [{ name: 'get_weather', description: 'Weather lookup', parameters: {} }],
      },
      { streaming: false, includeModel: true },
    );

    expect(body['function_call']).toEqual({ name: 'get_weather' });
  });

  it('omits the model when the endpoint selects it', () => {
    const body = translateRequest(
      { ...baseRequest, options: { model: 'ignored' } },
      { streaming: false, includeModel: false },
    );

    expect('model' in body).toBe(false);
  });
});

describe('translateResponse', () => {
  it('flattens choices and usage', () => {
    const completion = translateResponse(completionBody);

    expect(completion.id).toBe('chatcmpl-123');
    expect(completion.choices).toEqual([
      { index: 0, role: 'assistant', content: 'hi', finishReason: 'stop', functionCall: null },
      { index: 1, role: 'assistant', content: 'yo', finishReason: 'length', functionCall: null },
    ]);
    expect(completion.usage).toEqual({ promptTokens: 10, completionTokens: 5, totalTokens: 15 });
  });

  it('reads function calls and null content', () => {
    const completion = translateResponse({
      ...completionBody,
      choices: [
        {
          index: 0,
          message: {
            role: 'assistant',
            content: null,
            function_call: { name: 'get_weather', arguments: '{"city":"Oslo"}' },
          },
          finish_reason: 'function_call',
        },
      ],
    });

    expect(completion.choices[0]).toEqual({
      index: 0,
      role: 'assistant',
      content: '',
      finishReason: 'function_call',
      functionCall: { name: 'get_weather', arguments: '{"city":"Oslo"}' },
    });
  });

  it('throws SchemaMismatchError when choices are missing', () => {
    expect(() => translateResponse({ id: 'x' })).toThrow(SchemaMismatchError);
  });
});

describe('translateStream', () => {
  async function* events(frames: string[]): AsyncGenerator<SSEEvent> {
    for (const data of frames) {
      yield { event: '', data };
    }
  }

  it('yields one chunk per frame and stops at [DONE]', async () => {
    const chunks = await collect(
      translateStream(events([chunkFrame('Hel'), chunkFrame('lo'), chunkFrame(null, 'stop'), '[DONE]', chunkFrame('late')])),
    );

    expect(chunks.map((chunk) => chunk.choices[0]?.delta.content)).toEqual(['Hel', 'lo', null]);
    expect(chunks[2]?.choices[0]?.finishReason).toBe('stop');
  });

  it('throws SchemaMismatchError on a frame that is not JSON', async () => {
    await expect(collect(translateStream(events(['{broken'])))).rejects.toThrow(SchemaMismatchError);
  });
});

describe('OpenAIChatTransport', () => {
  beforeEach(() => {
    vi.stubGlobal('fetch', vi.fn());
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts to the chat completions endpoint with a bearer token', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValue(new Response(JSON.stringify(completionBody)));
    const transport = new OpenAIChatTransport('test-key');

    const completion = await transport.complete(baseRequest);

    expect(vi.mocked(globalThis.fetch).mock.calls[0]?.[0]).toBe('https://api.openai.com/v1/chat/completions');
    expect(lastFetchInit()?.method).toBe('POST');
    expect(lastFetchInit()?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-key',
    });
    expect(lastFetchBody()).toEqual({
      max_tokens: 50,
      model: 'gpt-3.5-turbo',
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'hello' },
      ],
      stream: false,
    });
    expect(completion.choices.map((choice) => choice.content)).toEqual(['hi', 'yo']);
  });

  it('uses a custom base URL without doubling slashes', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValue(new Response(JSON.stringify(completionBody)));
    const transport = new OpenAIChatTransport('test-key', { baseUrl: 'http://localhost:8080/v1/' });

    await transport.complete(baseRequest);

    expect(vi.mocked(globalThis.fetch).mock.calls[0]?.[0]).toBe('http://localhost:8080/v1/chat/completions');
  });

  it('streams chunks from server-sent events', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValue(
      sseResponse([chunkFrame('Hel'), chunkFrame('lo'), chunkFrame(null, 'stop'), '[DONE]']),
    );
    const transport = new OpenAIChatTransport('test-key');

    const chunks = await collect(transport.stream(baseRequest));

    expect(chunks).toHaveLength(3);
    expect(chunks.map((chunk) => chunk.choices[0]?.delta.content)).toEqual(['Hel', 'lo', null]);
    expect(lastFetchBody()).toMatchObject({ stream: true });
  });
});

describe('AzureChatTransport', () => {
  beforeEach(() => {
    vi.stubGlobal('fetch', vi.fn());
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('targets the deployment URL with an api-key header and no model', async () => {
    vi.mocked(globalThis.fetch).mockResolvedValue(new Response(JSON.stringify(completionBody)));
    const transport = new AzureChatTransport('test-key', {
      baseUrl: 'https://example-resource.openai.azure.com/',
      deploymentId: 'chat-deploy',
      apiVersion: '2024-02-01',
    });

    await transport.complete(baseRequest);

    expect(vi.mocked(globalThis.fetch).mock.calls[0]?.[0]).toBe(
      'https://example-resource.openai.azure.com/openai/deployments/chat-deploy/chat/completions?api-version=2024-02-01',
    );
    expect(lastFetchInit()?.headers).toEqual({
      'Content-Type': 'application/json',
      'api-key': 'test-key',
    });
    expect(lastFetchBody()).not.toHaveProperty('model');
    expect(transport.name).toBe('azure');
  });
});
