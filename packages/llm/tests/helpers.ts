import type {
  ChatCompletion,
  ChatCompletionChunk,
  ChatRequest,
  ChatTransport,
  Choice,
  RetryPolicy,
} from '../src/types/index.js';

export const FAST_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 0,
  maxDelayMs: 10,
  backoffMultiplier: 2,
  jitterRatio: 0,
  retryableKinds: ['timeout', 'rate_limited', 'connection', 'server'],
};

export function completion(...contents: string[]): ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'test-model',
    choices: contents.map((content, index): Choice => ({
      index,
      role: 'assistant',
      content,
      finishReason: 'stop',
      functionCall: null,
    })),
    usage: null,
  };
}

export function chunk(content: string): ChatCompletionChunk {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion.chunk',
    created: 0,
    model: 'test-model',
    choices: [{ index: 0, delta: { role: null, content, functionCall: null }, finishReason: null }],
  };
}

type StreamStep = ChatCompletionChunk | Error;

/**
 * In-memory transport. Each `complete` call consumes the next scripted
 * outcome; each `stream` call replays the next scripted list of steps,
 * throwing when a step is an Error.
 */
export class ScriptedTransport implements ChatTransport {
  readonly name = 'scripted';
  readonly requests: ChatRequest[] = [];
  streamOpens = 0;
  streamCloses = 0;
  private readonly completions: Array<ChatCompletion | Error>;
  private readonly streams: Array<ReadonlyArray<StreamStep>>;

  constructor(script: {
    readonly completions?: Array<ChatCompletion | Error>;
    readonly streams?: Array<ReadonlyArray<StreamStep>>;
  }) {
    this.completions = [...(script.completions ?? [])];
    this.streams = [...(script.streams ?? [])];
  }

  async complete(request: ChatRequest): Promise<ChatCompletion> {
    this.requests.push(request);
    const next = this.completions.shift();
    if (next === undefined) {
      throw new Error('ScriptedTransport: no completion left');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  async* stream(request: ChatRequest): AsyncGenerator<ChatCompletionChunk> {
    this.requests.push(request);
    this.streamOpens += 1;
    const steps = this.streams.shift() ?? [];
    try {
      for (const step of steps) {
        if (step instanceof Error) {
          throw step;
        }
        yield step;
      }
    } finally {
      this.streamCloses += 1;
    }
  }
}
