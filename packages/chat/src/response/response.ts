import {
  EmptyResponseError,
  type ChatCompletion,
  type ChatCompletionChunk,
  type Choice,
  type ChunkChoice,
  type Usage,
} from '@tipchat/llm';

/** A finished completion with shortcuts to its text. */
export class ChatResponse {
  readonly id: string;
  readonly object: string;
  readonly created: number;
  readonly model: string;
  readonly choices: ReadonlyArray<Choice>;
  readonly usage: Usage | null;

  constructor(completion: ChatCompletion) {
    this.id = completion.id;
    this.object = completion.object;
    this.created = completion.created;
    this.model = completion.model;
    this.choices = completion.choices;
    this.usage = completion.usage;
  }

  get firstChoice(): Choice {
    const choice = this.choices[0];
    if (choice === undefined) {
      throw new EmptyResponseError();
    }
    return choice;
  }

  /** Text of the first choice. */
  get first(): string {
    return this.firstChoice.content;
  }

  get contents(): string[] {
    return this.choices.map((choice) => choice.content);
  }

  toJSON(): ChatCompletion {
    return {
      id: this.id,
      object: this.object,
      created: this.created,
      model: this.model,
      choices: this.choices,
      usage: this.usage,
    };
  }
}

/** One streamed fragment. */
export class ChatResponseChunk {
  readonly id: string;
  readonly object: string;
  readonly created: number;
  readonly model: string;
  readonly choices: ReadonlyArray<ChunkChoice>;

  constructor(chunk: ChatCompletionChunk) {
    this.id = chunk.id;
    this.object = chunk.object;
    this.created = chunk.created;
    this.model = chunk.model;
    this.choices = chunk.choices;
  }

  get firstChoice(): ChunkChoice {
    const choice = this.choices[0];
    if (choice === undefined) {
      throw new EmptyResponseError('Chunk has no choices');
    }
    return choice;
  }

  /**
   * Text fragment of the first choice, or null for chunks that carry none
   * (role announcements, the final chunk, or chunks without choices).
   */
  get first(): string | null {
    return this.choices[0]?.delta.content ?? null;
  }

  get contents(): string[] {
    return this.choices.map((choice) => choice.delta.content ?? '');
  }

  toJSON(): ChatCompletionChunk {
    return {
      id: this.id,
      object: this.object,
      created: this.created,
      model: this.model,
      choices: this.choices,
    };
  }
}
