export type Role = 'system' | 'user' | 'assistant' | 'function';

export type ChatMessage = {
  readonly role: Role;
  readonly content: string;
  /** Function name, for `function` role messages. */
  readonly name?: string;
};

export function systemMessage(text: string): ChatMessage {
  return {
    role: 'system',
    content: text,
  };
}

export function userMessage(content: string): ChatMessage {
  return {
    role: 'user',
    content,
  };
}

export function assistantMessage(content: string): ChatMessage {
  return {
    role: 'assistant',
    content,
  };
}

export function functionMessage(name: string, content: string): ChatMessage {
  return {
    role: 'function',
    name,
    content,
  };
}
