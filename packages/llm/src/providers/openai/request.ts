import type { ChatMessage, ChatRequest } from '../../types/index.js';

export type BodyOptions = {
  readonly streaming: boolean;
  /** Azure names the model through the deployment URL instead. */
  readonly includeModel: boolean;
};

function translateMessage(message: ChatMessage): Record<string, unknown> {
  const wire: Record<string, unknown> = {
    role: message.role,
    content: message.content,
  };
  if (message.name !== undefined) {
    wire['name'] = message.name;
  }
  return wire;
}

/**
 * Builds the Chat Completions JSON body. Options are copied through untouched;
 * `model`, `messages` and `stream` are always set by the request itself.
 */
export function translateRequest(
  request: Readonly<ChatRequest>,
  { streaming, includeModel }: BodyOptions,
): Record<string, unknown> {
  const body: Record<string, unknown> = { ...request.options };

  if (includeModel) {
    body['model'] = request.model;
  } else {
    delete body['model'];
  }
  body['messages'] = request.messages.map(translateMessage);

  if (request.functions && request.functions.length > 0) {
    body['functions'] = request.functions.map((fn) => ({
      name: fn.name,
      ...(fn.description !== undefined && { description: fn.description }),
      parameters: fn.parameters,
    }));
    if (body['function_call'] === undefined) {
      body['function_call'] = 'auto';
    }
  }

  body['stream'] = streaming;

  return body;
}
