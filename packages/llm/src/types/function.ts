export type FunctionDefinition = {
  readonly name: string;
  readonly description?: string;
  readonly parameters: Record<string, unknown>;
};

export type FunctionCall = {
  readonly name: string;
  /** JSON-encoded arguments, exactly as the model produced them. */
  readonly arguments: string;
};
