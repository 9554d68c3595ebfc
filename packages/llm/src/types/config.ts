export type JsonSchema = Readonly<Record<string, unknown>>;

export type RetryPolicy = {
  readonly maxRetries: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffMultiplier: number;
};

export type ResponseFormat = {
  readonly type: 'text' | 'json_schema';
  readonly schema?: JsonSchema;
  readonly name?: string;
};
