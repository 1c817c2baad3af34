export interface OracleMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Result of one oracle call. Rate limits are kept apart from other failures
 * so the retry loop can decide without catching anything.
 */
export type OracleOutcome =
  | { kind: 'ok'; text: string }
  | { kind: 'rate-limited'; error: string }
  | { kind: 'failed'; error: string; fatal: boolean };

export interface Oracle {
  complete(messages: OracleMessage[], temperature: number, maxTokens: number): Promise<OracleOutcome>;
}

export interface EmbeddingsProvider {
  embed(texts: string[]): Promise<number[][]>;
}
