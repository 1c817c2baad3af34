import OpenAI from 'openai';
import { EmbeddingsProvider, Oracle, OracleMessage, OracleOutcome } from './Oracle';
import { ProviderFatalError, describeError } from '../errors';

/** Maps an HTTP status from the provider onto the oracle outcome taxonomy. */
export function classifyProviderStatus(status: number | undefined, message: string): OracleOutcome {
  if (status === 429 || status === 408 || status === undefined) {
    // No status means the request never got an answer (connection reset, timeout)
    return { kind: 'rate-limited', error: message };
  }
  if (status === 401 || status === 403 || status === 404) {
    return { kind: 'failed', error: message, fatal: true };
  }
  if (status >= 500) {
    return { kind: 'rate-limited', error: message };
  }
  return { kind: 'failed', error: message, fatal: false };
}

function toChatMessage(m: OracleMessage) {
  switch (m.role) {
    case 'system': return { role: 'system' as const, content: m.content };
    case 'user': return { role: 'user' as const, content: m.content };
    case 'assistant': return { role: 'assistant' as const, content: m.content };
  }
}

export class OpenAIOracle implements Oracle {
  private client: OpenAI;

  constructor(apiKey: string | undefined, private model: string) {
    if (!apiKey) {
      throw new ProviderFatalError('OPENAI_API_KEY is not set. Run `dump-investigator setup` to create a .env template.');
    }
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
  }

  async complete(messages: OracleMessage[], temperature: number, maxTokens: number): Promise<OracleOutcome> {
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: messages.map(toChatMessage),
        temperature,
        max_tokens: maxTokens
      });
      const text = completion.choices[0]?.message.content ?? '';
      return { kind: 'ok', text };
    } catch (error) {
      if (error instanceof OpenAI.APIError) {
        return classifyProviderStatus(error.status, error.message);
      }
      return { kind: 'failed', error: describeError(error), fatal: false };
    }
  }
}

export class OpenAIEmbeddings implements EmbeddingsProvider {
  private client: OpenAI;

  constructor(apiKey: string | undefined, private model: string) {
    if (!apiKey) {
      throw new ProviderFatalError('OPENAI_API_KEY is not set; embeddings are unavailable.');
    }
    this.client = new OpenAI({ apiKey, maxRetries: 2 });
  }

  async embed(texts: string[]): Promise<number[][]> {
    const response = await this.client.embeddings.create({ model: this.model, input: texts });
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map(d => d.embedding);
  }
}
