import { Oracle, OracleMessage } from './Oracle';
import { RetryPolicy, Sleep, realSleep } from './RetryPolicy';
import { ReplyValidator } from './jsonReply';
import { Redactor } from '../evidence/Redactor';
import { Logger, silentLogger } from '../logging/Logger';
import { OracleCallError, ProviderFatalError, ProviderTransientError } from '../errors';

export interface ReasoningClientOptions {
  temperature: number;
  maxTokens: number;
  redactor?: Redactor;
  logger?: Logger;
  sleep?: Sleep;
}

export interface AskOptions {
  temperature?: number;
  maxTokens?: number;
}

/**
 * The only way engine components reach the oracle. Redacts every outbound
 * message, then runs the backoff loop over the oracle's typed outcomes.
 */
export class ReasoningClient {
  private logger: Logger;
  private sleep: Sleep;
  private calls = 0;

  constructor(private oracle: Oracle, private policy: RetryPolicy, private options: ReasoningClientOptions) {
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? realSleep;
  }

  /** Number of completed `ask` calls, successful or not. */
  get callCount(): number {
    return this.calls;
  }

  async ask(messages: OracleMessage[], options: AskOptions = {}): Promise<string> {
    const redactor = this.options.redactor;
    const outbound = redactor
      ? messages.map(m => ({ ...m, content: redactor.redact(m.content).redacted }))
      : messages;
    const temperature = options.temperature ?? this.options.temperature;
    const maxTokens = options.maxTokens ?? this.options.maxTokens;

    this.calls++;
    for (let attempt = 0; ; attempt++) {
      const outcome = await this.oracle.complete(outbound, temperature, maxTokens);

      if (outcome.kind === 'ok') {
        return outcome.text;
      }
      if (outcome.kind === 'failed') {
        if (outcome.fatal) {
          throw new ProviderFatalError(outcome.error);
        }
        throw new OracleCallError(outcome.error);
      }

      if (!this.policy.shouldRetry(attempt)) {
        throw new ProviderTransientError(
          `Oracle still unavailable after ${attempt + 1} attempt(s): ${outcome.error}`,
          attempt + 1
        );
      }
      const delaySeconds = this.policy.computeBackoff(attempt);
      this.logger.warn(`Oracle rate limited, retrying in ${delaySeconds}s (attempt ${attempt + 1}/${this.policy.maxAttempts})`);
      await this.sleep(delaySeconds * 1000);
    }
  }

  async askJson<T>(messages: OracleMessage[], validator: ReplyValidator<T>, options: AskOptions = {}): Promise<T> {
    return validator.parse(await this.ask(messages, options));
  }
}
