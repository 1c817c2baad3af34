import { RetryPolicySettings } from '../config/EngineConfig';

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export class RetryPolicy {
  constructor(private settings: RetryPolicySettings) {}

  get maxAttempts(): number {
    return this.settings.maxAttempts;
  }

  /** Wait before retrying after the given zero-based attempt, in seconds. */
  computeBackoff(attempt: number): number {
    return this.settings.baseDelaySeconds * Math.pow(this.settings.multiplier, attempt);
  }

  shouldRetry(attempt: number): boolean {
    return attempt + 1 < this.settings.maxAttempts;
  }
}
