import { ReasoningClient } from '../llm/ReasoningClient';
import { Evidence } from '../types';
import { Logger, silentLogger } from '../logging/Logger';
import { InvestigationError, describeError } from '../errors';
import { DEFAULT_RULES, RewriteRule, RuleContext } from './rewriteRules';
import { knownThreads } from './placeholderResolver';

export interface HealRequest {
  command: string;
  error: string;
  attempt: number;
  context?: {
    recentEvidence?: Evidence[]; // oldest first
    dumpType?: string;
  };
}

export type HealOutcome =
  | { state: 'healed'; command: string; strategy: string }
  | { state: 'exhausted'; reason: string };

export interface HealingStats {
  successfulHeals: number;
  failedHeals: number;
  successRate: number;
}

const COMMAND_START = /^(!|~|dx\b|\.)/;

/** First line of a reply that looks like a debugger command, fences stripped. */
export function extractCommandLine(reply: string): string | null {
  const lines = reply
    .replace(/```\w*\n?/g, '')
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
  return lines.find(line => COMMAND_START.test(line)) ?? null;
}

/** Why an oracle fix must be refused, or null if it is acceptable. */
export function rejectFix(original: string, fixed: string): string | null {
  if (fixed === original.trim()) return 'fix is identical to the failing command';
  if (fixed.includes('-stat') && !original.includes('-stat')) return 'fix adds -stat, which changes the output type';
  if (original.includes('-short') && !fixed.includes('-short')) return 'fix drops -short, which changes the output format';
  return null;
}

function buildPrompt(request: HealRequest): string {
  const recent = (request.context?.recentEvidence ?? []).slice(-3);
  const history = recent.length > 0
    ? '\n\nRECENT COMMANDS:\n' + recent.map(e => `${e.command}: ${e.finding}`).join('\n')
    : '';

  return `A cdb/SOS command failed against a ${request.context?.dumpType ?? 'user-mode'} dump.

FAILED COMMAND: ${request.command}

ERROR OUTPUT:
${request.error.slice(0, 2000)}${history}

Return ONLY the corrected command on one line. Keep the original intent:
- never add -stat if the command did not have it
- never drop -short
- use ~<n>e or ~~[<hex osid>]e for thread-scoped commands
- prefer SOS commands over dx
If the command cannot be fixed (for example a method table address passed to !do), return SKIP.`;
}

/**
 * Bounded repair loop for commands the debugger rejected. The oracle is
 * asked first; rewrite rules cover oracle refusals and outages.
 */
export class CommandHealer {
  private successfulHeals = 0;
  private failedHeals = 0;
  private logger: Logger;

  constructor(
    private maxRetries: number,
    private reasoning: ReasoningClient | null = null,
    logger?: Logger,
    private rules: RewriteRule[] = DEFAULT_RULES
  ) {
    this.logger = logger ?? silentLogger;
  }

  async heal(request: HealRequest): Promise<HealOutcome> {
    const outcome = await this.attempt(request);
    if (outcome.state === 'healed') {
      this.successfulHeals++;
      this.logger.info(`🔧 Healed (${outcome.strategy}): ${request.command} → ${outcome.command}`);
    } else {
      this.failedHeals++;
      this.logger.warn(`Cannot heal ${request.command}: ${outcome.reason}`);
    }
    return outcome;
  }

  getStats(): HealingStats {
    const total = this.successfulHeals + this.failedHeals;
    return {
      successfulHeals: this.successfulHeals,
      failedHeals: this.failedHeals,
      successRate: total > 0 ? this.successfulHeals / total : 0
    };
  }

  private async attempt(request: HealRequest): Promise<HealOutcome> {
    if (request.attempt >= this.maxRetries) {
      return { state: 'exhausted', reason: `retry limit of ${this.maxRetries} reached` };
    }

    if (this.reasoning) {
      const fromOracle = await this.askOracle(this.reasoning, request);
      if (fromOracle.state === 'healed' || fromOracle.reason === 'oracle declined') {
        return fromOracle;
      }
      this.logger.debug(`Oracle fix unusable (${fromOracle.reason}), trying rewrite rules`);
    }

    const context: RuleContext = { threads: knownThreads(request.context?.recentEvidence ?? []) };
    for (const rule of this.rules) {
      const rewritten = rule.apply(request.command, request.error, context);
      if (rewritten !== null && rewritten !== request.command) {
        return { state: 'healed', command: rewritten, strategy: `rule:${rule.name}` };
      }
    }
    return { state: 'exhausted', reason: 'no rewrite rule applies' };
  }

  private async askOracle(reasoning: ReasoningClient, request: HealRequest): Promise<HealOutcome> {
    let reply: string;
    try {
      reply = await reasoning.ask(
        [
          { role: 'system', content: 'You are a debugger command repair expert. Return ONLY the fixed command, no explanations.' },
          { role: 'user', content: buildPrompt(request) }
        ],
        { temperature: 0.1 }
      );
    } catch (error) {
      if (error instanceof InvestigationError && error.fatal) {
        throw error;
      }
      return { state: 'exhausted', reason: `oracle unavailable: ${describeError(error)}` };
    }

    if (/^skip\b/i.test(reply.trim())) {
      return { state: 'exhausted', reason: 'oracle declined' };
    }
    const fixed = extractCommandLine(reply);
    if (!fixed) {
      return { state: 'exhausted', reason: 'oracle reply held no command' };
    }
    const rejection = rejectFix(request.command, fixed);
    if (rejection) {
      return { state: 'exhausted', reason: rejection };
    }
    return { state: 'healed', command: fixed, strategy: 'oracle' };
  }
}
