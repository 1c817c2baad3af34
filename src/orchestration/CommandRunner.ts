import dayjs from 'dayjs';
import { AnalysisResult, Confidence, Evidence, OutputRef } from '../types';
import { ToolExecutor } from '../tool/ToolExecutor';
import { CommandHealer } from '../healing/CommandHealer';
import { Redactor } from '../evidence/Redactor';
import { AnalyzerRegistry } from '../analyzers/AnalyzerRegistry';
import { Analyzer } from '../analyzers/BaseAnalyzer';
import { EvidenceStore } from '../evidence/EvidenceStore';
import { findPlaceholders, resolvePlaceholders } from '../healing/placeholderResolver';
import { HealingExhausted } from '../errors';
import { Logger, silentLogger } from '../logging/Logger';

export interface CommandRunnerSettings {
  commandTimeoutSeconds: number;
}

export interface RunContext {
  sessionId: string;
  dumpType: string;
  recentEvidence: Evidence[]; // everything collected so far, oldest first
}

function confidenceFor(analyzer: Analyzer | null, analysis: AnalysisResult | null): Confidence {
  if (!analyzer || !analysis || !analysis.success) return 'low';
  return analyzer.tier === 1 ? 'high' : 'medium';
}

/** Turns one successful command's output into an immutable evidence record. */
export function buildEvidence(
  command: string,
  outputRef: OutputRef,
  outputLength: number,
  analyzer: Analyzer | null,
  analysis: AnalysisResult | null
): Evidence {
  const ok = analysis !== null && analysis.success;
  const evidence: Evidence = {
    command,
    outputRef,
    finding: ok ? analysis.summary : `Raw output captured (${outputLength} chars)`,
    significance: ok ? analysis.findings.slice(0, 3).join('; ') : '',
    confidence: confidenceFor(analyzer, analysis),
    summary: ok ? analysis.summary : null,
    timestamp: dayjs().toISOString()
  };
  if (analyzer) evidence.analyzer = analyzer.name;
  if (ok && analysis.structuredData) evidence.structuredData = analysis.structuredData;
  return Object.freeze(evidence);
}

/**
 * Execute → heal → redact → analyze → store, for one command.
 * Raises HealingExhausted when the command cannot be made to run.
 */
export class CommandRunner {
  private logger: Logger;

  constructor(
    private executor: ToolExecutor,
    private healer: CommandHealer,
    private redactor: Redactor,
    private registry: AnalyzerRegistry,
    private store: EvidenceStore,
    private settings: CommandRunnerSettings,
    logger?: Logger
  ) {
    this.logger = logger ?? silentLogger;
  }

  async run(command: string, ctx: RunContext): Promise<Evidence> {
    let current = command;
    for (let attempt = 0; ; attempt++) {
      current = this.fillPlaceholders(current, ctx);
      const result = await this.executor.execute(current, this.settings.commandTimeoutSeconds);
      if (result.success) {
        return this.capture(current, result.output, ctx);
      }

      const error = result.error ?? 'command failed';
      this.logger.warn(`${current} failed (${result.failure ?? 'tool-error'}): ${error}`);
      const healed = await this.healer.heal({
        command: current,
        error,
        attempt,
        context: { recentEvidence: ctx.recentEvidence, dumpType: ctx.dumpType }
      });
      if (healed.state === 'exhausted') {
        throw new HealingExhausted(current, `${error} (${healed.reason})`);
      }
      current = healed.command;
    }
  }

  private fillPlaceholders(command: string, ctx: RunContext): string {
    if (findPlaceholders(command).length === 0) return command;
    const filled = resolvePlaceholders(command, ctx.recentEvidence);
    if (!filled.resolved) {
      const advice = filled.unresolved.some(slot => /thread|tid|osid|~~\[/i.test(slot))
        ? 'run !threads for real thread ids'
        : 'run !dumpheap -stat or !syncblk for real addresses';
      throw new HealingExhausted(command, `unresolved placeholder ${filled.unresolved.join(', ')}; ${advice}`);
    }
    this.logger.info(`Filled placeholders: ${command} → ${filled.command}`);
    return filled.command;
  }

  private async capture(command: string, rawOutput: string, ctx: RunContext): Promise<Evidence> {
    const { redacted } = this.redactor.redact(rawOutput);
    const analyzer = this.registry.getAnalyzer(command);
    const analysis = analyzer ? analyzer.analyze(command, redacted) : null;
    if (analysis && !analysis.success) {
      this.logger.debug(analysis.error ?? `${analyzer?.name} could not parse output`);
    }
    const outputRef = await this.store.store(ctx.sessionId, redacted, command);
    const evidence = buildEvidence(command, outputRef, redacted.length, analyzer, analysis);
    this.logger.success(`${command}: ${evidence.finding}`);
    return evidence;
  }
}
