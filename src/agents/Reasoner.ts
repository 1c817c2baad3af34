import { AnalysisState, Evidence } from '../types';
import { AgentContext, allEvidence, messages, promptContext, withFallback } from './AgentContext';
import { reasonerPrompt } from './prompts';
import { ReasonerReply, reasonerReply } from './schemas';

/** Low-confidence synthesis built straight from evidence findings. */
export function findingsOnlyReasoning(evidence: Evidence[], reason: string): ReasonerReply {
  const findings = evidence.map(e => `${e.command}: ${e.finding}`);
  return {
    analysisSummary: findings.length > 0
      ? `Automated synthesis unavailable (${reason}). Collected findings:\n${findings.map(f => `- ${f}`).join('\n')}`
      : `Automated synthesis unavailable (${reason}) and no evidence was collected.`,
    keyFindings: findings.slice(0, 10),
    confidenceLevel: 'low',
    needsDeeperInvestigation: false,
    investigationRequests: []
  };
}

export class Reasoner {
  constructor(private ctx: AgentContext) {}

  async reason(state: AnalysisState): Promise<ReasonerReply> {
    const evidence = allEvidence(state);
    const working = state.hypothesis?.tests.find(t => t.result === 'confirmed')
      ?? state.hypothesis?.tests[state.hypothesis.tests.length - 1];
    const prompt = reasonerPrompt(
      promptContext(state),
      working ? working.hypothesis : null,
      await this.ctx.retriever.formatForPrompt(evidence)
    );

    return withFallback(
      this.ctx.logger,
      'Reasoner',
      () => this.ctx.reasoning.askJson(messages(prompt), reasonerReply),
      reason => findingsOnlyReasoning(evidence, reason)
    );
  }
}
