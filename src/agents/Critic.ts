import { AnalysisState, CritiqueResult } from '../types';
import { AgentContext, allEvidence, messages, promptContext, withFallback } from './AgentContext';
import { critiquePrompt } from './prompts';
import { critiqueReply } from './schemas';

export const NO_ISSUES: CritiqueResult = {
  issuesFound: false,
  criticalIssues: [],
  evidenceGaps: [],
  suggestedActions: [],
  severity: 'none'
};

/**
 * Independent review of the reasoning output. Gaps it reports can send the
 * run back to Investigate.
 */
export class Critic {
  constructor(private ctx: AgentContext) {}

  async critique(state: AnalysisState): Promise<CritiqueResult> {
    const reasoning = state.reasoning;
    if (!reasoning) {
      return { ...NO_ISSUES };
    }
    const prompt = critiquePrompt(
      promptContext(state),
      reasoning.analysisSummary,
      reasoning.keyFindings,
      await this.ctx.retriever.formatForPrompt(allEvidence(state))
    );

    return withFallback(
      this.ctx.logger,
      'Critic',
      () => this.ctx.reasoning.askJson(messages(prompt), critiqueReply),
      () => ({ ...NO_ISSUES })
    );
  }
}
