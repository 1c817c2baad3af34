import { AnalysisState, HypothesisTest } from '../types';
import { AgentContext, messages, promptContext, withFallback } from './AgentContext';
import { evaluationPrompt, hypothesisPrompt } from './prompts';
import { EvaluationReply, evaluationReply, hypothesisReply } from './schemas';

const EVIDENCE_FOR_FORMATION = 8;

/**
 * Forms root-cause hypotheses and judges their test evidence.
 */
export class HypothesisAgent {
  constructor(private ctx: AgentContext, private maxTestCommands: number) {}

  /**
   * Proposes the next hypothesis, avoiding those already rejected.
   * Returns null when the oracle cannot produce one.
   */
  async form(state: AnalysisState): Promise<HypothesisTest | null> {
    const rejected = (state.hypothesis?.tests ?? []).filter(t => t.result === 'rejected');
    const relevant = await this.ctx.retriever.findRelevant(
      state.issue,
      state.evidenceInventory,
      EVIDENCE_FOR_FORMATION,
      this.ctx.useEmbeddings
    );
    const prompt = hypothesisPrompt(promptContext(state), rejected, await this.ctx.retriever.formatForPrompt(relevant));

    return withFallback<HypothesisTest | null>(
      this.ctx.logger,
      'Hypothesis formation',
      async () => {
        const reply = await this.ctx.reasoning.askJson(messages(prompt), hypothesisReply);
        const commands = reply.testCommands
          .map(c => c.trim())
          .filter(c => c.length > 0)
          .slice(0, this.maxTestCommands);
        return {
          hypothesis: reply.hypothesis.trim(),
          testCommands: commands,
          expectedConfirmed: reply.expectedConfirmed,
          expectedRejected: reply.expectedRejected,
          result: null,
          evidence: [],
          inconclusiveCount: 0,
          reasoning: reply.reasoning,
          pendingCommands: [...commands]
        };
      },
      () => null
    );
  }

  async evaluate(state: AnalysisState, test: HypothesisTest): Promise<EvaluationReply> {
    const prompt = evaluationPrompt(
      promptContext(state),
      test,
      await this.ctx.retriever.formatForPrompt(test.evidence),
      this.maxTestCommands
    );

    return withFallback<EvaluationReply>(
      this.ctx.logger,
      'Hypothesis evaluation',
      async () => {
        const reply = await this.ctx.reasoning.askJson(messages(prompt), evaluationReply);
        return {
          ...reply,
          additionalCommands: (reply.additionalCommands ?? []).slice(0, this.maxTestCommands)
        };
      },
      reason => ({ result: 'inconclusive', reasoning: `Evaluation unavailable: ${reason}`, additionalCommands: [] })
    );
  }
}
