import { AnalysisState, Evidence } from '../types';
import { AgentContext, messages, promptContext, withFallback } from './AgentContext';
import { chatAnswerPrompt, chatAssessPrompt } from './prompts';
import { ChatAssessmentReply, chatAssessmentReply } from './schemas';

export const CHAT_TOP_K = 10;
const REPORT_EXCERPT = 20000;

function reportExcerpt(state: AnalysisState): string {
  return state.report ? state.report.slice(0, REPORT_EXCERPT) : '(no report written yet)';
}

/** Answer assembled from findings when the oracle cannot write one. */
export function findingsOnlyAnswer(evidence: Evidence[], reason: string): string {
  if (evidence.length === 0) {
    return `Could not compose an answer (${reason}) and no evidence matches the question.`;
  }
  return [
    `Could not compose an answer (${reason}). Evidence that looks relevant:`,
    ...evidence.map(e => `- \`${e.command}\`: ${e.finding}`)
  ].join('\n');
}

/** Follow-up questions about a finished investigation. */
export class ChatAgent {
  constructor(private ctx: AgentContext) {}

  relevant(state: AnalysisState, question: string): Promise<Evidence[]> {
    return this.ctx.retriever.findRelevant(question, state.evidenceInventory, CHAT_TOP_K, this.ctx.useEmbeddings);
  }

  async assess(state: AnalysisState, question: string, evidence: Evidence[], attempted: string[]): Promise<ChatAssessmentReply> {
    const prompt = chatAssessPrompt(
      promptContext(state),
      question,
      reportExcerpt(state),
      await this.ctx.retriever.formatForPrompt(evidence),
      attempted
    );
    return withFallback(
      this.ctx.logger,
      'Chat assessment',
      () => this.ctx.reasoning.askJson(messages(prompt), chatAssessmentReply),
      reason => ({ hasSufficientEvidence: true, reasoning: `Assessment unavailable (${reason})`, suggestedCommands: [] })
    );
  }

  async answer(state: AnalysisState, question: string, evidence: Evidence[]): Promise<string> {
    const prompt = chatAnswerPrompt(
      promptContext(state),
      question,
      reportExcerpt(state),
      await this.ctx.retriever.formatForPrompt(evidence)
    );
    return withFallback(
      this.ctx.logger,
      'Chat answer',
      async () => {
        const text = (await this.ctx.reasoning.ask(messages(prompt), { temperature: 0.2 })).trim();
        return text.length > 0 ? text : findingsOnlyAnswer(evidence, 'empty reply');
      },
      reason => findingsOnlyAnswer(evidence, reason)
    );
  }
}
