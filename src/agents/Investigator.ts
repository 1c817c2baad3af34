import { AnalysisState } from '../types';
import { AgentContext, messages, promptContext, withFallback } from './AgentContext';
import { investigatorPrompt } from './prompts';
import { InvestigatorReply, investigatorReply } from './schemas';

const EVIDENCE_PER_STEP = 5;

export class Investigator {
  constructor(private ctx: AgentContext) {}

  /** Picks the next command for a task, or reports the task satisfied. */
  async next(state: AnalysisState, task: string): Promise<InvestigatorReply> {
    const executed = (state.evidenceInventory[task] ?? []).map(e => e.command);
    const relevant = await this.ctx.retriever.findRelevant(
      task,
      state.evidenceInventory,
      EVIDENCE_PER_STEP,
      this.ctx.useEmbeddings
    );
    const prompt = investigatorPrompt(promptContext(state), task, executed, await this.ctx.retriever.formatForPrompt(relevant));

    return withFallback<InvestigatorReply>(
      this.ctx.logger,
      'Investigator',
      async () => {
        const reply = await this.ctx.reasoning.askJson(messages(prompt), investigatorReply);
        const command = reply.command?.trim();
        if (!command || executed.includes(command)) {
          return { command: null, taskComplete: true, rationale: reply.rationale };
        }
        return { ...reply, command };
      },
      reason => ({ command: null, taskComplete: true, rationale: `Investigator unavailable: ${reason}` })
    );
  }
}
