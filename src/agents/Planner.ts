import { AnalysisState } from '../types';
import { AgentContext, messages, promptContext, withFallback } from './AgentContext';
import { planPrompt } from './prompts';
import { planReply } from './schemas';

export const DEFAULT_PLAN: readonly string[] = [
  'Examine crash context and exception details',
  'Analyze call stack and thread states',
  'Investigate memory and heap state'
];

export const MAX_PLAN_TASKS = 5;

export class Planner {
  constructor(private ctx: AgentContext) {}

  /** Ordered task list for the investigation, never empty. */
  async plan(state: AnalysisState): Promise<string[]> {
    const prompt = planPrompt(promptContext(state));

    return withFallback(
      this.ctx.logger,
      'Planner',
      async () => {
        const reply = await this.ctx.reasoning.askJson(messages(prompt), planReply);
        const tasks = reply.tasks
          .map(t => t.trim())
          .filter(t => t.length > 0)
          .slice(0, MAX_PLAN_TASKS);
        if (tasks.length === 0) {
          this.ctx.logger.info('Planner returned no tasks, using the default plan');
          return [...DEFAULT_PLAN];
        }
        return tasks;
      },
      () => [...DEFAULT_PLAN]
    );
  }
}
