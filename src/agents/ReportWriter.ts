import dayjs from 'dayjs';
import { AnalysisState, TerminationReason } from '../types';
import { AgentContext, allEvidence, messages, promptContext, withFallback } from './AgentContext';
import { reportPrompt } from './prompts';

const TERMINATION_TEXT: Record<TerminationReason, string> = {
  [TerminationReason.IterationLimitReached]: 'iteration limit reached',
  [TerminationReason.NoFurtherInvestigation]: 'no further investigation needed',
  [TerminationReason.PlanComplete]: 'investigation plan complete',
  [TerminationReason.UserRequestedReport]: 'report requested by user'
};

/** Everything the state knows, as markdown sections. */
export function renderStateSections(state: AnalysisState): string {
  const lines: string[] = [];

  const tests = state.hypothesis?.tests ?? [];
  if (tests.length > 0) {
    lines.push('## Hypotheses Tested', '');
    for (const t of tests) {
      lines.push(`- **${t.result ?? 'untested'}**: ${t.hypothesis}`);
      if (t.reasoning) lines.push(`  - ${t.reasoning}`);
    }
    lines.push('');
  }

  if (state.reasoning) {
    lines.push('## Analysis', '', state.reasoning.analysisSummary, '');
    lines.push(`Confidence: **${state.reasoning.confidenceLevel}**`, '');
    if (state.reasoning.keyFindings.length > 0) {
      lines.push('### Key Findings', '', ...state.reasoning.keyFindings.map(f => `- ${f}`), '');
    }
  }

  const evidence = allEvidence(state);
  if (evidence.length > 0) {
    lines.push('## Evidence', '');
    for (const [task, items] of Object.entries(state.evidenceInventory)) {
      if (items.length === 0) continue;
      lines.push(`### ${task}`, '');
      for (const e of items) {
        lines.push(`- \`${e.command}\` (${e.confidence}): ${e.finding}`);
      }
      lines.push('');
    }
  }

  if (state.failedCommands.length > 0) {
    lines.push('## Commands That Could Not Run', '');
    lines.push(...state.failedCommands.map(f => `- \`${f.command}\`: ${f.error}`), '');
  }

  if (state.critique?.hasUnresolvedIssues) {
    const { criticalIssues, evidenceGaps } = state.critique.result;
    lines.push('## Review Caveats', '');
    lines.push(...criticalIssues.map(i => `- ${i}`), ...evidenceGaps.map(g => `- Gap: ${g}`), '');
  }

  return lines.join('\n').trim();
}

/** Report rendered without the oracle. */
export function renderFallbackReport(state: AnalysisState): string {
  const reason = state.terminationReason ? TERMINATION_TEXT[state.terminationReason] : 'unknown';
  return [
    '# Dump Analysis Report',
    '',
    `- **Dump:** ${state.dumpPath}`,
    `- **Issue:** ${state.issue}`,
    `- **Session:** ${state.sessionId}`,
    `- **Generated:** ${dayjs().format('YYYY-MM-DD HH:mm:ss')}`,
    `- **Stopped because:** ${reason}`,
    '',
    renderStateSections(state)
  ].join('\n');
}

export class ReportWriter {
  constructor(private ctx: AgentContext) {}

  async write(state: AnalysisState): Promise<string> {
    const prompt = reportPrompt(promptContext(state), renderStateSections(state));
    return withFallback(
      this.ctx.logger,
      'Report writer',
      async () => {
        const text = (await this.ctx.reasoning.ask(messages(prompt), { temperature: 0.2 })).trim();
        return text.length > 0 ? text : renderFallbackReport(state);
      },
      () => renderFallbackReport(state)
    );
  }
}
