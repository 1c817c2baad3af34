import { HypothesisTest, InvestigationRequest } from '../types';

export const SYSTEM_PROMPT = `You are an expert Windows crash and hang dump analyst working with cdb and the SOS extension.

**HOW TO THINK**
- Ground every claim in debugger output you have actually seen.
- Prefer SOS commands (!threads, !clrstack, !syncblk, !threadpool, !dumpheap, !eeheap, !gcroot, !gchandles, !finalizequeue).
- Use ~<n>e <cmd> or ~~[<hex osid>]e <cmd> for thread-scoped commands. Never invent thread ids or addresses.
- Be terse.

**OUTPUT**
When asked for JSON, reply with a single JSON object and nothing else.`;

export interface PromptContext {
  issue: string;
  dumpType: string;
}

function header(ctx: PromptContext): string {
  return `ISSUE: ${ctx.issue}\nDUMP TYPE: ${ctx.dumpType}-mode`;
}

export function planPrompt(ctx: PromptContext): string {
  return `${header(ctx)}

Create an investigation plan of 3 to 5 focused tasks. Each task names one thing to establish from the dump.

Reply with JSON:
{"tasks": ["task 1", "task 2", "task 3"]}`;
}

export function hypothesisPrompt(ctx: PromptContext, rejected: HypothesisTest[], evidence: string): string {
  const history = rejected.length > 0
    ? '\nREJECTED HYPOTHESES (do not repeat these):\n' +
      rejected.map(t => `- ${t.hypothesis}${t.reasoning ? ` (${t.reasoning})` : ''}`).join('\n') + '\n'
    : '';

  return `${header(ctx)}
${history}
EVIDENCE SO FAR:
${evidence}

Propose the single most likely root cause and the debugger commands that would test it.

Reply with JSON:
{
  "hypothesis": "the root cause you suspect",
  "reasoning": "why",
  "testCommands": ["command1", "command2"],
  "expectedConfirmed": "output that would confirm it",
  "expectedRejected": "output that would reject it"
}`;
}

export function evaluationPrompt(ctx: PromptContext, test: HypothesisTest, evidence: string, maxAdditional: number): string {
  return `${header(ctx)}

HYPOTHESIS: ${test.hypothesis}
EXPECTED IF CONFIRMED: ${test.expectedConfirmed}
EXPECTED IF REJECTED: ${test.expectedRejected}

TEST EVIDENCE:
${evidence}

Decide whether the evidence confirms or rejects the hypothesis. If it is genuinely inconclusive,
suggest at most ${maxAdditional} additional commands that would decide it.

Reply with JSON:
{"result": "confirmed|rejected|inconclusive", "reasoning": "cite specific evidence", "additionalCommands": []}`;
}

export function investigatorPrompt(ctx: PromptContext, task: string, executed: string[], evidence: string): string {
  const done = executed.length > 0 ? executed.map(c => `- ${c}`).join('\n') : '(none)';
  return `${header(ctx)}

CURRENT TASK: ${task}

COMMANDS ALREADY RUN FOR THIS TASK:
${done}

RELEVANT EVIDENCE:
${evidence}

Choose the next debugger command for this task, or mark the task complete if the evidence already answers it.

Reply with JSON:
{"command": "!command or null", "taskComplete": false, "rationale": "why"}`;
}

export function reasonerPrompt(ctx: PromptContext, hypothesis: string | null, evidence: string): string {
  return `${header(ctx)}
${hypothesis ? `WORKING HYPOTHESIS: ${hypothesis}\n` : ''}
ALL EVIDENCE:
${evidence}

Synthesize what the evidence shows about the root cause. If a specific question remains that more
debugger output could answer, request it.

Reply with JSON:
{
  "analysisSummary": "markdown summary",
  "keyFindings": ["finding"],
  "confidenceLevel": "high|medium|low",
  "needsDeeperInvestigation": false,
  "investigationRequests": [{"question": "...", "context": "...", "approach": "..."}]
}`;
}

export function critiquePrompt(ctx: PromptContext, analysis: string, keyFindings: string[], evidence: string): string {
  return `${header(ctx)}

ANALYSIS UNDER REVIEW:
${analysis}

KEY FINDINGS:
${keyFindings.map(f => `- ${f}`).join('\n') || '(none)'}

EVIDENCE:
${evidence}

Review the analysis as a skeptical senior engineer. Flag claims the evidence does not support,
contradictions, and gaps that further debugger output could close.

Reply with JSON:
{
  "issuesFound": true,
  "criticalIssues": ["..."],
  "evidenceGaps": ["..."],
  "suggestedActions": ["..."],
  "severity": "none|minor|major|critical"
}`;
}

export function reportPrompt(ctx: PromptContext, body: string): string {
  return `${header(ctx)}

${body}

Write the final root-cause report in markdown with these sections:
## Summary
## Root Cause
## Evidence
## Recommendations

Cite commands for every claim. Do not invent evidence.`;
}

export function chatAssessPrompt(
  ctx: PromptContext,
  question: string,
  report: string,
  evidence: string,
  attempted: string[]
): string {
  return `${header(ctx)}

REPORT:
${report}

RELEVANT EVIDENCE:
${evidence}

COMMANDS ALREADY RUN:
${attempted.map(c => `- ${c}`).join('\n') || '(none)'}

USER QUESTION: ${question}

Decide whether the evidence above answers the question. If it does not, suggest debugger commands
that would. Use plain debugger syntax: no shell pipes, no PowerShell, no placeholders you cannot fill.

Reply with JSON:
{"hasSufficientEvidence": true, "reasoning": "...", "suggestedCommands": ["!command"]}`;
}

export function chatAnswerPrompt(ctx: PromptContext, question: string, report: string, evidence: string): string {
  return `${header(ctx)}

REPORT:
${report}

EVIDENCE:
${evidence}

USER QUESTION: ${question}

Answer the question in markdown. Cite the commands your answer rests on and say plainly when the
evidence does not settle it.`;
}

export function requestAsTask(request: InvestigationRequest): string {
  return request.approach ? `${request.question} (approach: ${request.approach})` : request.question;
}
