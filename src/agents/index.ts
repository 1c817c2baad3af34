/**
 * Agent module exports
 *
 * Oracle-backed roles that the investigation controller sequences
 */

export { Planner, DEFAULT_PLAN, MAX_PLAN_TASKS } from './Planner';
export { HypothesisAgent } from './HypothesisAgent';
export { Investigator } from './Investigator';
export { Reasoner, findingsOnlyReasoning } from './Reasoner';
export { Critic, NO_ISSUES } from './Critic';
export { ReportWriter, renderFallbackReport, renderStateSections } from './ReportWriter';
export { ChatAgent, findingsOnlyAnswer, CHAT_TOP_K } from './ChatAgent';
export { AgentContext, withFallback } from './AgentContext';

export * from './schemas';
