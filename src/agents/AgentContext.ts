import { ReasoningClient } from '../llm/ReasoningClient';
import { EvidenceRetriever } from '../evidence/EvidenceRetriever';
import { Logger } from '../logging/Logger';
import { AnalysisState, Evidence } from '../types';
import { InvestigationError } from '../errors';
import { OracleMessage } from '../llm/Oracle';
import { PromptContext, SYSTEM_PROMPT } from './prompts';

/** Collaborators every oracle-backed agent needs. */
export interface AgentContext {
  reasoning: ReasoningClient;
  retriever: EvidenceRetriever;
  useEmbeddings: boolean;
  logger: Logger;
}

export function promptContext(state: AnalysisState): PromptContext {
  return { issue: state.issue, dumpType: state.dumpType };
}

export function messages(userPrompt: string): OracleMessage[] {
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: userPrompt }
  ];
}

export function allEvidence(state: AnalysisState): Evidence[] {
  return Object.values(state.evidenceInventory).flat();
}

/**
 * Runs an oracle-backed step and substitutes the phase fallback when the
 * oracle fails recoverably. Fatal errors and programming errors propagate.
 */
export async function withFallback<T>(
  logger: Logger,
  label: string,
  call: () => Promise<T>,
  fallback: (reason: string) => T
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof InvestigationError && !error.fatal) {
      logger.warn(`${label} unavailable (${error.code}), using fallback: ${error.message}`);
      return fallback(error.message);
    }
    throw error;
  }
}
