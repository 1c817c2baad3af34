export * from './types';
export * from './errors';
export { EngineConfig, RetryPolicySettings, loadConfig } from './config/EngineConfig';
export { Logger, LogLevel, ConsoleLogger, silentLogger, parseLogLevel } from './logging/Logger';

export { Redactor, RedactionReport, PatternTestResult } from './evidence/Redactor';
export { loadCustomPatterns } from './evidence/PatternLoader';
export { EvidenceStore, evidenceIdFor } from './evidence/EvidenceStore';
export { EvidenceRetriever } from './evidence/EvidenceRetriever';

export * from './analyzers';
export { CommandHealer, HealOutcome, HealRequest, HealingStats } from './healing/CommandHealer';

export { Oracle, OracleMessage, OracleOutcome, EmbeddingsProvider } from './llm/Oracle';
export { ReasoningClient } from './llm/ReasoningClient';
export { RetryPolicy } from './llm/RetryPolicy';
export { OpenAIOracle, OpenAIEmbeddings } from './llm/OpenAIOracle';

export { ToolExecutor } from './tool/ToolExecutor';
export { CdbExecutor, extractToolError } from './tool/CdbExecutor';
export { SessionManager } from './storage/SessionManager';

export { StateMachine } from './orchestration/StateMachine';
export { CommandRunner } from './orchestration/CommandRunner';
export {
  InvestigationController,
  InvestigationOutcome,
  ConfirmCallback,
  ConfirmDecision,
  createInitialState
} from './orchestration/InvestigationController';
export {
  ChatSession,
  ChatMessage,
  ChatReply,
  ChatTurn,
  ChatSettings,
  renderEvidence,
  renderHistory
} from './orchestration/ChatSession';
export { createEngine, Engine, EngineDependencies } from './engine';
