import { EngineConfig } from './config/EngineConfig';
import { AnalysisState, RedactionPattern, SessionInfo } from './types';
import { Redactor } from './evidence/Redactor';
import { EvidenceStore } from './evidence/EvidenceStore';
import { EvidenceRetriever } from './evidence/EvidenceRetriever';
import { createDefaultRegistry } from './analyzers';
import { CommandHealer } from './healing/CommandHealer';
import { Oracle, EmbeddingsProvider } from './llm/Oracle';
import { ReasoningClient } from './llm/ReasoningClient';
import { RetryPolicy, Sleep } from './llm/RetryPolicy';
import { ToolExecutor } from './tool/ToolExecutor';
import { SessionManager } from './storage/SessionManager';
import { CommandRunner } from './orchestration/CommandRunner';
import { ConfirmCallback, InvestigationController } from './orchestration/InvestigationController';
import { ChatSession, DEFAULT_CHAT_ROUNDS, MAX_CHAT_COMMANDS } from './orchestration/ChatSession';
import { AgentContext } from './agents/AgentContext';
import { Planner } from './agents/Planner';
import { HypothesisAgent } from './agents/HypothesisAgent';
import { Investigator } from './agents/Investigator';
import { Reasoner } from './agents/Reasoner';
import { Critic } from './agents/Critic';
import { ReportWriter } from './agents/ReportWriter';
import { ChatAgent } from './agents/ChatAgent';
import { Logger } from './logging/Logger';

export interface EngineDependencies {
  config: EngineConfig;
  session: SessionInfo;
  sessions: SessionManager;
  executor: ToolExecutor;
  oracle: Oracle;
  embeddings: EmbeddingsProvider | null;
  customPatterns: RedactionPattern[];
  logger: Logger;
  confirm?: ConfirmCallback;
  sleep?: Sleep;
}

export interface Engine {
  controller: InvestigationController;
  redactor: Redactor;
  healer: CommandHealer;
  reasoning: ReasoningClient;
  runner: CommandRunner;
  /** Follow-up questions over a state this engine's session produced. */
  chat(state: AnalysisState): ChatSession;
}

/** Wires one session's investigation engine from its collaborators. */
export function createEngine(deps: EngineDependencies): Engine {
  const { config, session, sessions, logger } = deps;

  const redactor = new Redactor(deps.customPatterns, {
    auditLogPath: config.enableRedactionAudit ? sessions.auditLogPath(session.id) : undefined,
    logger
  });

  const reasoning = new ReasoningClient(deps.oracle, new RetryPolicy(config.retry), {
    temperature: config.temperature,
    maxTokens: config.maxTokens,
    redactor,
    logger,
    sleep: deps.sleep
  });

  const store = new EvidenceStore(sessions.baseDir, config.evidenceStorageThreshold);
  const ctx: AgentContext = {
    reasoning,
    retriever: new EvidenceRetriever(deps.embeddings, { redactor, store, reranker: reasoning, logger }),
    useEmbeddings: config.useEmbeddings,
    logger
  };

  const healer = new CommandHealer(config.maxCommandRetries, reasoning, logger);
  const runner = new CommandRunner(
    deps.executor,
    healer,
    redactor,
    createDefaultRegistry(),
    store,
    { commandTimeoutSeconds: config.commandTimeoutSeconds },
    logger
  );

  const reportWriter = new ReportWriter(ctx);
  const controller = new InvestigationController(
    config,
    {
      planner: new Planner(ctx),
      hypothesis: new HypothesisAgent(ctx, config.maxTestCommands),
      investigator: new Investigator(ctx),
      reasoner: new Reasoner(ctx),
      critic: new Critic(ctx),
      reportWriter
    },
    runner,
    sessions,
    logger,
    deps.confirm
  );

  const chat = (state: AnalysisState): ChatSession => new ChatSession(
    state,
    new ChatAgent(ctx),
    runner,
    reportWriter,
    sessions,
    { maxHistory: config.maxChatMessages, maxRounds: DEFAULT_CHAT_ROUNDS, maxCommandsPerRound: MAX_CHAT_COMMANDS },
    logger
  );

  return { controller, redactor, healer, reasoning, runner, chat };
}
