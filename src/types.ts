export enum InvestigationPhase {
  Plan = "Plan",               // Build the ordered task list
  Hypothesize = "Hypothesize", // Propose a root-cause candidate
  Test = "Test",               // Run the candidate's test commands
  Investigate = "Investigate", // Deep dive, one command per step
  Reason = "Reason",           // Synthesize conclusions from evidence
  Critique = "Critique",       // Independent quality pass
  Report = "Report",           // Render the final narrative
  Done = "Done"
}

export type Confidence = 'high' | 'medium' | 'low';

export type Severity = 'critical' | 'warning' | 'info';

export enum CommandFailure {
  Timeout = 'timeout',
  ToolError = 'tool-error'
}

export interface CommandResult {
  command: string;
  output: string;
  success: boolean;
  error?: string;
  failure?: CommandFailure; // Set whenever success is false
}

export interface AnalysisMetadata {
  analyzer: string;
  tier: number;
  [key: string]: string | number | boolean;
}

export interface AnalysisResult<T extends object = object> {
  structuredData: T | null; // null when success is false
  summary: string;
  findings: string[];
  metadata: AnalysisMetadata;
  success: boolean;
  error?: string;
}

export type OutputRef =
  | { kind: 'inline'; text: string }
  | { kind: 'external'; evidenceId: string; size: number };

export interface Evidence {
  command: string;
  outputRef: OutputRef;
  finding: string;
  significance: string;
  confidence: Confidence;
  summary?: string | null; // Missing when no analyzer could interpret the output
  analyzer?: string;
  structuredData?: object;
  embedding?: number[];
  timestamp: string;
}

export type EvidenceInventory = Record<string, Evidence[]>;

export type HypothesisResult = 'confirmed' | 'rejected' | 'inconclusive';

export interface HypothesisTest {
  hypothesis: string;
  testCommands: string[];
  expectedConfirmed: string;
  expectedRejected: string;
  result: HypothesisResult | null;
  evidence: Evidence[];
  inconclusiveCount: number;
  reasoning?: string;
  pendingCommands: string[]; // Commands queued for the next test round
}

export type HypothesisStatus = 'testing' | 'confirmed' | 'rejected';

export interface HypothesisBlock {
  status: HypothesisStatus;
  attempts: number;
  tests: HypothesisTest[];
}

export interface PlanBlock {
  tasks: string[];
  currentTaskIndex: number;
  completedTasks: string[];
  commandsForCurrentTask: number;
}

export interface InvestigationRequest {
  question: string;
  context?: string;
  approach?: string;
}

export interface ReasoningBlock {
  analysisSummary: string;
  keyFindings: string[];
  confidenceLevel: Confidence;
  needsDeeperInvestigation: boolean;
  investigationRequests: InvestigationRequest[];
  iterations: number;
}

export interface CritiqueResult {
  issuesFound: boolean;
  criticalIssues: string[];
  evidenceGaps: string[];
  suggestedActions: string[];
  severity: 'none' | 'minor' | 'major' | 'critical';
}

export interface CritiqueBlock {
  round: number;
  result: CritiqueResult;
  hasUnresolvedIssues: boolean;
  triggeredInvestigation: boolean;
}

export enum TerminationReason {
  IterationLimitReached = 'iteration-limit-reached',
  NoFurtherInvestigation = 'no-further-investigation',
  PlanComplete = 'plan-complete',
  UserRequestedReport = 'user-requested-report'
}

export interface FailedCommand {
  command: string;
  error: string;
  task: string;
}

export interface PhaseTransition {
  from: InvestigationPhase;
  to: InvestigationPhase;
  ts: string;
}

export interface AnalysisState {
  version: 1;
  sessionId: string;
  dumpPath: string;
  issue: string;
  dumpType: string;
  phase: InvestigationPhase;
  phaseHistory: PhaseTransition[];
  iteration: number;
  maxIterations: number;
  plan?: PlanBlock;
  hypothesis?: HypothesisBlock;
  reasoning?: ReasoningBlock;
  critique?: CritiqueBlock;
  evidenceInventory: EvidenceInventory;
  failedCommands: FailedCommand[];
  userRequestedReport: boolean;
  terminationReason?: TerminationReason;
  report?: string;
}

export interface RedactionPattern {
  name: string;
  pattern: string; // regex source, compiled case-insensitively
  description: string;
  severity: Severity;
}

export interface SessionInfo {
  id: string;
  dir: string;
  dumpPath: string;
  createdAt: string;
  lastAccessed: string;
}
