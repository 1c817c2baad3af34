import { replyValidator } from '../llm/jsonReply';
import { Confidence, CritiqueResult, HypothesisResult, InvestigationRequest } from '../types';

export interface PlanReply {
  tasks: string[];
}

export interface HypothesisReply {
  hypothesis: string;
  reasoning?: string;
  testCommands: string[];
  expectedConfirmed: string;
  expectedRejected: string;
}

export interface EvaluationReply {
  result: HypothesisResult;
  reasoning: string;
  additionalCommands?: string[];
}

export interface InvestigatorReply {
  command?: string | null;
  taskComplete: boolean;
  rationale: string;
}

export interface ReasonerReply {
  analysisSummary: string;
  keyFindings: string[];
  confidenceLevel: Confidence;
  needsDeeperInvestigation: boolean;
  investigationRequests: InvestigationRequest[];
}

export interface ChatAssessmentReply {
  hasSufficientEvidence: boolean;
  reasoning: string;
  suggestedCommands: string[];
}

const stringArray = { type: 'array', items: { type: 'string' } };

export const planReply = replyValidator<PlanReply>('Planner', {
  type: 'object',
  properties: {
    tasks: stringArray
  },
  required: ['tasks']
});

export const hypothesisReply = replyValidator<HypothesisReply>('Hypothesis', {
  type: 'object',
  properties: {
    hypothesis: { type: 'string', minLength: 1 },
    reasoning: { type: 'string' },
    testCommands: { ...stringArray, minItems: 1 },
    expectedConfirmed: { type: 'string' },
    expectedRejected: { type: 'string' }
  },
  required: ['hypothesis', 'testCommands', 'expectedConfirmed', 'expectedRejected']
});

export const evaluationReply = replyValidator<EvaluationReply>('Evaluation', {
  type: 'object',
  properties: {
    result: { type: 'string', enum: ['confirmed', 'rejected', 'inconclusive'] },
    reasoning: { type: 'string' },
    additionalCommands: stringArray
  },
  required: ['result', 'reasoning']
});

export const investigatorReply = replyValidator<InvestigatorReply>('Investigator', {
  type: 'object',
  properties: {
    command: { type: 'string', nullable: true },
    taskComplete: { type: 'boolean' },
    rationale: { type: 'string', default: '' }
  },
  required: ['taskComplete']
});

export const reasonerReply = replyValidator<ReasonerReply>('Reasoner', {
  type: 'object',
  properties: {
    analysisSummary: { type: 'string' },
    keyFindings: { ...stringArray, default: [] },
    confidenceLevel: { type: 'string', enum: ['high', 'medium', 'low'] },
    needsDeeperInvestigation: { type: 'boolean', default: false },
    investigationRequests: {
      type: 'array',
      default: [],
      items: {
        type: 'object',
        properties: {
          question: { type: 'string', minLength: 1 },
          context: { type: 'string' },
          approach: { type: 'string' }
        },
        required: ['question']
      }
    }
  },
  required: ['analysisSummary', 'confidenceLevel']
});

export const critiqueReply = replyValidator<CritiqueResult>('Critic', {
  type: 'object',
  properties: {
    issuesFound: { type: 'boolean' },
    criticalIssues: { ...stringArray, default: [] },
    evidenceGaps: { ...stringArray, default: [] },
    suggestedActions: { ...stringArray, default: [] },
    severity: { type: 'string', enum: ['none', 'minor', 'major', 'critical'], default: 'none' }
  },
  required: ['issuesFound']
});

export const chatAssessmentReply = replyValidator<ChatAssessmentReply>('Chat', {
  type: 'object',
  properties: {
    hasSufficientEvidence: { type: 'boolean' },
    reasoning: { type: 'string', default: '' },
    suggestedCommands: { ...stringArray, default: [] }
  },
  required: ['hasSufficientEvidence']
});
