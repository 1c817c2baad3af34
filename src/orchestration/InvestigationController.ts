import chalk from 'chalk';
import dayjs from 'dayjs';
import {
  AnalysisState,
  Evidence,
  HypothesisBlock,
  HypothesisTest,
  InvestigationPhase,
  PlanBlock,
  TerminationReason
} from '../types';
import { EngineConfig } from '../config/EngineConfig';
import { StateMachine } from './StateMachine';
import { CommandRunner } from './CommandRunner';
import { SessionManager } from '../storage/SessionManager';
import { Planner, DEFAULT_PLAN, MAX_PLAN_TASKS } from '../agents/Planner';
import { HypothesisAgent } from '../agents/HypothesisAgent';
import { Investigator } from '../agents/Investigator';
import { Reasoner } from '../agents/Reasoner';
import { Critic } from '../agents/Critic';
import { ReportWriter } from '../agents/ReportWriter';
import { requestAsTask } from '../agents/prompts';
import { allEvidence } from '../agents/AgentContext';
import { HealingExhausted, describeError } from '../errors';
import { Logger, silentLogger } from '../logging/Logger';

export type ConfirmDecision = 'continue' | 'report' | 'abort';

/** Asked after every phase change when running interactively. */
export type ConfirmCallback = (
  from: InvestigationPhase,
  to: InvestigationPhase,
  state: AnalysisState
) => Promise<ConfirmDecision>;

export interface InvestigationAgents {
  planner: Planner;
  hypothesis: HypothesisAgent;
  investigator: Investigator;
  reasoner: Reasoner;
  critic: Critic;
  reportWriter: ReportWriter;
}

export interface InvestigationOutcome {
  status: 'completed' | 'aborted';
  state: AnalysisState;
  reportPath?: string;
}

export const HYPOTHESIS_TASK_PREFIX = 'Hypothesis Test: ';
export const CRITIQUE_TASK = 'Critique-requested evidence';

// An optional thread selector followed by one bang command and its flags
const ACTION_COMMAND = /(~[\w*]+\s+)?(![\w-]+(?:\s+-\w+)*)/g;
const MAX_ACTION_WORDS = 4;

/** Debugger commands named in a reviewer's suggested actions, in order, without repeats. */
export function commandsFromActions(actions: string[]): string[] {
  const commands: string[] = [];
  for (const action of actions) {
    for (const m of action.matchAll(ACTION_COMMAND)) {
      const command = m[1] ? `${m[1].trim()} ${m[2]}` : m[2];
      if (command.split(/\s+/).length <= MAX_ACTION_WORDS && !commands.includes(command)) {
        commands.push(command);
      }
    }
  }
  return commands;
}

export function createInitialState(
  sessionId: string,
  dumpPath: string,
  issue: string,
  dumpType: string,
  maxIterations: number
): AnalysisState {
  return {
    version: 1,
    sessionId,
    dumpPath,
    issue,
    dumpType,
    phase: InvestigationPhase.Plan,
    phaseHistory: [],
    iteration: 0,
    maxIterations,
    evidenceInventory: {},
    failedCommands: [],
    userRequestedReport: false
  };
}

function newPlan(tasks: string[]): PlanBlock {
  return { tasks, currentTaskIndex: 0, completedTasks: [], commandsForCurrentTask: 0 };
}

/**
 * Sequences Plan → Hypothesize → Test → Investigate → Reason → Critique →
 * Report over one session. The controller is the only writer of the state;
 * it is persisted after every step.
 */
export class InvestigationController {
  private stateMachine = new StateMachine();
  private logger: Logger;
  private reportPath?: string;

  constructor(
    private config: EngineConfig,
    private agents: InvestigationAgents,
    private commands: CommandRunner,
    private sessions: SessionManager,
    logger?: Logger,
    private confirm?: ConfirmCallback
  ) {
    this.logger = logger ?? silentLogger;
  }

  async run(state: AnalysisState): Promise<InvestigationOutcome> {
    try {
      while (state.phase !== InvestigationPhase.Done) {
        const from = state.phase;
        const next = await this.step(state);
        this.moveTo(state, next);
        await this.sessions.saveState(state.sessionId, state);

        if (this.confirm && from !== next && next !== InvestigationPhase.Report && next !== InvestigationPhase.Done) {
          const decision = await this.confirm(from, next, state);
          if (decision === 'abort') {
            this.logger.warn(`Investigation aborted at ${next}. State saved for session ${state.sessionId}`);
            return { status: 'aborted', state };
          }
          if (decision === 'report') {
            state.userRequestedReport = true;
            state.terminationReason = TerminationReason.UserRequestedReport;
            this.moveTo(state, InvestigationPhase.Report);
            await this.sessions.saveState(state.sessionId, state);
          }
        }
      }
    } catch (error) {
      await this.sessions.saveState(state.sessionId, state).catch(saveError => {
        this.logger.error(`Could not save state after failure: ${describeError(saveError)}`);
      });
      throw error;
    }

    return { status: 'completed', state, reportPath: this.reportPath };
  }

  private async step(state: AnalysisState): Promise<InvestigationPhase> {
    switch (state.phase) {
      case InvestigationPhase.Plan: return this.plan(state);
      case InvestigationPhase.Hypothesize: return this.hypothesize(state);
      case InvestigationPhase.Test: return this.test(state);
      case InvestigationPhase.Investigate: return this.investigate(state);
      case InvestigationPhase.Reason: return this.reason(state);
      case InvestigationPhase.Critique: return this.critique(state);
      case InvestigationPhase.Report: return this.report(state);
      case InvestigationPhase.Done: return InvestigationPhase.Done;
    }
  }

  private moveTo(state: AnalysisState, next: InvestigationPhase): void {
    const check = this.stateMachine.canTransition(state, next);
    if (!check.allowed) {
      throw new Error(`Transition blocked: ${check.reason}`);
    }
    if (state.phase !== next) {
      this.logger.debug(`${state.phase} → ${next}`);
      state.phaseHistory.push({ from: state.phase, to: next, ts: dayjs().toISOString() });
      state.phase = next;
    }
  }

  private async plan(state: AnalysisState): Promise<InvestigationPhase> {
    this.logger.info(chalk.bold('\n📋 Planning investigation'));
    const tasks = await this.agents.planner.plan(state);
    state.plan = newPlan(tasks);
    state.hypothesis = { status: 'testing', attempts: 0, tests: [] };
    tasks.forEach((t, i) => this.logger.info(`   ${i + 1}. ${t}`));
    return InvestigationPhase.Hypothesize;
  }

  private async hypothesize(state: AnalysisState): Promise<InvestigationPhase> {
    const block: HypothesisBlock = state.hypothesis ?? { status: 'testing', attempts: 0, tests: [] };
    state.hypothesis = block;

    if (block.attempts >= this.config.maxHypothesisAttempts) {
      this.logger.warn(`No hypothesis confirmed after ${block.attempts} attempt(s); moving to reasoning`);
      return InvestigationPhase.Reason;
    }

    this.logger.info(chalk.bold('\n🔬 Forming hypothesis'));
    block.attempts++;
    const test = await this.agents.hypothesis.form(state);
    if (!test || test.testCommands.length === 0) {
      this.logger.warn('No testable hypothesis; investigating the plan directly');
      return InvestigationPhase.Investigate;
    }

    block.tests.push(test);
    block.status = 'testing';
    this.logger.info(`   ${test.hypothesis}`);
    return InvestigationPhase.Test;
  }

  private async test(state: AnalysisState): Promise<InvestigationPhase> {
    const block = state.hypothesis;
    const test = block?.tests[block.tests.length - 1];
    if (!block || !test) {
      return InvestigationPhase.Hypothesize;
    }

    if (this.stateMachine.checkTermination(state) === TerminationReason.IterationLimitReached) {
      state.terminationReason = TerminationReason.IterationLimitReached;
      return this.stateMachine.afterIterationLimit(state);
    }

    state.iteration++;
    const pending = test.pendingCommands.slice(0, this.config.maxTestCommands);
    test.pendingCommands = [];
    for (const command of pending) {
      const evidence = await this.runCommand(state, command, HYPOTHESIS_TASK_PREFIX + test.hypothesis, test.evidence);
      if (evidence) test.evidence.push(evidence);
    }

    const evaluation = await this.agents.hypothesis.evaluate(state, test);
    test.reasoning = evaluation.reasoning;

    if (evaluation.result === 'inconclusive') {
      test.inconclusiveCount++;
      const additional = evaluation.additionalCommands ?? [];
      if (test.inconclusiveCount < this.config.maxInconclusiveRounds && additional.length > 0) {
        test.result = 'inconclusive';
        test.pendingCommands = additional;
        this.logger.info(`🔍 Inconclusive, gathering more evidence (${test.inconclusiveCount}/${this.config.maxInconclusiveRounds})`);
        return InvestigationPhase.Test;
      }
      this.logger.warn(`Hypothesis still inconclusive after ${test.inconclusiveCount} round(s); treating as rejected`);
      return this.decide(block, test, 'rejected');
    }

    return this.decide(block, test, evaluation.result);
  }

  private decide(block: HypothesisBlock, test: HypothesisTest, result: 'confirmed' | 'rejected'): InvestigationPhase {
    test.result = result;
    block.status = result;
    if (result === 'confirmed') {
      this.logger.success(`Hypothesis confirmed: ${test.hypothesis}`);
      return InvestigationPhase.Investigate;
    }
    this.logger.info(`✗ Hypothesis rejected: ${test.hypothesis}`);
    return InvestigationPhase.Hypothesize;
  }

  private async investigate(state: AnalysisState): Promise<InvestigationPhase> {
    const plan = state.plan ?? newPlan([...DEFAULT_PLAN]);
    state.plan = plan;

    const termination = this.stateMachine.checkTermination(state);
    if (termination === TerminationReason.IterationLimitReached) {
      this.logger.warn(`Iteration limit (${state.maxIterations}) reached`);
      state.terminationReason = termination;
      return this.stateMachine.afterIterationLimit(state);
    }
    if (termination === TerminationReason.PlanComplete) {
      state.terminationReason = termination;
      return InvestigationPhase.Reason;
    }

    const task = plan.tasks[plan.currentTaskIndex];
    if (plan.commandsForCurrentTask === 0) {
      this.logger.info(chalk.bold(`\n🔎 Task ${plan.currentTaskIndex + 1}/${plan.tasks.length}: ${task}`));
    }

    const next = await this.agents.investigator.next(state, task);
    if (next.taskComplete || !next.command) {
      this.completeTask(plan, task);
      return InvestigationPhase.Investigate;
    }

    state.iteration++;
    plan.commandsForCurrentTask++;
    const inventory = state.evidenceInventory[task] ?? [];
    state.evidenceInventory[task] = inventory;
    const evidence = await this.runCommand(state, next.command, task, inventory);
    if (evidence) inventory.push(evidence);

    if (plan.commandsForCurrentTask >= this.config.maxCommandsPerTask) {
      this.completeTask(plan, task);
    }
    return InvestigationPhase.Investigate;
  }

  private completeTask(plan: PlanBlock, task: string): void {
    plan.completedTasks.push(task);
    plan.currentTaskIndex++;
    plan.commandsForCurrentTask = 0;
  }

  private async reason(state: AnalysisState): Promise<InvestigationPhase> {
    this.logger.info(chalk.bold('\n🧠 Reasoning over evidence'));
    for (const test of state.hypothesis?.tests ?? []) {
      if (test.evidence.length > 0) {
        state.evidenceInventory[HYPOTHESIS_TASK_PREFIX + test.hypothesis] = [...test.evidence];
      }
    }

    const reply = await this.agents.reasoner.reason(state);
    const iterations = (state.reasoning?.iterations ?? 0) + 1;
    state.reasoning = { ...reply, iterations };

    // Out of budget: no follow-ups and no review round
    if (state.terminationReason === TerminationReason.IterationLimitReached || state.iteration >= state.maxIterations) {
      state.terminationReason = TerminationReason.IterationLimitReached;
      return InvestigationPhase.Report;
    }

    const requests = reply.investigationRequests;
    if (reply.needsDeeperInvestigation && requests.length > 0 && iterations < this.config.maxReasoningIterations) {
      this.logger.info(`Reasoner requested ${requests.length} follow-up investigation(s)`);
      state.plan = newPlan(requests.slice(0, MAX_PLAN_TASKS).map(requestAsTask));
      state.terminationReason = undefined;
      return InvestigationPhase.Investigate;
    }

    state.terminationReason = this.stateMachine.checkTermination(state) ?? TerminationReason.PlanComplete;
    return this.config.maxCritiqueRounds > 0 ? InvestigationPhase.Critique : InvestigationPhase.Report;
  }

  private async critique(state: AnalysisState): Promise<InvestigationPhase> {
    this.logger.info(chalk.bold('\n🔍 Quality review'));
    const round = (state.critique?.round ?? 0) + 1;
    const result = await this.agents.critic.critique(state);
    const gaps = result.evidenceGaps.length > 0 ? result.evidenceGaps : result.criticalIssues;

    if (result.issuesFound && round < this.config.maxCritiqueRounds) {
      const requested = this.unseenCommands(state, commandsFromActions(result.suggestedActions));
      if (requested.length > 0) {
        this.logger.info(`Review asked for ${requested.length} command(s); collecting them before reasoning again`);
        state.critique = { round, result, hasUnresolvedIssues: true, triggeredInvestigation: true };
        const inventory = state.evidenceInventory[CRITIQUE_TASK] ?? [];
        state.evidenceInventory[CRITIQUE_TASK] = inventory;
        for (const command of requested.slice(0, this.config.maxCommandsPerTask)) {
          if (state.iteration >= state.maxIterations) break;
          state.iteration++;
          const evidence = await this.runCommand(state, command, CRITIQUE_TASK, inventory);
          if (evidence) inventory.push(evidence);
        }
        state.terminationReason = undefined;
        return InvestigationPhase.Reason;
      }
    }

    if (gaps.length > 0 && round < this.config.maxCritiqueRounds) {
      this.logger.info(`Review found ${gaps.length} gap(s); investigating further`);
      state.critique = { round, result, hasUnresolvedIssues: true, triggeredInvestigation: true };
      state.plan = newPlan(gaps.slice(0, MAX_PLAN_TASKS));
      state.terminationReason = undefined;
      return InvestigationPhase.Investigate;
    }

    state.critique = { round, result, hasUnresolvedIssues: gaps.length > 0, triggeredInvestigation: false };
    return InvestigationPhase.Report;
  }

  /** Drops commands already answered by evidence or already given up on. */
  private unseenCommands(state: AnalysisState, commands: string[]): string[] {
    const ran = allEvidence(state).map(e => e.command.toLowerCase());
    const failed = new Set(state.failedCommands.map(f => f.command.toLowerCase()));
    return commands.filter(c => {
      const lower = c.toLowerCase();
      return !failed.has(lower) && !ran.some(r => r.includes(lower));
    });
  }

  private async report(state: AnalysisState): Promise<InvestigationPhase> {
    this.logger.info(chalk.bold('\n📝 Writing report'));
    state.report = await this.agents.reportWriter.write(state);
    this.reportPath = await this.sessions.saveReport(state.sessionId, state.report);
    this.logger.success(`Report saved to ${this.reportPath}`);
    return InvestigationPhase.Done;
  }

  private async runCommand(state: AnalysisState, command: string, task: string, recent: Evidence[]): Promise<Evidence | null> {
    const current = new Set(recent);
    try {
      return await this.commands.run(command, {
        sessionId: state.sessionId,
        dumpType: state.dumpType,
        recentEvidence: [...allEvidence(state).filter(e => !current.has(e)), ...recent]
      });
    } catch (error) {
      if (error instanceof HealingExhausted) {
        state.failedCommands.push({ command, error: error.reason, task });
        this.logger.warn(`Skipping ${command}: ${error.reason}`);
        return null;
      }
      throw error;
    }
  }
}
