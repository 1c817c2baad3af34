import { AnalysisState, InvestigationPhase, TerminationReason } from "../types";

const P = InvestigationPhase;

const TRANSITIONS: Record<InvestigationPhase, InvestigationPhase[]> = {
  [P.Plan]: [P.Hypothesize],
  [P.Hypothesize]: [P.Test, P.Investigate, P.Reason],
  [P.Test]: [P.Test, P.Hypothesize, P.Investigate, P.Reason],
  [P.Investigate]: [P.Investigate, P.Reason],
  [P.Reason]: [P.Investigate, P.Critique],
  [P.Critique]: [P.Investigate, P.Reason],
  [P.Report]: [P.Done],
  [P.Done]: []
};

export class StateMachine {

  canTransition(current: AnalysisState, next: InvestigationPhase): { allowed: boolean; reason?: string } {
    const from = current.phase;
    if (from === P.Done) {
      return { allowed: false, reason: "Investigation already finished." };
    }

    // Any live phase may jump to Report: limits, critique exhaustion or a user request
    if (next === P.Report) return { allowed: true };

    if (!TRANSITIONS[from].includes(next)) {
      return { allowed: false, reason: `No transition from ${from} to ${next}.` };
    }

    // Gate: Test needs a hypothesis under test
    const tests = current.hypothesis?.tests ?? [];
    const latest = tests[tests.length - 1];
    if (next === P.Test && (!latest || latest.result === 'confirmed' || latest.result === 'rejected')) {
      return { allowed: false, reason: "Cannot Test: no hypothesis is under test." };
    }

    // Gate: Investigate needs a plan
    if (next === P.Investigate && !current.plan) {
      return { allowed: false, reason: "Cannot Investigate: no plan." };
    }

    return { allowed: true };
  }

  /**
   * Why the run should stop investigating, if it should, checked in
   * priority order.
   */
  checkTermination(current: AnalysisState): TerminationReason | null {
    if (current.userRequestedReport) {
      return TerminationReason.UserRequestedReport;
    }
    if (current.iteration >= current.maxIterations) {
      return TerminationReason.IterationLimitReached;
    }
    if (current.phase === P.Reason && current.reasoning && !current.reasoning.needsDeeperInvestigation) {
      return TerminationReason.NoFurtherInvestigation;
    }
    if (current.plan && current.plan.currentTaskIndex >= current.plan.tasks.length) {
      return TerminationReason.PlanComplete;
    }
    return null;
  }

  /** Where a run goes once the iteration budget is spent. */
  afterIterationLimit(current: AnalysisState): InvestigationPhase {
    return current.reasoning ? P.Report : P.Reason;
  }
}
