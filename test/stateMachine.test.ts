import { StateMachine } from '../src/orchestration/StateMachine';
import { createInitialState } from '../src/orchestration/InvestigationController';
import { AnalysisState, HypothesisTest, InvestigationPhase, TerminationReason } from '../src/types';

function stateIn(phase: InvestigationPhase, changes: Partial<AnalysisState> = {}): AnalysisState {
    return { ...createInitialState('s1', 'app.dmp', 'hang', 'user', 10), phase, ...changes };
}

function hypothesisTest(result: HypothesisTest['result']): HypothesisTest {
    return {
        hypothesis: 'Deadlock',
        testCommands: ['!syncblk'],
        expectedConfirmed: 'contention',
        expectedRejected: 'none',
        result,
        evidence: [],
        inconclusiveCount: 0,
        pendingCommands: []
    };
}

const plan = { tasks: ['a', 'b'], currentTaskIndex: 0, completedTasks: [], commandsForCurrentTask: 0 };

describe('StateMachine', () => {
    const sm = new StateMachine();

    test('Follows the phase graph', () => {
        expect(sm.canTransition(stateIn(InvestigationPhase.Plan), InvestigationPhase.Hypothesize).allowed).toBe(true);
        expect(sm.canTransition(stateIn(InvestigationPhase.Plan), InvestigationPhase.Investigate))
            .toEqual({ allowed: false, reason: 'No transition from Plan to Investigate.' });
        expect(sm.canTransition(stateIn(InvestigationPhase.Critique, { plan }), InvestigationPhase.Investigate).allowed).toBe(true);
        expect(sm.canTransition(stateIn(InvestigationPhase.Critique), InvestigationPhase.Reason).allowed).toBe(true);
        expect(sm.canTransition(stateIn(InvestigationPhase.Critique), InvestigationPhase.Hypothesize))
            .toEqual({ allowed: false, reason: 'No transition from Critique to Hypothesize.' });
    });

    test('Allows Report from every live phase and nothing after Done', () => {
        expect(sm.canTransition(stateIn(InvestigationPhase.Plan), InvestigationPhase.Report).allowed).toBe(true);
        expect(sm.canTransition(stateIn(InvestigationPhase.Test), InvestigationPhase.Report).allowed).toBe(true);
        expect(sm.canTransition(stateIn(InvestigationPhase.Done), InvestigationPhase.Report))
            .toEqual({ allowed: false, reason: 'Investigation already finished.' });
    });

    test('Only tests a hypothesis that is still open', () => {
        const noTests = stateIn(InvestigationPhase.Hypothesize, { hypothesis: { status: 'testing', attempts: 1, tests: [] } });
        const fresh = stateIn(InvestigationPhase.Hypothesize, { hypothesis: { status: 'testing', attempts: 1, tests: [hypothesisTest(null)] } });
        const inconclusive = stateIn(InvestigationPhase.Test, { hypothesis: { status: 'testing', attempts: 1, tests: [hypothesisTest('inconclusive')] } });
        const decided = stateIn(InvestigationPhase.Test, { hypothesis: { status: 'rejected', attempts: 1, tests: [hypothesisTest('rejected')] } });

        expect(sm.canTransition(noTests, InvestigationPhase.Test))
            .toEqual({ allowed: false, reason: 'Cannot Test: no hypothesis is under test.' });
        expect(sm.canTransition(fresh, InvestigationPhase.Test).allowed).toBe(true);
        expect(sm.canTransition(inconclusive, InvestigationPhase.Test).allowed).toBe(true);
        expect(sm.canTransition(decided, InvestigationPhase.Test).allowed).toBe(false);
    });

    test('Needs a plan to investigate', () => {
        expect(sm.canTransition(stateIn(InvestigationPhase.Hypothesize), InvestigationPhase.Investigate))
            .toEqual({ allowed: false, reason: 'Cannot Investigate: no plan.' });
        expect(sm.canTransition(stateIn(InvestigationPhase.Hypothesize, { plan }), InvestigationPhase.Investigate).allowed).toBe(true);
    });

    test('Checks termination in priority order', () => {
        const reasoning = {
            analysisSummary: 'done',
            keyFindings: [],
            confidenceLevel: 'high' as const,
            needsDeeperInvestigation: false,
            investigationRequests: [],
            iterations: 1
        };
        const finishedPlan = { ...plan, currentTaskIndex: 2 };

        expect(sm.checkTermination(stateIn(InvestigationPhase.Investigate, { userRequestedReport: true, iteration: 10 })))
            .toBe(TerminationReason.UserRequestedReport);
        expect(sm.checkTermination(stateIn(InvestigationPhase.Reason, { iteration: 10, reasoning })))
            .toBe(TerminationReason.IterationLimitReached);
        expect(sm.checkTermination(stateIn(InvestigationPhase.Reason, { reasoning, plan: finishedPlan })))
            .toBe(TerminationReason.NoFurtherInvestigation);
        expect(sm.checkTermination(stateIn(InvestigationPhase.Investigate, { reasoning, plan: finishedPlan })))
            .toBe(TerminationReason.PlanComplete);
        expect(sm.checkTermination(stateIn(InvestigationPhase.Investigate, { plan }))).toBeNull();
    });

    test('Reasons before reporting once the budget is spent', () => {
        expect(sm.afterIterationLimit(stateIn(InvestigationPhase.Investigate))).toBe(InvestigationPhase.Reason);
        expect(sm.afterIterationLimit(stateIn(InvestigationPhase.Investigate, {
            reasoning: {
                analysisSummary: '',
                keyFindings: [],
                confidenceLevel: 'low',
                needsDeeperInvestigation: false,
                investigationRequests: [],
                iterations: 1
            }
        }))).toBe(InvestigationPhase.Report);
    });
});
