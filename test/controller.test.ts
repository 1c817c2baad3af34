import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { createEngine } from '../src/engine';
import { ConfirmCallback, commandsFromActions, createInitialState } from '../src/orchestration/InvestigationController';
import { SessionManager } from '../src/storage/SessionManager';
import { EngineConfig } from '../src/config/EngineConfig';
import { silentLogger } from '../src/logging/Logger';
import { OracleOutcome } from '../src/llm/Oracle';
import { ProviderFatalError } from '../src/errors';
import { InvestigationPhase, SessionInfo, TerminationReason } from '../src/types';
import { FakeExecutor, RoutingOracle, noSleep, ok, testConfig } from './helpers';

type Step = 'heal' | 'plan' | 'hypothesis' | 'evaluation' | 'investigator' | 'reasoner' | 'critic' | 'report';
type Replies = Record<Step, (prompt: string) => OracleOutcome>;

const MARKERS: Array<[Step, string]> = [
    ['heal', 'FAILED COMMAND:'],
    ['plan', 'Create an investigation plan'],
    ['hypothesis', 'Propose the single most likely root cause'],
    ['evaluation', 'Decide whether the evidence confirms'],
    ['investigator', 'CURRENT TASK:'],
    ['reasoner', 'Synthesize what the evidence shows'],
    ['critic', 'Review the analysis as a skeptical'],
    ['report', 'Write the final root-cause report']
];

const THREADPOOL_OUTPUT = [
    'CPU utilization: 95%',
    'Worker Thread: Total: 16 Running: 16 Idle: 0 MaxLimit: 16 MinLimit: 4',
    'Work Request in Queue: 42'
].join('\n');

const SYNCBLK_OUTPUT = [
    'Index         SyncBlock MonitorHeld Recursion Owning Thread Info          SyncBlock Owner',
    '   12 0000024f8a3b1c28            5         1 0000024f8a2d4e10 1a2c  14   0000024f8c7e5a30 System.Object',
    'Total           20'
].join('\n');

const HYPOTHESIS = 'Thread pool starvation';

function defaultReplies(): Replies {
    return {
        heal: () => ok('SKIP'),
        plan: () => ok({ tasks: ['Check thread pool'] }),
        hypothesis: () => ok({
            hypothesis: HYPOTHESIS,
            reasoning: 'hang with busy workers',
            testCommands: ['!threadpool'],
            expectedConfirmed: 'No idle workers',
            expectedRejected: 'Idle workers available'
        }),
        evaluation: () => ok({ result: 'confirmed', reasoning: '0 idle workers, 42 queued' }),
        investigator: () => ok({ command: '!syncblk', taskComplete: false, rationale: 'look for lock owners' }),
        reasoner: () => ok({
            analysisSummary: 'Thread pool starvation caused the hang',
            keyFindings: ['No idle worker threads'],
            confidenceLevel: 'high'
        }),
        critic: () => ok({ issuesFound: false }),
        report: () => ok('# Root Cause\nThread pool starvation')
    };
}

function routing(replies: Replies): RoutingOracle {
    return new RoutingOracle(prompt => {
        const step = MARKERS.find(([, marker]) => prompt.includes(marker));
        return step ? replies[step[0]](prompt) : { kind: 'failed', error: 'unexpected prompt', fatal: false };
    });
}

describe('InvestigationController', () => {
    let dir: string;
    let sessions: SessionManager;
    let session: SessionInfo;
    let executor: FakeExecutor;

    beforeEach(async () => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'controller-'));
        sessions = new SessionManager(path.join(dir, 'sessions'));
        session = await sessions.createSession(path.join(dir, 'app.dmp'));
        executor = new FakeExecutor({ '!threadpool': THREADPOOL_OUTPUT, '!syncblk': SYNCBLK_OUTPUT });
    });

    afterEach(() => {
        fs.removeSync(dir);
    });

    function engineFor(oracle: RoutingOracle, config: EngineConfig = testConfig(), confirm?: ConfirmCallback) {
        return createEngine({
            config,
            session,
            sessions,
            executor,
            oracle,
            embeddings: null,
            customPatterns: [],
            logger: silentLogger,
            confirm,
            sleep: noSleep
        });
    }

    function initialState(maxIterations = 15) {
        return createInitialState(session.id, session.dumpPath, 'App hangs under load', 'user', maxIterations);
    }

    test('Runs a confirmed hypothesis through to a saved report', async () => {
        const engine = engineFor(routing(defaultReplies()));

        const outcome = await engine.controller.run(initialState());
        const state = outcome.state;

        expect(outcome.status).toBe('completed');
        expect(outcome.reportPath).toBe(path.join(session.dir, 'report.md'));
        expect(fs.readFileSync(path.join(session.dir, 'report.md'), 'utf-8')).toBe('# Root Cause\nThread pool starvation');
        expect(state.phaseHistory.map(t => t.to)).toEqual([
            InvestigationPhase.Hypothesize,
            InvestigationPhase.Test,
            InvestigationPhase.Investigate,
            InvestigationPhase.Reason,
            InvestigationPhase.Critique,
            InvestigationPhase.Report,
            InvestigationPhase.Done
        ]);
        expect(state.hypothesis?.tests[0].result).toBe('confirmed');
        expect(state.hypothesis?.status).toBe('confirmed');
        expect(executor.executed).toEqual(['!threadpool', '!syncblk']);
        expect(state.iteration).toBe(2);
        expect(state.terminationReason).toBe(TerminationReason.NoFurtherInvestigation);
        expect(Object.keys(state.evidenceInventory)).toEqual(['Check thread pool', `Hypothesis Test: ${HYPOTHESIS}`]);
        expect(state.evidenceInventory['Check thread pool'][0].finding).toBe('Found 1 sync blocks with contention out of 20 total.');
        expect(state.evidenceInventory[`Hypothesis Test: ${HYPOTHESIS}`][0].confidence).toBe('high');
        expect(state.critique?.round).toBe(1);
        expect(state.critique?.hasUnresolvedIssues).toBe(false);

        const saved = fs.readJSONSync(path.join(session.dir, 'state.json'));
        expect(saved.phase).toBe('Done');
    });

    test('Redacts everything sent to the oracle', async () => {
        const oracle = routing(defaultReplies());
        const engine = engineFor(oracle);
        const state = createInitialState(session.id, session.dumpPath, 'Reported by ops@corp.example: app hangs', 'user', 15);

        await engine.controller.run(state);

        expect(oracle.prompts[0]).toContain('ISSUE: Reported by [REDACTED:EmailAddress]: app hangs');
        expect(oracle.prompts.some(p => p.includes('ops@corp.example'))).toBe(false);
    });

    test('Heals commands and records the ones that cannot run', async () => {
        const replies = defaultReplies();
        replies.hypothesis = () => ok({
            hypothesis: HYPOTHESIS,
            testCommands: ['threadpool', '!bogus'],
            expectedConfirmed: 'No idle workers',
            expectedRejected: 'Idle workers available'
        });
        replies.heal = prompt => (prompt.includes('FAILED COMMAND: threadpool') ? ok('!threadpool') : ok('SKIP'));
        replies.evaluation = () => ok({ result: 'rejected', reasoning: 'workers are idle' });
        replies.report = () => ok('');
        const engine = engineFor(routing(replies), testConfig({ maxHypothesisAttempts: 1, maxCritiqueRounds: 0 }));

        const { state } = await engine.controller.run(initialState());

        expect(executor.executed).toEqual(['threadpool', '!threadpool', '!bogus']);
        expect(state.failedCommands).toEqual([{
            command: '!bogus',
            error: 'No export !bogus found (oracle declined)',
            task: `Hypothesis Test: ${HYPOTHESIS}`
        }]);
        expect(state.hypothesis?.tests[0].result).toBe('rejected');
        expect(state.hypothesis?.tests[0].evidence.map(e => e.command)).toEqual(['!threadpool']);
        expect(engine.healer.getStats()).toEqual({ successfulHeals: 1, failedHeals: 1, successRate: 0.5 });
        expect(state.report?.split('\n')[0]).toBe('# Dump Analysis Report');
        expect(state.report).toContain('- **Stopped because:** no further investigation needed');
        expect(state.report).toContain('- `!bogus`: No export !bogus found (oracle declined)');
    });

    test('Gathers more evidence for inconclusive results, then rejects', async () => {
        const replies = defaultReplies();
        replies.evaluation = () => ok({ result: 'inconclusive', reasoning: 'need lock data', additionalCommands: ['!syncblk'] });
        const engine = engineFor(routing(replies), testConfig({ maxHypothesisAttempts: 1, maxInconclusiveRounds: 2, maxCritiqueRounds: 0 }));

        const { state } = await engine.controller.run(initialState());
        const test = state.hypothesis?.tests[0];

        expect(test?.result).toBe('rejected');
        expect(test?.inconclusiveCount).toBe(2);
        expect(test?.evidence.map(e => e.command)).toEqual(['!threadpool', '!syncblk']);
        expect(executor.executed).toEqual(['!threadpool', '!syncblk']);
        expect(state.iteration).toBe(2);
        expect(state.phase).toBe(InvestigationPhase.Done);
    });

    test('Goes to reasoning and then the report once the iteration budget is spent', async () => {
        const engine = engineFor(routing(defaultReplies()));

        const { state } = await engine.controller.run(initialState(1));

        expect(executor.executed).toEqual(['!threadpool']);
        expect(state.terminationReason).toBe(TerminationReason.IterationLimitReached);
        expect(state.reasoning?.iterations).toBe(1);
        expect(state.critique).toBeUndefined();
        expect(state.phase).toBe(InvestigationPhase.Done);
    });

    test('Follows up on reasoner requests', async () => {
        const replies = defaultReplies();
        let reasonerCalls = 0;
        replies.reasoner = () => {
            reasonerCalls++;
            return reasonerCalls === 1
                ? ok({
                    analysisSummary: 'Starvation, lock owner unknown',
                    confidenceLevel: 'medium',
                    needsDeeperInvestigation: true,
                    investigationRequests: [{ question: 'Which thread holds the lock', approach: '!syncblk' }]
                })
                : ok({ analysisSummary: 'Thread 14 holds the lock', confidenceLevel: 'high' });
        };
        const engine = engineFor(routing(replies), testConfig({ maxCritiqueRounds: 0 }));

        const { state } = await engine.controller.run(initialState());

        expect(state.plan?.tasks).toEqual(['Which thread holds the lock (approach: !syncblk)']);
        expect(state.reasoning?.iterations).toBe(2);
        expect(state.reasoning?.analysisSummary).toBe('Thread 14 holds the lock');
        expect(executor.executed).toEqual(['!threadpool', '!syncblk', '!syncblk']);
    });

    test('Investigates critique gaps before reporting', async () => {
        const replies = defaultReplies();
        let critiques = 0;
        replies.critic = () => {
            critiques++;
            return critiques === 1 ? ok({ issuesFound: true, evidenceGaps: ['Inspect finalizer queue'] }) : ok({ issuesFound: false });
        };
        replies.investigator = prompt => (prompt.includes('CURRENT TASK: Inspect finalizer queue')
            ? ok({ command: null, taskComplete: true, rationale: 'already known' })
            : ok({ command: '!syncblk', taskComplete: false, rationale: 'look for lock owners' }));
        const engine = engineFor(routing(replies), testConfig({ maxCritiqueRounds: 2 }));

        const { state } = await engine.controller.run(initialState());

        expect(critiques).toBe(2);
        expect(state.critique?.round).toBe(2);
        expect(state.critique?.hasUnresolvedIssues).toBe(false);
        expect(state.plan?.completedTasks).toEqual(['Inspect finalizer queue']);
        expect(state.reasoning?.iterations).toBe(2);
    });

    test('Runs commands the review asks for and reasons again', async () => {
        executor = new FakeExecutor({
            '!threadpool': THREADPOOL_OUTPUT,
            '!syncblk': SYNCBLK_OUTPUT,
            '!finalizequeue': [
                'generation 2 has 12 finalizable objects (0000024f8a1b2500->0000024f8a1b2560)',
                'Ready for finalization 0 objects (0000024f8a1b2560->0000024f8a1b2560)'
            ].join('\n')
        });
        const replies = defaultReplies();
        let critiques = 0;
        replies.critic = () => {
            critiques++;
            return critiques === 1
                ? ok({
                    issuesFound: true,
                    suggestedActions: ['Run !finalizequeue to check the finalizer backlog', 'Re-check !syncblk for lock owners']
                })
                : ok({ issuesFound: false });
        };
        const engine = engineFor(routing(replies), testConfig({ maxCritiqueRounds: 2 }));

        const { state } = await engine.controller.run(initialState());

        expect(critiques).toBe(2);
        expect(executor.executed).toEqual(['!threadpool', '!syncblk', '!finalizequeue']);
        expect(state.evidenceInventory['Critique-requested evidence'].map(e => e.finding)).toEqual([
            '12 finalizable objects across 1 heap(s), 0 ready for finalization.'
        ]);
        expect(state.phaseHistory.map(t => t.to)).toEqual([
            InvestigationPhase.Hypothesize,
            InvestigationPhase.Test,
            InvestigationPhase.Investigate,
            InvestigationPhase.Reason,
            InvestigationPhase.Critique,
            InvestigationPhase.Reason,
            InvestigationPhase.Critique,
            InvestigationPhase.Report,
            InvestigationPhase.Done
        ]);
        expect(state.iteration).toBe(3);
        expect(state.reasoning?.iterations).toBe(2);
        expect(state.critique?.round).toBe(2);
    });

    test('Shows raw output of unanalyzed commands to the evaluator and the reasoner', async () => {
        executor = new FakeExecutor({ '!pe': 'Exception type: System.OutOfMemoryException\nMessage: <none>', '!syncblk': SYNCBLK_OUTPUT });
        const replies = defaultReplies();
        replies.hypothesis = () => ok({
            hypothesis: 'Out of memory',
            testCommands: ['!pe'],
            expectedConfirmed: 'OutOfMemoryException on the faulting thread',
            expectedRejected: 'Some other exception'
        });
        const oracle = routing(replies);
        const engine = engineFor(oracle, testConfig({ maxCritiqueRounds: 0 }));

        const { state } = await engine.controller.run(initialState());

        const evaluation = oracle.prompts.find(p => p.includes('Decide whether the evidence confirms'));
        const reasoning = oracle.prompts.find(p => p.includes('Synthesize what the evidence shows'));
        expect(state.hypothesis?.tests[0].evidence[0].summary).toBeNull();
        expect(evaluation).toContain('    Output:\n      Exception type: System.OutOfMemoryException\n      Message: <none>');
        expect(reasoning).toContain('      Exception type: System.OutOfMemoryException');
    });

    test('Stops when the user aborts', async () => {
        const engine = engineFor(routing(defaultReplies()), testConfig(), async () => 'abort');

        const outcome = await engine.controller.run(initialState());

        expect(outcome.status).toBe('aborted');
        expect(outcome.state.phase).toBe(InvestigationPhase.Hypothesize);
        expect(fs.readJSONSync(path.join(session.dir, 'state.json')).phase).toBe('Hypothesize');
        expect(fs.pathExistsSync(path.join(session.dir, 'report.md'))).toBe(false);
    });

    test('Writes the report early when the user asks for it', async () => {
        const seen: Array<[InvestigationPhase, InvestigationPhase]> = [];
        const engine = engineFor(routing(defaultReplies()), testConfig(), async (from, to) => {
            seen.push([from, to]);
            return 'report';
        });

        const outcome = await engine.controller.run(initialState());

        expect(seen).toEqual([[InvestigationPhase.Plan, InvestigationPhase.Hypothesize]]);
        expect(outcome.state.userRequestedReport).toBe(true);
        expect(outcome.state.terminationReason).toBe(TerminationReason.UserRequestedReport);
        expect(outcome.state.report).toBe('# Root Cause\nThread pool starvation');
        expect(executor.executed).toEqual([]);
    });

    test('Saves state and rethrows on fatal provider errors', async () => {
        const replies = defaultReplies();
        replies.plan = () => ({ kind: 'failed', error: 'invalid api key', fatal: true });
        const engine = engineFor(routing(replies));

        await expect(engine.controller.run(initialState())).rejects.toThrow(ProviderFatalError);
        expect(fs.readJSONSync(path.join(session.dir, 'state.json')).phase).toBe('Plan');
    });

    test('Uses the default plan when planning fails', async () => {
        const replies = defaultReplies();
        replies.plan = () => ({ kind: 'failed', error: 'bad gateway', fatal: false });
        replies.investigator = () => ok({ command: null, taskComplete: true, rationale: 'nothing to add' });
        const engine = engineFor(routing(replies), testConfig({ maxCritiqueRounds: 0 }));

        const { state } = await engine.controller.run(initialState());

        expect(state.plan?.tasks).toEqual([
            'Examine crash context and exception details',
            'Analyze call stack and thread states',
            'Investigate memory and heap state'
        ]);
        expect(state.plan?.completedTasks).toHaveLength(3);
    });
});

describe('commandsFromActions', () => {
    test('Pulls debugger commands out of suggested actions', () => {
        expect(commandsFromActions([
            'Run !finalizequeue -detail to confirm',
            'Check ~12e !clrstack and !syncblk',
            'Run !finalizequeue -detail again',
            'Look at !dumpheap -stat -min -max -live'
        ])).toEqual(['!finalizequeue -detail', '~12e !clrstack', '!syncblk']);
        expect(commandsFromActions(['Explain the timeline more clearly'])).toEqual([]);
    });
});
