import { Oracle, OracleMessage, OracleOutcome } from '../src/llm/Oracle';
import { ToolExecutor } from '../src/tool/ToolExecutor';
import { CommandFailure, CommandResult, Evidence } from '../src/types';
import { EngineConfig, loadConfig } from '../src/config/EngineConfig';
import { Analyzer } from '../src/analyzers/BaseAnalyzer';

export interface OracleCall {
    messages: OracleMessage[];
    temperature: number;
    maxTokens: number;
}

/** Replays queued outcomes in order; answers `fallback` once the queue is empty. */
export class ScriptedOracle implements Oracle {
    readonly calls: OracleCall[] = [];
    private queue: OracleOutcome[];

    constructor(outcomes: OracleOutcome[] = [], private fallback: OracleOutcome = { kind: 'failed', error: 'script exhausted', fatal: false }) {
        this.queue = [...outcomes];
    }

    async complete(messages: OracleMessage[], temperature: number, maxTokens: number): Promise<OracleOutcome> {
        this.calls.push({ messages, temperature, maxTokens });
        return this.queue.shift() ?? this.fallback;
    }
}

/** Chooses each reply from the last user message, so tests need not know call order. */
export class RoutingOracle implements Oracle {
    readonly prompts: string[] = [];

    constructor(private route: (prompt: string) => OracleOutcome) {}

    async complete(messages: OracleMessage[]): Promise<OracleOutcome> {
        const prompt = messages[messages.length - 1]?.content ?? '';
        this.prompts.push(prompt);
        return this.route(prompt);
    }
}

export function ok(value: unknown): OracleOutcome {
    return { kind: 'ok', text: typeof value === 'string' ? value : JSON.stringify(value) };
}

/** Serves canned debugger output per command; anything unknown fails like cdb does. */
export class FakeExecutor implements ToolExecutor {
    readonly executed: string[] = [];

    constructor(private outputs: Record<string, string | CommandResult>) {}

    async execute(command: string): Promise<CommandResult> {
        this.executed.push(command);
        const canned = this.outputs[command];
        if (canned === undefined) {
            return {
                command,
                output: `No export ${command} found`,
                success: false,
                error: `No export ${command} found`,
                failure: CommandFailure.ToolError
            };
        }
        return typeof canned === 'string' ? { command, output: canned, success: true } : canned;
    }
}

export function makeEvidence(command: string, summary: string | null, overrides: Partial<Evidence> = {}): Evidence {
    return {
        command,
        outputRef: { kind: 'inline', text: `output of ${command}` },
        finding: summary ?? 'Raw output captured (10 chars)',
        significance: '',
        confidence: summary ? 'medium' : 'low',
        summary,
        timestamp: '2026-01-01T00:00:00.000Z',
        ...overrides
    };
}

/** Evidence as the runner would record it after a successful analysis. */
export function analyzedEvidence(analyzer: Analyzer, command: string, output: string): Evidence {
    const result = analyzer.analyze(command, output);
    return makeEvidence(command, result.summary, {
        analyzer: analyzer.name,
        structuredData: result.structuredData ?? undefined
    });
}

// Live threads: ~0 (OSID 1a2c, lock holder), ~5 (2b3c, finalizer), ~12 (3d4c, managed id 14, exception)
export const THREADS_OUTPUT = [
    'ThreadCount:      4',
    'UnstartedThread:  0',
    'BackgroundThread: 3',
    'PendingThread:    0',
    'DeadThread:       1',
    'Hosted Runtime:   no',
    ' DBG   ID     OSID ThreadOBJ           State GC Mode     GC Alloc Context                  Domain           Count Apt Exception',
    '   0    1     1a2c 0000024f8a2d4e10    2a020 Preemptive  0000000000000000:0000000000000000 0000024f8a2c1230 1     MTA',
    '   5    2     2b3c 0000024f8a2f1a20    2b220 Preemptive  0000000000000000:0000000000000000 0000024f8a2c1230 0     MTA (Finalizer)',
    '  12   14     3d4c 0000024f8a301b30  1029220 Preemptive  0000000000000000:0000000000000000 0000024f8a2c1230 0     MTA (Threadpool Worker) System.OutOfMemoryException',
    'XXXX    3        0 0000024f8a311c40  1039820 Preemptive  0000000000000000:0000000000000000 0000024f8a2c1230 0     Ukn (Threadpool Worker) System.InvalidOperationException'
].join('\n');

export function testConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
    return loadConfig({}, { useEmbeddings: false, ...overrides });
}

export const noSleep = async (): Promise<void> => undefined;
