import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { CdbExecutor, ProcessOutput, ProcessRunner, extractToolError } from '../src/tool/CdbExecutor';
import { CommandFailure } from '../src/types';
import { ValidationError } from '../src/errors';

interface RunnerCall {
    file: string;
    args: string[];
    timeoutMs: number;
}

function fakeRunner(output: Partial<ProcessOutput> | ((args: string[]) => Partial<ProcessOutput>), calls: RunnerCall[] = []): ProcessRunner {
    return async (file, args, timeoutMs) => {
        calls.push({ file, args, timeoutMs });
        const produced = typeof output === 'function' ? output(args) : output;
        return { exitCode: 0, stdout: '', stderr: '', timedOut: false, ...produced };
    };
}

describe('extractToolError', () => {
    test('Finds the first error line', () => {
        expect(extractToolError('0:000> !foo\nNo export foo found\nError: later')).toBe('No export foo found');
        expect(extractToolError('  ^^^ Error: Syntax error in expression  ')).toBe('^^^ Error: Syntax error in expression');
        expect(extractToolError("Couldn't resolve error at 'kb 5x'")).toBe("Couldn't resolve error at 'kb 5x'");
    });

    test('Returns null for clean output', () => {
        expect(extractToolError('Thread 0\nChild-SP RetAddr Call Site')).toBeNull();
    });
});

describe('CdbExecutor', () => {
    test('Runs one-shot cdb with the dump, symbols and a trailing quit', async () => {
        const calls: RunnerCall[] = [];
        const executor = new CdbExecutor('/dumps/app.dmp', 'cdb.exe', 'srv*c:\\symbols', undefined, fakeRunner({ stdout: 'OK' }, calls));

        const result = await executor.execute('!threads', 30);

        expect(result).toEqual({ command: '!threads', output: 'OK', success: true });
        expect(calls).toEqual([{
            file: 'cdb.exe',
            args: ['-z', '/dumps/app.dmp', '-y', 'srv*c:\\symbols', '-lines', '-c', '!threads; q'],
            timeoutMs: 30000
        }]);
    });

    test('Reports timeouts with the partial output', async () => {
        const executor = new CdbExecutor('/dumps/app.dmp', 'cdb', 'sym', undefined, fakeRunner({ stdout: 'partial', stderr: 'noise', timedOut: true }));

        expect(await executor.execute('!dumpheap', 30)).toEqual({
            command: '!dumpheap',
            output: 'partial',
            success: false,
            error: 'Command timed out after 30 seconds',
            failure: CommandFailure.Timeout
        });
    });

    test('Prefers the error cdb printed over the exit code', async () => {
        const printed = new CdbExecutor('/dumps/app.dmp', 'cdb', 'sym', undefined, fakeRunner({ stdout: 'No export foo found', exitCode: 1 }));
        const silent = new CdbExecutor('/dumps/app.dmp', 'cdb', 'sym', undefined, fakeRunner({ stdout: 'done', exitCode: 2 }));

        expect((await printed.execute('!foo', 30)).error).toBe('No export foo found');
        expect(await silent.execute('lm', 30)).toEqual({
            command: 'lm',
            output: 'done',
            success: false,
            error: 'cdb exited with code 2',
            failure: CommandFailure.ToolError
        });
    });

    test('Turns a launch failure into a failed result', async () => {
        const runner: ProcessRunner = async () => {
            throw new Error('Failed to start cdb: spawn cdb ENOENT');
        };
        const executor = new CdbExecutor('/dumps/app.dmp', 'cdb', 'sym', undefined, runner);

        expect(await executor.execute('lm', 30)).toEqual({
            command: 'lm',
            output: '',
            success: false,
            error: 'Failed to start cdb: spawn cdb ENOENT',
            failure: CommandFailure.ToolError
        });
    });

    test('Runs one debugger process at a time', async () => {
        let active = 0;
        let peak = 0;
        const runner: ProcessRunner = async (_file, args) => {
            active++;
            peak = Math.max(peak, active);
            await new Promise(resolve => setTimeout(resolve, 5));
            active--;
            return { exitCode: 0, stdout: args[args.length - 1], stderr: '', timedOut: false };
        };
        const executor = new CdbExecutor('/dumps/app.dmp', 'cdb', 'sym', undefined, runner);

        const results = await Promise.all(['!threads', '!syncblk', 'lm'].map(c => executor.execute(c, 30)));

        expect(results.map(r => r.output)).toEqual(['!threads; q', '!syncblk; q', 'lm; q']);
        expect(peak).toBe(1);
    });

    describe('dump checks', () => {
        let dir: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cdb-'));
        });

        afterEach(() => {
            fs.removeSync(dir);
        });

        test('Rejects missing files and other extensions', async () => {
            const missing = path.join(dir, 'gone.dmp');
            const text = path.join(dir, 'notes.txt');
            fs.writeFileSync(text, 'x');

            await expect(new CdbExecutor(missing, 'cdb', 'sym', undefined, fakeRunner({})).validateDump())
                .rejects.toThrow(`Dump file not found: ${missing}`);
            await expect(new CdbExecutor(text, 'cdb', 'sym', undefined, fakeRunner({})).validateDump())
                .rejects.toThrow(`Not a .dmp file: ${text}`);
        });

        test('Asks cdb for the last event', async () => {
            const dump = path.join(dir, 'app.dmp');
            fs.writeFileSync(dump, 'MDMP');
            const calls: RunnerCall[] = [];

            const output = await new CdbExecutor(dump, 'cdb', 'sym', undefined, fakeRunner({ stdout: 'Last event: 1a2c.1a30: Break instruction' }, calls)).validateDump();

            expect(output).toBe('Last event: 1a2c.1a30: Break instruction');
            expect(calls[0].args[6]).toBe('.lastevent; q');
            expect(calls[0].timeoutMs).toBe(120000);
        });

        test('Fails when cdb cannot open the dump', async () => {
            const dump = path.join(dir, 'app.dmp');
            fs.writeFileSync(dump, 'MDMP');
            const executor = new CdbExecutor(dump, 'cdb', 'sym', undefined, fakeRunner({ stdout: 'Unable to open dump file' }));

            const check = executor.validateDump();

            await expect(check).rejects.toThrow(ValidationError);
            await expect(check).rejects.toThrow('Debugger could not load app.dmp: Unable to open dump file');
        });
    });

    test('Detects kernel dumps', async () => {
        const kernel = new CdbExecutor('/dumps/k.dmp', 'cdb', 'sym', undefined, fakeRunner({ stdout: '. 0 Kernel bitmap dump' }));
        const user = new CdbExecutor('/dumps/u.dmp', 'cdb', 'sym', undefined, fakeRunner({ stdout: '. 0 id: 1a2c examine name: user mini dump: kernel32 loaded' }));

        expect(await kernel.detectDumpType()).toBe('kernel');
        expect(await user.detectDumpType()).toBe('user');
    });
});
