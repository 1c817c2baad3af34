import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { loadConfig } from '../src/config/EngineConfig';
import { ConsoleLogger, LogLevel, parseLogLevel } from '../src/logging/Logger';
import { ENV_EXAMPLE, runSetup } from '../src/setup';
import { EXAMPLE_CUSTOM_PATTERNS, loadCustomPatterns } from '../src/evidence/PatternLoader';
import { Redactor } from '../src/evidence/Redactor';
import { ValidationError } from '../src/errors';

describe('loadConfig', () => {
    test('Uses defaults for an empty environment', () => {
        const config = loadConfig({});

        expect(config.maxIterations).toBe(15);
        expect(config.commandTimeoutSeconds).toBe(1800);
        expect(config.evidenceStorageThreshold).toBe(250000);
        expect(config.maxChatMessages).toBe(50);
        expect(config.retry).toEqual({ maxAttempts: 3, baseDelaySeconds: 5, multiplier: 2 });
        expect(config.logLevel).toBe(LogLevel.Info);
        expect(config.openaiApiKey).toBeUndefined();
    });

    test('Reads values from the environment', () => {
        const config = loadConfig({
            MAX_ITERATIONS: '4',
            USE_EMBEDDINGS: 'no',
            OPENAI_API_KEY: ' test-secret ',
            LLM_RETRY_BASE_DELAY: '0.5',
            LOG_LEVEL: 'DEBUG'
        });

        expect(config.maxIterations).toBe(4);
        expect(config.useEmbeddings).toBe(false);
        expect(config.openaiApiKey).toBe('test-secret');
        expect(config.retry.baseDelaySeconds).toBe(0.5);
        expect(config.logLevel).toBe(LogLevel.Debug);
    });

    test('Lets overrides win over the environment', () => {
        expect(loadConfig({ MAX_ITERATIONS: '4' }, { maxIterations: 2 }).maxIterations).toBe(2);
    });

    test('Rejects malformed values', () => {
        expect(() => loadConfig({ MAX_ITERATIONS: '0' })).toThrow("MAX_ITERATIONS must be an integer >= 1, got '0'");
        expect(() => loadConfig({ MAX_COMMAND_RETRIES: 'three' })).toThrow("MAX_COMMAND_RETRIES must be an integer >= 0, got 'three'");
        expect(() => loadConfig({ USE_EMBEDDINGS: 'maybe' })).toThrow("USE_EMBEDDINGS must be true or false, got 'maybe'");
        expect(() => loadConfig({ LLM_PROVIDER: 'other' })).toThrow("Unsupported LLM_PROVIDER 'other' (supported: openai)");
        expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(ValidationError);
    });

    test('Returns a frozen configuration', () => {
        const config = loadConfig({});

        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.retry)).toBe(true);
    });
});

describe('Logger', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'logger-'));
    });

    afterEach(() => {
        jest.restoreAllMocks();
        fs.removeSync(dir);
    });

    test('Parses level names', () => {
        expect(parseLogLevel('warning')).toBe(LogLevel.Warn);
        expect(parseLogLevel('none')).toBe(LogLevel.Silent);
        expect(() => parseLogLevel('loud')).toThrow("Unknown LOG_LEVEL 'loud'");
    });

    test('Filters by level and mirrors lines to the log file', () => {
        const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const file = path.join(dir, 'logs', 'run.log');
        const logger = new ConsoleLogger(LogLevel.Info, file);

        logger.debug('hidden');
        logger.info('starting');
        logger.warn('slow command');
        logger.error('failed');

        expect(log).toHaveBeenCalledTimes(1);
        expect(error).toHaveBeenCalledTimes(2);
        const lines = fs.readFileSync(file, 'utf-8').trim().split('\n').map(l => l.replace(/^\S+ \S+ /, ''));
        expect(lines).toEqual(['starting', 'WARN slow command', 'ERROR failed']);
    });
});

describe('runSetup', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'setup-'));
    });

    afterEach(() => {
        fs.removeSync(dir);
    });

    test('Writes starter files once', async () => {
        const envFile = path.join(dir, '.env.example');
        const patternsFile = path.join(dir, '.redaction', 'custom_patterns.example.json');

        expect(await runSetup(dir)).toEqual({ written: [envFile, patternsFile], skipped: [] });
        expect(fs.readFileSync(envFile, 'utf-8')).toBe(ENV_EXAMPLE);
        expect(await runSetup(dir)).toEqual({ written: [], skipped: [envFile, patternsFile] });
    });

    test('Writes an example pattern file that loads cleanly', async () => {
        await runSetup(dir);

        const patterns = await loadCustomPatterns(path.join(dir, '.redaction', 'custom_patterns.example.json'));
        const redactor = new Redactor(patterns);

        expect(patterns).toEqual(EXAMPLE_CUSTOM_PATTERNS);
        expect(redactor.rejectedPatterns).toEqual([]);
        expect(redactor.redact('Ticket for CUST-12345678').redacted).toBe('Ticket for [REDACTED:CustomerID]');
    });
});

describe('loadCustomPatterns', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'patterns-'));
    });

    afterEach(() => {
        fs.removeSync(dir);
    });

    test('Treats a missing file as no patterns', async () => {
        expect(await loadCustomPatterns(path.join(dir, 'none.json'))).toEqual([]);
    });

    test('Rejects files that are not JSON', async () => {
        const file = path.join(dir, 'bad.json');
        fs.writeFileSync(file, '{ not json');

        await expect(loadCustomPatterns(file)).rejects.toThrow(`Custom pattern file ${file} is not valid JSON: `);
    });

    test('Rejects files that do not match the schema', async () => {
        const file = path.join(dir, 'wrong.json');
        fs.writeJSONSync(file, [{ name: 'X', pattern: 'x', description: 'd', severity: 'severe' }]);

        await expect(loadCustomPatterns(file)).rejects.toThrow(`Custom pattern file ${file} is invalid: `);
    });
});
