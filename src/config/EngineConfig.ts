import { ValidationError } from '../errors';
import { LogLevel, parseLogLevel } from '../logging/Logger';

export interface RetryPolicySettings {
  readonly maxAttempts: number;
  readonly baseDelaySeconds: number;
  readonly multiplier: number;
}

export interface EngineConfig {
  readonly maxIterations: number;
  readonly commandTimeoutSeconds: number;
  readonly maxCommandRetries: number;
  readonly maxHypothesisAttempts: number;
  readonly maxInconclusiveRounds: number;
  readonly maxTestCommands: number;
  readonly maxCommandsPerTask: number;
  readonly maxReasoningIterations: number;
  readonly maxCritiqueRounds: number;
  readonly maxChatMessages: number;

  readonly evidenceStorageThreshold: number; // characters
  readonly useEmbeddings: boolean;
  readonly embeddingsModel: string;

  readonly sessionsBaseDir: string;
  readonly sessionCleanupDays: number;
  readonly sessionKeepRecent: number;

  readonly enableRedactionAudit: boolean;
  readonly customPatternsPath: string;

  readonly llmProvider: string;
  readonly openaiModel: string;
  readonly openaiApiKey?: string;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly retry: RetryPolicySettings;

  readonly cdbPath: string;
  readonly symbolPath: string;

  readonly logLevel: LogLevel;
}

export const DEFAULT_SYMBOL_PATH = 'srv*https://msdl.microsoft.com/download/symbols';

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ValidationError(`${key} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

function readFloat(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${key} must be a number, got '${raw}'`);
  }
  return value;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  switch (raw.trim().toLowerCase()) {
    case 'true': case '1': case 'yes': return true;
    case 'false': case '0': case 'no': return false;
    default:
      throw new ValidationError(`${key} must be true or false, got '${raw}'`);
  }
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key];
  return raw === undefined || raw.trim() === '' ? fallback : raw.trim();
}

/**
 * Builds the engine configuration once from environment variables.
 * The CLI calls dotenv before this; components only ever see the frozen result.
 */
export function loadConfig(env: Env = process.env, overrides: Partial<EngineConfig> = {}): EngineConfig {
  const apiKey = env.OPENAI_API_KEY?.trim();

  const config: EngineConfig = {
    maxIterations: readInt(env, 'MAX_ITERATIONS', 15, 1),
    commandTimeoutSeconds: readInt(env, 'COMMAND_TIMEOUT', 1800, 1),
    maxCommandRetries: readInt(env, 'MAX_COMMAND_RETRIES', 3),
    maxHypothesisAttempts: readInt(env, 'MAX_HYPOTHESIS_ATTEMPTS', 8, 1),
    maxInconclusiveRounds: readInt(env, 'MAX_INCONCLUSIVE_ROUNDS', 2, 1),
    maxTestCommands: readInt(env, 'MAX_TEST_COMMANDS', 3, 1),
    maxCommandsPerTask: readInt(env, 'MAX_COMMANDS_PER_TASK', 3, 1),
    maxReasoningIterations: readInt(env, 'MAX_REASONING_ITERATIONS', 2),
    maxCritiqueRounds: readInt(env, 'MAX_CRITIQUE_ROUNDS', 2),
    maxChatMessages: readInt(env, 'MAX_CHAT_MESSAGES', 50, 2),

    evidenceStorageThreshold: readInt(env, 'EVIDENCE_STORAGE_THRESHOLD', 250000, 1),
    useEmbeddings: readBool(env, 'USE_EMBEDDINGS', true),
    embeddingsModel: readString(env, 'EMBEDDINGS_MODEL', 'text-embedding-3-small'),

    sessionsBaseDir: readString(env, 'SESSIONS_BASE_DIR', '.sessions'),
    sessionCleanupDays: readInt(env, 'SESSION_CLEANUP_DAYS', 7),
    sessionKeepRecent: readInt(env, 'SESSION_KEEP_RECENT', 5),

    enableRedactionAudit: readBool(env, 'ENABLE_REDACTION_AUDIT', false),
    customPatternsPath: readString(env, 'CUSTOM_PATTERNS_PATH', '.redaction/custom_patterns.json'),

    llmProvider: readString(env, 'LLM_PROVIDER', 'openai'),
    openaiModel: readString(env, 'OPENAI_MODEL', 'gpt-4o'),
    openaiApiKey: apiKey ? apiKey : undefined,
    temperature: readFloat(env, 'LLM_TEMPERATURE', 0.1),
    maxTokens: readInt(env, 'LLM_MAX_TOKENS', 4000, 1),
    retry: {
      maxAttempts: readInt(env, 'LLM_RETRY_ATTEMPTS', 3, 1),
      baseDelaySeconds: readFloat(env, 'LLM_RETRY_BASE_DELAY', 5),
      multiplier: readFloat(env, 'LLM_RETRY_MULTIPLIER', 2)
    },

    cdbPath: readString(env, 'CDB_PATH', 'cdb'),
    symbolPath: readString(env, 'SYMBOL_PATH', DEFAULT_SYMBOL_PATH),

    logLevel: parseLogLevel(readString(env, 'LOG_LEVEL', 'info')),
    ...overrides
  };

  if (config.llmProvider !== 'openai') {
    throw new ValidationError(`Unsupported LLM_PROVIDER '${config.llmProvider}' (supported: openai)`);
  }

  return Object.freeze({ ...config, retry: Object.freeze({ ...config.retry }) });
}
