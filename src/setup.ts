import * as fs from 'fs-extra';
import * as path from 'path';
import { EXAMPLE_CUSTOM_PATTERNS } from './evidence/PatternLoader';
import { DEFAULT_SYMBOL_PATH } from './config/EngineConfig';

export const ENV_EXAMPLE = `# LLM provider
LLM_PROVIDER=openai
OPENAI_API_KEY=your-api-key-here
OPENAI_MODEL=gpt-4o
LLM_TEMPERATURE=0.1
LLM_MAX_TOKENS=4000

# Debugger
CDB_PATH=cdb
SYMBOL_PATH=${DEFAULT_SYMBOL_PATH}
COMMAND_TIMEOUT=1800

# Investigation limits
MAX_ITERATIONS=15
MAX_COMMAND_RETRIES=3
MAX_HYPOTHESIS_ATTEMPTS=8
MAX_INCONCLUSIVE_ROUNDS=2
MAX_TEST_COMMANDS=3
MAX_COMMANDS_PER_TASK=3
MAX_REASONING_ITERATIONS=2
MAX_CRITIQUE_ROUNDS=2
MAX_CHAT_MESSAGES=50

# Evidence
EVIDENCE_STORAGE_THRESHOLD=250000
USE_EMBEDDINGS=true
EMBEDDINGS_MODEL=text-embedding-3-small

# Sessions
SESSIONS_BASE_DIR=.sessions
SESSION_CLEANUP_DAYS=7
SESSION_KEEP_RECENT=5

# Redaction
ENABLE_REDACTION_AUDIT=false
CUSTOM_PATTERNS_PATH=.redaction/custom_patterns.json

LOG_LEVEL=info
`;

export interface SetupResult {
  written: string[];
  skipped: string[];
}

/** Writes starter configuration files, leaving existing ones alone. */
export async function runSetup(dir: string): Promise<SetupResult> {
  const result: SetupResult = { written: [], skipped: [] };

  const files: Array<[string, string]> = [
    [path.join(dir, '.env.example'), ENV_EXAMPLE],
    [path.join(dir, '.redaction', 'custom_patterns.example.json'), JSON.stringify(EXAMPLE_CUSTOM_PATTERNS, null, 2) + '\n']
  ];

  for (const [file, content] of files) {
    if (await fs.pathExists(file)) {
      result.skipped.push(file);
      continue;
    }
    await fs.outputFile(file, content, 'utf-8');
    result.written.push(file);
  }
  return result;
}
