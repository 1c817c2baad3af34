import { spawn } from 'child_process';
import * as fs from 'fs-extra';
import * as path from 'path';
import { CommandFailure, CommandResult } from '../types';
import { ToolExecutor } from './ToolExecutor';
import { ValidationError, describeError } from '../errors';
import { Logger, silentLogger } from '../logging/Logger';

export interface ProcessOutput {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export type ProcessRunner = (file: string, args: string[], timeoutMs: number) => Promise<ProcessOutput>;

/** Runs a process to completion, killing it once the timeout passes. */
export const spawnRunner: ProcessRunner = (file, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    const child = spawn(file, args, { stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true });

    let stdout = '';
    let stderr = '';
    let timedOut = false;

    const timeout = setTimeout(() => {
      timedOut = true;
      child.kill();
    }, timeoutMs);

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString('utf-8');
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString('utf-8');
    });

    child.on('close', (code: number | null) => {
      clearTimeout(timeout);
      resolve({ exitCode: code, stdout, stderr, timedOut });
    });

    child.on('error', (err: Error) => {
      clearTimeout(timeout);
      reject(new Error(`Failed to start ${file}: ${err.message}`));
    });
  });

const ERROR_PATTERNS = [
  /^Error:\s*.+$/i,
  /^\^\^\^ Error:\s*.+$/i,
  /Couldn't resolve error at '.+'/i,
  /Unable to .+$/i,
  /Failed to .+$/i,
  /No export .+$/i,
  /Unknown command.*$/i,
  /Syntax error.*$/i
];

/** First error line cdb printed, or null when the output looks clean. */
export function extractToolError(output: string): string | null {
  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trim();
    for (const pattern of ERROR_PATTERNS) {
      const match = pattern.exec(trimmed);
      if (match) return match[0];
    }
  }
  return null;
}

export type DumpType = 'user' | 'kernel';

/**
 * Drives cdb in one-shot mode: each command opens the dump, runs, and quits.
 * Calls are chained so only one cdb process exists at a time.
 */
export class CdbExecutor implements ToolExecutor {
  private queue: Promise<unknown> = Promise.resolve();
  private logger: Logger;

  constructor(
    private dumpPath: string,
    private cdbPath: string,
    private symbolPath: string,
    logger?: Logger,
    private runner: ProcessRunner = spawnRunner
  ) {
    this.logger = logger ?? silentLogger;
  }

  execute(command: string, timeoutSeconds: number): Promise<CommandResult> {
    const run = this.queue.then(() => this.runOnce(command, timeoutSeconds));
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** Checks the dump file and that cdb can load it. */
  async validateDump(): Promise<string> {
    if (!(await fs.pathExists(this.dumpPath))) {
      throw new ValidationError(`Dump file not found: ${this.dumpPath}`);
    }
    if (path.extname(this.dumpPath).toLowerCase() !== '.dmp') {
      throw new ValidationError(`Not a .dmp file: ${this.dumpPath}`);
    }
    const result = await this.execute('.lastevent', 120);
    if (!result.success) {
      throw new ValidationError(`Debugger could not load ${path.basename(this.dumpPath)}: ${result.error ?? 'unknown error'}`);
    }
    return result.output;
  }

  async detectDumpType(): Promise<DumpType> {
    const result = await this.execute('||', 120);
    return /kernel/i.test(result.output) && !/user mini dump|user dump/i.test(result.output) ? 'kernel' : 'user';
  }

  private async runOnce(command: string, timeoutSeconds: number): Promise<CommandResult> {
    const args = ['-z', this.dumpPath, '-y', this.symbolPath, '-lines', '-c', `${command}; q`];
    this.logger.debug(`Executing: ${command}`);

    let result: ProcessOutput;
    try {
      result = await this.runner(this.cdbPath, args, timeoutSeconds * 1000);
    } catch (error) {
      return { command, output: '', success: false, error: describeError(error), failure: CommandFailure.ToolError };
    }

    if (result.timedOut) {
      return {
        command,
        output: result.stdout,
        success: false,
        error: `Command timed out after ${timeoutSeconds} seconds`,
        failure: CommandFailure.Timeout
      };
    }

    const output = result.stdout + result.stderr;
    const error = extractToolError(output) ?? (result.exitCode === 0 ? null : `cdb exited with code ${result.exitCode}`);
    if (error) {
      return { command, output, success: false, error, failure: CommandFailure.ToolError };
    }
    return { command, output, success: true };
  }
}
