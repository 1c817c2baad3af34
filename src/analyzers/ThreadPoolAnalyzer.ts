import { BaseAnalyzer, Extraction, normalizeCommand } from './BaseAnalyzer';
import { ParseError } from '../errors';

export interface ThreadPoolData {
  cpuUtilization: number | null;
  workers: {
    total: number;
    running: number;
    idle: number;
    maxLimit: number | null;
    minLimit: number | null;
  };
  completionPorts: { total: number; free: number } | null;
  queuedWorkItems: number;
  timers: number | null;
  healthIssues: string[];
}

function firstInt(output: string, patterns: RegExp[]): number | null {
  for (const pattern of patterns) {
    const m = pattern.exec(output);
    if (m) return parseInt(m[1], 10);
  }
  return null;
}

/**
 * Parses `!threadpool`. Handles both the single-line
 * "Worker Thread: Total: 16 Running: 16 Idle: 0 MaxLimit: ..." layout
 * and the one-value-per-line "Workers Total: 16" layout.
 */
export class ThreadPoolAnalyzer extends BaseAnalyzer<ThreadPoolData> {
  readonly name = 'threadpool';
  readonly description = 'Thread pool worker, completion port and queue health from !threadpool';
  readonly tier = 1;

  canAnalyze(command: string): boolean {
    return normalizeCommand(command).startsWith('!threadpool');
  }

  protected extract(_command: string, output: string): Extraction<ThreadPoolData> {
    const total = firstInt(output, [/Worker Thread:[^\n]*?\bTotal:\s*(\d+)/i, /Workers Total:\s*(\d+)/i]);
    const running = firstInt(output, [/Worker Thread:[^\n]*?\bRunning:\s*(\d+)/i, /Workers Running:\s*(\d+)/i]);
    const idle = firstInt(output, [/Worker Thread:[^\n]*?\bIdle:\s*(\d+)/i, /Workers Idle:\s*(\d+)/i]);
    if (total === null || running === null || idle === null) {
      throw new ParseError('no worker thread statistics found');
    }

    const maxLimit = firstInt(output, [/Worker Thread:[^\n]*?\bMaxLimit:\s*(\d+)/i, /^\s*Max Limit:\s*(\d+)/im]);
    const minLimit = firstInt(output, [/Worker Thread:[^\n]*?\bMinLimit:\s*(\d+)/i, /^\s*Min Limit:\s*(\d+)/im]);
    const cpu = firstInt(output, [/CPU utilization:\s*(\d+)\s*%/i]);
    const queued = firstInt(output, [/Work Request in Queue:\s*(\d+)/i, /Work items? in queue:\s*(\d+)/i]) ?? 0;
    const timers = firstInt(output, [/Number of Timers:\s*(\d+)/i]);

    const iocp = /Completion Port Thread:[^\n]*?\bTotal:\s*(\d+)[^\n]*?\bFree:\s*(\d+)/i.exec(output);
    const completionPorts = iocp ? { total: parseInt(iocp[1], 10), free: parseInt(iocp[2], 10) } : null;

    const healthIssues: string[] = [];
    if (queued > 0) {
      healthIssues.push(`Work queue backlog: ${queued} items`);
    }
    if (idle === 0 && total > 0) {
      healthIssues.push('No idle worker threads - potential starvation');
    }
    if (total > 0 && running >= total) {
      healthIssues.push('All worker threads busy');
    }
    if (cpu !== null && cpu >= 90) {
      healthIssues.push(`High CPU utilization: ${cpu}%`);
    }
    if (maxLimit !== null && total >= maxLimit) {
      healthIssues.push(`Worker count at MaxLimit (${maxLimit})`);
    }

    const summary = healthIssues.length > 0
      ? `Thread pool shows issues: ${healthIssues.slice(0, 2).join(', ')}`
      : `Thread pool healthy: ${idle} idle workers, ${queued} queued items`;

    const findings = [`Workers: ${total} total, ${running} running, ${idle} idle`];
    if (cpu !== null) findings.push(`CPU utilization: ${cpu}%`);
    if (minLimit !== null && maxLimit !== null) findings.push(`Worker limits: min ${minLimit}, max ${maxLimit}`);
    if (completionPorts) findings.push(`Completion ports: ${completionPorts.total} total, ${completionPorts.free} free`);
    findings.push(`Queued work items: ${queued}`);
    findings.push(...healthIssues);

    return {
      data: {
        cpuUtilization: cpu,
        workers: { total, running, idle, maxLimit, minLimit },
        completionPorts,
        queuedWorkItems: queued,
        timers,
        healthIssues
      },
      summary,
      findings
    };
  }
}
