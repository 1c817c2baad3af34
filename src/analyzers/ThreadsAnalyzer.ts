import { BaseAnalyzer, Extraction, extractKeyValues, normalizeCommand } from './BaseAnalyzer';
import { ParseError } from '../errors';

export interface ManagedThread {
  dbgId: number | null;        // null for dead threads (XXXX)
  managedId: number;
  osid: number;                // hex in the table
  threadObj: string;
  state: number;               // hex bit field
  gcMode: string;
  allocContext: string;
  domain: string;
  lockCount: number;
  apartment: string;
  special: string | null;      // e.g. "Finalizer", "Threadpool Worker"
  exception: string | null;
  isDead: boolean;
}

export interface ThreadsData {
  stats: Record<string, number>;
  threads: ManagedThread[];
  byGcMode: Record<string, number>;
  byApartment: Record<string, number>;
  lockHolders: number[];       // managed ids
  finalizerThread: number | null;
  exceptions: Array<{ managedId: number; exception: string }>;
}

const STAT_KEYS = ['ThreadCount', 'UnstartedThread', 'BackgroundThread', 'PendingThread', 'DeadThread'];

const THREAD_ROW = /^\s*(\d+|XXXX)\s+(\d+)\s+([0-9a-fA-F]+)\s+([0-9a-fA-F]+)\s+([0-9a-fA-F]+)\s+(\w+)\s+([0-9a-fA-F]+:[0-9a-fA-F]+)\s+([0-9a-fA-F]+)\s+(-?\d+)\s+(\w+)(?:\s+(.+))?$/;

function countBy(threads: ManagedThread[], key: (t: ManagedThread) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const t of threads) {
    const k = key(t);
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
}

export class ThreadsAnalyzer extends BaseAnalyzer<ThreadsData> {
  readonly name = 'threads';
  readonly description = 'Managed thread list, states and lock holders from !threads';
  readonly tier = 1;

  canAnalyze(command: string): boolean {
    const cmd = normalizeCommand(command);
    return cmd === '!threads' || cmd.startsWith('!threads ') || cmd === '!t' || cmd.startsWith('!t ');
  }

  protected extract(_command: string, output: string): Extraction<ThreadsData> {
    const stats = extractKeyValues(output, STAT_KEYS);
    const threads = this.parseRows(output);
    if (threads.length === 0 && stats.ThreadCount === undefined) {
      throw new ParseError('no thread table or ThreadCount line found');
    }

    const live = threads.filter(t => !t.isDead);
    const lockHolders = live.filter(t => t.lockCount > 0).map(t => t.managedId);
    const finalizer = live.find(t => t.special !== null && t.special.toLowerCase().includes('finalizer'));
    const exceptions = threads
      .filter((t): t is ManagedThread & { exception: string } => t.exception !== null)
      .map(t => ({ managedId: t.managedId, exception: t.exception }));

    const total = stats.ThreadCount ?? threads.length;
    const background = stats.BackgroundThread ?? 0;
    const dead = stats.DeadThread ?? threads.filter(t => t.isDead).length;

    const summaryParts = [`Found ${total} threads in the process.`];
    if (background > 0) summaryParts.push(`${background} are background threads.`);
    if (dead > 0) summaryParts.push(`${dead} are dead threads.`);
    if (lockHolders.length > 0) summaryParts.push(`${lockHolders.length} threads hold locks.`);

    const findings = [
      `Total threads: ${total}`,
      `Foreground: ${total - background}, Background: ${background}`
    ];
    if (dead > 0) findings.push(`Dead threads: ${dead} (may indicate thread pool issues)`);
    if (lockHolders.length > 0) {
      findings.push(`${lockHolders.length} threads holding locks (managed ids ${lockHolders.join(', ')})`);
    }
    if (finalizer) findings.push(`Finalizer thread is managed id ${finalizer.managedId}`);
    for (const e of exceptions) {
      findings.push(`Thread ${e.managedId} has exception ${e.exception}`);
    }

    return {
      data: {
        stats,
        threads,
        byGcMode: countBy(live, t => t.gcMode),
        byApartment: countBy(live, t => t.apartment),
        lockHolders,
        finalizerThread: finalizer ? finalizer.managedId : null,
        exceptions
      },
      summary: summaryParts.join(' '),
      findings
    };
  }

  private parseRows(output: string): ManagedThread[] {
    const threads: ManagedThread[] = [];
    const lines = output.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
      let line = lines[i].trimEnd();
      let m = THREAD_ROW.exec(line);
      // Long exception names sometimes wrap onto the next line
      if (m && i + 1 < lines.length && /^\s{20,}\S/.test(lines[i + 1]) && !THREAD_ROW.exec(lines[i + 1])) {
        line = `${line} ${lines[i + 1].trim()}`;
        m = THREAD_ROW.exec(line);
        i++;
      }
      if (!m) continue;

      const rest = (m[11] ?? '').trim();
      const special = /\(([^)]+)\)/.exec(rest);
      const exception = /(\S*Exception)\b/.exec(rest.replace(/\([^)]*\)/g, ''));
      const isDead = m[1] === 'XXXX';

      threads.push({
        dbgId: isDead ? null : parseInt(m[1], 10),
        managedId: parseInt(m[2], 10),
        osid: parseInt(m[3], 16),
        threadObj: m[4],
        state: parseInt(m[5], 16),
        gcMode: m[6],
        allocContext: m[7],
        domain: m[8],
        lockCount: parseInt(m[9], 10),
        apartment: m[10],
        special: special ? special[1] : null,
        exception: exception ? exception[1] : null,
        isDead
      });
    }
    return threads;
  }
}
