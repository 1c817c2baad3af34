import { BaseAnalyzer, Extraction, normalizeCommand } from './BaseAnalyzer';
import { ParseError } from '../errors';

export interface StackFrame {
  childSp: string;
  ip: string;
  callSite: string;
  source: { file: string; line: number } | null;
}

export interface ThreadStack {
  osid: number;          // hex in the header
  debuggerId: number | null;
  frames: StackFrame[];
  blockedOn: string | null;
}

export interface StackGroup {
  signature: string;     // top frames joined
  osids: number[];
}

export interface ClrStackData {
  threads: ThreadStack[];
  blockedThreads: number;
  groups: StackGroup[];  // identical stacks shared by more than one thread
}

// Frame text that means the thread is parked waiting on something
const BLOCKING_FRAMES: Array<{ pattern: RegExp; reason: string }> = [
  { pattern: /Monitor\.(?:Reliable)?Enter|Monitor\.Wait|JIT_MonEnter/, reason: 'monitor lock' },
  { pattern: /WaitHandle\.Wait(?:One|Any|All|Multiple)/, reason: 'wait handle' },
  { pattern: /SemaphoreSlim\.Wait/, reason: 'semaphore' },
  { pattern: /ManualResetEventSlim\.Wait/, reason: 'event' },
  { pattern: /Task(?:`1)?\.(?:Wait|InternalWait|get_Result)|TaskAwaiter\.GetResult/, reason: 'synchronous wait on task' },
  { pattern: /Thread\.(?:Sleep|Join)/, reason: 'sleep or join' },
  { pattern: /ReaderWriterLock(?:Slim)?\.(?:Enter|Acquire)/, reason: 'reader/writer lock' }
];

const HEADER = /OS Thread Id:\s*0x([0-9a-fA-F]+)\s*(?:\((\d+)\))?/i;
const FRAME = /^\s*([0-9a-fA-F]{8,16})\s+([0-9a-fA-F]{8,16})\s+(\S.*?)\s*$/;
const SOURCE = /\[(.+?) @ (\d+)\]\s*$/;
const SIGNATURE_DEPTH = 5;

export class ClrStackAnalyzer extends BaseAnalyzer<ClrStackData> {
  readonly name = 'clrstack';
  readonly description = 'Managed call stacks, blocking waits and duplicate stacks from !clrstack';
  readonly tier = 3;

  canAnalyze(command: string): boolean {
    return normalizeCommand(command).includes('!clrstack');
  }

  protected extract(_command: string, output: string): Extraction<ClrStackData> {
    const threads: ThreadStack[] = [];
    let current: ThreadStack | null = null;

    for (const line of output.split(/\r?\n/)) {
      const header = HEADER.exec(line);
      if (header) {
        current = {
          osid: parseInt(header[1], 16),
          debuggerId: header[2] !== undefined ? parseInt(header[2], 10) : null,
          frames: [],
          blockedOn: null
        };
        threads.push(current);
        continue;
      }
      const frame = FRAME.exec(line);
      if (frame && current) {
        const source = SOURCE.exec(frame[3]);
        current.frames.push({
          childSp: frame[1],
          ip: frame[2],
          callSite: frame[3],
          source: source ? { file: source[1], line: parseInt(source[2], 10) } : null
        });
      }
    }

    if (threads.length === 0) {
      throw new ParseError('no "OS Thread Id" headers found');
    }

    for (const t of threads) {
      t.blockedOn = this.blockingReason(t.frames);
    }

    const groups = this.groupIdentical(threads);
    const blocked = threads.filter(t => t.blockedOn !== null);

    const findings: string[] = [`Stacks captured for ${threads.length} thread(s)`];
    const reasons = new Map<string, number>();
    for (const t of blocked) {
      const reason = t.blockedOn ?? '';
      reasons.set(reason, (reasons.get(reason) ?? 0) + 1);
    }
    for (const [reason, n] of reasons) {
      findings.push(`${n} thread(s) blocked on ${reason}`);
    }
    for (const g of groups) {
      findings.push(`${g.osids.length} threads share an identical stack (top frame: ${g.signature.split(' <- ')[0]})`);
    }
    const topSource = threads.find(t => t.frames.some(f => f.source !== null));
    const located = topSource?.frames.find(f => f.source !== null)?.source;
    if (located) findings.push(`First source location: ${located.file}:${located.line}`);

    const summary = blocked.length > 0
      ? `${blocked.length} of ${threads.length} thread(s) are blocked${groups.length > 0 ? `; ${groups.length} group(s) of identical stacks` : ''}.`
      : `${threads.length} thread stack(s) parsed; no blocking waits detected.`;

    return {
      data: { threads, blockedThreads: blocked.length, groups },
      summary,
      findings
    };
  }

  private blockingReason(frames: StackFrame[]): string | null {
    // Only the top few frames say what the thread is doing right now
    for (const frame of frames.slice(0, 8)) {
      const hit = BLOCKING_FRAMES.find(b => b.pattern.test(frame.callSite));
      if (hit) return hit.reason;
    }
    return null;
  }

  private groupIdentical(threads: ThreadStack[]): StackGroup[] {
    const bySignature = new Map<string, number[]>();
    for (const t of threads) {
      if (t.frames.length === 0) continue;
      const signature = t.frames
        .slice(0, SIGNATURE_DEPTH)
        .map(f => f.callSite.replace(SOURCE, '').trim())
        .join(' <- ');
      bySignature.set(signature, [...(bySignature.get(signature) ?? []), t.osid]);
    }
    return [...bySignature.entries()]
      .filter(([, osids]) => osids.length > 1)
      .map(([signature, osids]) => ({ signature, osids }));
  }
}
