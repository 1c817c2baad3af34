import { BaseAnalyzer, Extraction, normalizeCommand } from './BaseAnalyzer';

export interface SyncBlockEntry {
  index: number;
  syncBlock: string;
  monitorHeld: number;
  recursion: number;
  owningThread: string | null; // ThreadOBJ address
  osid: number | null;
  debuggerThreadId: number | null; // ~N index; null when unowned or the owner is dead (XXX)
  ownerObject: string;
  ownerType: string;
  waitingThreads: number;
}

export interface SyncBlockData {
  totalSyncBlocks: number;
  entries: SyncBlockEntry[];
  contention: SyncBlockEntry[];
}

// Index  SyncBlock  MonitorHeld  Recursion  ThreadOBJ  OSID  DbgId  Owner  Type
const OWNED_ROW = /^\s*(\d+)\s+([0-9a-fA-F]+)\s+(\d+)\s+(\d+)\s+([0-9a-fA-F]+)\s+([0-9a-fA-F]+)\s+(\d+|X+)\s+([0-9a-fA-F]+)\s+(\S.*?)\s*$/;
const UNOWNED_ROW = /^\s*(\d+)\s+([0-9a-fA-F]+)\s+(\d+)\s+(\d+)\s+([0-9a-fA-F]+)\s+none\s+([0-9a-fA-F]+)\s+(\S.*?)\s*$/i;
const TOTAL_LINE = /^\s*Total\s+(\d+)\s*$/m;

/**
 * MonitorHeld counts 1 for the owner plus 2 for every waiter, so the waiter
 * count is recovered from it rather than read from a column.
 */
export function waitingFromMonitorHeld(monitorHeld: number, owned: boolean): number {
  const waiters = owned ? monitorHeld - 1 : monitorHeld;
  return Math.max(0, Math.floor(waiters / 2));
}

export class SyncBlockAnalyzer extends BaseAnalyzer<SyncBlockData> {
  readonly name = 'syncblk';
  readonly description = 'Lock ownership and contention from !syncblk';
  readonly tier = 1;

  canAnalyze(command: string): boolean {
    return normalizeCommand(command).startsWith('!syncblk');
  }

  protected extract(_command: string, output: string): Extraction<SyncBlockData> {
    const entries: SyncBlockEntry[] = [];

    for (const line of output.split(/\r?\n/)) {
      const unowned = UNOWNED_ROW.exec(line);
      if (unowned) {
        const monitorHeld = parseInt(unowned[3], 10);
        entries.push({
          index: parseInt(unowned[1], 10),
          syncBlock: unowned[2],
          monitorHeld,
          recursion: parseInt(unowned[4], 10),
          owningThread: null,
          osid: null,
          debuggerThreadId: null,
          ownerObject: unowned[6],
          ownerType: unowned[7],
          waitingThreads: waitingFromMonitorHeld(monitorHeld, false)
        });
        continue;
      }

      const owned = OWNED_ROW.exec(line);
      if (owned) {
        const monitorHeld = parseInt(owned[3], 10);
        entries.push({
          index: parseInt(owned[1], 10),
          syncBlock: owned[2],
          monitorHeld,
          recursion: parseInt(owned[4], 10),
          owningThread: owned[5],
          osid: parseInt(owned[6], 16),
          debuggerThreadId: /^\d+$/.test(owned[7]) ? parseInt(owned[7], 10) : null,
          ownerObject: owned[8],
          ownerType: owned[9],
          waitingThreads: waitingFromMonitorHeld(monitorHeld, true)
        });
      }
    }

    const totalMatch = TOTAL_LINE.exec(output);
    const totalSyncBlocks = totalMatch ? parseInt(totalMatch[1], 10) : entries.length;
    const contention = entries.filter(e => e.waitingThreads > 0);

    let summary: string;
    if (entries.length === 0 && totalSyncBlocks === 0) {
      summary = 'No synchronization blocks found. No lock contention detected.';
    } else if (contention.length > 0) {
      summary = `Found ${contention.length} sync blocks with contention out of ${totalSyncBlocks} total.`;
    } else {
      summary = `Found ${totalSyncBlocks} sync blocks with no active contention.`;
    }

    const findings = contention.map(e => {
      let owner = 'no owner';
      if (e.osid !== null) {
        owner = e.debuggerThreadId !== null
          ? `debugger thread ~${e.debuggerThreadId} (OSID 0x${e.osid.toString(16)})`
          : `a dead thread (OSID 0x${e.osid.toString(16)})`;
      }
      return `Lock on ${e.ownerType} (${e.ownerObject}) held by ${owner} with ${e.waitingThreads} waiting`;
    });
    const totalWaiting = contention.reduce((sum, e) => sum + e.waitingThreads, 0);
    if (totalWaiting > 0) {
      findings.push(`${totalWaiting} thread(s) blocked waiting on monitors`);
    }

    return {
      data: { totalSyncBlocks, entries, contention },
      summary,
      findings,
      metadata: { contendedLocks: contention.length }
    };
  }
}
