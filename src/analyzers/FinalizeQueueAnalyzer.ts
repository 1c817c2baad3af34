import { BaseAnalyzer, Extraction, StatRow, normalizeCommand, parseStatTable } from './BaseAnalyzer';
import { ParseError } from '../errors';

export interface FinalizeQueueData {
  heaps: number;
  generations: Record<number, number>; // generation -> finalizable objects, summed across heaps
  readyForFinalization: number;
  syncBlocksToCleanUp: number;
  totalFinalizable: number;
  topTypes: StatRow[];
  warnings: string[];
}

const GEN2_THRESHOLD = 10000;
const READY_THRESHOLD = 1000;
const TOTAL_THRESHOLD = 50000;

export class FinalizeQueueAnalyzer extends BaseAnalyzer<FinalizeQueueData> {
  readonly name = 'finalizequeue';
  readonly description = 'Finalization queue depth and backlog from !finalizequeue';
  readonly tier = 1;

  canAnalyze(command: string): boolean {
    const cmd = normalizeCommand(command);
    return cmd.startsWith('!finalizequeue') || cmd === '!fq' || cmd.startsWith('!fq ');
  }

  protected extract(_command: string, output: string): Extraction<FinalizeQueueData> {
    const generations: Record<number, number> = {};
    const heapIds = new Set<number>();
    let ready = 0;
    let sawReady = false;
    let syncBlocks = 0;

    for (const line of output.split(/\r?\n/)) {
      const heap = /^\s*Heap\s+(\d+)\s*$/i.exec(line);
      if (heap) {
        heapIds.add(parseInt(heap[1], 10));
        continue;
      }
      const gen = /generation\s+(\d+)\s+has\s+(\d+)\s+finalizable/i.exec(line);
      if (gen) {
        const g = parseInt(gen[1], 10);
        generations[g] = (generations[g] ?? 0) + parseInt(gen[2], 10);
        continue;
      }
      const readyMatch = /Ready for finalization\s+(\d+)/i.exec(line);
      if (readyMatch) {
        ready += parseInt(readyMatch[1], 10);
        sawReady = true;
        continue;
      }
      const sync = /SyncBlocks to be cleaned up:\s*(\d+)/i.exec(line);
      if (sync) {
        syncBlocks += parseInt(sync[1], 10);
      }
    }

    if (Object.keys(generations).length === 0 && !sawReady) {
      throw new ParseError('no generation or ready-for-finalization lines found');
    }

    const totalFinalizable = Object.values(generations).reduce((a, b) => a + b, 0);
    const gen2 = generations[2] ?? 0;
    const warnings: string[] = [];
    if (gen2 > GEN2_THRESHOLD) {
      warnings.push(`High Gen2 finalizable count (${gen2}) - finalizable objects are surviving to Gen2`);
    }
    if (ready > READY_THRESHOLD) {
      warnings.push(`Large finalization backlog: ${ready} objects ready for finalization - finalizer thread may be blocked`);
    }
    if (totalFinalizable > TOTAL_THRESHOLD) {
      warnings.push(`Very high total finalizable objects: ${totalFinalizable}`);
    }

    const topTypes = parseStatTable(output)
      .sort((a, b) => b.count - a.count)
      .slice(0, 5);

    const heaps = Math.max(1, heapIds.size);
    const findings = Object.keys(generations)
      .map(Number)
      .sort((a, b) => a - b)
      .map(g => `Generation ${g}: ${generations[g]} finalizable objects`);
    findings.push(`Ready for finalization: ${ready}`);
    if (topTypes.length > 0) {
      findings.push(`Most common finalizable type: ${topTypes[0].className} (${topTypes[0].count})`);
    }
    findings.push(...warnings);

    return {
      data: {
        heaps,
        generations,
        readyForFinalization: ready,
        syncBlocksToCleanUp: syncBlocks,
        totalFinalizable,
        topTypes,
        warnings
      },
      summary: `${totalFinalizable} finalizable objects across ${heaps} heap(s), ${ready} ready for finalization.`,
      findings
    };
  }
}
