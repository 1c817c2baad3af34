import { BaseAnalyzer, Extraction, formatBytes, normalizeCommand } from './BaseAnalyzer';
import { ParseError } from '../errors';

export interface HeapSegment {
  segment: string;
  begin: string;
  allocated: string;
  size: number;
  largeObjectHeap: boolean;
}

export interface EEHeapData {
  gcHeaps: number;
  segments: HeapSegment[];
  gcHeapSize: number;
  lohSize: number;
  lohPercent: number;
  loaderHeapSize: number | null;
  warnings: string[];
}

const TWO_GB = 2 * 1024 * 1024 * 1024;
const LOH_PERCENT_THRESHOLD = 30;

// segment  begin  allocated  0x<size hex>(<size dec>)
const SEGMENT_ROW = /^\s*([0-9a-fA-F]+)\s+([0-9a-fA-F]+)\s+([0-9a-fA-F]+)\s+0x([0-9a-fA-F]+)\s*\((\d+)\)/;

export class EEHeapAnalyzer extends BaseAnalyzer<EEHeapData> {
  readonly name = 'eeheap';
  readonly description = 'GC heap segments, heap size and large object heap share from !eeheap';
  readonly tier = 1;

  canAnalyze(command: string): boolean {
    return normalizeCommand(command).startsWith('!eeheap');
  }

  protected extract(_command: string, output: string): Extraction<EEHeapData> {
    const heapCount = /Number of GC Heaps:\s*(\d+)/i.exec(output);
    const gcHeaps = heapCount ? parseInt(heapCount[1], 10) : 1;

    const segments: HeapSegment[] = [];
    let inLoh = false;
    for (const line of output.split(/\r?\n/)) {
      if (/Large object heap/i.test(line)) {
        inLoh = true;
        continue;
      }
      if (/generation \d+ starts at|Pinned object heap|^\s*Heap \d+/i.test(line)) {
        inLoh = false;
        continue;
      }
      const m = SEGMENT_ROW.exec(line);
      if (m) {
        segments.push({
          segment: m[1],
          begin: m[2],
          allocated: m[3],
          size: parseInt(m[5], 10),
          largeObjectHeap: inLoh
        });
      }
    }

    const totalLine = /GC Heap Size:\s+Size:\s*0x[0-9a-fA-F]+\s*\((\d+)\)/i.exec(output);
    if (segments.length === 0 && !totalLine) {
      throw new ParseError('no heap segments or GC Heap Size line found');
    }

    const gcHeapSize = totalLine
      ? parseInt(totalLine[1], 10)
      : segments.reduce((sum, s) => sum + s.size, 0);
    const lohSize = segments.filter(s => s.largeObjectHeap).reduce((sum, s) => sum + s.size, 0);
    const lohPercent = gcHeapSize > 0 ? Math.round((lohSize / gcHeapSize) * 100) : 0;

    const loader = /Total LoaderHeap size:\s*Size:\s*0x([0-9a-fA-F]+)/i.exec(output);
    const loaderHeapSize = loader ? parseInt(loader[1], 16) : null;

    const warnings: string[] = [];
    if (gcHeapSize > TWO_GB) {
      warnings.push(`Large GC heap: ${formatBytes(gcHeapSize)}`);
    }
    if (lohPercent > LOH_PERCENT_THRESHOLD) {
      warnings.push(`Large object heap is ${lohPercent}% of GC heap - possible LOH fragmentation`);
    }

    const lohSegments = segments.filter(s => s.largeObjectHeap).length;
    const findings = [
      `GC heaps: ${gcHeaps}`,
      `GC heap size: ${formatBytes(gcHeapSize)}`,
      `Segments: ${segments.length} (${lohSegments} LOH)`,
      `Large object heap: ${formatBytes(lohSize)} (${lohPercent}%)`
    ];
    if (loaderHeapSize !== null) findings.push(`Loader heap: ${formatBytes(loaderHeapSize)}`);
    findings.push(...warnings);

    return {
      data: { gcHeaps, segments, gcHeapSize, lohSize, lohPercent, loaderHeapSize, warnings },
      summary: `GC heap is ${formatBytes(gcHeapSize)} across ${gcHeaps} heap(s); large object heap holds ${lohPercent}%.`,
      findings
    };
  }
}
