import { BaseAnalyzer, Extraction, StatRow, extractKeyValues, normalizeCommand, parseStatTable } from './BaseAnalyzer';
import { ParseError } from '../errors';

export interface GCHandlesData {
  counts: Record<string, number>;
  total: number;
  pinned: number;
  topTypes: StatRow[];
  warnings: string[];
}

const HANDLE_KINDS = [
  'Strong Handles',
  'Pinned Handles',
  'Async Pinned Handles',
  'Ref Count Handles',
  'Weak Long Handles',
  'Weak Short Handles',
  'Dependent Handles',
  'Other Handles'
];

const PINNED_THRESHOLD = 1000;
const TOTAL_THRESHOLD = 10000;

export class GCHandlesAnalyzer extends BaseAnalyzer<GCHandlesData> {
  readonly name = 'gchandles';
  readonly description = 'GC handle counts by kind and the types they keep alive from !gchandles';
  readonly tier = 2;

  canAnalyze(command: string): boolean {
    return normalizeCommand(command).startsWith('!gchandles');
  }

  protected extract(_command: string, output: string): Extraction<GCHandlesData> {
    const counts = extractKeyValues(output, HANDLE_KINDS);
    const totalLine = extractKeyValues(output, ['Total Handles']);
    if (Object.keys(counts).length === 0 && totalLine['Total Handles'] === undefined) {
      throw new ParseError('no handle count lines found');
    }

    const total = totalLine['Total Handles'] ?? Object.values(counts).reduce((a, b) => a + b, 0);
    const pinned = (counts['Pinned Handles'] ?? 0) + (counts['Async Pinned Handles'] ?? 0);
    const topTypes = parseStatTable(output).sort((a, b) => b.count - a.count).slice(0, 5);

    const warnings: string[] = [];
    if (pinned > PINNED_THRESHOLD) {
      warnings.push(`High pinned handle count (${pinned}) - pinning fragments the heap`);
    }
    if (total > TOTAL_THRESHOLD) {
      warnings.push(`High total handle count (${total}) - possible handle leak`);
    }

    const findings = Object.entries(counts).map(([kind, n]) => `${kind}: ${n}`);
    if (topTypes.length > 0) {
      findings.push(`Most referenced type: ${topTypes[0].className} (${topTypes[0].count} handles)`);
    }
    findings.push(...warnings);

    const pinnedShare = total > 0 ? Math.round((pinned / total) * 100) : 0;
    return {
      data: { counts, total, pinned, topTypes, warnings },
      summary: warnings.length > 0
        ? `${total} GC handles, ${pinned} pinned: ${warnings[0]}`
        : `${total} GC handles, ${pinned} pinned (${pinnedShare}%); no handle pressure detected.`,
      findings
    };
  }
}
