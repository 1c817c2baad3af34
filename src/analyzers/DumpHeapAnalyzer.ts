import { BaseAnalyzer, Extraction, StatRow, formatBytes, normalizeCommand, parseStatTable } from './BaseAnalyzer';
import { ParseError } from '../errors';

export interface HeapObject {
  address: string;
  methodTable: string;
  size: number;
}

export interface DumpHeapData {
  mode: 'stat' | 'type';
  typeName: string | null;
  totalCount: number;
  totalSize: number;
  uniqueTypes: number;
  topByCount: StatRow[];
  topBySize: StatRow[];
  objects: HeapObject[]; // -type only, first 100
}

const HIGH_INSTANCE_COUNT = 1000;
const OBJECT_ROW = /^([0-9a-fA-F]{8,16})\s+([0-9a-fA-F]{8,16})\s+(\d+)\s*$/;

export class DumpHeapAnalyzer extends BaseAnalyzer<DumpHeapData> {
  readonly name = 'dumpheap';
  readonly description = 'Heap statistics and per-type object lists from !dumpheap';
  readonly tier = 2;

  canAnalyze(command: string): boolean {
    return normalizeCommand(command).startsWith('!dumpheap');
  }

  protected extract(command: string, output: string): Extraction<DumpHeapData> {
    const typeName = this.typeNameOf(command);
    const statsIndex = output.search(/^\s*Statistics:/m);
    const statSection = statsIndex >= 0 ? output.slice(statsIndex) : output;
    const rows = parseStatTable(statSection);

    const objects: HeapObject[] = [];
    if (typeName !== null) {
      const objectSection = statsIndex >= 0 ? output.slice(0, statsIndex) : output;
      for (const line of objectSection.split(/\r?\n/)) {
        const m = OBJECT_ROW.exec(line.trim());
        if (m) objects.push({ address: m[1], methodTable: m[2], size: parseInt(m[3], 10) });
      }
    }

    if (rows.length === 0 && objects.length === 0) {
      throw new ParseError('no heap statistics or object rows found');
    }

    const totalLine = /^\s*Total\s+(\d+)\s+objects/im.exec(output);
    const totalCount = totalLine
      ? parseInt(totalLine[1], 10)
      : rows.length > 0 ? rows.reduce((s, r) => s + r.count, 0) : objects.length;
    const totalSize = rows.length > 0
      ? rows.reduce((s, r) => s + r.totalSize, 0)
      : objects.reduce((s, o) => s + o.size, 0);

    const topByCount = [...rows].sort((a, b) => b.count - a.count).slice(0, 5);
    const topBySize = [...rows].sort((a, b) => b.totalSize - a.totalSize).slice(0, 5);

    const findings: string[] = [];
    let summary: string;
    if (typeName !== null) {
      summary = `Found ${totalCount} instances of '${typeName}' totaling ${formatBytes(totalSize)}.`;
      findings.push(`Type: ${typeName}`, `Instance count: ${totalCount}`, `Total size: ${formatBytes(totalSize)}`);
      if (totalCount > HIGH_INSTANCE_COUNT) {
        findings.push('High instance count may indicate a memory leak');
      }
    } else {
      summary = `Heap contains ${totalCount} objects totaling ${formatBytes(totalSize)}.`;
      findings.push(
        `Total objects: ${totalCount}`,
        `Total heap size: ${formatBytes(totalSize)}`,
        `Unique types: ${rows.length}`
      );
      if (topByCount.length > 0) {
        findings.push(`Most common type: ${topByCount[0].className} (${topByCount[0].count} instances)`);
      }
      if (topBySize.length > 0) {
        findings.push(`Largest type by size: ${topBySize[0].className} (${formatBytes(topBySize[0].totalSize)})`);
      }
    }

    return {
      data: {
        mode: typeName !== null ? 'type' : 'stat',
        typeName,
        totalCount,
        totalSize,
        uniqueTypes: rows.length,
        topByCount,
        topBySize,
        objects: objects.slice(0, 100)
      },
      summary,
      findings,
      metadata: { commandType: typeName !== null ? 'type' : 'stat' }
    };
  }

  private typeNameOf(command: string): string | null {
    const parts = command.trim().split(/\s+/);
    const i = parts.findIndex(p => p.toLowerCase() === '-type');
    return i >= 0 && i + 1 < parts.length ? parts[i + 1] : null;
  }
}
