import { BaseAnalyzer, Extraction, normalizeCommand } from './BaseAnalyzer';
import { ParseError } from '../errors';

export interface StackObject {
  slot: string; // stack pointer or register
  address: string;
  typeName: string;
  shortName: string;
}

export interface DumpStackObjectsData {
  osid: number | null;
  debuggerThreadId: number | null;
  objects: StackObject[];
  typeCounts: Array<{ shortName: string; count: number }>;
  uniqueTypes: number;
  warnings: string[];
}

const THREAD_HEADER = /OS Thread Id:\s*0x([0-9a-fA-F]+)\s*\((\d+)\)/;
// RSP/REG  Object  Name
const OBJECT_ROW = /^([0-9a-fA-F]{8,16}|[a-z][a-z0-9]{1,3})\s+([0-9a-fA-F]{8,16})\s+(\S.*?)\s*$/;
const REPEAT_THRESHOLD = 5;

/** `System.Collections.Generic.List`1[[App.Order, App]]` → `List`1` */
export function shortTypeName(typeName: string): string {
  const base = typeName.replace(/\[.*$/, '');
  return base.slice(base.lastIndexOf('.') + 1);
}

export class DumpStackObjectsAnalyzer extends BaseAnalyzer<DumpStackObjectsData> {
  readonly name = 'dumpstackobjects';
  readonly description = 'Managed objects referenced from one thread stack from !dso';
  readonly tier = 1;

  canAnalyze(command: string): boolean {
    const cmd = normalizeCommand(command);
    return cmd.includes('!dso') || cmd.includes('!dumpstackobjects');
  }

  protected extract(_command: string, output: string): Extraction<DumpStackObjectsData> {
    const header = THREAD_HEADER.exec(output);
    const osid = header ? parseInt(header[1], 16) : null;
    const debuggerThreadId = header ? parseInt(header[2], 10) : null;

    const objects: StackObject[] = [];
    for (const line of output.split(/\r?\n/)) {
      const m = OBJECT_ROW.exec(line.trim());
      if (m) {
        objects.push({ slot: m[1], address: m[2], typeName: m[3], shortName: shortTypeName(m[3]) });
      }
    }
    if (!header && objects.length === 0) {
      throw new ParseError('no OS Thread Id line or stack object rows found');
    }

    const label = osid !== null
      ? `Thread ~${debuggerThreadId} (OSID 0x${osid.toString(16)})`
      : 'Current thread';

    if (objects.length === 0) {
      return {
        data: { osid, debuggerThreadId, objects, typeCounts: [], uniqueTypes: 0, warnings: [] },
        summary: `${label} has no managed objects on its stack.`,
        findings: ['Thread may be in native code or idle']
      };
    }

    const counts = new Map<string, number>();
    for (const o of objects) counts.set(o.shortName, (counts.get(o.shortName) ?? 0) + 1);
    const typeCounts = [...counts.entries()]
      .map(([shortName, count]) => ({ shortName, count }))
      .sort((a, b) => b.count - a.count);
    const uniqueTypes = new Set(objects.map(o => o.typeName)).size;

    const warnings: string[] = [];
    const exceptions = objects.filter(o => o.typeName.includes('Exception'));
    if (exceptions.length > 0) {
      warnings.push(`${exceptions.length} exception object(s) on the stack - the thread may be handling an error`);
    }
    for (const t of typeCounts) {
      if (t.count >= REPEAT_THRESHOLD) {
        warnings.push(`${t.shortName} appears ${t.count} times - possible recursion or a tight loop`);
      }
    }
    const database = objects.filter(o => /Sql|Database|DbContext/.test(o.typeName));
    if (database.length > 0) {
      warnings.push(`${database.length} database-related object(s) on the stack`);
    }

    const top = typeCounts[0];
    const findings = [
      `${objects.length} objects on stack, ${uniqueTypes} unique types`,
      `Most common: ${typeCounts.slice(0, 3).map(t => `${t.shortName}(${t.count})`).join(', ')}`,
      ...warnings
    ];
    const exceptionNote = exceptions.length > 0 ? `, ${exceptions.length} exception object(s)` : '';

    return {
      data: { osid, debuggerThreadId, objects, typeCounts, uniqueTypes, warnings },
      summary: `${label}: ${objects.length} object(s) on the stack, most common ${top.shortName} (${top.count})${exceptionNote}.`,
      findings
    };
  }
}
