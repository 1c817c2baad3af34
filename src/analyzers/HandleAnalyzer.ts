import { BaseAnalyzer, Extraction, normalizeCommand } from './BaseAnalyzer';
import { ParseError } from '../errors';

export interface HandleEntry {
  handle: string;
  type: string;
}

export interface HandleData {
  total: number;
  typeCounts: Record<string, number>;
  handles: HandleEntry[]; // first 100 from detailed output
  warnings: string[];
}

// Counts above which a handle type suggests a leak; twice the limit is critical
const TYPE_LIMITS: Record<string, number> = {
  Event: 1000,
  Thread: 500,
  File: 200,
  Mutant: 100,
  Semaphore: 100,
  Section: 500,
  Key: 100
};
const TOTAL_WARNING = 2000;
const TOTAL_CRITICAL = 5000;
const KEPT_HANDLES = 100;

const HANDLE_LINE = /^Handle\s+([0-9a-fA-F]+)\s*$/;
const TYPE_LINE = /^Type\s+(\S.*?)\s*$/;
const COUNT_ROW = /^([A-Za-z][\w ]*?)\s+(\d+)\s*$/;
const TOTAL_LINE = /^\s*(\d+)\s+Handles\s*$/im;

/**
 * Reads both `!handle` layouts: the per-type count table printed without
 * arguments, and the `Handle <n>` / `Type <name>` blocks of `!handle 0 f`.
 */
export class HandleAnalyzer extends BaseAnalyzer<HandleData> {
  readonly name = 'handle';
  readonly description = 'Operating system handle counts by type from !handle';
  readonly tier = 1;

  canAnalyze(command: string): boolean {
    return normalizeCommand(command).startsWith('!handle');
  }

  protected extract(_command: string, output: string): Extraction<HandleData> {
    const lines = output.split(/\r?\n/).map(l => l.trim());
    const handles: HandleEntry[] = [];
    let pending: string | null = null;
    for (const line of lines) {
      const h = HANDLE_LINE.exec(line);
      if (h) {
        pending = h[1];
        continue;
      }
      const t = TYPE_LINE.exec(line);
      if (t && pending !== null) {
        handles.push({ handle: pending, type: t[1] });
        pending = null;
      }
    }

    const typeCounts: Record<string, number> = {};
    if (handles.length > 0) {
      for (const h of handles) typeCounts[h.type] = (typeCounts[h.type] ?? 0) + 1;
    } else {
      for (const line of lines) {
        const row = COUNT_ROW.exec(line);
        if (row && row[1] !== 'Type') typeCounts[row[1]] = parseInt(row[2], 10);
      }
    }

    const totalLine = TOTAL_LINE.exec(output);
    if (!totalLine && Object.keys(typeCounts).length === 0) {
      throw new ParseError('no handle entries or type counts found');
    }
    const total = totalLine
      ? parseInt(totalLine[1], 10)
      : Object.values(typeCounts).reduce((a, b) => a + b, 0);

    if (total === 0) {
      return {
        data: { total, typeCounts, handles, warnings: [] },
        summary: 'No handles found.',
        findings: ['Process may have just started or handles were not enumerated']
      };
    }

    const warnings: string[] = [];
    for (const [type, limit] of Object.entries(TYPE_LIMITS)) {
      const count = typeCounts[type] ?? 0;
      if (count > limit) {
        warnings.push(`${count > limit * 2 ? 'CRITICAL' : 'WARNING'}: ${type} handles excessive (${count} > ${limit})`);
      }
    }
    if (total > TOTAL_CRITICAL) {
      warnings.push(`CRITICAL: Total handle count very high (${total})`);
    } else if (total > TOTAL_WARNING) {
      warnings.push(`WARNING: Total handle count elevated (${total})`);
    }

    const ranked = Object.entries(typeCounts).sort((a, b) => b[1] - a[1]);
    const findings = [`${total} total handles, ${ranked.length} types`];
    if (ranked.length > 0) {
      findings.push(`Most common: ${ranked.slice(0, 5).map(([type, n]) => `${type}(${n})`).join(', ')}`);
    }
    findings.push(...warnings);
    const critical = warnings.filter(w => w.startsWith('CRITICAL')).length;
    if (critical > 0) {
      findings.push('Investigate handle leaks: !htrace shows where handles are allocated');
    } else if (warnings.length > 0) {
      findings.push('Watch the handle count over time for a slow leak');
    }

    let summary = `${total} handles`;
    if (ranked.length > 0) {
      const [topType, topCount] = ranked[0];
      summary += `, mostly ${topType} (${topCount}, ${Math.round((topCount / total) * 100)}%)`;
    }
    if (critical > 0) summary += `; ${critical} critical issue(s)`;

    return {
      data: { total, typeCounts, handles: handles.slice(0, KEPT_HANDLES), warnings },
      summary: `${summary}.`,
      findings
    };
  }
}
