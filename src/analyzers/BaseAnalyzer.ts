import { AnalysisMetadata, AnalysisResult } from '../types';
import { describeError } from '../errors';

export type AnalyzerTier = 1 | 2 | 3;

/** What the registry needs from an analyzer. */
export interface Analyzer {
  readonly name: string;
  readonly description: string;
  readonly tier: AnalyzerTier;
  canAnalyze(command: string): boolean;
  analyze(command: string, rawOutput: string): AnalysisResult;
}

export interface Extraction<T extends object> {
  data: T;
  summary: string;
  findings: string[];
  metadata?: Record<string, string | number | boolean>;
}

export interface StatRow {
  methodTable: string;
  count: number;
  totalSize: number;
  className: string;
}

// MT (hex)    Count (dec)    TotalSize (dec)    Class Name
const STAT_ROW = /^([0-9a-fA-F]{8,16})\s+(\d+)\s+(\d+)\s+(\S.*)$/;

export function normalizeCommand(command: string): string {
  return command.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function parseStatTable(output: string): StatRow[] {
  const rows: StatRow[] = [];
  for (const line of output.split(/\r?\n/)) {
    const m = STAT_ROW.exec(line.trim());
    if (m) {
      rows.push({
        methodTable: m[1],
        count: parseInt(m[2], 10),
        totalSize: parseInt(m[3], 10),
        className: m[4].trim()
      });
    }
  }
  return rows;
}

/** Reads `Key: 123` lines into a map of decimal integers. */
export function extractKeyValues(output: string, keys: string[]): Record<string, number> {
  const values: Record<string, number> = {};
  for (const key of keys) {
    const escaped = key.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const m = new RegExp(`^\\s*${escaped}:\\s*(\\d+)`, 'im').exec(output);
    if (m) values[key] = parseInt(m[1], 10);
  }
  return values;
}

export function formatBytes(size: number): string {
  if (size < 1024) return `${size} bytes`;
  if (size < 1024 * 1024) return `${(size / 1024).toFixed(1)} KB`;
  if (size < 1024 * 1024 * 1024) return `${(size / (1024 * 1024)).toFixed(1)} MB`;
  return `${(size / (1024 * 1024 * 1024)).toFixed(1)} GB`;
}

/**
 * Template for analyzers: subclasses implement `extract`, and `analyze`
 * turns any failure inside it into an unsuccessful result.
 */
export abstract class BaseAnalyzer<T extends object> implements Analyzer {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly tier: AnalyzerTier;

  abstract canAnalyze(command: string): boolean;

  protected abstract extract(command: string, output: string): Extraction<T>;

  analyze(command: string, rawOutput: string): AnalysisResult<T> {
    const metadata: AnalysisMetadata = { analyzer: this.name, tier: this.tier };
    try {
      const extraction = this.extract(command, rawOutput);
      return {
        structuredData: extraction.data,
        summary: extraction.summary,
        findings: extraction.findings,
        metadata: { ...extraction.metadata, ...metadata },
        success: true
      };
    } catch (error) {
      return {
        structuredData: null,
        summary: '',
        findings: [],
        metadata,
        success: false,
        error: `${this.name} analysis failed: ${describeError(error)}`
      };
    }
  }
}
