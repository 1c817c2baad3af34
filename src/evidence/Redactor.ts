/**
 * Redactor - sensitive data scrubbing for debugger output
 *
 * Every piece of text that leaves the process (oracle prompts, embedding
 * requests) or lands on disk (evidence files, reports) passes through
 * `redact()` first. Matches are replaced by `[REDACTED:<PatternName>]`;
 * the matched value itself is never logged or stored.
 *
 * PRECEDENCE:
 * Patterns run in registration order, built-ins first and custom patterns
 * after. A match that overlaps a span already claimed by an earlier pattern
 * (or an existing placeholder) is dropped, so the first registered pattern
 * wins and redacting twice gives the same text as redacting once.
 *
 * FALSE POSITIVES:
 * Debugger output is full of nine and ten digit numbers. SSN and phone
 * matches are vetoed when they sit in technical context (addresses, heap
 * sizes, handle counts); card numbers must pass the Luhn check.
 *
 * @example
 * const redactor = new Redactor();
 * const { redacted, report } = redactor.redact("Owner: jane@corp.example");
 * // redacted === "Owner: [REDACTED:EmailAddress]"
 * // report.appliedRules === ["EmailAddress"]
 */
import * as fs from 'fs-extra';
import dayjs from 'dayjs';
import { RedactionPattern, Severity } from '../types';
import { SessionIOError, ValidationError, describeError } from '../errors';
import { Logger, silentLogger } from '../logging/Logger';
import { BREADTH_PROBES, BUILTIN_PATTERNS, BUILTIN_VALIDATORS, MatchValidator } from './redactionPatterns';

export interface RedactionMatch {
  pattern: string;
  severity: Severity;
  length: number;
}

export interface RedactionReport {
  hasChanges: boolean;
  appliedRules: string[];
  matches: RedactionMatch[];
  bySeverity: Record<Severity, number>;
}

export interface RejectedPattern {
  name: string;
  reason: string;
}

export interface PatternTestResult {
  pattern: string;
  matches: Array<{ text: string; start: number; end: number }>;
  count: number;
  redacted: string;
}

export interface RedactorOptions {
  auditLogPath?: string;
  logger?: Logger;
}

interface CompiledPattern {
  source: RedactionPattern;
  regex: RegExp;
  validate?: MatchValidator;
}

interface Span {
  start: number;
  end: number;
}

interface AcceptedMatch extends Span {
  pattern: CompiledPattern;
}

const PLACEHOLDER = /\[REDACTED:[A-Za-z0-9_]+\]/g;
const VALID_NAME = /^[A-Za-z0-9_]+$/;
const MAX_PASSES = 5;

export function placeholderFor(name: string): string {
  return `[REDACTED:${name}]`;
}

export class Redactor {
  private patterns: CompiledPattern[] = [];
  readonly rejectedPatterns: RejectedPattern[] = [];
  readonly warnings: string[] = [];
  private logger: Logger;

  constructor(customPatterns: RedactionPattern[] = [], private options: RedactorOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    for (const pattern of BUILTIN_PATTERNS) {
      this.register(pattern, false);
    }
    for (const pattern of customPatterns) {
      this.register(pattern, true);
    }
  }

  get patternNames(): string[] {
    return this.patterns.map(p => p.source.name);
  }

  redact(text: string): { redacted: string; report: RedactionReport } {
    let current = text;
    const matches: RedactionMatch[] = [];

    for (let pass = 0; pass < MAX_PASSES; pass++) {
      const accepted = this.scan(current, this.patterns);
      if (accepted.length === 0) break;
      current = this.replace(current, accepted);
      for (const m of accepted) {
        matches.push({ pattern: m.pattern.source.name, severity: m.pattern.source.severity, length: m.end - m.start });
      }
    }

    const report = this.buildReport(matches);
    if (report.hasChanges && this.options.auditLogPath) {
      this.writeAudit(this.options.auditLogPath, matches);
    }
    return { redacted: current, report };
  }

  /** Runs a single pattern against a sample for pattern-authoring diagnostics. */
  testPattern(name: string, sampleText: string): PatternTestResult {
    const compiled = this.patterns.find(p => p.source.name === name);
    if (!compiled) {
      throw new ValidationError(`Unknown redaction pattern: ${name}`);
    }
    const accepted = this.scan(sampleText, [compiled]);
    return {
      pattern: name,
      matches: accepted.map(m => ({ text: sampleText.slice(m.start, m.end), start: m.start, end: m.end })),
      count: accepted.length,
      redacted: this.replace(sampleText, accepted)
    };
  }

  private register(pattern: RedactionPattern, custom: boolean): void {
    const reject = (reason: string) => {
      this.rejectedPatterns.push({ name: pattern.name, reason });
      this.logger.warn(`Skipping redaction pattern '${pattern.name}': ${reason}`);
    };

    if (!VALID_NAME.test(pattern.name)) {
      reject('name must contain only letters, digits and underscores');
      return;
    }
    if (this.patterns.some(p => p.source.name === pattern.name)) {
      reject('duplicate pattern name');
      return;
    }

    let regex: RegExp;
    try {
      regex = new RegExp(pattern.pattern, 'gim');
    } catch (error) {
      reject(`invalid regular expression (${describeError(error)})`);
      return;
    }

    const probe = new RegExp(pattern.pattern, 'im');
    if (probe.test('')) {
      reject('pattern matches the empty string');
      return;
    }

    if (custom) {
      this.checkBreadth(pattern, probe);
    }

    this.patterns.push({ source: pattern, regex, validate: custom ? undefined : BUILTIN_VALIDATORS[pattern.name] });
  }

  private checkBreadth(pattern: RedactionPattern, probe: RegExp): void {
    const hits = BREADTH_PROBES.filter(sample => probe.test(sample)).length;
    if (hits / BREADTH_PROBES.length >= 0.8) {
      this.warn(`Pattern '${pattern.name}' matches ${hits}/${BREADTH_PROBES.length} probe strings and is likely too broad`);
    }
    if (pattern.pattern.includes('.*.*') || pattern.pattern.includes('.+.+')) {
      this.warn(`Pattern '${pattern.name}' contains nested wildcards and may backtrack heavily`);
    }
  }

  private warn(message: string): void {
    this.warnings.push(message);
    this.logger.warn(message);
  }

  private scan(text: string, patterns: CompiledPattern[]): AcceptedMatch[] {
    const claimed: Span[] = [];
    for (const m of text.matchAll(PLACEHOLDER)) {
      const start = m.index ?? 0;
      claimed.push({ start, end: start + m[0].length });
    }

    const accepted: AcceptedMatch[] = [];
    for (const pattern of patterns) {
      for (const m of text.matchAll(pattern.regex)) {
        if (m[0].length === 0) continue;
        const start = m.index ?? 0;
        const end = start + m[0].length;
        if (claimed.some(span => start < span.end && span.start < end)) continue;
        if (pattern.validate && !pattern.validate(m[0], text, start, end)) continue;
        claimed.push({ start, end });
        accepted.push({ start, end, pattern });
      }
    }
    return accepted.sort((a, b) => a.start - b.start);
  }

  private replace(text: string, accepted: AcceptedMatch[]): string {
    let out = '';
    let cursor = 0;
    for (const m of accepted) {
      out += text.slice(cursor, m.start) + placeholderFor(m.pattern.source.name);
      cursor = m.end;
    }
    return out + text.slice(cursor);
  }

  private buildReport(matches: RedactionMatch[]): RedactionReport {
    const bySeverity: Record<Severity, number> = { critical: 0, warning: 0, info: 0 };
    const applied: string[] = [];
    for (const m of matches) {
      bySeverity[m.severity]++;
      if (!applied.includes(m.pattern)) applied.push(m.pattern);
    }
    return { hasChanges: matches.length > 0, appliedRules: applied, matches, bySeverity };
  }

  private writeAudit(auditLogPath: string, matches: RedactionMatch[]): void {
    const ts = dayjs().toISOString();
    const lines = matches.map(m => `${ts} | REDACTED | ${m.pattern} | ${m.severity.toUpperCase()} | Length: ${m.length}`);
    const counts = this.buildReport(matches).bySeverity;
    lines.push(`${ts} | SUMMARY | ${matches.length} redaction(s): ${counts.critical} critical, ${counts.warning} warning, ${counts.info} info`);
    try {
      fs.ensureFileSync(auditLogPath);
      fs.appendFileSync(auditLogPath, lines.join('\n') + '\n');
    } catch (error) {
      throw new SessionIOError('Writing redaction audit', auditLogPath, error);
    }
  }
}
