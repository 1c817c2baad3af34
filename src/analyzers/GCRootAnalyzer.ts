import { BaseAnalyzer, Extraction, normalizeCommand } from './BaseAnalyzer';
import { ParseError } from '../errors';

export type RootKind = 'thread' | 'handle' | 'finalizer' | 'other';

export interface RootPath {
  kind: RootKind;
  source: string;            // "Thread 1a2c", "HandleTable", ...
  handleType: string | null; // "strong handle", "pinned handle", ...
  chain: Array<{ address: string; type: string }>;
}

export interface GCRootData {
  target: string | null;
  uniqueRoots: number;
  paths: RootPath[];
  byKind: Record<RootKind, number>;
}

const ROOT_KINDS: RootKind[] = ['thread', 'handle', 'finalizer', 'other'];

const SECTION = /^(Thread [0-9a-fA-F]+|HandleTable|Finalizer Queue|[A-Za-z][\w ]*):\s*$/;
const CHAIN_LINK = /->\s+([0-9a-fA-F]{8,16})\s+(\S.*?)\s*$/;
const HANDLE_TYPE = /\(([\w ]*handle)\)/i;

function kindOf(section: string): RootKind {
  if (/^Thread /i.test(section)) return 'thread';
  if (/HandleTable/i.test(section)) return 'handle';
  if (/Finalizer/i.test(section)) return 'finalizer';
  return 'other';
}

/**
 * Walks `!gcroot` output section by section. Each "-> address type" line
 * extends the current reference chain; a new section or a new handle line
 * starts a fresh path.
 */
export class GCRootAnalyzer extends BaseAnalyzer<GCRootData> {
  readonly name = 'gcroot';
  readonly description = 'Reference chains keeping an object alive from !gcroot';
  readonly tier = 2;

  canAnalyze(command: string): boolean {
    return normalizeCommand(command).startsWith('!gcroot');
  }

  protected extract(command: string, output: string): Extraction<GCRootData> {
    const paths: RootPath[] = [];
    let section: string | null = null;
    let current: RootPath | null = null;

    const startPath = (handleType: string | null): RootPath => {
      const path: RootPath = { kind: kindOf(section ?? ''), source: section ?? 'unknown', handleType, chain: [] };
      paths.push(path);
      return path;
    };

    for (const raw of output.split(/\r?\n/)) {
      const line = raw.trimEnd();
      if (line.trim() === '') continue;

      const header = SECTION.exec(line);
      if (header && !line.startsWith(' ')) {
        section = header[1];
        current = null;
        continue;
      }
      if (section === null) continue;

      const handle = HANDLE_TYPE.exec(line);
      if (handle && !CHAIN_LINK.test(line)) {
        current = startPath(handle[1].toLowerCase());
        continue;
      }

      const link = CHAIN_LINK.exec(line);
      if (link) {
        if (!current) current = startPath(null);
        current.chain.push({ address: link[1], type: link[2] });
        continue;
      }

      // A stack frame line under a thread section opens a new chain
      if (/^\s+[0-9a-fA-F]{8,16}\s+[0-9a-fA-F]{8,16}\s+\S/.test(line)) {
        current = startPath(null);
      }
    }

    const found = /Found\s+(\d+)\s+(?:unique\s+)?roots?/i.exec(output);
    if (!found && paths.length === 0) {
      throw new ParseError('no root sections or "Found N roots" line');
    }

    const rooted = paths.filter(p => p.chain.length > 0);
    const uniqueRoots = found ? parseInt(found[1], 10) : rooted.length;
    const byKind: Record<RootKind, number> = { thread: 0, handle: 0, finalizer: 0, other: 0 };
    for (const p of rooted) byKind[p.kind]++;

    const target = command.trim().split(/\s+/).filter(p => !p.startsWith('-'))[1] ?? null;

    const findings: string[] = [];
    let summary: string;
    if (uniqueRoots === 0) {
      summary = target
        ? `Object ${target} is not rooted - it is eligible for collection.`
        : 'Object is not rooted - it is eligible for collection.';
      findings.push('No roots found');
    } else {
      const kinds = ROOT_KINDS.filter(k => byKind[k] > 0);
      summary = `Found ${uniqueRoots} root(s) keeping the object alive via ${kinds.join(', ') || 'unknown roots'}.`;
      for (const k of kinds) findings.push(`${k} roots: ${byKind[k]}`);
      const strong = rooted.filter(p => p.handleType === 'strong handle').length;
      if (strong > 0) {
        findings.push(`${strong} path(s) start at a strong handle (static or long-lived reference)`);
      }
      const pinned = rooted.filter(p => p.handleType !== null && p.handleType.includes('pinned')).length;
      if (pinned > 0) findings.push(`${pinned} path(s) start at a pinned handle`);
      const longest = rooted.reduce((max, p) => Math.max(max, p.chain.length), 0);
      findings.push(`Longest reference chain: ${longest} object(s)`);
      const holder = rooted[0]?.chain[0];
      if (holder) findings.push(`First holder: ${holder.type}`);
    }

    return {
      data: { target, uniqueRoots, paths: rooted, byKind },
      summary,
      findings
    };
  }
}
