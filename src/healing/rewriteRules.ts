import { KnownThread } from './placeholderResolver';

/** What earlier evidence says about the dump. */
export interface RuleContext {
  threads: KnownThread[];
}

/**
 * Deterministic command rewrites for the failures cdb reports most often.
 * Each rule returns the rewritten command or null when it does not apply.
 */
export interface RewriteRule {
  name: string;
  apply(command: string, error: string, context?: RuleContext): string | null;
}

const SOS_VERBS = [
  'threads', 'threadpool', 'syncblk', 'clrstack', 'dumpheap', 'eeheap', 'gcroot', 'gchandles',
  'finalizequeue', 'dumpobj', 'do', 'pe', 'printexception', 'dumpstackobjects', 'dso', 'dumpmt',
  'dumpclass', 'analyze', 'runaway', 'locks', 'handle', 'address'
];

const ALIASES: Record<string, string> = {
  '!t': '!threads',
  '!fq': '!finalizequeue',
  '!dso': '!dumpstackobjects'
};

const DX_EQUIVALENTS: Array<[RegExp, string]> = [
  [/^dx\s+@\$curprocess\.Threads\b/i, '!threads'],
  [/^dx\s+@\$curthread\.Stack\b/i, '!clrstack'],
  [/^dx\s+@\$curprocess\.Modules\b/i, 'lm'],
  [/^dx\s+@\$curprocess\.Environment\b/i, '!peb']
];

const UNKNOWN_COMMAND = /Unknown command|No export/i;

/**
 * `~N` takes the debugger index and `~~[hex]` the OS thread id. When cdb
 * rejects one, the !threads table says what the other form should be; the
 * rule never guesses without it.
 */
export const illegalThreadRule: RewriteRule = {
  name: 'thread-selector',
  apply(command, error, context) {
    if (!/Illegal thread/i.test(error)) return null;
    const threads = context?.threads ?? [];
    const trimmed = command.trim();

    const byOsid = /^~~\[([0-9a-fA-F]+)\]([se])\b(.*)$/.exec(trimmed);
    if (byOsid) {
      const osid = parseInt(byOsid[1], 16);
      const match = threads.find(t => t.osid === osid);
      return match ? `~${match.dbgId}${byOsid[2]}${byOsid[3]}` : null;
    }

    const byIndex = /^~(\d+)([se])\b(.*)$/.exec(trimmed);
    if (byIndex) {
      const n = Number(byIndex[1]);
      const sameIndex = threads.find(t => t.dbgId === n);
      if (sameIndex) return `~~[${sameIndex.osid.toString(16)}]${byIndex[2]}${byIndex[3]}`;
      // A managed thread id passed where the debugger index belongs
      const sameManaged = threads.find(t => t.managedId === n);
      return sameManaged ? `~${sameManaged.dbgId}${byIndex[2]}${byIndex[3]}` : null;
    }
    return null;
  }
};

export const missingBangRule: RewriteRule = {
  name: 'sos-prefix',
  apply(command, error) {
    if (!UNKNOWN_COMMAND.test(error)) return null;
    const [verb, ...rest] = command.trim().split(/\s+/);
    if (!SOS_VERBS.includes(verb.toLowerCase())) return null;
    return ['!' + verb, ...rest].join(' ');
  }
};

export const aliasRule: RewriteRule = {
  name: 'alias',
  apply(command, error) {
    if (!UNKNOWN_COMMAND.test(error)) return null;
    const [verb, ...rest] = command.trim().split(/\s+/);
    const target = ALIASES[verb.toLowerCase()];
    return target ? [target, ...rest].join(' ') : null;
  }
};

export const flagSpacingRule: RewriteRule = {
  name: 'flag-spacing',
  apply(command, error) {
    if (!/Syntax error/i.test(error)) return null;
    const match = /^(![A-Za-z]+)-(\S.*)$/.exec(command.trim());
    return match ? `${match[1]} -${match[2]}` : null;
  }
};

export const dataModelRule: RewriteRule = {
  name: 'dx-to-sos',
  apply(command) {
    const trimmed = command.trim();
    for (const [pattern, replacement] of DX_EQUIVALENTS) {
      if (pattern.test(trimmed)) return replacement;
    }
    return null;
  }
};

export const DEFAULT_RULES: RewriteRule[] = [
  illegalThreadRule,
  missingBangRule,
  aliasRule,
  flagSpacingRule,
  dataModelRule
];
