import { Evidence } from '../types';
import { ThreadsData } from '../analyzers/ThreadsAnalyzer';
import { SyncBlockData } from '../analyzers/SyncBlockAnalyzer';
import { DumpHeapData } from '../analyzers/DumpHeapAnalyzer';

/** A live thread as both selectors see it: `~<dbgId>` and `~~[<osid hex>]`. */
export interface KnownThread {
  dbgId: number;
  managedId: number;
  osid: number;
}

export type PlaceholderResolution =
  | { resolved: true; command: string }
  | { resolved: false; command: string; unresolved: string[] };

type SlotKind = 'thread' | 'mt' | 'address';

interface ThreadRef {
  dbgId: number | null;
  osid: number;
}

// ~~[name] where the bracket holds an identifier instead of a hex OSID
const THREAD_SLOT = /~~\[([A-Za-z_][A-Za-z0-9_]*)\]/g;
const ANGLE_SLOT = /<([^<>]+)>/g;
const TYPE_HINT = /([A-Z][A-Za-z0-9_.]+)/;

function isThreadsData(d: object): d is ThreadsData {
  return 'threads' in d && Array.isArray(d.threads) && 'lockHolders' in d;
}

function isSyncBlockData(d: object): d is SyncBlockData {
  return 'contention' in d && Array.isArray(d.contention);
}

function isDumpHeapData(d: object): d is DumpHeapData {
  return 'topBySize' in d && Array.isArray(d.topBySize) && 'objects' in d && Array.isArray(d.objects);
}

/** Structured data of the most recent evidence a given analyzer produced. */
function latest<T extends object>(evidence: Evidence[], analyzer: string, guard: (d: object) => d is T): T | null {
  for (let i = evidence.length - 1; i >= 0; i--) {
    const e = evidence[i];
    if (e.analyzer === analyzer && e.structuredData && guard(e.structuredData)) {
      return e.structuredData;
    }
  }
  return null;
}

export function knownThreads(evidence: Evidence[]): KnownThread[] {
  const data = latest(evidence, 'threads', isThreadsData);
  if (!data) return [];
  const live: KnownThread[] = [];
  for (const t of data.threads) {
    if (t.dbgId !== null) live.push({ dbgId: t.dbgId, managedId: t.managedId, osid: t.osid });
  }
  return live;
}

function isHex(text: string): boolean {
  return /^[0-9a-fA-F]+$/.test(text);
}

function slotKind(name: string): SlotKind | null {
  const lower = name.toLowerCase();
  if (/thread|tid|osid/.test(lower)) return 'thread';
  if (/(^|[^a-z])mt([^a-z]|$)|method[ _]?table/.test(lower)) return 'mt';
  if (/addr|object|obj\b/.test(lower)) return 'address';
  return null;
}

/** `~~[name]` and `<...>` slots an oracle left in a command, in order. */
export function findPlaceholders(command: string): string[] {
  const slots: string[] = [];
  for (const m of command.matchAll(THREAD_SLOT)) {
    if (!isHex(m[1])) slots.push(m[0]);
  }
  for (const m of command.matchAll(ANGLE_SLOT)) {
    if (slotKind(m[1]) !== null) slots.push(m[0]);
  }
  return slots;
}

function pickThread(hint: string, evidence: Evidence[]): ThreadRef | null {
  const lower = hint.toLowerCase();
  const threads = latest(evidence, 'threads', isThreadsData);
  const live = threads ? threads.threads.filter(t => !t.isDead) : [];

  if (lower.includes('finaliz')) {
    const finalizer = live.find(t => t.special !== null && t.special.toLowerCase().includes('finalizer'));
    return finalizer ? { dbgId: finalizer.dbgId, osid: finalizer.osid } : null;
  }
  if (lower.includes('exception')) {
    const faulting = live.find(t => t.exception !== null);
    return faulting ? { dbgId: faulting.dbgId, osid: faulting.osid } : null;
  }

  const locks = latest(evidence, 'syncblk', isSyncBlockData);
  const owner = locks
    ? [...locks.contention].sort((a, b) => b.waitingThreads - a.waitingThreads).find(e => e.osid !== null)
    : undefined;
  if (owner && owner.osid !== null) {
    return { dbgId: owner.debuggerThreadId, osid: owner.osid };
  }

  const fallback = live.find(t => t.exception !== null) ?? live.find(t => t.lockCount > 0);
  return fallback ? { dbgId: fallback.dbgId, osid: fallback.osid } : null;
}

function pickMethodTable(hint: string, evidence: Evidence[]): string | null {
  const heap = latest(evidence, 'dumpheap', isDumpHeapData);
  if (!heap) return null;
  const typeName = TYPE_HINT.exec(hint.replace(/^(?:mt|methodtable)_?(?:of_)?/i, ''));
  if (typeName) {
    const row = [...heap.topBySize, ...heap.topByCount].find(r => r.className.includes(typeName[1]));
    if (row) return row.methodTable;
  }
  if (/common|count|most/i.test(hint)) return heap.topByCount[0]?.methodTable ?? null;
  return heap.topBySize[0]?.methodTable ?? heap.objects[0]?.methodTable ?? null;
}

function pickAddress(hint: string, evidence: Evidence[]): string | null {
  const heap = latest(evidence, 'dumpheap', isDumpHeapData);
  const locks = latest(evidence, 'syncblk', isSyncBlockData);
  const typeName = TYPE_HINT.exec(hint.replace(/^(?:address|addr|object|obj)_?(?:of_)?/i, ''));

  if (typeName) {
    if (heap && heap.typeName !== null && heap.typeName.includes(typeName[1]) && heap.objects.length > 0) {
      return heap.objects[0].address;
    }
    const locked = locks?.entries.find(e => e.ownerType.includes(typeName[1]));
    if (locked) return locked.ownerObject;
  }
  if (/lock|monitor/i.test(hint) && locks && locks.contention.length > 0) {
    return locks.contention[0].ownerObject;
  }
  if (heap && heap.objects.length > 0) {
    if (/largest|biggest|large/i.test(hint)) {
      return heap.objects.reduce((max, o) => (o.size > max.size ? o : max)).address;
    }
    return heap.objects[0].address;
  }
  return locks && locks.contention.length > 0 ? locks.contention[0].ownerObject : null;
}

/**
 * Fills oracle-written placeholders from structured evidence: thread slots
 * from !threads and !syncblk, method tables and object addresses from
 * !dumpheap and !syncblk. A slot with no grounded value stays unresolved.
 */
export function resolvePlaceholders(command: string, evidence: Evidence[]): PlaceholderResolution {
  const unresolved: string[] = [];

  let resolved = command.replace(THREAD_SLOT, (slot: string, name: string) => {
    if (isHex(name)) return slot;
    const thread = pickThread(name, evidence);
    if (!thread) {
      unresolved.push(slot);
      return slot;
    }
    return `~~[${thread.osid.toString(16)}]`;
  });

  resolved = resolved.replace(ANGLE_SLOT, (slot: string, name: string, offset: number) => {
    const kind = slotKind(name);
    if (kind === null) return slot;

    let value: string | null = null;
    if (kind === 'thread') {
      const thread = pickThread(name, evidence);
      const before = resolved.slice(0, offset);
      if (thread && before.endsWith('~~[')) {
        value = thread.osid.toString(16);
      } else if (thread && before.endsWith('~')) {
        value = thread.dbgId !== null ? String(thread.dbgId) : `~[${thread.osid.toString(16)}]`;
      } else if (thread) {
        value = String(thread.dbgId ?? thread.osid);
      }
    } else if (kind === 'mt') {
      value = pickMethodTable(name, evidence);
    } else {
      value = pickAddress(name, evidence);
    }

    if (value === null) {
      unresolved.push(slot);
      return slot;
    }
    return value;
  });

  return unresolved.length > 0
    ? { resolved: false, command: resolved, unresolved }
    : { resolved: true, command: resolved };
}
