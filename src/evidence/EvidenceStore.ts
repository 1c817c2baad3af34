import * as fs from 'fs-extra';
import * as path from 'path';
import * as crypto from 'crypto';
import dayjs from 'dayjs';
import { OutputRef } from '../types';
import { SessionIOError, ValidationError } from '../errors';

export interface EvidenceIndexEntry {
  id: string;
  size: number;
  sha256: string;
  createdAt: string;
  command?: string;
}

const ID_PATTERN = /^ev_[0-9a-f]{24}$/;

export function evidenceIdFor(sessionId: string, content: string): string {
  const digest = crypto.createHash('sha256').update(sessionId).update('\0').update(content).digest('hex');
  return `ev_${digest.slice(0, 24)}`;
}

/**
 * Content-keyed evidence blobs, one namespace per session:
 *   <rootDir>/<sessionId>/evidence/<id>.txt
 *   <rootDir>/<sessionId>/evidence/index.json
 */
export class EvidenceStore {
  private owners = new Map<string, string>(); // evidence id -> session id

  constructor(private rootDir: string, private threshold: number) {}

  async put(sessionId: string, content: string, command?: string): Promise<string> {
    const id = evidenceIdFor(sessionId, content);
    const evidenceDir = this.evidenceDir(sessionId);
    const filePath = path.join(evidenceDir, `${id}.txt`);

    try {
      await fs.ensureDir(evidenceDir);
      if (!await fs.pathExists(filePath)) {
        await fs.writeFile(filePath, content, 'utf-8');
        await this.appendIndex(sessionId, {
          id,
          size: content.length,
          sha256: crypto.createHash('sha256').update(content).digest('hex'),
          createdAt: dayjs().toISOString(),
          command
        });
      }
    } catch (error) {
      throw new SessionIOError('Storing evidence', filePath, error);
    }

    this.owners.set(id, sessionId);
    return id;
  }

  async get(evidenceId: string): Promise<string> {
    if (!ID_PATTERN.test(evidenceId)) {
      throw new ValidationError(`Malformed evidence id: ${evidenceId}`);
    }
    const sessionId = this.owners.get(evidenceId) ?? await this.findOwner(evidenceId);
    const filePath = path.join(this.evidenceDir(sessionId), `${evidenceId}.txt`);
    try {
      return await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new SessionIOError('Reading evidence', filePath, error);
    }
  }

  /** Inline below the threshold, external file at or above it. */
  async store(sessionId: string, content: string, command?: string): Promise<OutputRef> {
    if (content.length < this.threshold) {
      return { kind: 'inline', text: content };
    }
    const evidenceId = await this.put(sessionId, content, command);
    return { kind: 'external', evidenceId, size: content.length };
  }

  async resolve(ref: OutputRef): Promise<string> {
    return ref.kind === 'inline' ? ref.text : this.get(ref.evidenceId);
  }

  async list(sessionId: string): Promise<EvidenceIndexEntry[]> {
    const indexPath = this.indexPath(sessionId);
    try {
      if (!await fs.pathExists(indexPath)) return [];
      return await fs.readJSON(indexPath);
    } catch (error) {
      throw new SessionIOError('Reading evidence index', indexPath, error);
    }
  }

  private async appendIndex(sessionId: string, entry: EvidenceIndexEntry): Promise<void> {
    const entries = await this.list(sessionId);
    entries.push(entry);
    await fs.writeJSON(this.indexPath(sessionId), entries, { spaces: 2 });
  }

  private async findOwner(evidenceId: string): Promise<string> {
    let sessions: string[];
    try {
      sessions = await fs.pathExists(this.rootDir) ? await fs.readdir(this.rootDir) : [];
    } catch (error) {
      throw new SessionIOError('Listing sessions', this.rootDir, error);
    }
    for (const sessionId of sessions) {
      if (await fs.pathExists(path.join(this.evidenceDir(sessionId), `${evidenceId}.txt`))) {
        this.owners.set(evidenceId, sessionId);
        return sessionId;
      }
    }
    throw new SessionIOError('Locating evidence', evidenceId, new Error('no session holds this id'));
  }

  private evidenceDir(sessionId: string): string {
    return path.join(this.rootDir, sessionId, 'evidence');
  }

  private indexPath(sessionId: string): string {
    return path.join(this.evidenceDir(sessionId), 'index.json');
  }
}
