import * as fs from 'fs-extra';
import * as path from 'path';
import dayjs from 'dayjs';
import { v4 as uuidv4 } from 'uuid';
import { AnalysisState, SessionInfo } from '../types';
import { SessionIOError, ValidationError } from '../errors';

const METADATA_FILE = 'metadata.json';
const STATE_FILE = 'state.json';
const REPORT_FILE = 'report.md';
export const AUDIT_LOG_FILE = 'redaction_audit.log';

function isSessionInfo(value: unknown): value is SessionInfo {
  if (typeof value !== 'object' || value === null) return false;
  const fields: Array<keyof SessionInfo> = ['id', 'dir', 'dumpPath', 'createdAt', 'lastAccessed'];
  return fields.every(f => typeof Reflect.get(value, f) === 'string');
}

/** `session_<YYYYMMDD_HHmmss>_<dump stem>_<8 hex>` */
export function generateSessionId(dumpPath: string, now = dayjs()): string {
  const stem = path.basename(dumpPath, path.extname(dumpPath))
    .replace(/[^A-Za-z0-9_-]/g, '_')
    .slice(0, 40);
  const suffix = uuidv4().replace(/-/g, '').slice(0, 8);
  return `session_${now.format('YYYYMMDD_HHmmss')}_${stem}_${suffix}`;
}

/**
 * One directory per investigation run under the sessions root. Every
 * file a run produces lives in its session directory.
 */
export class SessionManager {
  constructor(private rootDir: string) {}

  get baseDir(): string {
    return this.rootDir;
  }

  sessionDir(id: string): string {
    if (!/^[A-Za-z0-9_-]+$/.test(id)) {
      throw new ValidationError(`Invalid session id '${id}'`);
    }
    return path.join(this.rootDir, id);
  }

  auditLogPath(id: string): string {
    return path.join(this.sessionDir(id), AUDIT_LOG_FILE);
  }

  async createSession(dumpPath: string): Promise<SessionInfo> {
    const id = generateSessionId(dumpPath);
    const dir = this.sessionDir(id);
    const now = dayjs().toISOString();
    const info: SessionInfo = {
      id,
      dir,
      dumpPath: path.resolve(dumpPath),
      createdAt: now,
      lastAccessed: now
    };
    await this.io('Creating session', dir, async () => {
      await fs.ensureDir(path.join(dir, 'evidence'));
      await fs.writeJSON(path.join(dir, METADATA_FILE), info, { spaces: 2 });
    });
    return info;
  }

  async getSession(id: string): Promise<SessionInfo | null> {
    const metadataPath = path.join(this.sessionDir(id), METADATA_FILE);
    if (!await fs.pathExists(metadataPath)) {
      return null;
    }
    const data: unknown = await this.io('Reading session metadata', metadataPath, () => fs.readJSON(metadataPath));
    return isSessionInfo(data) ? data : null;
  }

  /** All readable sessions, newest first. */
  async listSessions(): Promise<SessionInfo[]> {
    if (!await fs.pathExists(this.rootDir)) {
      return [];
    }
    const dirs = await fs.readdir(this.rootDir);
    const sessions: SessionInfo[] = [];
    for (const d of dirs) {
      if (!/^[A-Za-z0-9_-]+$/.test(d)) continue;
      const info = await this.getSession(d);
      if (info) sessions.push(info);
    }
    return sessions.sort((a, b) => dayjs(b.createdAt).valueOf() - dayjs(a.createdAt).valueOf());
  }

  async updateAccessTime(id: string): Promise<void> {
    const info = await this.getSession(id);
    if (!info) {
      throw new ValidationError(`Session ${id} not found`);
    }
    const metadataPath = path.join(this.sessionDir(id), METADATA_FILE);
    await this.io('Updating session metadata', metadataPath, () =>
      fs.writeJSON(metadataPath, { ...info, lastAccessed: dayjs().toISOString() }, { spaces: 2 })
    );
  }

  async saveState(id: string, state: AnalysisState): Promise<void> {
    const statePath = path.join(this.sessionDir(id), STATE_FILE);
    await this.io('Saving state', statePath, () => fs.outputJSON(statePath, state, { spaces: 2 }));
  }

  async saveReport(id: string, text: string): Promise<string> {
    const reportPath = path.join(this.sessionDir(id), REPORT_FILE);
    await this.io('Saving report', reportPath, () => fs.outputFile(reportPath, text, 'utf-8'));
    return reportPath;
  }

  /**
   * Deletes sessions created more than `daysOld` days ago. The `keepRecent`
   * newest sessions survive regardless of age. Returns the removed ids.
   */
  async cleanupOldSessions(daysOld = 7, keepRecent = 5): Promise<string[]> {
    const cutoff = dayjs().subtract(daysOld, 'day');
    const sessions = await this.listSessions();
    const removed: string[] = [];

    for (const s of sessions.slice(keepRecent)) {
      if (dayjs(s.createdAt).isBefore(cutoff)) {
        const dir = this.sessionDir(s.id);
        await this.io('Removing session', dir, () => fs.remove(dir));
        removed.push(s.id);
      }
    }
    return removed;
  }

  private async io<T>(operation: string, target: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      throw new SessionIOError(operation, target, error);
    }
  }
}
