import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import dayjs from 'dayjs';
import { SessionManager, generateSessionId } from '../src/storage/SessionManager';
import { createInitialState } from '../src/orchestration/InvestigationController';
import { SessionIOError, ValidationError } from '../src/errors';

describe('SessionManager', () => {
    let root: string;
    let manager: SessionManager;

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'sessions-'));
        manager = new SessionManager(root);
    });

    afterEach(() => {
        fs.removeSync(root);
    });

    function writeSession(id: string, createdAt: string): void {
        fs.outputJSONSync(path.join(root, id, 'metadata.json'), {
            id,
            dir: path.join(root, id),
            dumpPath: '/dumps/app.dmp',
            createdAt,
            lastAccessed: createdAt
        });
    }

    test('Builds readable session ids', () => {
        const id = generateSessionId('/dumps/my app.dmp', dayjs('2026-03-04T05:06:07'));

        expect(id).toMatch(/^session_20260304_050607_my_app_[0-9a-f]{8}$/);
    });

    test('Creates a session directory with metadata and an evidence folder', async () => {
        const info = await manager.createSession('/dumps/app.dmp');

        expect(info.dir).toBe(path.join(root, info.id));
        expect(fs.pathExistsSync(path.join(info.dir, 'evidence'))).toBe(true);
        expect(await manager.getSession(info.id)).toEqual(info);
    });

    test('Rejects ids that could escape the sessions root', () => {
        expect(() => manager.sessionDir('../elsewhere')).toThrow(ValidationError);
    });

    test('Returns null for missing or unreadable sessions', async () => {
        fs.outputJSONSync(path.join(root, 'broken', 'metadata.json'), { id: 1 });

        expect(await manager.getSession('missing')).toBeNull();
        expect(await manager.getSession('broken')).toBeNull();
    });

    test('Lists sessions newest first, skipping broken ones', async () => {
        writeSession('older', '2026-01-01T00:00:00.000Z');
        writeSession('newer', '2026-02-01T00:00:00.000Z');
        fs.outputJSONSync(path.join(root, 'broken', 'metadata.json'), { id: 1 });

        expect((await manager.listSessions()).map(s => s.id)).toEqual(['newer', 'older']);
    });

    test('Cleans up old sessions but keeps the most recent', async () => {
        writeSession('today', dayjs().toISOString());
        writeSession('tenDays', dayjs().subtract(10, 'day').toISOString());
        writeSession('twentyDays', dayjs().subtract(20, 'day').toISOString());

        expect(await manager.cleanupOldSessions(15, 1)).toEqual(['twentyDays']);
        expect(await manager.cleanupOldSessions(7, 1)).toEqual(['tenDays']);
        expect((await manager.listSessions()).map(s => s.id)).toEqual(['today']);
    });

    test('Never removes the newest sessions, however old', async () => {
        writeSession('ancient', dayjs().subtract(100, 'day').toISOString());

        expect(await manager.cleanupOldSessions(7, 5)).toEqual([]);
        expect(fs.pathExistsSync(path.join(root, 'ancient'))).toBe(true);
    });

    test('Saves state, reports and access times', async () => {
        const info = await manager.createSession('/dumps/app.dmp');
        const state = createInitialState(info.id, info.dumpPath, 'hang', 'user', 15);

        await manager.saveState(info.id, state);
        const reportPath = await manager.saveReport(info.id, '# Report');
        await manager.updateAccessTime(info.id);

        expect(fs.readJSONSync(path.join(info.dir, 'state.json'))).toEqual(state);
        expect(reportPath).toBe(path.join(info.dir, 'report.md'));
        expect(fs.readFileSync(reportPath, 'utf-8')).toBe('# Report');
        expect((await manager.getSession(info.id))?.createdAt).toBe(info.createdAt);
        await expect(manager.updateAccessTime('missing')).rejects.toThrow(ValidationError);
    });

    test('Wraps filesystem failures in SessionIOError', async () => {
        const file = path.join(root, 'not-a-directory');
        fs.writeFileSync(file, 'x');

        await expect(new SessionManager(file).createSession('/dumps/app.dmp')).rejects.toThrow(SessionIOError);
    });
});
