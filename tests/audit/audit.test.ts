import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import * as Audit from '../../src/audit';
import type { MoveOperation } from '../../src/mover';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        verbose: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

const TIMESTAMP = '2024-01-15T10:30:00.000Z';
const now = () => new Date(TIMESTAMP);

const operation = (overrides: Partial<MoveOperation>): MoveOperation => ({
    source: '/shop/in/x.step',
    destination: '/shop/CAD/x.step',
    dryRun: false,
    outcome: 'moved',
    ...overrides,
});

describe('Audit Trail', () => {
    let tempDir: string;
    let logFile: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'shopfloor-audit-test-'));
        logFile = path.join(tempDir, 'shopfloor.log');
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    describe('describeMove', () => {
        it('should describe a move', () => {
            expect(Audit.describeMove(operation({}))).toEqual({
                level: 'info',
                message: 'Moved: /shop/in/x.step -> /shop/CAD/x.step',
            });
        });

        it('should warn about a collision rename', () => {
            expect(Audit.describeMove(operation({ outcome: 'renamed', destination: '/shop/CAD/x_20240115_103000.step' }))).toEqual({
                level: 'warn',
                message: 'Renamed to avoid collision: /shop/in/x.step -> /shop/CAD/x_20240115_103000.step',
            });
        });

        it('should report a failed move as an error', () => {
            expect(Audit.describeMove(operation({ outcome: 'skipped', reason: 'error', error: 'EACCES' }))).toEqual({
                level: 'error',
                message: 'Skipped: /shop/in/x.step (error): EACCES',
            });
        });

        it('should report a plain skip as info', () => {
            expect(Audit.describeMove(operation({ outcome: 'skipped', reason: 'already in place' }))).toEqual({
                level: 'info',
                message: 'Skipped: /shop/in/x.step (already in place)',
            });
        });
    });

    describe('formatEntry', () => {
        it('should write timestamp, level and message', () => {
            expect(Audit.formatEntry({ timestamp: now(), level: 'warn', message: 'hello' }))
                .toBe(`${TIMESTAMP} - WARN - hello`);
        });
    });

    describe('recording', () => {
        it('should append one line per decision to the log file', async () => {
            const audit = Audit.create({ logFile, dryRun: false, now });

            audit.recordMove(operation({}));
            audit.recordViolation('/shop/in/bracket.nc', [
                { code: 'non-canonical', message: 'bad' },
                { code: 'missing-revision', message: 'none' },
            ]);
            await audit.close();

            await vi.waitFor(async () => {
                const content = await fs.readFile(logFile, 'utf-8');
                expect(content.trim().split('\n')).toEqual([
                    `${TIMESTAMP} - INFO - Moved: /shop/in/x.step -> /shop/CAD/x.step`,
                    `${TIMESTAMP} - WARN - Naming violation: /shop/in/bracket.nc: non-canonical, missing-revision`,
                ]);
            });
        });

        it('should keep entries in memory', () => {
            const audit = Audit.create({ logFile, dryRun: false, now });
            const entry = audit.record('info', 'Processing complete');

            expect(entry).toEqual({ timestamp: now(), level: 'info', message: 'Processing complete' });
            expect(audit.entries()).toEqual([entry]);
            return audit.close();
        });

        it('should not create the file before anything is recorded', async () => {
            const audit = Audit.create({ logFile, dryRun: false, now });
            await audit.close();

            await expect(fs.access(logFile)).rejects.toThrow();
        });
    });

    describe('dry run', () => {
        it('should prefix entries and never write the file', async () => {
            const audit = Audit.create({ logFile, dryRun: true, now });

            audit.recordMove(operation({ dryRun: true }));
            await audit.close();

            expect(audit.entries().map(entry => entry.message)).toEqual([
                '[DRY RUN] Moved: /shop/in/x.step -> /shop/CAD/x.step',
            ]);
            expect(await fs.readdir(tempDir)).toEqual([]);
        });
    });
});
