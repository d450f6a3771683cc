import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import * as Config from '../../src/config';
import { ConfigError } from '../../src/errors';
import { DEFAULT_DEBOUNCE_MS, DEFAULT_FOLDERS } from '../../src/constants';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

describe('Configuration', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'shopfloor-config-test-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    describe('readConfigFile', () => {
        it('should treat a missing file as empty', async () => {
            expect(await Config.readConfigFile(path.join(tempDir, 'nowhere'))).toEqual({});
        });

        it('should treat an empty file as empty', async () => {
            await fs.writeFile(Config.configFilePath(tempDir), '');
            expect(await Config.readConfigFile(tempDir)).toEqual({});
        });

        it('should read YAML settings', async () => {
            await fs.writeFile(Config.configFilePath(tempDir), [
                'rootDirectory: /shop',
                'hierarchical: true',
                'debounceMs: 500',
                'folders:',
                '  HOLDING: Inbox',
                'categories:',
                '  CAD: [.step, .x_t]',
            ].join('\n'));

            expect(await Config.readConfigFile(tempDir)).toEqual({
                rootDirectory: '/shop',
                hierarchical: true,
                debounceMs: 500,
                folders: { HOLDING: 'Inbox' },
                categories: { CAD: ['.step', '.x_t'] },
            });
        });

        it('should reject malformed YAML', async () => {
            await fs.writeFile(Config.configFilePath(tempDir), 'folders: [unclosed');
            await expect(Config.readConfigFile(tempDir)).rejects.toThrow(ConfigError);
        });

        it('should reject unknown keys', async () => {
            await fs.writeFile(Config.configFilePath(tempDir), 'rootDir: /shop\n');
            await expect(Config.readConfigFile(tempDir)).rejects.toThrow('Invalid configuration');
        });

        it('should reject values of the wrong type', async () => {
            await fs.writeFile(Config.configFilePath(tempDir), 'debounceMs: soon\n');
            await expect(Config.readConfigFile(tempDir)).rejects.toThrow(/debounceMs/);
        });
    });

    describe('readEnvironment', () => {
        it('should take the root from SHOPFLOOR_ROOT', () => {
            expect(Config.readEnvironment({ SHOPFLOOR_ROOT: '/mnt/shop' })).toEqual({ rootDirectory: '/mnt/shop' });
        });

        it('should ignore an empty value', () => {
            expect(Config.readEnvironment({ SHOPFLOOR_ROOT: '' })).toEqual({});
        });
    });

    describe('resolveConfig', () => {
        it('should start from the defaults', () => {
            const config = Config.defaults();
            expect(config.debounceMs).toBe(DEFAULT_DEBOUNCE_MS);
            expect(config.folders).toEqual(DEFAULT_FOLDERS);
            expect(config.recursive).toBe(true);
            expect(config.customer).toBeUndefined();
        });

        it('should apply file, environment and command line in that order', () => {
            const config = Config.resolveConfig(
                { rootDirectory: '/from-file', dryRun: true, hierarchical: true },
                { rootDirectory: '/from-env' },
                { rootDirectory: '/from-cli', dryRun: false },
            );

            expect(config.rootDirectory).toBe('/from-cli');
            expect(config.dryRun).toBe(false);
            expect(config.hierarchical).toBe(true);
        });

        it('should merge folder overrides with the defaults', () => {
            const config = Config.resolveConfig({ folders: { HOLDING: 'Inbox' } }, {}, {});
            expect(config.folders).toEqual({ ...DEFAULT_FOLDERS, HOLDING: 'Inbox' });
        });

        it('should replace the category table as a whole', () => {
            const config = Config.resolveConfig({ categories: { CAD: ['.step'] } }, {}, {});
            expect(config.categories).toEqual({ CAD: ['.step'] });
        });

        it('should reject invalid merged values', () => {
            expect(() => Config.resolveConfig({}, {}, { debounceMs: -1 })).toThrow(ConfigError);
        });
    });
});
