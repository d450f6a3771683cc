import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import * as Arguments from '../src/arguments';
import { ConfigError } from '../src/errors';

vi.mock('../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

describe('Arguments', () => {
    let configDir: string;

    const argv = (...args: string[]) => ['node', 'shopfloor', '--config-directory', configDir, ...args];

    beforeEach(async () => {
        configDir = await fs.mkdtemp(path.join(os.tmpdir(), 'shopfloor-args-test-'));
    });

    afterEach(async () => {
        await fs.rm(configDir, { recursive: true, force: true });
    });

    describe('configure', () => {
        it('should turn flags into configuration and actions', async () => {
            const [config, actions] = await Arguments.configure(
                argv('--root', '/shop', '--organize', 'incoming', '--hierarchical', '--customer', 'ACME', '--debounce', '500', '--dry-run'),
                {},
            );

            expect(config).toMatchObject({
                rootDirectory: '/shop',
                configDirectory: configDir,
                hierarchical: true,
                customer: 'ACME',
                debounceMs: 500,
                dryRun: true,
                recursive: true,
            });
            expect(actions).toEqual({ init: false, organize: 'incoming' });
        });

        it('should keep config file values the command line does not set', async () => {
            await fs.writeFile(path.join(configDir, 'config.yaml'), 'recursive: false\nenforceNaming: true\n');

            const [config] = await Arguments.configure(argv('--init'), {});

            expect(config.recursive).toBe(false);
            expect(config.enforceNaming).toBe(true);
        });

        it('should let --no-recursive override the defaults', async () => {
            const [config] = await Arguments.configure(argv('--no-recursive'), {});
            expect(config.recursive).toBe(false);
        });

        it('should take the root from the environment unless --root is given', async () => {
            const [fromEnv] = await Arguments.configure(argv(), { SHOPFLOOR_ROOT: '/mnt/shop' });
            expect(fromEnv.rootDirectory).toBe('/mnt/shop');

            const [fromCli] = await Arguments.configure(argv('--root', '/shop'), { SHOPFLOOR_ROOT: '/mnt/shop' });
            expect(fromCli.rootDirectory).toBe('/shop');
        });

        it('should reject a bad debounce value', async () => {
            await expect(Arguments.configure(argv('--debounce', 'soon'), {})).rejects.toThrow(ConfigError);
        });

        it('should surface config file errors', async () => {
            await fs.writeFile(path.join(configDir, 'config.yaml'), 'unknownSetting: 1\n');
            await expect(Arguments.configure(argv(), {})).rejects.toThrow('Invalid configuration');
        });
    });

    describe('toActions', () => {
        it('should watch the root when --monitor has no directory', () => {
            expect(Arguments.toActions({ monitor: true })).toEqual({ init: false, monitor: '' });
        });

        it('should keep the monitor directory', () => {
            expect(Arguments.toActions({ monitor: '/drop', init: true })).toEqual({ init: true, monitor: '/drop' });
        });

        it('should report whether anything was asked for', () => {
            expect(Arguments.hasAction(Arguments.toActions({}))).toBe(false);
            expect(Arguments.hasAction(Arguments.toActions({ archive: 'JOB-7' }))).toBe(true);
        });
    });

    describe('toCliValues', () => {
        it('should only include flags that were given', () => {
            expect(Arguments.toCliValues({ recursive: true }, false)).toEqual({});
            expect(Arguments.toCliValues({ recursive: false, autoRename: true }, true)).toEqual({
                recursive: false,
                autoRename: true,
            });
        });
    });
});
