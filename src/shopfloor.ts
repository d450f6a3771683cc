import 'dotenv/config';
import * as path from 'node:path';
import * as Arguments from '@/arguments';
import { PROGRAM_NAME, VERSION } from '@/constants';
import type { Config } from '@/config';
import { describeError } from '@/errors';
import { getLogger, setLogLevel } from '@/logging';
import * as Organizer from '@/organizer';
import * as Monitor from '@/monitor';

export const formatSummary = (result: Organizer.OrganizeResult): string[] => {
    const { stats } = result;
    return [
        '='.repeat(60),
        result.dryRun ? 'ORGANIZE SUMMARY (DRY RUN)' : 'ORGANIZE SUMMARY',
        '='.repeat(60),
        `Source:       ${result.sourceDirectory}`,
        `Files:        ${stats.totalFiles}`,
        `Categorized:  ${stats.categorized}`,
        `Held:         ${stats.held}`,
        `Renamed:      ${stats.renamed}`,
        `Collisions:   ${stats.collisions}`,
        `Violations:   ${stats.violations}`,
        `Skipped:      ${stats.skipped}`,
        `Failed:       ${stats.failed}`,
        '='.repeat(60),
    ];
};

/**
 * Watch until SIGINT/SIGTERM, then drain and stop.
 */
export const runMonitor = async (
    organizer: Organizer.OrganizerInstance,
    config: Config,
    directory: string,
): Promise<void> => {
    const logger = getLogger();
    const root = path.resolve(directory);

    const monitor = Monitor.create({
        root,
        debounceMs: config.debounceMs,
        ignore: organizer.shouldIgnore,
        handler: async (filePath) => {
            const outcome = await organizer.processFile(filePath, { sourceDirectory: root });
            logger.verbose('Processed %s -> %s', filePath, outcome.operation.destination);
        },
    });

    const shutdown = (): void => {
        logger.info('Stopping monitor...');
        monitor.stop().catch((error: unknown) => {
            logger.error('Failed to stop monitor: %s', describeError(error));
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    try {
        await monitor.start();
        logger.info('Press Ctrl+C to stop.');
        await monitor.done();
    } finally {
        process.off('SIGINT', shutdown);
        process.off('SIGTERM', shutdown);
    }
};

export async function main(argv: string[] = process.argv): Promise<void> {

    // eslint-disable-next-line no-console
    console.info(`Starting ${PROGRAM_NAME}: ${VERSION}`);

    let organizer: Organizer.OrganizerInstance | undefined;

    try {
        const [config, actions] = await Arguments.configure(argv);

        if (config.verbose) {
            setLogLevel('verbose');
        }
        if (config.debug) {
            setLogLevel('debug');
        }

        if (!Arguments.hasAction(actions)) {
            getLogger().warn('Nothing to do. Use --init, --organize <dir>, --archive <dir> or --monitor [dir].');
            return;
        }

        organizer = Organizer.create(config);
        const current = getLogger();

        if (actions.init) {
            const created = await organizer.initFolders();
            current.info('Folder structure ready under %s (%d folder(s))', path.resolve(config.rootDirectory), created.length);
        }

        if (actions.organize !== undefined) {
            const result = await organizer.organizeDirectory(actions.organize);
            for (const line of formatSummary(result)) {
                // eslint-disable-next-line no-console
                console.info(line);
            }
        }

        if (actions.archive !== undefined) {
            const operation = await organizer.archiveFolder(actions.archive);
            if (operation.outcome === 'skipped') {
                throw new Error(`Cannot archive ${actions.archive}: ${operation.error ?? operation.reason ?? 'unknown reason'}`);
            }
            current.info('Archived: %s -> %s', operation.source, operation.destination);
        }

        if (actions.monitor !== undefined) {
            await runMonitor(organizer, config, actions.monitor || config.rootDirectory);
        }

        await organizer.close();
    } catch (error) {
        const logger = getLogger();
        logger.error('Exiting due to Error: %s', describeError(error));
        if (error instanceof Error && error.stack) {
            logger.debug('%s', error.stack);
        }
        await organizer?.close();
        process.exit(1);
    }
}
