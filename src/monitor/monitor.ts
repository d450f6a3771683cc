/**
 * Monitor
 *
 * Watches a directory and feeds files that have stopped changing to a
 * handler, one at a time. Filesystem events only restart per-path debounce
 * timers; a path whose timer runs out is pushed onto a queue drained by a
 * single processing loop. stop() closes the watcher, abandons running timers
 * and discards queued paths.
 */

import * as path from 'node:path';
import { watch as watchPaths } from 'chokidar';
import type { MonitorConfig, StabilityState, WatchFactory } from './types';
import * as Stability from './stability';
import * as Queue from './queue';
import * as Logging from '../logging';
import { describeError } from '../errors';

export interface MonitorInstance {
    start(): Promise<void>;
    stop(): Promise<void>;
    notify(filePath: string): void;
    getState(filePath: string): StabilityState | undefined;
    isRunning(): boolean;
    /** Resolves when the processing loop has finished */
    done(): Promise<void>;
}

export const watchWithChokidar: WatchFactory = (root, handlers, ignore) => {
    const watcher = watchPaths(root, {
        ignoreInitial: true,
        ignored: (filePath: string) => filePath !== root && ignore(filePath),
    });
    watcher.on('add', (filePath: string) => handlers.onChange(filePath));
    watcher.on('change', (filePath: string) => handlers.onChange(filePath));
    watcher.on('error', (error: unknown) => handlers.onError(error));
    return { close: () => watcher.close() };
};

export const create = (config: MonitorConfig): MonitorInstance => {
    const logger = Logging.getLogger();
    const root = path.resolve(config.root);
    const ignore = config.ignore ?? (() => false);
    const watch = config.watch ?? watchWithChokidar;

    const queue = Queue.create<string>();
    const tracker = Stability.create({
        debounceMs: config.debounceMs,
        onStable: (filePath) => {
            logger.debug('File stable: %s', filePath);
            queue.push(filePath);
        },
    });

    let source: { close(): Promise<void> } | undefined;
    let running = false;
    let loop: Promise<void> = Promise.resolve();

    const notify = (filePath: string): void => {
        if (!running) return;

        const resolved = path.resolve(filePath);
        if (ignore(resolved)) {
            logger.debug('Ignoring event for %s', resolved);
            return;
        }
        tracker.notify(resolved);
    };

    const processLoop = async (): Promise<void> => {
        for (;;) {
            const filePath = await queue.next();
            if (filePath === undefined) return;

            // Modified again after it was queued; it comes back once it settles
            if (tracker.getState(filePath) !== 'STABLE') continue;

            try {
                await config.handler(filePath);
            } catch (error) {
                logger.error('Error processing %s: %s', filePath, describeError(error));
            } finally {
                tracker.release(filePath);
            }
        }
    };

    const start = async (): Promise<void> => {
        if (running) {
            logger.warn('Monitor already running for %s', root);
            return;
        }
        if (queue.isClosed()) {
            throw new Error('Monitor has been stopped and cannot be restarted');
        }

        running = true;
        source = watch(root, {
            onChange: notify,
            onError: (error) => logger.error('Watcher error on %s: %s', root, describeError(error)),
        }, ignore);
        loop = processLoop();
        logger.info('Monitoring %s (debounce %dms)', root, config.debounceMs);
    };

    const stop = async (): Promise<void> => {
        if (!running) return;
        running = false;

        tracker.cancel();
        queue.close();

        const active = source;
        source = undefined;
        if (active) {
            await active.close();
        }
        await loop;
        logger.info('Stopped monitoring %s', root);
    };

    return {
        start,
        stop,
        notify,
        getState: (filePath) => tracker.getState(path.resolve(filePath)),
        isRunning: () => running,
        done: () => loop,
    };
};
