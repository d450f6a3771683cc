/**
 * Housekeeper Module
 *
 * Wraps the organizer as an activatable module so a host application can
 * run organize/archive/init on demand and keep a directory under watch while
 * the module is active. Failures are reported in the response and counted,
 * never thrown to the caller.
 */

import * as path from 'node:path';
import { HOUSEKEEPER_ACTIONS } from './types';
import type {
    HousekeeperAction,
    HousekeeperConfig,
    HousekeeperStatus,
    MetricName,
    ProcessRequest,
    ProcessResponse,
} from './types';
import * as Organizer from '../organizer';
import * as Monitor from '../monitor';
import * as Logging from '../logging';
import { describeError } from '../errors';

export interface HousekeeperInstance {
    readonly name: string;
    readonly displayName: string;
    readonly version: string;
    activate(): Promise<boolean>;
    deactivate(): Promise<boolean>;
    process(request: ProcessRequest): Promise<ProcessResponse>;
    getStatus(): HousekeeperStatus;
    startMonitoring(monitorPath: string): Promise<boolean>;
    stopMonitoring(): Promise<boolean>;
    getMetrics(): Partial<Record<MetricName, number>>;
}

const isAction = (action: string): action is HousekeeperAction =>
    HOUSEKEEPER_ACTIONS.some(known => known === action);

export const create = (config: HousekeeperConfig): HousekeeperInstance => {
    const logger = Logging.getLogger();
    const now = config.now ?? (() => new Date());
    const metrics: Partial<Record<MetricName, number>> = {};

    let organizer: Organizer.OrganizerInstance | undefined;
    let monitor: Monitor.MonitorInstance | undefined;
    let monitorPath: string | null = null;
    let active = false;
    let lastRun: Date | null = null;

    const increment = (metric: MetricName, amount = 1): void => {
        metrics[metric] = (metrics[metric] ?? 0) + amount;
    };

    const logActivity = (message: string, level: 'info' | 'error' = 'info'): void => {
        logger.log(level, `[housekeeper] ${message}`);
    };

    const startMonitoring = async (target: string): Promise<boolean> => {
        if (!organizer) return false;
        const current = organizer;

        try {
            if (monitor) {
                await stopMonitoring();
            }
            const resolved = path.resolve(target);
            const started = Monitor.create({
                root: resolved,
                debounceMs: config.debounceMs,
                ignore: current.shouldIgnore,
                ...(config.watch !== undefined && { watch: config.watch }),
                handler: async (filePath) => {
                    const outcome = await current.processFile(filePath, { sourceDirectory: resolved });
                    increment('files_processed');
                    if (outcome.operation.error !== undefined) {
                        increment('errors');
                    }
                    lastRun = now();
                },
            });
            await started.start();

            monitor = started;
            monitorPath = resolved;
            logActivity(`Started monitoring: ${resolved}`);
            return true;
        } catch (error) {
            logActivity(`Failed to start monitoring: ${describeError(error)}`, 'error');
            return false;
        }
    };

    const stopMonitoring = async (): Promise<boolean> => {
        try {
            const running = monitor;
            monitor = undefined;
            monitorPath = null;
            if (running) {
                await running.stop();
            }
            logActivity('Stopped monitoring');
            return true;
        } catch (error) {
            logActivity(`Failed to stop monitoring: ${describeError(error)}`, 'error');
            return false;
        }
    };

    const activate = async (): Promise<boolean> => {
        if (active) {
            logActivity('Housekeeper already active');
            return true;
        }

        try {
            organizer = Organizer.create(config);
            await organizer.initFolders();

            active = true;
            increment('activations');
            logActivity(`Housekeeper activated with root: ${config.rootDirectory}`);

            if (config.monitorPath) {
                await startMonitoring(config.monitorPath);
            }
            return true;
        } catch (error) {
            organizer = undefined;
            logActivity(`Failed to activate: ${describeError(error)}`, 'error');
            return false;
        }
    };

    const deactivate = async (): Promise<boolean> => {
        try {
            if (monitor) {
                await stopMonitoring();
            }
            if (organizer) {
                await organizer.close();
            }
            organizer = undefined;
            active = false;
            logActivity('Housekeeper deactivated');
            return true;
        } catch (error) {
            logActivity(`Failed to deactivate: ${describeError(error)}`, 'error');
            return false;
        }
    };

    const process = async (request: ProcessRequest): Promise<ProcessResponse> => {
        if (!organizer) {
            return { success: false, error: 'Housekeeper not activated' };
        }

        const action = request.action;
        if (!isAction(action)) {
            return { success: false, error: `Unknown action: ${action}` };
        }
        const dryRun = request.dryRun ?? config.dryRun;

        try {
            switch (action) {
                case 'organize': {
                    if (!request.path) {
                        return { success: false, error: 'Path required for organize action' };
                    }
                    const result = await organizer.organizeDirectory(request.path, {
                        dryRun,
                        ...(request.customer !== undefined && { customer: request.customer }),
                    });
                    increment('files_processed', result.stats.totalFiles);
                    lastRun = now();
                    return { success: true, dryRun, stats: result.stats };
                }
                case 'archive': {
                    if (!request.path) {
                        return { success: false, error: 'Path required for archive action' };
                    }
                    const operation = await organizer.archiveFolder(request.path, { dryRun });
                    if (operation.outcome === 'skipped') {
                        increment('errors');
                        return { success: false, error: operation.error ?? `Cannot archive ${request.path}: ${operation.reason ?? 'skipped'}` };
                    }
                    increment('folders_archived');
                    lastRun = now();
                    return { success: true, dryRun, message: `Archived ${request.path}`, operation };
                }
                case 'init': {
                    const created = await organizer.initFolders({ dryRun });
                    return { success: true, dryRun, message: 'Folder structure initialized', created };
                }
            }
        } catch (error) {
            logActivity(`Error processing ${action}: ${describeError(error)}`, 'error');
            increment('errors');
            return { success: false, error: describeError(error) };
        }
    };

    const getStatus = (): HousekeeperStatus => ({
        healthy: organizer !== undefined,
        active,
        monitoring: monitor !== undefined,
        monitorPath,
        config: {
            rootDirectory: config.rootDirectory,
            hierarchical: config.hierarchical,
            enforceNaming: config.enforceNaming,
            autoRename: config.autoRename,
        },
        metrics: { ...metrics },
        lastRun: lastRun ? lastRun.toISOString() : null,
    });

    return {
        name: 'housekeeper',
        displayName: 'Housekeeper',
        version: '1.0.0',
        activate,
        deactivate,
        process,
        getStatus,
        startMonitoring,
        stopMonitoring,
        getMetrics: () => ({ ...metrics }),
    };
};
