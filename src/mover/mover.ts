/**
 * Mover
 *
 * Guarded file moves. A move never overwrites: when the destination name is
 * taken a `_YYYYMMDD_HHMMSS` suffix is added (and `_2`, `_3`, ... after that
 * if needed). Nothing is ever deleted; a source name is only unlinked once
 * its content is reachable from the destination.
 *
 * In dry-run mode the same decisions are computed from read-only checks and
 * the names a real run would have taken are reserved, so later files in the
 * same run see the same collisions.
 */

import * as path from 'node:path';
import * as fs from 'fs/promises';
import { constants as fsConstants, type Stats } from 'node:fs';
import type { BatchResult, MoveOperation, MoveRequest, MoverConfig } from './types';
import * as Logging from '../logging';
import { describeError, errorCode } from '../errors';

export interface MoverInstance {
    move(request: MoveRequest): Promise<MoveOperation>;
    moveBatch(requests: MoveRequest[]): Promise<BatchResult>;
    moveFolder(source: string, destinationDir: string): Promise<MoveOperation>;
    resolveDestination(destinationDir: string, name: string): Promise<{ destination: string; collided: boolean }>;
    reset(): void;
}

const MAX_ATTEMPTS = 5;

export const formatTimestamp = (date: Date): string => {
    const pad = (n: number) => n.toString().padStart(2, '0');
    const datePart = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
    const timePart = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
    return `${datePart}_${timePart}`;
};

export const pathExists = async (target: string): Promise<boolean> => {
    try {
        await fs.lstat(target);
        return true;
    } catch (error) {
        if (errorCode(error) === 'ENOENT') return false;
        throw error;
    }
};

const statOrUndefined = async (target: string): Promise<Stats | undefined> => {
    try {
        return await fs.stat(target);
    } catch (error) {
        if (errorCode(error) === 'ENOENT') return undefined;
        throw error;
    }
};

export const create = (config: MoverConfig): MoverInstance => {
    const logger = Logging.getLogger();
    const now = config.now ?? (() => new Date());
    const createDirectories = config.createDirectories ?? true;
    const reserved = new Set<string>();

    const isTaken = async (candidate: string): Promise<boolean> =>
        reserved.has(candidate) || await pathExists(candidate);

    const resolveDestination = async (
        destinationDir: string,
        name: string
    ): Promise<{ destination: string; collided: boolean }> => {
        const direct = path.join(destinationDir, name);
        if (!await isTaken(direct)) {
            return { destination: direct, collided: false };
        }

        const ext = path.extname(name);
        const stem = ext ? name.slice(0, -ext.length) : name;
        const stamped = `${stem}_${formatTimestamp(now())}`;

        let candidate = path.join(destinationDir, `${stamped}${ext}`);
        for (let counter = 2; await isTaken(candidate); counter++) {
            candidate = path.join(destinationDir, `${stamped}_${counter}${ext}`);
        }
        return { destination: candidate, collided: true };
    };

    // Hard link first: it fails instead of replacing an existing name
    const transfer = async (source: string, destination: string): Promise<void> => {
        try {
            await fs.link(source, destination);
        } catch (error) {
            const code = errorCode(error);
            if (code !== 'EXDEV' && code !== 'EPERM' && code !== 'ENOTSUP') {
                throw error;
            }
            await fs.copyFile(source, destination, fsConstants.COPYFILE_EXCL);
        }

        try {
            await fs.unlink(source);
        } catch (error) {
            // Source stays put, so the new name goes: one path per file
            try {
                await fs.unlink(destination);
            } catch (cleanupError) {
                logger.error('Cannot remove %s after failed move: %s', destination, describeError(cleanupError));
            }
            throw error;
        }
    };

    const skipped = (request: MoveRequest, destination: string, reason: string, error?: string): MoveOperation => ({
        source: request.source,
        destination,
        dryRun: config.dryRun,
        outcome: 'skipped',
        reason,
        ...(error !== undefined && { error }),
    });

    const ensureDirectory = async (dir: string): Promise<string | undefined> => {
        if (await pathExists(dir)) return undefined;
        if (!createDirectories) {
            return `Destination directory does not exist: ${dir}`;
        }
        if (!config.dryRun) {
            await fs.mkdir(dir, { recursive: true });
        }
        return undefined;
    };

    const move = async (request: MoveRequest): Promise<MoveOperation> => {
        const source = path.resolve(request.source);
        const destinationDir = path.resolve(request.destinationDir);
        const name = request.targetName ?? path.basename(source);
        const intended = path.join(destinationDir, name);

        try {
            const stats = await statOrUndefined(source);
            if (!stats) {
                logger.warn('Source file not found: %s', source);
                return skipped(request, intended, 'source not found');
            }
            if (!stats.isFile()) {
                logger.warn('Source is not a regular file: %s', source);
                return skipped(request, intended, 'not a regular file');
            }

            if (intended === source) {
                return skipped(request, intended, 'already in place');
            }

            const directoryProblem = await ensureDirectory(destinationDir);
            if (directoryProblem) {
                logger.error(directoryProblem);
                return skipped(request, intended, 'destination unavailable', directoryProblem);
            }

            for (let attempt = 1; ; attempt++) {
                const { destination, collided } = await resolveDestination(destinationDir, name);
                if (collided) {
                    logger.warn('Duplicate filename detected, renaming to: %s', path.basename(destination));
                }

                const operation: MoveOperation = {
                    source,
                    destination,
                    dryRun: config.dryRun,
                    outcome: collided ? 'renamed' : 'moved',
                };

                if (config.dryRun) {
                    reserved.add(destination);
                    logger.info('[DRY RUN] Would move: %s -> %s', source, destination);
                    return operation;
                }

                try {
                    await transfer(source, destination);
                } catch (error) {
                    // Someone else took the name between the check and the link
                    if (errorCode(error) === 'EEXIST' && attempt < MAX_ATTEMPTS) continue;
                    throw error;
                }

                logger.info('Moved: %s -> %s', path.basename(source), destination);
                return operation;
            }
        } catch (error) {
            const message = describeError(error);
            logger.error('Error moving %s to %s: %s', source, intended, message);
            return skipped(request, intended, 'error', message);
        }
    };

    const moveBatch = async (requests: MoveRequest[]): Promise<BatchResult> => {
        const operations: MoveOperation[] = [];
        for (const request of requests) {
            operations.push(await move(request));
        }
        return {
            operations,
            errors: operations.filter(operation => operation.error !== undefined),
        };
    };

    const moveFolder = async (source: string, destinationDir: string): Promise<MoveOperation> => {
        const resolvedSource = path.resolve(source);
        const resolvedDir = path.resolve(destinationDir);
        const name = `${path.basename(resolvedSource)}_${formatTimestamp(now())}`;
        const request: MoveRequest = { source: resolvedSource, destinationDir: resolvedDir, targetName: name };

        try {
            const stats = await statOrUndefined(resolvedSource);
            if (!stats || !stats.isDirectory()) {
                logger.error('Source folder not found or not a directory: %s', resolvedSource);
                return skipped(request, path.join(resolvedDir, name), 'not a directory');
            }

            const directoryProblem = await ensureDirectory(resolvedDir);
            if (directoryProblem) {
                return skipped(request, path.join(resolvedDir, name), 'destination unavailable', directoryProblem);
            }

            const { destination, collided } = await resolveDestination(resolvedDir, name);
            const operation: MoveOperation = {
                source: resolvedSource,
                destination,
                dryRun: config.dryRun,
                outcome: collided ? 'renamed' : 'moved',
            };

            if (config.dryRun) {
                reserved.add(destination);
                logger.info('[DRY RUN] Would archive: %s -> %s', resolvedSource, destination);
                return operation;
            }

            await fs.rename(resolvedSource, destination);
            logger.info('Archived: %s -> %s', resolvedSource, destination);
            return operation;
        } catch (error) {
            const message = describeError(error);
            logger.error('Error archiving %s: %s', resolvedSource, message);
            return skipped(request, path.join(resolvedDir, name), 'error', message);
        }
    };

    return {
        move,
        moveBatch,
        moveFolder,
        resolveDestination,
        reset: () => reserved.clear(),
    };
};
