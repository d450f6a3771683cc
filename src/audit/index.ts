/**
 * Audit Trail
 *
 * Append-only text record of every move, rename and skip decision, one line
 * per decision: `<ISO timestamp> - <LEVEL> - <message>`. Dry runs keep the
 * entries in memory and echo them to the console but never touch the file.
 */

import winston from 'winston';
import type { MoveOperation } from '../mover/types';
import type { NamingViolation } from '../naming/types';
import * as Logging from '../logging';

export type AuditLevel = 'info' | 'warn' | 'error';

export interface AuditEntry {
    timestamp: Date;
    level: AuditLevel;
    message: string;
}

export interface AuditConfig {
    logFile: string;
    dryRun: boolean;
    now?: () => Date;
}

export interface AuditInstance {
    recordMove(operation: MoveOperation): AuditEntry;
    recordViolation(file: string, violations: NamingViolation[]): AuditEntry;
    record(level: AuditLevel, message: string): AuditEntry;
    entries(): AuditEntry[];
    close(): Promise<void>;
}

export const formatEntry = (entry: AuditEntry): string =>
    `${entry.timestamp.toISOString()} - ${entry.level.toUpperCase()} - ${entry.message}`;

export const describeMove = (operation: MoveOperation): { level: AuditLevel; message: string } => {
    switch (operation.outcome) {
        case 'moved':
            return { level: 'info', message: `Moved: ${operation.source} -> ${operation.destination}` };
        case 'renamed':
            return { level: 'warn', message: `Renamed to avoid collision: ${operation.source} -> ${operation.destination}` };
        case 'skipped': {
            const reason = operation.reason ?? 'no action';
            return operation.error !== undefined
                ? { level: 'error', message: `Skipped: ${operation.source} (${reason}): ${operation.error}` }
                : { level: 'info', message: `Skipped: ${operation.source} (${reason})` };
        }
    }
};

export const create = (config: AuditConfig): AuditInstance => {
    const logger = Logging.getLogger();
    const now = config.now ?? (() => new Date());
    const recorded: AuditEntry[] = [];
    let fileLogger: winston.Logger | undefined;

    // Opened on first write so a run that records nothing leaves no file behind
    const getFileLogger = (): winston.Logger => {
        if (!fileLogger) {
            fileLogger = winston.createLogger({
                level: 'info',
                format: winston.format.printf(({ message }) => String(message)),
                transports: [
                    new winston.transports.File({ filename: config.logFile, options: { flags: 'a' } }),
                ],
            });
        }
        return fileLogger;
    };

    const record = (level: AuditLevel, message: string): AuditEntry => {
        const entry: AuditEntry = {
            timestamp: now(),
            level,
            message: config.dryRun ? `[DRY RUN] ${message}` : message,
        };
        recorded.push(entry);

        if (config.dryRun) {
            logger.verbose(entry.message);
        } else {
            getFileLogger().log(level, formatEntry(entry));
        }
        return entry;
    };

    const recordMove = (operation: MoveOperation): AuditEntry => {
        const { level, message } = describeMove(operation);
        return record(level, message);
    };

    const recordViolation = (file: string, violations: NamingViolation[]): AuditEntry =>
        record('warn', `Naming violation: ${file}: ${violations.map(v => v.code).join(', ')}`);

    const close = async (): Promise<void> => {
        const active = fileLogger;
        if (!active) return;
        fileLogger = undefined;

        await new Promise<void>((resolve) => {
            active.on('finish', () => resolve());
            active.end();
        });
    };

    return {
        recordMove,
        recordViolation,
        record,
        entries: () => [...recorded],
        close,
    };
};
