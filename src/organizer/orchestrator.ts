/**
 * Organizer
 *
 * Runs each file through extraction, categorization, naming and a guarded
 * move, recording every decision in the audit trail. Flat mode places files
 * in `<root>/<category folder>`; hierarchical mode in
 * `<root>/<customer>/<PART>-<REV>/<category folder>`.
 */

import * as path from 'node:path';
import * as fs from 'fs/promises';
import { glob } from 'glob';
import type {
    FileOutcome,
    FilePlan,
    FileRecord,
    OrganizeOptions,
    OrganizeResult,
    OrganizeStats,
    OrganizerConfig,
    PlacementReason,
} from './types';
import type { Category } from '../categorization/types';
import type { NamingViolation } from '../naming/types';
import type { MoveOperation } from '../mover/types';
import * as Categorization from '../categorization';
import * as Extraction from '../extraction';
import * as Naming from '../naming';
import * as Mover from '../mover';
import * as Audit from '../audit';
import * as Logging from '../logging';
import { AUDIT_LOG_FILENAME } from '../constants';
import { ConfigError } from '../errors';

export interface OrganizerInstance {
    initFolders(options?: { dryRun?: boolean }): Promise<string[]>;
    planFile(filePath: string, options?: OrganizeOptions): FilePlan;
    processFile(filePath: string, options?: OrganizeOptions): Promise<FileOutcome>;
    organizeDirectory(directory?: string, options?: OrganizeOptions): Promise<OrganizeResult>;
    archiveFolder(folder: string, options?: { dryRun?: boolean }): Promise<MoveOperation>;
    shouldIgnore(filePath: string): boolean;
    auditEntries(dryRun?: boolean): Audit.AuditEntry[];
    close(): Promise<void>;
}

interface RunTools {
    mover: Mover.MoverInstance;
    audit: Audit.AuditInstance;
}

export const emptyStats = (): OrganizeStats => ({
    totalFiles: 0,
    categorized: 0,
    held: 0,
    renamed: 0,
    collisions: 0,
    skipped: 0,
    failed: 0,
    violations: 0,
});

// Customer names become directory names
export const sanitizeSegment = (value: string): string =>
    value.trim().replace(/[\\/:*?"<>|\u0000-\u001f]+/g, '-').replace(/^\.+/, '');

const isWithin = (parent: string, child: string): boolean => {
    const relative = path.relative(parent, child);
    return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
};

export const create = (config: OrganizerConfig): OrganizerInstance => {
    const logger = Logging.getLogger();
    const root = path.resolve(config.rootDirectory);
    const now = config.now ?? (() => new Date());

    const categorizer = Categorization.create({ categories: config.categories, folders: config.folders });
    const extractor = Extraction.create(config.patterns);
    const namer = Naming.create(extractor);

    let ignoreExpressions: RegExp[];
    try {
        ignoreExpressions = config.ignorePatterns.map(source => new RegExp(source));
    } catch (error) {
        throw new ConfigError(`Invalid ignore pattern: ${error instanceof Error ? error.message : String(error)}`);
    }

    const managedFolders = Array.from(new Set(Object.values(config.folders)))
        .map(folder => path.join(root, folder));

    const tools = new Map<boolean, RunTools>();
    const toolsFor = (dryRun: boolean): RunTools => {
        let entry = tools.get(dryRun);
        if (!entry) {
            entry = {
                mover: Mover.create({ dryRun, now }),
                audit: Audit.create({ logFile: path.join(root, AUDIT_LOG_FILENAME), dryRun, now }),
            };
            tools.set(dryRun, entry);
        }
        return entry;
    };

    const shouldIgnore = (filePath: string): boolean => {
        const resolved = path.resolve(filePath);
        const base = path.basename(resolved);
        if (base === AUDIT_LOG_FILENAME) return true;
        if (ignoreExpressions.some(expression => expression.test(base))) return true;
        return managedFolders.some(folder => isWithin(folder, resolved));
    };

    const inferCustomer = (filePath: string, sourceDirectory?: string): string | undefined => {
        if (!sourceDirectory) return undefined;
        const relative = path.relative(path.resolve(sourceDirectory), path.dirname(filePath));
        if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) return undefined;
        return relative.split(path.sep)[0];
    };

    const planFile = (filePath: string, options: OrganizeOptions = {}): FilePlan => {
        const resolved = path.resolve(filePath);
        const base = path.basename(resolved);
        const checkNaming = config.enforceNaming || config.autoRename;

        const extraction = extractor.extract(base);
        const report = namer.validate(base);
        const category = categorizer.categorize(extraction.extension);

        const customer = options.customer
            ?? config.customer
            ?? report.fields.customer
            ?? inferCustomer(resolved, options.sourceDirectory);

        const record: FileRecord = {
            path: resolved,
            extension: extraction.extension,
            category,
            fields: {
                ...report.fields,
                ...(customer !== undefined && { customer }),
            },
            compliant: report.compliant,
        };

        let placement: Category = category;
        let reason: PlacementReason = 'categorized';
        let destinationDir = path.join(root, categorizer.folderFor(category));

        if (category === 'HOLDING') {
            reason = 'unknown-extension';
        } else if (config.hierarchical) {
            const { partNumber, revision } = record.fields;
            const customerDir = customer !== undefined ? sanitizeSegment(customer) : '';
            if (!partNumber || customerDir === '') {
                placement = 'HOLDING';
                reason = 'uncategorizable-by-hierarchy';
                destinationDir = path.join(root, categorizer.folderFor('HOLDING'));
            } else {
                const partDir = revision ? `${partNumber}-${revision}` : partNumber;
                destinationDir = path.join(root, customerDir, sanitizeSegment(partDir), categorizer.folderFor(category));
            }
        }

        const violations: NamingViolation[] = checkNaming ? report.violations : [];
        const targetName = config.autoRename && report.suggestedName !== undefined
            ? report.suggestedName
            : base;

        return {
            record,
            placement,
            reason,
            destinationDir,
            targetName,
            violations,
            needsManualReview: checkNaming && report.needsManualReview,
        };
    };

    const processOne = async (filePath: string, options: OrganizeOptions = {}): Promise<FileOutcome> => {
        const dryRun = options.dryRun ?? config.dryRun;
        const { mover, audit } = toolsFor(dryRun);
        const plan = planFile(filePath, options);
        const base = path.basename(plan.record.path);

        if (plan.reason === 'unknown-extension') {
            logger.warn('Cannot categorize: %s', base);
        } else if (plan.reason === 'uncategorizable-by-hierarchy') {
            logger.warn('Cannot place in hierarchy (missing part number or customer): %s', base);
        }

        if (plan.violations.length > 0) {
            audit.recordViolation(plan.record.path, plan.violations);
            if (plan.needsManualReview) {
                audit.record('warn', `Manual review required: ${plan.record.path}`);
            }
        }

        const operation = await mover.move({
            source: plan.record.path,
            destinationDir: plan.destinationDir,
            targetName: plan.targetName,
        });
        audit.recordMove(operation);

        if (operation.outcome !== 'skipped' && plan.targetName !== base) {
            audit.record('info', `Renamed to canonical name: ${base} -> ${plan.targetName}`);
        }

        return { plan, operation };
    };

    // A single file is its own run: dry-run reservations from earlier calls do not apply
    const processFile = async (filePath: string, options: OrganizeOptions = {}): Promise<FileOutcome> => {
        toolsFor(options.dryRun ?? config.dryRun).mover.reset();
        return processOne(filePath, options);
    };

    const initFolders = async (options: { dryRun?: boolean } = {}): Promise<string[]> => {
        const dryRun = options.dryRun ?? config.dryRun;
        const created: string[] = [];

        logger.info('Creating folder structure in: %s', root);
        for (const folder of managedFolders) {
            if (await Mover.pathExists(folder)) {
                logger.debug('Already exists: %s', folder);
                continue;
            }
            if (dryRun) {
                logger.info('[DRY RUN] Would create: %s', folder);
            } else {
                await fs.mkdir(folder, { recursive: true });
                logger.info('Created: %s', folder);
            }
            created.push(folder);
        }
        return created;
    };

    const tally = (stats: OrganizeStats, outcome: FileOutcome): void => {
        const { plan, operation } = outcome;
        stats.totalFiles++;
        if (plan.violations.length > 0) stats.violations++;

        if (operation.outcome === 'skipped') {
            if (operation.error !== undefined) {
                stats.failed++;
            } else {
                stats.skipped++;
            }
            return;
        }

        if (plan.placement === 'HOLDING') {
            stats.held++;
        } else {
            stats.categorized++;
        }
        if (operation.outcome === 'renamed') stats.collisions++;
        if (plan.targetName !== path.basename(plan.record.path)) stats.renamed++;
    };

    const organizeDirectory = async (directory?: string, options: OrganizeOptions = {}): Promise<OrganizeResult> => {
        const dryRun = options.dryRun ?? config.dryRun;
        const recursive = options.recursive ?? config.recursive;
        const sourceDirectory = path.resolve(directory ?? root);
        const { mover, audit } = toolsFor(dryRun);

        logger.info('Organizing files in: %s', sourceDirectory);
        await initFolders({ dryRun });
        mover.reset();

        const found = await glob(recursive ? '**/*' : '*', {
            cwd: sourceDirectory,
            nodir: true,
            absolute: true,
            dot: false,
        });
        const files = found.filter(file => !shouldIgnore(file)).sort();
        logger.debug('Found %d file(s) to organize in %s', files.length, sourceDirectory);

        const stats = emptyStats();
        const outcomes: FileOutcome[] = [];
        for (const file of files) {
            const outcome = await processOne(file, { ...options, dryRun, sourceDirectory });
            tally(stats, outcome);
            outcomes.push(outcome);
        }

        const summary = `Processing complete: ${stats.totalFiles} files processed, `
            + `${stats.categorized} categorized, ${stats.held} sent to HOLDING, `
            + `${stats.skipped} skipped, ${stats.failed} failed`;
        logger.info(summary);
        audit.record('info', summary);

        return { sourceDirectory, dryRun, stats, outcomes };
    };

    const archiveFolder = async (folder: string, options: { dryRun?: boolean } = {}): Promise<MoveOperation> => {
        const dryRun = options.dryRun ?? config.dryRun;
        const { mover, audit } = toolsFor(dryRun);
        const operation = await mover.moveFolder(folder, path.join(root, config.folders.ARCHIVE));
        audit.recordMove(operation);
        return operation;
    };

    const close = async (): Promise<void> => {
        for (const { audit } of tools.values()) {
            await audit.close();
        }
        tools.clear();
    };

    return {
        initFolders,
        planFile,
        processFile,
        organizeDirectory,
        archiveFolder,
        shouldIgnore,
        auditEntries: (dryRun = config.dryRun) => tools.get(dryRun)?.audit.entries() ?? [],
        close,
    };
};
