/**
 * Organizer Types
 */

import type { Category, CategoryTable, FolderMap } from '../categorization/types';
import type { ExtractedFields, NamingPattern } from '../extraction/types';
import type { NamingViolation } from '../naming/types';
import type { MoveOperation } from '../mover/types';

export interface OrganizerConfig {
    rootDirectory: string;
    dryRun: boolean;
    recursive: boolean;
    hierarchical: boolean;
    enforceNaming: boolean;
    autoRename: boolean;
    /** Explicit customer; wins over anything inferred */
    customer?: string;
    folders: FolderMap;
    categories: CategoryTable;
    ignorePatterns: string[];
    patterns?: NamingPattern[];
    now?: () => Date;
}

export interface OrganizeOptions {
    customer?: string;
    dryRun?: boolean;
    recursive?: boolean;
    /** Directory the file was found under; its first sub-folder names the customer */
    sourceDirectory?: string;
}

/**
 * Everything known about a file for one operation. Never persisted.
 */
export interface FileRecord {
    path: string;
    extension: string;
    category: Category;
    fields: ExtractedFields;
    compliant: boolean;
}

export type PlacementReason =
    | 'categorized'
    | 'unknown-extension'
    | 'uncategorizable-by-hierarchy';

export interface FilePlan {
    record: FileRecord;
    /** Folder the file is sent to; HOLDING when it cannot be placed */
    placement: Category;
    reason: PlacementReason;
    destinationDir: string;
    targetName: string;
    violations: NamingViolation[];
    needsManualReview: boolean;
}

export interface FileOutcome {
    plan: FilePlan;
    operation: MoveOperation;
}

export interface OrganizeStats {
    totalFiles: number;
    categorized: number;
    held: number;
    renamed: number;
    collisions: number;
    skipped: number;
    failed: number;
    violations: number;
}

export interface OrganizeResult {
    sourceDirectory: string;
    dryRun: boolean;
    stats: OrganizeStats;
    outcomes: FileOutcome[];
}
