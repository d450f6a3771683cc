/**
 * Mover Types
 */

/**
 * `renamed` means the file was moved under a different name to avoid
 * clobbering an existing destination.
 */
export type MoveOutcome = 'moved' | 'renamed' | 'skipped';

export interface MoveRequest {
    source: string;
    destinationDir: string;
    /** Name to use at the destination; defaults to the source base name */
    targetName?: string;
}

export interface MoveOperation {
    source: string;
    destination: string;
    dryRun: boolean;
    outcome: MoveOutcome;
    reason?: string;
    error?: string;
}

export interface BatchResult {
    operations: MoveOperation[];
    errors: MoveOperation[];
}

export interface MoverConfig {
    dryRun: boolean;
    createDirectories?: boolean;
    now?: () => Date;
}
