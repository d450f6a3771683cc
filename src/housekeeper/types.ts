/**
 * Housekeeper Module Types
 */

import type { OrganizeStats, OrganizerConfig } from '../organizer/types';
import type { MoveOperation } from '../mover/types';
import type { WatchFactory } from '../monitor/types';

export const HOUSEKEEPER_ACTIONS = ['organize', 'archive', 'init'] as const;
export type HousekeeperAction = typeof HOUSEKEEPER_ACTIONS[number];

export interface HousekeeperConfig extends OrganizerConfig {
    debounceMs: number;
    /** Directory to watch as soon as the module is activated */
    monitorPath?: string;
    watch?: WatchFactory;
}

export interface ProcessRequest {
    /** One of HOUSEKEEPER_ACTIONS; anything else is answered with an error */
    action: string;
    path?: string;
    dryRun?: boolean;
    customer?: string;
}

export type ProcessResponse =
    | {
        success: true;
        dryRun: boolean;
        message?: string;
        stats?: OrganizeStats;
        created?: string[];
        operation?: MoveOperation;
    }
    | { success: false; error: string };

export type MetricName = 'activations' | 'files_processed' | 'folders_archived' | 'errors';

export interface HousekeeperStatus {
    healthy: boolean;
    active: boolean;
    monitoring: boolean;
    monitorPath: string | null;
    config: {
        rootDirectory: string;
        hierarchical: boolean;
        enforceNaming: boolean;
        autoRename: boolean;
    };
    metrics: Partial<Record<MetricName, number>>;
    lastRun: string | null;
}
