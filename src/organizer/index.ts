/**
 * Organizer
 *
 * Entry point for the file organization pipeline.
 */

import type { OrganizerConfig } from './types';
import * as Orchestrator from './orchestrator';

export type OrganizerInstance = Orchestrator.OrganizerInstance;

export const create = (config: OrganizerConfig): OrganizerInstance => {
    return Orchestrator.create(config);
};

export { emptyStats, sanitizeSegment } from './orchestrator';
export * from './types';
