/**
 * Mover
 *
 * Entry point for collision-safe, non-destructive file moves.
 */

import type { MoverConfig } from './types';
import * as Mover from './mover';

export type MoverInstance = Mover.MoverInstance;

export const create = (config: MoverConfig): MoverInstance => {
    return Mover.create(config);
};

export { formatTimestamp, pathExists } from './mover';
export * from './types';
