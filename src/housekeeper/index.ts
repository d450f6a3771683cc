/**
 * Housekeeper
 *
 * Entry point for the activatable file organization module.
 */

import type { HousekeeperConfig } from './types';
import * as Module from './module';

export type HousekeeperInstance = Module.HousekeeperInstance;

export const create = (config: HousekeeperConfig): HousekeeperInstance => {
    return Module.create(config);
};

export * from './types';
