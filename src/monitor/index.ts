/**
 * Monitor
 *
 * Entry point for debounced directory monitoring.
 */

import type { MonitorConfig } from './types';
import * as Monitor from './monitor';

export type MonitorInstance = Monitor.MonitorInstance;

export const create = (config: MonitorConfig): MonitorInstance => {
    return Monitor.create(config);
};

export { watchWithChokidar } from './monitor';
export * from './types';
