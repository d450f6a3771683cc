/**
 * Stability Tracker
 *
 * Per-path debounce. Every event restarts the path's timer; when a timer runs
 * out without interruption the path becomes STABLE and is handed on exactly
 * once. cancel() drops every running timer without handing anything on.
 */

import type { StabilityState } from './types';

export interface TrackerInstance {
    notify(filePath: string): void;
    getState(filePath: string): StabilityState | undefined;
    release(filePath: string): void;
    pendingCount(): number;
    cancel(): void;
}

export interface TrackerConfig {
    debounceMs: number;
    onStable(filePath: string): void;
}

export const create = (config: TrackerConfig): TrackerInstance => {
    const states = new Map<string, StabilityState>();
    const timers = new Map<string, NodeJS.Timeout>();

    const notify = (filePath: string): void => {
        const existing = timers.get(filePath);
        if (existing) {
            clearTimeout(existing);
        }

        states.set(filePath, 'PENDING_STABILITY');
        timers.set(filePath, setTimeout(() => {
            timers.delete(filePath);
            states.set(filePath, 'STABLE');
            config.onStable(filePath);
        }, config.debounceMs));
    };

    // Forget a dispatched path, unless new events put it back into PENDING_STABILITY
    const release = (filePath: string): void => {
        if (states.get(filePath) === 'STABLE') {
            states.delete(filePath);
        }
    };

    const cancel = (): void => {
        for (const timer of timers.values()) {
            clearTimeout(timer);
        }
        timers.clear();
        states.clear();
    };

    return {
        notify,
        getState: (filePath) => states.get(filePath),
        release,
        pendingCount: () => timers.size,
        cancel,
    };
};
