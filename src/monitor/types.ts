/**
 * Monitor Types
 */

/**
 * PENDING_STABILITY: events are still arriving, the debounce timer is running.
 * STABLE: the timer elapsed; the path is queued for the processing loop.
 */
export type StabilityState = 'PENDING_STABILITY' | 'STABLE';

export interface WatchHandlers {
    onChange(filePath: string): void;
    onError(error: unknown): void;
}

export interface WatchSource {
    close(): Promise<void>;
}

export type WatchFactory = (
    root: string,
    handlers: WatchHandlers,
    ignore: (filePath: string) => boolean
) => WatchSource;

export type StableFileHandler = (filePath: string) => Promise<void>;

export interface MonitorConfig {
    root: string;
    debounceMs: number;
    handler: StableFileHandler;
    ignore?: (filePath: string) => boolean;
    watch?: WatchFactory;
}
