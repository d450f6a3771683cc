import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as Stability from '../../src/monitor/stability';

describe('Stability Tracker', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('should hand on a path once its timer runs out', () => {
        const onStable = vi.fn();
        const tracker = Stability.create({ debounceMs: 2000, onStable });

        tracker.notify('/shop/a.nc');
        expect(tracker.getState('/shop/a.nc')).toBe('PENDING_STABILITY');

        vi.advanceTimersByTime(1999);
        expect(onStable).not.toHaveBeenCalled();

        vi.advanceTimersByTime(1);
        expect(onStable).toHaveBeenCalledTimes(1);
        expect(onStable).toHaveBeenCalledWith('/shop/a.nc');
        expect(tracker.getState('/shop/a.nc')).toBe('STABLE');
    });

    it('should restart the timer on every event', () => {
        const onStable = vi.fn();
        const tracker = Stability.create({ debounceMs: 2000, onStable });

        tracker.notify('/shop/a.nc');
        vi.advanceTimersByTime(1000);
        tracker.notify('/shop/a.nc');

        vi.advanceTimersByTime(1999);
        expect(onStable).not.toHaveBeenCalled();

        vi.advanceTimersByTime(1);
        expect(onStable).toHaveBeenCalledTimes(1);
        expect(tracker.pendingCount()).toBe(0);
    });

    it('should debounce paths independently', () => {
        const onStable = vi.fn();
        const tracker = Stability.create({ debounceMs: 500, onStable });

        tracker.notify('/shop/a.nc');
        vi.advanceTimersByTime(300);
        tracker.notify('/shop/b.nc');
        expect(tracker.pendingCount()).toBe(2);

        vi.advanceTimersByTime(200);
        expect(onStable.mock.calls).toEqual([['/shop/a.nc']]);

        vi.advanceTimersByTime(300);
        expect(onStable.mock.calls).toEqual([['/shop/a.nc'], ['/shop/b.nc']]);
    });

    it('should forget a released path only once it is stable', () => {
        const tracker = Stability.create({ debounceMs: 100, onStable: vi.fn() });

        tracker.notify('/shop/a.nc');
        tracker.release('/shop/a.nc');
        expect(tracker.getState('/shop/a.nc')).toBe('PENDING_STABILITY');

        vi.advanceTimersByTime(100);
        tracker.release('/shop/a.nc');
        expect(tracker.getState('/shop/a.nc')).toBeUndefined();
    });

    it('should drop every timer on cancel', () => {
        const onStable = vi.fn();
        const tracker = Stability.create({ debounceMs: 100, onStable });

        tracker.notify('/shop/a.nc');
        tracker.notify('/shop/b.nc');
        tracker.cancel();
        vi.advanceTimersByTime(1000);

        expect(onStable).not.toHaveBeenCalled();
        expect(tracker.pendingCount()).toBe(0);
        expect(tracker.getState('/shop/a.nc')).toBeUndefined();
    });
});
