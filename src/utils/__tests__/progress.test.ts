import { describe, it, expect } from 'vitest';
import { ProgressTracker, renderProgressBar } from '../progress';

describe('ProgressTracker', () => {
    it('reports the latest end time over the total duration', () => {
        const tracker = new ProgressTracker(10);

        expect(tracker.ratio).toBe(0);
        expect(tracker.observe(2.5)).toBe(0.25);
        expect(tracker.observe(5)).toBe(0.5);
        expect(tracker.processedSeconds).toBe(5);
    });

    it('never goes backwards', () => {
        const tracker = new ProgressTracker(10);
        tracker.observe(6);

        expect(tracker.observe(3)).toBe(0.6);
    });

    it('clamps to 1 when fragments run past the duration', () => {
        const tracker = new ProgressTracker(10);

        expect(tracker.observe(12)).toBe(1);
    });

    it('reports 1 for zero duration once a fragment is seen', () => {
        const tracker = new ProgressTracker(0);

        expect(tracker.ratio).toBe(0);
        expect(tracker.observe(0)).toBe(1);
        expect(tracker.observe(3)).toBe(1);
    });

    it('treats negative and non-finite durations as zero', () => {
        expect(new ProgressTracker(-5).observe(1)).toBe(1);
        expect(new ProgressTracker(Number.NaN).observe(1)).toBe(1);
    });

    it('stays within [0, 1] and non-decreasing for monotonic end times', () => {
        const tracker = new ProgressTracker(7);
        let previous = 0;
        for (let end = 0; end <= 10; end += 0.5) {
            const ratio = tracker.observe(end);
            expect(ratio).toBeGreaterThanOrEqual(previous);
            expect(ratio).toBeLessThanOrEqual(1);
            previous = ratio;
        }
        expect(previous).toBe(1);
    });
});

describe('renderProgressBar', () => {
    it('renders filled and empty glyphs with a percentage', () => {
        expect(renderProgressBar(0.5, 10)).toBe('[█████░░░░░] 50%');
    });

    it('uses a width of 40 by default', () => {
        expect(renderProgressBar(0)).toBe(`[${'░'.repeat(40)}] 0%`);
        expect(renderProgressBar(1)).toBe(`[${'█'.repeat(40)}] 100%`);
    });

    it('rounds down partial glyphs and percentages', () => {
        expect(renderProgressBar(0.999, 10)).toBe('[█████████░] 99%');
    });

    it('clamps out-of-range ratios', () => {
        expect(renderProgressBar(1.5, 4)).toBe('[████] 100%');
        expect(renderProgressBar(-1, 4)).toBe('[░░░░] 0%');
        expect(renderProgressBar(Number.NaN, 4)).toBe('[░░░░] 0%');
    });
});
