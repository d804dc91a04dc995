/** Width of the console progress bar in glyphs. */
export const PROGRESS_BAR_WIDTH = 40;

const clamp = (value: number, min: number, max: number): number => Math.min(Math.max(value, min), max);

/**
 * Tracks how far the engine has got through the audio.
 *
 * The ratio is the latest fragment end time seen so far divided by the total
 * duration, clamped to [0, 1]. It never decreases. With a total duration of
 * zero the ratio is 1 as soon as a fragment has been observed.
 */
export class ProgressTracker {
    private maxEndTime = 0;
    private observed = false;
    private readonly totalDuration: number;

    /**
     * @param totalDuration Audio duration in seconds. Non-finite or negative values count as zero.
     */
    constructor(totalDuration: number) {
        this.totalDuration = Number.isFinite(totalDuration) && totalDuration > 0 ? totalDuration : 0;
    }

    /**
     * Records a fragment end time.
     *
     * @return The updated ratio.
     */
    observe(endTime: number): number {
        this.observed = true;
        if (Number.isFinite(endTime)) {
            this.maxEndTime = Math.max(this.maxEndTime, endTime);
        }
        return this.ratio;
    }

    /** Latest end time seen, in seconds. */
    get processedSeconds(): number {
        return this.maxEndTime;
    }

    /** Current progress in [0, 1]. */
    get ratio(): number {
        if (this.totalDuration === 0) {
            return this.observed ? 1 : 0;
        }
        return clamp(this.maxEndTime / this.totalDuration, 0, 1);
    }
}

/**
 * Renders a ratio as a fixed-width bar with a whole percentage,
 * e.g. `[████░░░░] 50%` (with the default width of 40).
 *
 * @param ratio Progress, clamped to [0, 1].
 * @param width Number of glyphs in the bar.
 */
export function renderProgressBar(ratio: number, width: number = PROGRESS_BAR_WIDTH): string {
    const clamped = Number.isFinite(ratio) ? clamp(ratio, 0, 1) : 0;
    const filled = Math.floor(width * clamped);
    const percent = Math.floor(clamped * 100);
    return `[${'█'.repeat(filled)}${'░'.repeat(width - filled)}] ${percent}%`;
}
