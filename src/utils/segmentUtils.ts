import { ChunkLimits, DEFAULT_CHUNK_LIMITS, SubtitleChunk, TimedFragment } from '../types/transcript';

/** Characters that close a sentence and force a chunk break after them. */
const SENTENCE_END_CHARS = new Set(['.', '!', '?']);

const graphemes = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/**
 * Length of the text in user-perceived characters, so that an emoji or a CJK
 * ideograph outside the BMP counts once.
 */
export function characterCount(text: string): number {
    return Array.from(graphemes.segment(text)).length;
}

/**
 * Whether the text ends with sentence punctuation.
 * Only the last character is inspected.
 */
export function endsWithSentence(text: string): boolean {
    return text.length > 0 && SENTENCE_END_CHARS.has(text[text.length - 1]);
}

/**
 * Merges time-ordered fragments into subtitle-sized chunks, one fragment at a time.
 *
 * A chunk is closed before the incoming fragment when extending it would exceed
 * `maxChunkDuration` (measured from the chunk start to the fragment end) or
 * `maxCharsPerChunk` (in characters, counting the joining space), or when the chunk already ends
 * with `.`, `!` or `?`. Blank fragments are dropped. A fragment longer than the
 * character limit still becomes one whole chunk.
 */
export class SegmentAggregator {
    private current: SubtitleChunk | null = null;
    private currentLength = 0;
    private readonly limits: ChunkLimits;

    constructor(limits: Partial<ChunkLimits> = {}) {
        this.limits = { ...DEFAULT_CHUNK_LIMITS, ...limits };
    }

    /**
     * Feeds one fragment.
     *
     * @return The chunk closed by this fragment, or null if it was merged or skipped.
     */
    push(fragment: TimedFragment): SubtitleChunk | null {
        const text = fragment.text.trim();
        if (!text) return null;

        const length = characterCount(text);
        const current = this.current;
        if (!current) {
            this.current = { text, start: fragment.start, end: fragment.end };
            this.currentLength = length;
            return null;
        }

        const candidateDuration = fragment.end - current.start;
        const candidateLength = this.currentLength + 1 + length;

        if (
            candidateDuration > this.limits.maxChunkDuration ||
            candidateLength > this.limits.maxCharsPerChunk ||
            endsWithSentence(current.text)
        ) {
            this.current = { text, start: fragment.start, end: fragment.end };
            this.currentLength = length;
            return current;
        }

        this.current = { text: `${current.text} ${text}`, start: current.start, end: fragment.end };
        this.currentLength = candidateLength;
        return null;
    }

    /**
     * Closes the open chunk at end of stream.
     *
     * @return The last chunk, or null if nothing is pending.
     */
    flush(): SubtitleChunk | null {
        const last = this.current;
        this.current = null;
        this.currentLength = 0;
        return last;
    }
}

/**
 * Aggregates a synchronous fragment sequence.
 *
 * @param fragments Time-ordered fragments.
 * @param limits Chunk limits; missing values take the defaults (80 chars, 6 s).
 */
export function* aggregate(fragments: Iterable<TimedFragment>, limits: Partial<ChunkLimits> = {}): Generator<SubtitleChunk> {
    const aggregator = new SegmentAggregator(limits);
    for (const fragment of fragments) {
        const chunk = aggregator.push(fragment);
        if (chunk) yield chunk;
    }
    const last = aggregator.flush();
    if (last) yield last;
}

/**
 * Aggregates a fragment stream as it arrives.
 *
 * @param fragments Time-ordered fragment stream; consumed once.
 * @param limits Chunk limits; missing values take the defaults.
 */
export async function* aggregateStream(
    fragments: AsyncIterable<TimedFragment>,
    limits: Partial<ChunkLimits> = {}
): AsyncGenerator<SubtitleChunk> {
    const aggregator = new SegmentAggregator(limits);
    for await (const fragment of fragments) {
        const chunk = aggregator.push(fragment);
        if (chunk) yield chunk;
    }
    const last = aggregator.flush();
    if (last) yield last;
}

/**
 * Collects all chunks of a synchronous fragment sequence.
 */
export function mergeFragments(fragments: Iterable<TimedFragment>, limits: Partial<ChunkLimits> = {}): SubtitleChunk[] {
    return Array.from(aggregate(fragments, limits));
}
