import { ExportOptions, SubtitleChunk, TRANSCRIPT_FORMATS, TimestampStyle, TranscriptFormat } from '../types/transcript';

interface TimeParts {
    hours: number;
    minutes: number;
    secs: number;
    millis: number;
}

/**
 * Splits seconds into clock parts.
 * Rounds to whole milliseconds first so that a value like 2.9996 carries into
 * the seconds field instead of rendering 1000 ms.
 */
function splitTime(seconds: number): TimeParts {
    const totalMillis = Math.max(0, Math.round(seconds * 1000));
    const totalSeconds = Math.floor(totalMillis / 1000);
    return {
        hours: Math.floor(totalSeconds / 3600),
        minutes: Math.floor((totalSeconds % 3600) / 60),
        secs: totalSeconds % 60,
        millis: totalMillis % 1000,
    };
}

const pad = (value: number, width: number = 2): string => String(value).padStart(width, '0');

/**
 * Formats seconds to SRT timestamp format (HH:MM:SS,mmm).
 * Hours are not wrapped at 24.
 *
 * @param seconds The time in seconds.
 * @return The formatted timestamp string.
 */
export function formatSrtTime(seconds: number): string {
    const { hours, minutes, secs, millis } = splitTime(seconds);
    return `${pad(hours)}:${pad(minutes)}:${pad(secs)},${pad(millis, 3)}`;
}

/**
 * Formats the bracketed line prefix of plain-text output.
 *
 * - `readable`: `[MM:SS]`, or `[HH:MM:SS]` from one hour on.
 * - `seconds`: `[83.5s]`.
 * - `none`: empty string.
 */
export function formatLineTimestamp(seconds: number, style: TimestampStyle): string {
    switch (style) {
        case 'readable': {
            const { hours, minutes, secs } = splitTime(Math.floor(Math.max(0, seconds)));
            return hours > 0 ? `[${pad(hours)}:${pad(minutes)}:${pad(secs)}]` : `[${pad(minutes)}:${pad(secs)}]`;
        }
        case 'seconds':
            return `[${seconds.toFixed(1)}s]`;
        case 'none':
            return '';
    }
}

/**
 * Converts chunks to SRT (SubRip Subtitle) format.
 * Every cue ends with a newline and cues are separated by one blank line, so
 * the output ends with a single newline and no trailing blank line.
 *
 * @param chunks The chunks to convert.
 * @return The SRT formatted string.
 */
export function toSRT(chunks: readonly SubtitleChunk[]): string {
    return chunks
        .filter((chunk) => chunk.text.trim().length > 0)
        .map((chunk, index) => `${index + 1}\n${formatSrtTime(chunk.start)} --> ${formatSrtTime(chunk.end)}\n${chunk.text.trim()}\n`)
        .join('\n');
}

/**
 * Converts chunks to plain text, one chunk per line.
 *
 * @param chunks The chunks to convert.
 * @param timestamps Optional leading timestamp per line.
 * @return The trimmed plain text.
 */
export function toTXT(chunks: readonly SubtitleChunk[], timestamps: TimestampStyle = 'none'): string {
    return chunks
        .filter((chunk) => chunk.text.trim().length > 0)
        .map((chunk) => {
            const prefix = formatLineTimestamp(chunk.start, timestamps);
            const text = chunk.text.trim();
            return prefix ? `${prefix} ${text}` : text;
        })
        .join('\n')
        .trim();
}

/**
 * Exports chunks in the specified format.
 *
 * @param chunks The chunks to export.
 * @param options Target format and plain-text timestamp style.
 * @return The formatted string content.
 */
export function exportChunks(chunks: readonly SubtitleChunk[], options: ExportOptions): string {
    switch (options.format) {
        case 'srt':
            return toSRT(chunks);
        case 'txt':
            return toTXT(chunks, options.timestamps ?? 'none');
    }
}

/**
 * Gets the file extension for a given format.
 *
 * @param format The export format.
 * @return The file extension (e.g., ".srt").
 */
export function getFileExtension(format: TranscriptFormat): string {
    return `.${format}`;
}

/**
 * Parses a user-supplied format name, case-insensitively.
 *
 * @return The format, or null if it is not one we write.
 */
export function parseFormat(value: string): TranscriptFormat | null {
    const normalized = value.trim().toLowerCase();
    return TRANSCRIPT_FORMATS.find((format) => format === normalized) ?? null;
}
