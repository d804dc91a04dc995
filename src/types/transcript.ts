/**
 * One timed unit of recognized text, as emitted by the recognition engine.
 * Times are in seconds from the start of the audio.
 */
export interface TimedFragment {
  /** Recognized text. May carry surrounding whitespace or be blank. */
  text: string;
  /** Start time in seconds. */
  start: number;
  /** End time in seconds (never before `start`). */
  end: number;
}

/**
 * A merged run of fragments shown as one subtitle cue or one transcript line.
 */
export interface SubtitleChunk {
  /** Trimmed, non-empty text. */
  text: string;
  /** Start time in seconds. */
  start: number;
  /** End time in seconds. */
  end: number;
}

/**
 * Output file format.
 */
export type TranscriptFormat = 'srt' | 'txt';

export const TRANSCRIPT_FORMATS: readonly TranscriptFormat[] = ['srt', 'txt'];

/**
 * Leading timestamp style for plain-text output.
 */
export type TimestampStyle = 'none' | 'readable' | 'seconds';

export const TIMESTAMP_STYLES: readonly TimestampStyle[] = ['none', 'readable', 'seconds'];

/**
 * Limits that decide where the aggregator closes a chunk.
 */
export interface ChunkLimits {
  /** Maximum characters per chunk. Default: 80. */
  maxCharsPerChunk: number;
  /** Maximum chunk duration in seconds. Default: 6. */
  maxChunkDuration: number;
}

export const DEFAULT_CHUNK_LIMITS: ChunkLimits = {
  maxCharsPerChunk: 80,
  maxChunkDuration: 6.0,
};

/**
 * Options for rendering chunks to text.
 */
export interface ExportOptions {
  format: TranscriptFormat;
  /** Only used by the plain-text format. Default: 'none'. */
  timestamps?: TimestampStyle;
}

/**
 * Record produced for every transcription run (printed as JSON by the CLI).
 */
export interface TranscriptionSummary {
  success: boolean;
  outputPath?: string;
  error?: string;
  /** Total audio duration in seconds. */
  duration?: number;
  /** Wall-clock processing time in seconds. */
  elapsedTime?: number;
}

/**
 * Application configuration.
 */
export interface AppConfig {
  /** Executable of the recognition sidecar. */
  engineCommand: string;
  /** Extra arguments placed before the mode arguments. */
  engineArgs: string[];
  /** Default output format. */
  format: TranscriptFormat;
  /** Default recognition locale (BCP-47). */
  locale: string;
  /** Plain-text timestamp style. */
  timestamps: TimestampStyle;
  /** Chunking limits. */
  chunkLimits: ChunkLimits;
  /** Language of status and error messages. */
  appLanguage: 'auto' | 'en' | 'zh';
}
