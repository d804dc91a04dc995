import { access } from 'node:fs/promises';
import i18n from '../i18n';
import { RecognitionEngine } from '../types/engine';
import { ChunkLimits, DEFAULT_CHUNK_LIMITS, SubtitleChunk, TimestampStyle, TranscriptFormat, TranscriptionSummary } from '../types/transcript';
import { TranscriptionError, isFatalError, toErrorMessage } from '../utils/errorHandling';
import { saveTranscript } from '../utils/fileExport';
import { ProgressTracker } from '../utils/progress';
import { SegmentAggregator } from '../utils/segmentUtils';
import { ModelService } from './modelService';

/** Callback for progress in [0, 1]. */
export type ProgressCallback = (ratio: number) => void;

/** Callback for every chunk as soon as the aggregator closes it. */
export type ChunkCallback = (chunk: SubtitleChunk) => void;

/**
 * Everything needed to transcribe one audio file.
 */
export interface TranscriptionRequest {
    /** Audio file to transcribe. */
    inputPath: string;
    /** Where the transcript is written. */
    outputPath: string;
    format: TranscriptFormat;
    /** Recognition locale (BCP-47). */
    locale: string;
    /** Plain-text timestamp style. Default: 'none'. */
    timestamps?: TimestampStyle;
    /** Chunk limits; missing values take the defaults. */
    chunkLimits?: Partial<ChunkLimits>;
}

export interface TranscribeCallbacks {
    onProgress?: ProgressCallback;
    onChunk?: ChunkCallback;
}

/**
 * Runs one file through provisioning, analysis, aggregation, formatting and
 * the atomic write.
 */
export class TranscriptionService {
    constructor(
        private readonly engine: RecognitionEngine,
        private readonly modelService: ModelService,
        private readonly now: () => number = Date.now
    ) { }

    /**
     * Transcribes a file and writes the transcript.
     *
     * @return The summary of a successful run.
     * @throws {TranscriptionError} Carrying the code of the step that failed.
     */
    async transcribeFile(request: TranscriptionRequest, callbacks: TranscribeCallbacks = {}): Promise<TranscriptionSummary> {
        const startedAt = this.now();
        const { inputPath, outputPath, format, locale } = request;
        const limits: ChunkLimits = { ...DEFAULT_CHUNK_LIMITS, ...request.chunkLimits };

        console.log(`[TranscriptionService] Starting transcription for: ${inputPath} (Locale: ${locale}, Format: ${format})`);

        try {
            await access(inputPath);
        } catch (error) {
            throw new TranscriptionError('InputNotFound', i18n.t('errors.inputNotFound', { path: inputPath }), { cause: error });
        }

        await this.modelService.ensureModel(locale);

        const chunks: SubtitleChunk[] = [];
        let duration = 0;

        try {
            duration = await this.engine.probeDuration(inputPath);
            const progress = new ProgressTracker(duration);
            const aggregator = new SegmentAggregator(limits);

            const collect = (chunk: SubtitleChunk | null) => {
                if (!chunk) return;
                chunks.push(chunk);
                callbacks.onChunk?.(chunk);
            };

            for await (const fragment of this.engine.analyze(inputPath, locale)) {
                callbacks.onProgress?.(progress.observe(fragment.end));
                collect(aggregator.push(fragment));
            }
            collect(aggregator.flush());
        } catch (error) {
            if (isFatalError(error)) throw error;
            throw new TranscriptionError(
                'AnalysisFailed',
                i18n.t('errors.analysisFailed', { path: inputPath, reason: toErrorMessage(error) }),
                { cause: error }
            );
        }

        console.log(`[TranscriptionService] Analysis completed: ${chunks.length} chunks`);

        if (chunks.length === 0) {
            throw new TranscriptionError('EmptyTranscriptionResult', i18n.t('errors.emptyTranscription', { path: inputPath }));
        }

        try {
            await saveTranscript(chunks, outputPath, { format, timestamps: request.timestamps ?? 'none' });
        } catch (error) {
            throw new TranscriptionError(
                'OutputWriteFailed',
                i18n.t('errors.outputWriteFailed', { path: outputPath, reason: toErrorMessage(error) }),
                { cause: error }
            );
        }

        callbacks.onProgress?.(1);

        return {
            success: true,
            outputPath,
            duration,
            elapsedTime: (this.now() - startedAt) / 1000,
        };
    }
}
