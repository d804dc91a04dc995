import { InstallProgressCallback, LocaleAvailability, RecognitionEngine } from '../../types/engine';
import { TimedFragment } from '../../types/transcript';
import { TranscriptionError } from '../../utils/errorHandling';

export interface FakeEngineOptions {
    supported?: string[];
    installed?: string[];
    duration?: number;
    /** Fragments per input path; the `*` entry applies to every other path. */
    fragments?: Record<string, TimedFragment[]>;
    /** Error raised by the analysis stream after the fragments. */
    analysisError?: Error;
    installError?: Error;
    unavailable?: boolean;
}

/**
 * In-process recognition engine for tests.
 */
export class FakeEngine implements RecognitionEngine {
    installedLocales: string[];
    readonly installCalls: string[] = [];
    readonly analyzeCalls: string[] = [];
    readonly analyzeLocales: string[] = [];

    constructor(private readonly options: FakeEngineOptions = {}) {
        this.installedLocales = [...(options.installed ?? ['en-US'])];
    }

    async checkAvailability(): Promise<void> {
        if (this.options.unavailable) {
            throw new TranscriptionError('EngineUnavailable', 'Speech engine is not available (fake): not installed');
        }
    }

    async getLocales(): Promise<LocaleAvailability> {
        return {
            supported: this.options.supported ?? ['en-US', 'fr-FR'],
            installed: [...this.installedLocales],
        };
    }

    async installLocale(locale: string, onProgress?: InstallProgressCallback): Promise<void> {
        this.installCalls.push(locale);
        if (this.options.installError) throw this.options.installError;
        onProgress?.(100);
        this.installedLocales.push(locale);
    }

    async probeDuration(): Promise<number> {
        return this.options.duration ?? 10;
    }

    async *analyze(filePath: string, locale: string): AsyncGenerator<TimedFragment> {
        this.analyzeCalls.push(filePath);
        this.analyzeLocales.push(locale);
        const fragments = this.options.fragments?.[filePath] ?? this.options.fragments?.['*'] ?? [];
        for (const fragment of fragments) {
            await Promise.resolve();
            yield fragment;
        }
        if (this.options.analysisError) throw this.options.analysisError;
    }
}
