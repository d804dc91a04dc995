import { TimedFragment } from './transcript';

/**
 * Locale identifiers known to the engine (BCP-47).
 */
export interface LocaleAvailability {
    /** Locales the engine can recognize once a model is installed. */
    supported: string[];
    /** Locales whose model is installed and ready. */
    installed: string[];
}

/** Callback for model download progress (0-100). */
export type InstallProgressCallback = (percentage: number) => void;

/**
 * External speech-recognition capability.
 */
export interface RecognitionEngine {
    /**
     * Verifies that the engine can run at all.
     * Rejects with an `EngineUnavailable` TranscriptionError otherwise.
     */
    checkAvailability(): Promise<void>;

    /** Lists supported and installed locales. */
    getLocales(): Promise<LocaleAvailability>;

    /** Downloads and installs the model for a locale. */
    installLocale(locale: string, onProgress?: InstallProgressCallback): Promise<void>;

    /** Total audio duration of a file in seconds. */
    probeDuration(filePath: string): Promise<number>;

    /**
     * Analyzes a file. Fragments arrive in time order, one at a time; the
     * stream ends after the engine has been told to finalize and has flushed.
     * The returned iterable can be consumed only once.
     */
    analyze(filePath: string, locale: string): AsyncIterable<TimedFragment>;
}
