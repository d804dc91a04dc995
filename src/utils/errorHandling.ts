/**
 * Failure categories of a transcription run.
 *
 * Everything except `EngineUnavailable` is scoped to a single queue item.
 */
export type TranscriptionErrorCode =
    | 'InputNotFound'
    | 'LocaleUnsupported'
    | 'ModelProvisioningFailed'
    | 'AnalysisFailed'
    | 'EmptyTranscriptionResult'
    | 'OutputWriteFailed'
    | 'EngineUnavailable';

/**
 * Error raised by the transcription pipeline.
 * The message is the human-readable reason shown to the user.
 */
export class TranscriptionError extends Error {
    readonly code: TranscriptionErrorCode;

    constructor(code: TranscriptionErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'TranscriptionError';
        this.code = code;
    }
}

/**
 * Whether the error means no item can ever succeed in this process.
 */
export function isFatalError(error: unknown): boolean {
    return error instanceof TranscriptionError && error.code === 'EngineUnavailable';
}

/**
 * Extracts a readable message from any thrown value.
 */
export function toErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    try {
        return JSON.stringify(error) ?? String(error);
    } catch {
        return String(error);
    }
}

/**
 * Whether a Node.js system error carries the given `code` (e.g. `ENOENT`).
 */
export function hasErrorCode(error: unknown, code: string): boolean {
    return error instanceof Error && 'code' in error && error.code === code;
}
