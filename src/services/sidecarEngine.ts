import { ChildProcessWithoutNullStreams, spawn } from 'node:child_process';
import { z } from 'zod';
import i18n from '../i18n';
import { InstallProgressCallback, LocaleAvailability, RecognitionEngine } from '../types/engine';
import { TimedFragment } from '../types/transcript';
import { AsyncChannel } from '../utils/asyncChannel';
import { TranscriptionError, hasErrorCode, toErrorMessage } from '../utils/errorHandling';
import { StreamLineBuffer } from '../utils/streamBuffer';

/** Written to the sidecar's stdin once it reports the audio as consumed. */
export const FINALIZE_COMMAND = '__FINALIZE__';

const FragmentLineSchema = z
    .object({
        text: z.string(),
        start: z.number().nonnegative(),
        end: z.number().nonnegative(),
    })
    .refine((fragment) => fragment.end >= fragment.start, { message: 'end before start' });

const ExhaustedLineSchema = z.object({ type: z.literal('exhausted') });

const ProgressLineSchema = z.object({
    type: z.literal('progress'),
    percentage: z.number(),
});

const DurationLineSchema = z.object({ duration: z.number().nonnegative() });

const LocalesLineSchema = z.object({
    supported: z.array(z.string()),
    installed: z.array(z.string()),
});

const ErrorLineSchema = z.object({ error: z.string() });

/** Configuration used to spawn the sidecar process. */
export interface SidecarEngineConfig {
    /** Executable name or path. */
    command: string;
    /** Arguments placed before the mode arguments (e.g. a script path). */
    args?: string[];
}

interface RunResult {
    code: number | null;
    stdoutLines: string[];
    stderr: string;
}

/**
 * Parses a line of JSON output.
 *
 * @return The parsed value, or undefined for blank or non-JSON lines.
 */
function parseJsonLine(line: string): unknown {
    const trimmed = line.trim();
    if (!trimmed) return undefined;
    try {
        return JSON.parse(trimmed);
    } catch {
        console.log(`[Sidecar] stdout: ${trimmed}`);
        return undefined;
    }
}

/**
 * Recognition engine backed by an external sidecar executable speaking JSON lines.
 *
 * Modes: `version`, `locales`, `install`, `probe` and `analyze`. During
 * analysis the sidecar prints one fragment per line, then
 * `{"type":"exhausted"}` once the audio is consumed; the engine answers with
 * `__FINALIZE__` on stdin and the sidecar flushes and exits.
 */
export class SidecarEngine implements RecognitionEngine {
    private readonly command: string;
    private readonly baseArgs: string[];

    constructor(config: SidecarEngineConfig) {
        this.command = config.command;
        this.baseArgs = config.args ?? [];
    }

    async checkAvailability(): Promise<void> {
        const result = await this.run(['--mode', 'version']);
        if (result.code !== 0) {
            throw this.unavailableError(`exited with code ${result.code}: ${result.stderr.trim()}`);
        }
        const version = result.stdoutLines.find((line) => line.trim().length > 0);
        console.log(`[Sidecar] Engine available: ${version?.trim() ?? 'unknown version'}`);
    }

    async getLocales(): Promise<LocaleAvailability> {
        const result = await this.run(['--mode', 'locales']);
        if (result.code !== 0) {
            throw new Error(`Locale query exited with code ${result.code}: ${result.stderr.trim()}`);
        }
        for (const line of result.stdoutLines) {
            const parsed = LocalesLineSchema.safeParse(parseJsonLine(line));
            if (parsed.success) {
                return parsed.data;
            }
        }
        throw new Error('Sidecar returned no locale list');
    }

    async installLocale(locale: string, onProgress?: InstallProgressCallback): Promise<void> {
        console.log(`[Sidecar] Installing model for ${locale}`);
        const result = await this.run(['--mode', 'install', '--locale', locale], (line) => {
            const progress = ProgressLineSchema.safeParse(parseJsonLine(line));
            if (progress.success) {
                onProgress?.(progress.data.percentage);
            }
        });
        if (result.code !== 0) {
            throw new Error(`Install exited with code ${result.code}: ${result.stderr.trim()}`);
        }
    }

    async probeDuration(filePath: string): Promise<number> {
        const result = await this.run(['--mode', 'probe', '--file', filePath]);
        if (result.code !== 0) {
            throw new Error(`Probe exited with code ${result.code}: ${result.stderr.trim()}`);
        }
        for (const line of result.stdoutLines) {
            const parsed = DurationLineSchema.safeParse(parseJsonLine(line));
            if (parsed.success) {
                return parsed.data.duration;
            }
        }
        throw new Error(`Sidecar reported no duration for ${filePath}`);
    }

    async *analyze(filePath: string, locale: string): AsyncGenerator<TimedFragment> {
        const channel = new AsyncChannel<TimedFragment>();
        const child = this.spawnSidecar(['--mode', 'analyze', '--file', filePath, '--locale', locale]);

        const stdoutBuffer = new StreamLineBuffer();
        const stderrBuffer = new StreamLineBuffer();
        const stderrChunks: string[] = [];
        let reportedError: string | null = null;
        let finalized = false;

        const finalize = () => {
            if (finalized) return;
            finalized = true;
            console.log(`[Sidecar] Audio exhausted, sending ${FINALIZE_COMMAND}`);
            child.stdin.write(`${FINALIZE_COMMAND}\n`);
            child.stdin.end();
        };

        const handleLine = (line: string) => {
            const data = parseJsonLine(line);
            if (data === undefined) return;

            const fragment = FragmentLineSchema.safeParse(data);
            if (fragment.success) {
                channel.push(fragment.data);
                return;
            }
            if (ExhaustedLineSchema.safeParse(data).success) {
                finalize();
                return;
            }
            const error = ErrorLineSchema.safeParse(data);
            if (error.success) {
                reportedError = error.data.error;
                return;
            }
            console.warn('[Sidecar] Ignoring unrecognized line:', line);
        };

        child.stdout.setEncoding('utf8');
        child.stderr.setEncoding('utf8');

        child.stdout.on('data', (chunk: string) => {
            stdoutBuffer.process(chunk).forEach(handleLine);
        });

        child.stderr.on('data', (chunk: string) => {
            stderrChunks.push(chunk);
            stderrBuffer.process(chunk).forEach((line) => console.log(`[Sidecar] stderr: ${line}`));
        });

        child.stdin.on('error', (error: Error) => {
            console.warn('[Sidecar] Failed to write to stdin:', error.message);
        });

        child.on('error', (error: Error) => {
            channel.fail(hasErrorCode(error, 'ENOENT') ? this.unavailableError(error.message) : new Error(`Process error: ${error.message}`));
        });

        child.on('close', (code: number | null) => {
            stdoutBuffer.flush().forEach(handleLine);
            stderrBuffer.flush().forEach((line) => console.log(`[Sidecar] stderr: ${line}`));
            console.log(`[Sidecar] Analysis finished with code ${code}`);

            if (code === 0 && reportedError === null) {
                channel.close();
            } else {
                const detail = reportedError ?? stderrChunks.join('').trim();
                channel.fail(new Error(`Sidecar failed with code ${code}: ${detail}`));
            }
        });

        try {
            yield* channel;
        } finally {
            if (child.exitCode === null && !child.killed) {
                child.kill();
            }
        }
    }

    private spawnSidecar(args: string[]): ChildProcessWithoutNullStreams {
        return spawn(this.command, [...this.baseArgs, ...args]);
    }

    private unavailableError(reason: string): TranscriptionError {
        return new TranscriptionError('EngineUnavailable', i18n.t('errors.engineUnavailable', { command: this.command, reason }));
    }

    /**
     * Runs the sidecar to completion and collects its output.
     *
     * @param args Mode arguments.
     * @param onStderrLine Called for every stderr line (progress reporting).
     */
    private run(args: string[], onStderrLine?: (line: string) => void): Promise<RunResult> {
        return new Promise<RunResult>((resolve, reject) => {
            const child = this.spawnSidecar(args);
            const stdoutBuffer = new StreamLineBuffer();
            const stderrBuffer = new StreamLineBuffer();
            const stdoutLines: string[] = [];
            const stderrChunks: string[] = [];

            const handleStderrLine = (line: string) => {
                onStderrLine?.(line);
                console.log(`[Sidecar] stderr: ${line}`);
            };

            child.stdout.setEncoding('utf8');
            child.stderr.setEncoding('utf8');

            child.stdout.on('data', (chunk: string) => {
                stdoutLines.push(...stdoutBuffer.process(chunk));
            });

            child.stderr.on('data', (chunk: string) => {
                stderrChunks.push(chunk);
                stderrBuffer.process(chunk).forEach(handleStderrLine);
            });

            child.on('error', (error: Error) => {
                reject(hasErrorCode(error, 'ENOENT') ? this.unavailableError(error.message) : new Error(`Process error: ${toErrorMessage(error)}`));
            });

            child.on('close', (code: number | null) => {
                stdoutLines.push(...stdoutBuffer.flush());
                stderrBuffer.flush().forEach(handleStderrLine);
                resolve({ code, stdoutLines, stderr: stderrChunks.join('') });
            });
        });
    }
}
