import { parseArgs } from 'node:util';
import i18n from './i18n';
import { ModelService, localeDisplayName } from './services/modelService';
import { TranscriptionService } from './services/transcriptionService';
import { createBatchQueueStore, whenIdle } from './stores/batchQueueStore';
import { RecognitionEngine } from './types/engine';
import { AppConfig, ChunkLimits, TIMESTAMP_STYLES, TimestampStyle, TranscriptFormat, TranscriptionSummary } from './types/transcript';
import { TranscriptionError, isFatalError, toErrorMessage } from './utils/errorHandling';
import { parseFormat } from './utils/exportFormats';
import { resolveOutputPath } from './utils/fileExport';
import { renderProgressBar } from './utils/progress';
import { describeStatus } from './utils/queueStatus';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
/** The speech engine is missing or cannot run on this platform. */
export const EXIT_UNSUPPORTED = 2;

/** Where the CLI writes. stdout carries results only. */
export interface CliIO {
    stdout: (text: string) => void;
    stderr: (text: string) => void;
}

export interface CliDependencies {
    config: AppConfig;
    engine: RecognitionEngine;
    io?: CliIO;
}

const defaultIO: CliIO = {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
};

export const USAGE = `Usage: audio-transcriber --input-path <file> --output-path <file> [--format txt|srt] [--locale <id>]
                        [--timestamps none|readable|seconds] [--max-chars <n>] [--max-duration <seconds>]
       audio-transcriber batch <file>... [--format txt|srt] [--locale <id>] [--timestamps none|readable|seconds]
       audio-transcriber locales

Example:
  audio-transcriber --input-path ABC123.mp3 --output-path ABC123.srt --format srt --locale en-US
`;

class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

interface ParsedOptions {
    format: TranscriptFormat;
    locale: string;
    /** Whether `--locale` was passed; otherwise batch runs pick an installed locale. */
    localeGiven: boolean;
    timestamps: TimestampStyle;
    chunkLimits: ChunkLimits;
}

function parseTimestampStyle(value: string): TimestampStyle | null {
    return TIMESTAMP_STYLES.find((style) => style === value.toLowerCase()) ?? null;
}

function parsePositive(name: string, value: string | undefined, fallback: number): number {
    if (value === undefined) return fallback;
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
        throw new UsageError(`--${name} must be a positive number, got "${value}"`);
    }
    return parsed;
}

function parsePositiveInteger(name: string, value: string | undefined, fallback: number): number {
    const parsed = parsePositive(name, value, fallback);
    if (!Number.isInteger(parsed)) {
        throw new UsageError(`--${name} must be a whole number, got "${value}"`);
    }
    return parsed;
}

function parseCommandLine(argv: string[], config: AppConfig) {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        strict: true,
        options: {
            'input-path': { type: 'string' },
            'output-path': { type: 'string' },
            format: { type: 'string' },
            locale: { type: 'string' },
            timestamps: { type: 'string' },
            'max-chars': { type: 'string' },
            'max-duration': { type: 'string' },
            help: { type: 'boolean', short: 'h' },
        },
    });

    const format = values.format === undefined ? config.format : parseFormat(values.format);
    if (!format) {
        throw new UsageError(`Unknown format "${values.format}" (expected txt or srt)`);
    }

    const timestamps = values.timestamps === undefined ? config.timestamps : parseTimestampStyle(values.timestamps);
    if (!timestamps) {
        throw new UsageError(`Unknown timestamp style "${values.timestamps}" (expected ${TIMESTAMP_STYLES.join(', ')})`);
    }

    const options: ParsedOptions = {
        format,
        locale: values.locale ?? config.locale,
        localeGiven: values.locale !== undefined,
        timestamps,
        chunkLimits: {
            maxCharsPerChunk: parsePositiveInteger('max-chars', values['max-chars'], config.chunkLimits.maxCharsPerChunk),
            maxChunkDuration: parsePositive('max-duration', values['max-duration'], config.chunkLimits.maxChunkDuration),
        },
    };

    return {
        command: positionals[0],
        files: positionals.slice(1),
        inputPath: values['input-path'],
        outputPath: values['output-path'],
        help: values.help ?? false,
        positionals,
        options,
    };
}

/**
 * Serializes the summary with sorted keys; absent fields are omitted.
 */
export function formatSummary(summary: TranscriptionSummary): string {
    return JSON.stringify(summary, Object.keys(summary).sort(), 2);
}

function failureSummary(error: unknown): TranscriptionSummary {
    const message = error instanceof TranscriptionError ? error.message : `Unknown error: ${toErrorMessage(error)}`;
    return { success: false, error: message };
}

async function runSingle(inputPath: string, outputPath: string, options: ParsedOptions, deps: CliDependencies, io: CliIO): Promise<number> {
    const modelService = new ModelService(deps.engine);
    const service = new TranscriptionService(deps.engine, modelService);
    let lastBar = '';

    try {
        await deps.engine.checkAvailability();
        const summary = await service.transcribeFile(
            {
                inputPath,
                outputPath,
                format: options.format,
                locale: options.locale,
                timestamps: options.timestamps,
                chunkLimits: options.chunkLimits,
            },
            {
                onProgress: (ratio) => {
                    const bar = renderProgressBar(ratio);
                    if (bar !== lastBar) {
                        lastBar = bar;
                        io.stderr(`\r${bar}`);
                    }
                },
            }
        );
        io.stderr(`\r${renderProgressBar(1)}\n`);
        io.stdout(`${formatSummary(summary)}\n`);
        return EXIT_SUCCESS;
    } catch (error) {
        if (lastBar) io.stderr('\n');
        io.stdout(`${formatSummary(failureSummary(error))}\n`);
        return isFatalError(error) ? EXIT_UNSUPPORTED : EXIT_FAILURE;
    }
}

async function runBatch(files: string[], options: ParsedOptions, deps: CliDependencies, io: CliIO): Promise<number> {
    const modelService = new ModelService(deps.engine);
    const service = new TranscriptionService(deps.engine, modelService);
    let locale = options.locale;

    try {
        await deps.engine.checkAvailability();
        if (!options.localeGiven) {
            locale = (await modelService.pickDefaultLocale(options.locale)) ?? options.locale;
        }
    } catch (error) {
        io.stderr(`${toErrorMessage(error)}\n`);
        return isFatalError(error) ? EXIT_UNSUPPORTED : EXIT_FAILURE;
    }
    console.log(`[BatchQueue] Using locale ${locale}`);

    const store = createBatchQueueStore({
        processItem: async (item, onProgress) => {
            const summary = await service.transcribeFile(
                {
                    inputPath: item.filePath,
                    outputPath: resolveOutputPath(item.filePath, options.format),
                    format: options.format,
                    locale,
                    timestamps: options.timestamps,
                    chunkLimits: options.chunkLimits,
                },
                { onProgress }
            );
            return { outputPath: summary.outputPath };
        },
        onStatusChange: (item) => {
            io.stdout(`${item.filename}: ${describeStatus(item.status)}\n`);
        },
    });

    store.getState().addFiles(files);
    await whenIdle(store);

    const state = store.getState();
    const counts = state.getCounts();
    io.stdout(`${i18n.t('queue.summary', { completed: counts.completed, failed: counts.failed })}\n`);

    if (state.haltReason !== null) return EXIT_UNSUPPORTED;
    return counts.failed > 0 ? EXIT_FAILURE : EXIT_SUCCESS;
}

async function runLocales(deps: CliDependencies, io: CliIO): Promise<number> {
    try {
        await deps.engine.checkAvailability();
        const locales = await new ModelService(deps.engine).listInstalledLocales();
        for (const locale of locales) {
            io.stdout(`${localeDisplayName(locale)}\n`);
        }
        return EXIT_SUCCESS;
    } catch (error) {
        io.stderr(`${toErrorMessage(error)}\n`);
        return isFatalError(error) ? EXIT_UNSUPPORTED : EXIT_FAILURE;
    }
}

/**
 * Runs the command line.
 *
 * @param argv Arguments without the node and script paths.
 * @return The process exit code.
 */
export async function runCli(argv: string[], deps: CliDependencies): Promise<number> {
    const io = deps.io ?? defaultIO;

    let parsed: ReturnType<typeof parseCommandLine>;
    try {
        parsed = parseCommandLine(argv, deps.config);
    } catch (error) {
        io.stderr(`${toErrorMessage(error)}\n\n${USAGE}`);
        return EXIT_FAILURE;
    }

    if (parsed.help) {
        io.stderr(USAGE);
        return EXIT_SUCCESS;
    }

    if (parsed.command === 'batch') {
        if (parsed.files.length === 0) {
            io.stderr(USAGE);
            return EXIT_FAILURE;
        }
        return runBatch(parsed.files, parsed.options, deps, io);
    }

    if (parsed.command === 'locales' && parsed.positionals.length === 1) {
        return runLocales(deps, io);
    }

    if (parsed.positionals.length > 0 || !parsed.inputPath || !parsed.outputPath) {
        io.stderr(USAGE);
        return EXIT_FAILURE;
    }

    return runSingle(parsed.inputPath, parsed.outputPath, parsed.options, deps, io);
}
