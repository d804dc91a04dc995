import { z } from 'zod';
import { AppConfig, DEFAULT_CHUNK_LIMITS } from './types/transcript';

const DEFAULT_ENGINE_COMMAND = 'speech-engine';

/**
 * The system locale in BCP-47 form, e.g. `en-US`.
 */
export function getSystemLocale(env: NodeJS.ProcessEnv = process.env): string {
    // LANG looks like en_US.UTF-8
    const fromEnv = (env.LC_ALL || env.LANG || '').split('.')[0];
    if (fromEnv && fromEnv !== 'C' && fromEnv !== 'POSIX') {
        return fromEnv.replace(/_/g, '-');
    }
    return Intl.DateTimeFormat().resolvedOptions().locale;
}

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const EnvSchema = z.object({
    TRANSCRIBER_ENGINE_CMD: z.preprocess(emptyToUndefined, z.string().default(DEFAULT_ENGINE_COMMAND)),
    TRANSCRIBER_ENGINE_ARGS: z.preprocess(emptyToUndefined, z.string().optional()),
    TRANSCRIBER_FORMAT: z.preprocess(
        (value) => (typeof value === 'string' ? emptyToUndefined(value.toLowerCase()) : value),
        z.enum(['srt', 'txt']).default('txt')
    ),
    TRANSCRIBER_LOCALE: z.preprocess(emptyToUndefined, z.string().optional()),
    TRANSCRIBER_TIMESTAMPS: z.preprocess(emptyToUndefined, z.enum(['none', 'readable', 'seconds']).default('none')),
    TRANSCRIBER_MAX_CHARS: z.preprocess(
        emptyToUndefined,
        z.coerce.number().int().positive().default(DEFAULT_CHUNK_LIMITS.maxCharsPerChunk)
    ),
    TRANSCRIBER_MAX_DURATION: z.preprocess(
        emptyToUndefined,
        z.coerce.number().positive().default(DEFAULT_CHUNK_LIMITS.maxChunkDuration)
    ),
    TRANSCRIBER_APP_LANGUAGE: z.preprocess(emptyToUndefined, z.enum(['auto', 'en', 'zh']).default('auto')),
});

/**
 * Builds the application configuration from environment variables.
 *
 * @param env Environment to read (defaults to `process.env`, after dotenv).
 * @throws {Error} Listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new Error(`Invalid configuration: ${details}`);
    }
    const values = parsed.data;

    return {
        engineCommand: values.TRANSCRIBER_ENGINE_CMD,
        engineArgs: values.TRANSCRIBER_ENGINE_ARGS ? values.TRANSCRIBER_ENGINE_ARGS.split(/\s+/).filter(Boolean) : [],
        format: values.TRANSCRIBER_FORMAT,
        locale: values.TRANSCRIBER_LOCALE ?? getSystemLocale(env),
        timestamps: values.TRANSCRIBER_TIMESTAMPS,
        chunkLimits: {
            maxCharsPerChunk: values.TRANSCRIBER_MAX_CHARS,
            maxChunkDuration: values.TRANSCRIBER_MAX_DURATION,
        },
        appLanguage: values.TRANSCRIBER_APP_LANGUAGE,
    };
}
