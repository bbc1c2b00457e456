/**
 * Configuration
 *
 * Resolved once at startup from, lowest precedence first: built-in defaults,
 * the config file (read by CardiganTime from the config directory), environment
 * variables, command line flags. The result is validated with zod and frozen
 * before it reaches the pipeline.
 */

import * as Cardigantime from '@utilarium/cardigantime';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { formatIssues } from './extraction';
import {
    DEFAULT_CONFIG_DIR,
    DEFAULT_CONFIG_FILE_NAME,
    DEFAULT_DEBUG,
    DEFAULT_IMAGE_CONCURRENCY,
    DEFAULT_MAX_CONCURRENT_REQUESTS,
    DEFAULT_MAX_TOKENS,
    DEFAULT_MAX_WINDOW_CHARS,
    DEFAULT_MIN_PLACEMENT_SCORE,
    DEFAULT_MODEL,
    DEFAULT_OUTPUT_DIRECTORY,
    DEFAULT_REQUEST_TIMEOUT_MS,
    DEFAULT_SKIP_SUMMARY,
    DEFAULT_TEMPERATURE,
    DEFAULT_TRANSCRIPTION_MODEL,
    DEFAULT_VERBOSE,
    DEFAULT_VISION_MODEL,
} from './constants';

export const ConfigSchema = z.object({
    model: z.string().min(1),
    visionModel: z.string().min(1),
    transcriptionModel: z.string().min(1),
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    requestTimeoutMs: z.number().int().positive(),
    maxConcurrentRequests: z.number().int().min(1),
    imageConcurrency: z.number().int().min(1),
    minPlacementScore: z.number().min(0).max(1),
    maxWindowChars: z.number().int().positive(),
    temperature: z.number().min(0).max(2),
    maxTokens: z.number().int().positive(),
    skipSummary: z.boolean(),
    outputDirectory: z.string().min(1),
    verbose: z.boolean(),
    debug: z.boolean(),
});

export type Config = Readonly<z.infer<typeof ConfigSchema>>;

// CardiganTime adds its own keys (configDirectory and friends); only ours are kept.
export const FileConfigSchema = ConfigSchema.partial();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export const DEFAULT_CONFIG: Config = {
    model: DEFAULT_MODEL,
    visionModel: DEFAULT_VISION_MODEL,
    transcriptionModel: DEFAULT_TRANSCRIPTION_MODEL,
    requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
    maxConcurrentRequests: DEFAULT_MAX_CONCURRENT_REQUESTS,
    imageConcurrency: DEFAULT_IMAGE_CONCURRENCY,
    minPlacementScore: DEFAULT_MIN_PLACEMENT_SCORE,
    maxWindowChars: DEFAULT_MAX_WINDOW_CHARS,
    temperature: DEFAULT_TEMPERATURE,
    maxTokens: DEFAULT_MAX_TOKENS,
    skipSummary: DEFAULT_SKIP_SUMMARY,
    outputDirectory: DEFAULT_OUTPUT_DIRECTORY,
    verbose: DEFAULT_VERBOSE,
    debug: DEFAULT_DEBUG,
};

export type ConfigReader = Cardigantime.Cardigantime<typeof ConfigSchema.shape>;

/**
 * CardiganTime instance for the config file layer. It also contributes the
 * `--config-directory`, `--check-config` and `--init-config` options.
 */
export const createConfigReader = (): ConfigReader => {
    return Cardigantime.create({
        defaults: {
            configDirectory: DEFAULT_CONFIG_DIR,
            configFile: DEFAULT_CONFIG_FILE_NAME,
            isRequired: false,
        },
        configShape: ConfigSchema.shape,
    });
};

export const readConfigFile = async (reader: ConfigReader, args: Cardigantime.Args): Promise<FileConfig> => {
    const directory = args.configDirectory ?? DEFAULT_CONFIG_DIR;
    let values: unknown;
    try {
        values = await reader.read(args);
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Cannot read configuration from ${directory}: ${detail}`, { cause: error });
    }

    const validated = FileConfigSchema.safeParse(values ?? {});
    if (!validated.success) {
        throw new ConfigurationError(`Invalid config file in ${directory}: ${formatIssues(validated.error).join('; ')}`);
    }
    return validated.data;
};

const text = (value: string | undefined): string | undefined => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
};

const numeric = (value: string | undefined): number | undefined => {
    const trimmed = text(value);
    return trimmed === undefined ? undefined : Number(trimmed);
};

const flag = (value: string | undefined): boolean | undefined => {
    const trimmed = text(value)?.toLowerCase();
    if (trimmed === undefined) return undefined;
    return ['1', 'true', 'yes', 'on'].includes(trimmed);
};

export const readEnvironment = (env: NodeJS.ProcessEnv): Partial<Config> => ({
    apiKey: text(env.OPENAI_API_KEY),
    baseUrl: text(env.TALKNOTES_BASE_URL) ?? text(env.OPENAI_BASE_URL),
    model: text(env.TALKNOTES_MODEL),
    visionModel: text(env.TALKNOTES_VISION_MODEL),
    transcriptionModel: text(env.TALKNOTES_TRANSCRIPTION_MODEL),
    requestTimeoutMs: numeric(env.TALKNOTES_REQUEST_TIMEOUT_MS),
    maxConcurrentRequests: numeric(env.TALKNOTES_MAX_CONCURRENT_REQUESTS),
    imageConcurrency: numeric(env.TALKNOTES_IMAGE_CONCURRENCY),
    minPlacementScore: numeric(env.TALKNOTES_MIN_PLACEMENT_SCORE),
    maxWindowChars: numeric(env.TALKNOTES_MAX_WINDOW_CHARS),
    skipSummary: flag(env.TALKNOTES_SKIP_SUMMARY),
    outputDirectory: text(env.TALKNOTES_OUTPUT_DIRECTORY),
});

const definedOnly = (values: Partial<Config>): Record<string, unknown> => {
    return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
};

export interface LoadOptions {
    reader: ConfigReader;
    args?: Cardigantime.Args;
    env?: NodeJS.ProcessEnv;
    overrides?: Partial<Config>;
}

export const mergeConfig = (...layers: Partial<Config>[]): Config => {
    const merged = layers.reduce<Record<string, unknown>>(
        (accumulated, layer) => ({ ...accumulated, ...definedOnly(layer) }),
        { ...DEFAULT_CONFIG },
    );
    const validated = ConfigSchema.safeParse(merged);
    if (!validated.success) {
        throw new ConfigurationError(`Invalid configuration: ${formatIssues(validated.error).join('; ')}`);
    }
    return Object.freeze(validated.data);
};

export const loadConfig = async (options: LoadOptions): Promise<Config> => {
    const fileValues = await readConfigFile(options.reader, options.args ?? {});
    const envValues = readEnvironment(options.env ?? process.env);
    return mergeConfig(fileValues, envValues, options.overrides ?? {});
};
