import * as Cardigantime from '@utilarium/cardigantime';
import { Command, InvalidArgumentError } from 'commander';
import {
    DEFAULT_UNDERSTANDING_LEVEL,
    MAX_UNDERSTANDING_LEVEL,
    MIN_UNDERSTANDING_LEVEL,
    PROGRAM_NAME,
    VERSION,
} from '@/constants';
import { Config, ConfigReader } from '@/config';

export interface Args extends Cardigantime.Args {
    images?: string[];
    title?: string;
    level: number;
    context?: string;
    output?: string;
    checkConfig?: boolean;
    initConfig?: boolean;
    model?: string;
    visionModel?: string;
    transcriptionModel?: string;
    baseUrl?: string;
    skipSummary?: boolean;
    verbose?: boolean;
    debug?: boolean;
}

/** What the command line asks for: notes from a recording, or one of the config commands. */
export type Invocation =
    | { kind: 'process'; audioPath: string; args: Args }
    | { kind: 'check-config'; args: Args }
    | { kind: 'init-config'; args: Args };

export type ProcessInvocation = Extract<Invocation, { kind: 'process' }>;

export const parseLevel = (value: string): number => {
    const level = Number(value);
    if (!Number.isInteger(level) || level < MIN_UNDERSTANDING_LEVEL || level > MAX_UNDERSTANDING_LEVEL) {
        throw new InvalidArgumentError(`Must be an integer from ${MIN_UNDERSTANDING_LEVEL} to ${MAX_UNDERSTANDING_LEVEL}.`);
    }
    return level;
};

export const createProgram = async (cardigantime: ConfigReader): Promise<Command> => {
    let program = new Command()
        .name(PROGRAM_NAME)
        .summary('Turn a recorded talk and its slides into structured notes')
        .description('Transcribes a talk, summarizes it at the depth you choose, and places your slide images into the resulting markdown')
        .argument('[audio]', 'audio recording of the talk')
        .option('--images <patterns...>', 'image files or glob patterns to analyze and place')
        .option('--title <title>', 'title for the notes (default: taken from the talk)')
        .option('--level <level>', 'your understanding of the topic, 0 (novice) to 5 (expert)', parseLevel, DEFAULT_UNDERSTANDING_LEVEL)
        .option('--context <context>', 'what the talk is about, to steer the summary and image analysis')
        .option('--output <directory>', 'directory to write notes into')
        .option('--model <model>', 'model used for summarization and placement')
        .option('--vision-model <model>', 'model used for OCR and image analysis')
        .option('--transcription-model <model>', 'speech-to-text model')
        .option('--base-url <url>', 'OpenAI-compatible API endpoint')
        .option('--skip-summary', 'skip summarization and keep the full transcript as one section')
        .option('--verbose', 'enable verbose logging')
        .option('--debug', 'enable debug logging');

    // Adds --config-directory, --check-config and --init-config
    program = await cardigantime.configure(program);
    program.version(VERSION);
    return program;
};

export const parse = async (
    cardigantime: ConfigReader,
    argv: readonly string[],
    from: 'node' | 'user' = 'node',
): Promise<Invocation> => {
    const program = await createProgram(cardigantime);
    program.parse([...argv], { from });
    const args = program.opts<Args>();

    if (args.checkConfig) {
        return { kind: 'check-config', args };
    }
    if (args.initConfig) {
        return { kind: 'init-config', args };
    }

    const audioPath = program.args.at(0);
    if (audioPath === undefined) {
        throw new InvalidArgumentError('missing audio file');
    }
    return { kind: 'process', audioPath, args };
};

/**
 * Flags that override configuration; unset flags leave lower layers alone.
 */
export const toConfigOverrides = (args: Args): Partial<Config> => ({
    model: args.model,
    visionModel: args.visionModel,
    transcriptionModel: args.transcriptionModel,
    baseUrl: args.baseUrl,
    outputDirectory: args.output,
    skipSummary: args.skipSummary,
    verbose: args.verbose,
    debug: args.debug,
});
