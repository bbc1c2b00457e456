import 'dotenv/config';
import * as path from 'node:path';
import * as fs from 'fs/promises';
import { glob } from 'glob';
import * as Arguments from '@/arguments';
import { Config, createConfigReader, loadConfig } from '@/config';
import { DEFAULT_AUDIO_EXTENSIONS, DEFAULT_CONFIG_DIR, DEFAULT_IMAGE_EXTENSIONS, PROGRAM_NAME, VERSION } from '@/constants';
import { toErrorReport, ValidationError } from '@/errors';
import { getLogger, setLogLevel } from '@/logging';
import { ImageInput, ProcessingRequest } from '@/types';
import * as Pipeline from '@/pipeline';
import * as Output from '@/output';
import { resolveMimeType } from '@/ocr';

const extensionOf = (filePath: string): string => path.extname(filePath).slice(1).toLowerCase();

/**
 * Expands the --images patterns into a sorted, de-duplicated list of image files.
 */
export const resolveImagePaths = async (patterns: readonly string[]): Promise<string[]> => {
    if (patterns.length === 0) return [];
    const matches = await glob([...patterns], { nodir: true, absolute: true });
    const images = [...new Set(matches)]
        .filter(match => DEFAULT_IMAGE_EXTENSIONS.includes(extensionOf(match)))
        .sort();
    if (images.length === 0) {
        getLogger().warn('No images matched %s', patterns.join(', '));
    }
    return images;
};

export const readImages = async (paths: readonly string[]): Promise<ImageInput[]> => {
    return Promise.all(paths.map(async (imagePath) => {
        const filename = path.basename(imagePath);
        const data = await fs.readFile(imagePath);
        return { data, filename, mimeType: resolveMimeType({ data, filename }) };
    }));
};

export const buildRequest = async (invocation: Arguments.ProcessInvocation): Promise<ProcessingRequest> => {
    const formatHint = extensionOf(invocation.audioPath);
    if (!DEFAULT_AUDIO_EXTENSIONS.includes(formatHint)) {
        throw new ValidationError(`Unsupported audio format "${formatHint || '(none)'}"; expected one of ${DEFAULT_AUDIO_EXTENSIONS.join(', ')}`);
    }

    let audio: Uint8Array;
    try {
        audio = await fs.readFile(invocation.audioPath);
    } catch (error) {
        throw new ValidationError(`Cannot read audio file ${invocation.audioPath}: ${error instanceof Error ? error.message : String(error)}`);
    }

    const imagePaths = await resolveImagePaths(invocation.args.images ?? []);
    return {
        audio: { data: audio, formatHint },
        images: await readImages(imagePaths),
        title: invocation.args.title,
        understandingLevel: invocation.args.level,
        context: invocation.args.context,
    };
};

const applyLogLevel = (config: Config): void => {
    if (config.verbose) {
        setLogLevel('verbose');
    }
    if (config.debug) {
        setLogLevel('debug');
    }
};

export async function main(argv: readonly string[] = process.argv): Promise<number> {
    const cardigantime = createConfigReader();
    const invocation = await Arguments.parse(cardigantime, argv);

    try {
        if (invocation.kind === 'check-config') {
            await cardigantime.checkConfig(invocation.args);
            return 0;
        }
        if (invocation.kind === 'init-config') {
            await cardigantime.generateConfig(invocation.args.configDirectory ?? DEFAULT_CONFIG_DIR);
            return 0;
        }

        const config = await loadConfig({
            reader: cardigantime,
            args: invocation.args,
            overrides: Arguments.toConfigOverrides(invocation.args),
        });
        applyLogLevel(config);

        const logger = getLogger();
        logger.verbose('Starting %s: %s', PROGRAM_NAME, VERSION);
        logger.debug('Resolved configuration', { ...config, apiKey: config.apiKey ? '***' : undefined });

        const request = await buildRequest(invocation);
        const output = Output.create({ outputDirectory: config.outputDirectory });
        const pipeline = Pipeline.create(config);

        const result = await pipeline.process(request, {
            transcriptLink: Output.TRANSCRIPT_FILE_NAME,
            resolveImagePath: (image) => `${Output.IMAGES_DIRECTORY}/${output.assetName(image)}`,
        });
        const paths = await output.writeResult(result, request.images);

        const unplaced = result.imagesMetadata.filter(image => image.sectionId === null).length;
        logger.info('Notes written to %s (%d sections, %d images, %d unplaced)',
            paths.markdown, result.sectionsMetadata.length, result.imagesMetadata.length, unplaced);
        return 0;
    } catch (error) {
        const report = toErrorReport(error);
        getLogger().error('%s/%s: %s', report.stage, report.kind, report.message);
        return 1;
    }
}
