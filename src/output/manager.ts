/**
 * Output Manager
 *
 * Lays a processing result out on disk:
 *
 *   <outputDirectory>/<slug>/<slug>.md
 *   <outputDirectory>/<slug>/images/<sourceId><ext>
 *   <outputDirectory>/<slug>/transcript.txt
 *   <outputDirectory>/<slug>/metadata.json
 *
 * An existing directory is never overwritten: the next free `<slug>-<n>` is used.
 */

import * as path from 'node:path';
import * as fs from 'fs/promises';
import { NoteMetadata, OutputConfig, OutputPaths } from './types';
import { ImageInput, ImageRecord, ProcessingResult } from '../types';
import * as Logging from '../logging';

export interface ManagerInstance {
    createOutputPaths(slug: string): OutputPaths;
    /** File name of the image asset; markdown links point at `images/<assetName>`. */
    assetName(image: ImageRecord): string;
    /** Creates the note directory under the first free name. */
    reserveDirectory(slug: string): Promise<OutputPaths>;
    ensureDirectories(paths: OutputPaths): Promise<void>;
    writeResult(result: ProcessingResult, images: readonly ImageInput[], createdAt?: Date): Promise<OutputPaths>;
}

export const TRANSCRIPT_FILE_NAME = 'transcript.txt';
export const METADATA_FILE_NAME = 'metadata.json';
export const IMAGES_DIRECTORY = 'images';

const isAlreadyExists = (error: unknown): boolean => {
    return error instanceof Error && 'code' in error && error.code === 'EEXIST';
};

export const create = (config: OutputConfig): ManagerInstance => {
    const logger = Logging.getLogger();

    const createOutputPaths = (slug: string): OutputPaths => {
        const directory = path.join(config.outputDirectory, slug);
        return {
            slug,
            directory,
            markdown: path.join(directory, `${slug}.md`),
            images: path.join(directory, IMAGES_DIRECTORY),
            transcript: path.join(directory, TRANSCRIPT_FILE_NAME),
            metadata: path.join(directory, METADATA_FILE_NAME),
        };
    };

    // Source ids are unique per request, so asset names never collide.
    const assetName = (image: ImageRecord): string => {
        const extension = image.filename ? path.extname(image.filename).toLowerCase() : '';
        return `${image.sourceId}${extension}`;
    };

    const reserveDirectory = async (slug: string): Promise<OutputPaths> => {
        await fs.mkdir(config.outputDirectory, { recursive: true });
        for (let attempt = 1; ; attempt++) {
            const paths = createOutputPaths(attempt === 1 ? slug : `${slug}-${attempt}`);
            try {
                // Without `recursive`, mkdir fails on an existing directory.
                await fs.mkdir(paths.directory);
                return paths;
            } catch (error) {
                if (!isAlreadyExists(error)) throw error;
                logger.debug('Output directory %s exists, trying the next name', paths.directory);
            }
        }
    };

    const ensureDirectories = async (paths: OutputPaths): Promise<void> => {
        await fs.mkdir(paths.images, { recursive: true });
        logger.debug('Ensured output directories', { directory: paths.directory });
    };

    const writeResult = async (
        result: ProcessingResult,
        images: readonly ImageInput[],
        createdAt: Date = new Date(),
    ): Promise<OutputPaths> => {
        const paths = await reserveDirectory(result.slug);
        await ensureDirectories(paths);

        await fs.writeFile(paths.markdown, result.markdown, 'utf-8');
        await fs.writeFile(paths.transcript, `${result.transcript.text}\n`, 'utf-8');

        // Records are in upload order, one per input.
        for (let index = 0; index < result.images.length; index++) {
            const input = images[index];
            if (input === undefined) continue;
            await fs.writeFile(path.join(paths.images, assetName(result.images[index])), input.data);
        }

        const metadata: NoteMetadata = {
            title: result.title,
            slug: paths.slug,
            language: result.transcript.language,
            createdAt: createdAt.toISOString(),
            sections: result.sectionsMetadata,
            images: result.imagesMetadata,
        };
        await fs.writeFile(paths.metadata, `${JSON.stringify(metadata, null, 2)}\n`, 'utf-8');

        logger.info('Wrote notes to %s', paths.markdown);
        return paths;
    };

    return { createOutputPaths, assetName, reserveDirectory, ensureDirectories, writeResult };
};
