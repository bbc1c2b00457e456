/**
 * Output
 *
 * Markdown rendering and the on-disk layout of a processed session.
 */

import { OutputConfig } from './types';
import * as Manager from './manager';
import { DEFAULT_OUTPUT_DIRECTORY } from '../constants';

export type OutputInstance = Manager.ManagerInstance;

export const create = (config: OutputConfig): OutputInstance => {
    return Manager.create(config);
};

export const DEFAULT_OUTPUT_CONFIG: OutputConfig = {
    outputDirectory: DEFAULT_OUTPUT_DIRECTORY,
};

export { renderMarkdown, altText, defaultImagePath } from './markdown';
export type { RenderOptions } from './markdown';
export { TRANSCRIPT_FILE_NAME, METADATA_FILE_NAME, IMAGES_DIRECTORY } from './manager';
export * from './types';
