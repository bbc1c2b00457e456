/**
 * talknotes public API
 *
 * Programmatic entry points for embedding the enrichment pipeline. For the
 * command line, use the `talknotes` binary.
 */

export * as Pipeline from './pipeline';
export * as Transcription from './transcription';
export * as Reasoning from './reasoning';
export * as Ocr from './ocr';
export * as Depth from './depth';
export * as Summary from './summary';
export * as Extraction from './extraction';
export * as Vision from './vision';
export * as Placement from './placement';
export * as Output from './output';

export { createConfigReader, loadConfig, mergeConfig, ConfigSchema, DEFAULT_CONFIG } from './config';
export type { Config } from './config';
export * from './errors';
export * from './types';
export { setLogLevel, getLogger } from './logging';
export { VERSION, PROGRAM_NAME } from './constants';
