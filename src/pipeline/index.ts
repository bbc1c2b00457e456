/**
 * Pipeline
 *
 * Entry point for processing a request end to end. Use Pipeline.create()
 * with a resolved configuration; pass dependencies to swap collaborators.
 */

import { PipelineConfig, PipelineDependencies, ProcessOptions } from './types';
import { ProcessingRequest, ProcessingResult } from '../types';
import * as Orchestrator from './orchestrator';

export interface PipelineInstance {
    process(request: ProcessingRequest, options?: ProcessOptions): Promise<ProcessingResult>;
}

export const create = (config: PipelineConfig = {}, dependencies: PipelineDependencies = {}): PipelineInstance => {
    return Orchestrator.create(config, dependencies);
};

export { validateRequest, buildImagesMetadata, buildSectionsMetadata } from './orchestrator';
export * from './types';
