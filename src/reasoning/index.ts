/**
 * Reasoning System
 *
 * Factory for the language-model adapter used by summarization, vision
 * analysis and placement adjudication.
 */

import { ReasoningConfig, ReasoningRequest, ReasoningResponse } from './types';
import * as Client from './client';

export interface ReasoningInstance {
    complete(request: ReasoningRequest): Promise<ReasoningResponse>;
}

export const create = (config: ReasoningConfig, options: Client.ClientOptions = {}): ReasoningInstance => {
    const client = Client.create(config, options);
    return {
        complete: (request) => client.complete(request),
    };
};

export * from './types';
