/**
 * Chat Prompts
 *
 * Cooks a RiotPrompt prompt from a registered template and renders it into the
 * system and user text a chat completion takes.
 */

import { cook, Formatter } from '@kjerneverk/riotprompt';
import type { Prompt } from '@kjerneverk/riotprompt';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { initializeTemplates, TemplateName } from './templates';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Initialize templates once on module load
initializeTemplates();

export type { Prompt };

export interface ChatPrompt {
    systemPrompt: string;
    prompt: string;
}

export interface PromptContent {
    title: string;
    content: string;
}

export interface PromptParts {
    template: TemplateName;
    instructions?: string[];
    content: PromptContent[];
}

// Chat models share one message layout; the formatter only needs a model name to pick the persona role.
const FORMAT_MODEL = 'gpt-4o';

const formatter = Formatter.create();

const messageText = (content: unknown): string => {
    if (typeof content === 'string') return content;
    if (Array.isArray(content)) {
        return content.filter((part): part is string => typeof part === 'string').join('\n');
    }
    return '';
};

export const cookPrompt = async (parts: PromptParts): Promise<Prompt> => {
    return cook({
        basePath: __dirname,
        template: parts.template,
        instructions: (parts.instructions ?? []).map(content => ({ content })),
        content: parts.content,
    });
};

/** Persona (system or developer role) goes to the system prompt, everything else to the user prompt. */
export const toChatPrompt = (prompt: Prompt): ChatPrompt => {
    const request = formatter.formatPrompt(FORMAT_MODEL, prompt);
    const system: string[] = [];
    const user: string[] = [];
    for (const message of request.messages) {
        const text = messageText(message.content);
        if (!text) continue;
        if (message.role === 'user') {
            user.push(text);
        } else {
            system.push(text);
        }
    }
    return { systemPrompt: system.join('\n\n'), prompt: user.join('\n\n') };
};

export const buildChatPrompt = async (parts: PromptParts): Promise<ChatPrompt> => {
    return toChatPrompt(await cookPrompt(parts));
};
