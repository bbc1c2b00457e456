import { buildChatPrompt, ChatPrompt } from './chat';
import { IMAGE_CATEGORIES, MAX_OCR_PROMPT_CHARS } from '../constants';
import { ImageInfo } from '../util/image';

export interface VisionPromptInput {
    ocrText: string;
    filename?: string;
    byteLength: number;
    info?: ImageInfo;
    context?: string;
}

export const buildImageAnalysisPrompt = async (input: VisionPromptInput): Promise<ChatPrompt> => {
    const instructions = ['Analyze this image based on its extracted text and file details.'];
    if (input.context) {
        instructions.push(`Context: ${input.context}`);
    }
    instructions.push(`Respond with JSON:\n${JSON.stringify({
        description: 'one paragraph describing the image content',
        keywords: ['keyword'],
        category: IMAGE_CATEGORIES.join(' | '),
        confidence: '0.0-1.0',
    })}`);

    const details = [`File: ${input.filename ?? '(unnamed)'} (${input.byteLength} bytes)`];
    if (input.info) {
        details.push(`Dimensions: ${input.info.width}x${input.info.height} (${input.info.format})`);
    }

    return buildChatPrompt({
        template: 'image-analysis',
        instructions,
        content: [
            { title: 'Image', content: details.join('\n') },
            { title: 'OCR Text', content: input.ocrText ? input.ocrText.slice(0, MAX_OCR_PROMPT_CHARS) : '(No text detected)' },
        ],
    });
};
