import { buildChatPrompt, ChatPrompt } from './chat';
import { DocumentSection, ImageRecord } from '../types';
import { truncate } from '../util/general';

const SECTION_SUMMARY_CHARS = 200;
const OCR_EXCERPT_CHARS = 1000;

export const buildPlacementPrompt = async (
    image: ImageRecord,
    sections: readonly DocumentSection[],
): Promise<ChatPrompt> => {
    const details = [`Image description: ${image.description || '(none)'}`];
    if (image.keywords.length > 0) {
        details.push(`Keywords: ${image.keywords.join(', ')}`);
    }
    details.push(`Text in image: ${image.ocrText ? truncate(image.ocrText, OCR_EXCERPT_CHARS) : '(none)'}`);

    const listing = sections.map(section => [
        `- id: ${section.id}`,
        `  title: ${section.title}`,
        `  summary: ${truncate(section.bodyText.replace(/\s+/g, ' ').trim(), SECTION_SUMMARY_CHARS)}`,
    ].join('\n'));

    return buildChatPrompt({
        template: 'image-placement',
        instructions: [
            'Which section does this image illustrate best?',
            'Respond with JSON: {"section_id": "<id from the list>" or null, "reason": "one sentence"}',
        ],
        content: [
            { title: 'Image', content: details.join('\n') },
            { title: 'Sections', content: listing.join('\n') },
        ],
    });
};
