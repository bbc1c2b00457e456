/**
 * Output Management Types
 */

import { ImageMetadata, SectionMetadata } from '../types';

export interface OutputConfig {
    outputDirectory: string;      // Default: ./notes
}

export interface OutputPaths {
    slug: string;                 // directory name; the note slug, suffixed -2, -3... when taken
    directory: string;            // <outputDirectory>/<slug>
    markdown: string;             // <directory>/<slug>.md
    images: string;               // <directory>/images
    transcript: string;           // <directory>/transcript.txt
    metadata: string;             // <directory>/metadata.json
}

export interface NoteMetadata {
    title: string;
    slug: string;
    language: string;
    createdAt: string;
    sections: SectionMetadata[];
    images: ImageMetadata[];
}
