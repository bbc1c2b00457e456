import { describe, it, expect, vi, beforeEach } from 'vitest';
import { mocks, toFile, APIConnectionTimeoutError } from '../helpers/openai-mock';
import * as Transcription from '../../src/transcription';
import { resolveExtension } from '../../src/transcription/service';
import { TranscriptionError } from '../../src/errors';
import { bytes } from '../helpers/fakes';

vi.mock('openai', () => import('../helpers/openai-mock'));

describe('Transcription adapter', () => {
    beforeEach(() => {
        mocks.transcriptionCreate.mockReset();
        toFile.mockClear();
    });

    it('should request timestamped segments and normalize them', async () => {
        mocks.transcriptionCreate.mockResolvedValue({
            text: 'ignored',
            language: 'english',
            duration: 9,
            segments: [
                { start: 4, end: 9, text: ' for hardware management ' },
                { start: 0, end: 5, text: 'Redfish is a REST API' },
                { start: 5, end: 6, text: '   ' },
            ],
        });
        const transcription = Transcription.create({ apiKey: 'test-key', timeoutMs: 1000 });

        const result = await transcription.transcribe({ data: bytes('audio'), formatHint: 'audio/x-m4a' });

        expect(toFile).toHaveBeenCalledWith(expect.any(Uint8Array), 'audio.m4a');
        const [params, options] = mocks.transcriptionCreate.mock.calls[0];
        expect(params).toMatchObject({ model: 'whisper-1', response_format: 'verbose_json', file: { name: 'audio.m4a' } });
        expect(options).toEqual({ timeout: 1000, maxRetries: 0 });
        expect(result.segments).toEqual([
            { startTime: 0, endTime: 5, text: 'Redfish is a REST API', detectedLanguage: 'english' },
            { startTime: 5, endTime: 9, text: 'for hardware management', detectedLanguage: 'english' },
        ]);
        expect(result.text).toBe('Redfish is a REST API for hardware management');
        expect(result.language).toBe('english');
        expect(result.model).toBe('whisper-1');
    });

    it('should make one segment when the model returns only text', async () => {
        mocks.transcriptionCreate.mockResolvedValue({ text: 'Hello there' });
        const transcription = Transcription.create({ apiKey: 'test-key', defaultModel: 'gpt-4o-transcribe' });

        const result = await transcription.transcribe({ data: bytes('audio'), formatHint: 'mp3' });

        expect(mocks.transcriptionCreate.mock.calls[0][0]).toMatchObject({ response_format: 'json' });
        expect(result.segments).toEqual([{ startTime: 0, endTime: 0, text: 'Hello there', detectedLanguage: 'unknown' }]);
    });

    it('should reject audio over the model size limit without calling the API', async () => {
        const transcription = Transcription.create({ apiKey: 'test-key' });

        await expect(transcription.transcribe({ data: new Uint8Array(25 * 1024 * 1024 + 1) }))
            .rejects.toBeInstanceOf(TranscriptionError);
        expect(mocks.transcriptionCreate).not.toHaveBeenCalled();
    });

    it('should wrap SDK failures', async () => {
        mocks.transcriptionCreate.mockRejectedValue(new APIConnectionTimeoutError('Request timed out.'));
        const transcription = Transcription.create({ apiKey: 'test-key' });

        await expect(transcription.transcribe({ data: bytes('audio') })).rejects.toMatchObject({
            stage: 'transcription',
            kind: 'TranscriptionError',
            message: 'Transcription with whisper-1 failed (timeout): Request timed out.',
        });
    });

    it('should reject an unexpected response shape', async () => {
        mocks.transcriptionCreate.mockResolvedValue({ text: 42 });
        const transcription = Transcription.create({ apiKey: 'test-key' });

        await expect(transcription.transcribe({ data: bytes('audio') })).rejects.toBeInstanceOf(TranscriptionError);
    });
});

describe('resolveExtension', () => {
    it.each([
        [undefined, 'wav'],
        ['.MP3', 'mp3'],
        ['m4a', 'm4a'],
        ['audio/mpeg', 'mp3'],
        ['audio/x-wav', 'wav'],
        ['audio/flac', 'flac'],
    ])('should map %s to %s', (hint, expected) => {
        expect(resolveExtension(hint)).toBe(expected);
    });
});
