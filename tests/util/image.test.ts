import { describe, it, expect } from 'vitest';
import { readImageInfo } from '../../src/util/image';
import { bytes, pngHeader } from '../helpers/fakes';

describe('readImageInfo', () => {
    it('should read size and format from a PNG header', () => {
        expect(readImageInfo(pngHeader(640, 480))).toEqual({ width: 640, height: 480, format: 'png' });
    });

    it('should give undefined for data it cannot recognize', () => {
        expect(readImageInfo(bytes('not an image'))).toBeUndefined();
        expect(readImageInfo(new Uint8Array(0))).toBeUndefined();
    });
});
