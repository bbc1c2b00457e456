import { describe, it, expect, afterEach } from 'vitest';
import { getLogger, setLogLevel } from '../src/logging';

describe('logging', () => {
    afterEach(() => {
        setLogLevel('error');
    });

    it('should rebuild the logger at the requested level', () => {
        setLogLevel('debug');
        expect(getLogger().level).toBe('debug');
        expect(getLogger().isDebugEnabled()).toBe(true);

        setLogLevel('info');
        expect(getLogger().level).toBe('info');
        expect(getLogger().isDebugEnabled()).toBe(false);
    });

    it('should tag entries with the program name', () => {
        expect(getLogger().defaultMeta).toEqual({ service: 'talknotes' });
    });
});
