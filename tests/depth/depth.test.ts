import { describe, it, expect } from 'vitest';
import * as Depth from '../../src/depth';
import { ValidationError } from '../../src/errors';

const LEVELS = [0, 1, 2, 3, 4, 5];

describe('Depth Policy', () => {
    describe('resolve', () => {
        it('should resolve every level in range', () => {
            for (const level of LEVELS) {
                expect(Depth.resolve(level).level).toBe(level);
            }
        });

        it('should be deterministic', () => {
            for (const level of LEVELS) {
                expect(Depth.resolve(level)).toEqual(Depth.resolve(level));
            }
        });

        it.each([-1, 6, 2.5, Number.NaN])('should reject %s', (level) => {
            expect(() => Depth.resolve(level)).toThrow(ValidationError);
        });

        it('should map level 0 to the most explanatory profile', () => {
            const profile = Depth.resolve(0);
            expect(profile.glossaryMinTechnicality).toBe(1);
            expect(profile.verbosityMultiplier).toBe(2);
            expect(profile.includeBackground).toBe(true);
        });

        it('should map level 5 to the tersest profile', () => {
            const profile = Depth.resolve(5);
            expect(profile.glossaryMinTechnicality).toBe(5);
            expect(profile.verbosityMultiplier).toBe(0.5);
            expect(profile.includeBackground).toBe(false);
        });
    });

    describe('monotonicity', () => {
        it('should never ask for less explanation at a lower level', () => {
            for (let level = 0; level < 5; level++) {
                const lower = Depth.resolve(level);
                const higher = Depth.resolve(level + 1);
                expect(lower.glossaryMinTechnicality).toBeLessThanOrEqual(higher.glossaryMinTechnicality);
                expect(lower.verbosityMultiplier).toBeGreaterThanOrEqual(higher.verbosityMultiplier);
                if (higher.includeBackground) {
                    expect(lower.includeBackground).toBe(true);
                }
            }
        });

        it('should keep a superset of glossary terms at each lower level', () => {
            const entries = [
                { term: 'API', definition: 'interface', technicality: 1 },
                { term: 'REST', definition: 'style', technicality: 2 },
                { term: 'BMC', definition: 'controller' },
                { term: 'OData', definition: 'protocol', technicality: 4 },
                { term: 'Swordfish', definition: 'extension', technicality: 5 },
            ];
            for (let level = 0; level < 5; level++) {
                const lower = Depth.filterGlossary(entries, Depth.resolve(level)).map(entry => entry.term);
                const higher = Depth.filterGlossary(entries, Depth.resolve(level + 1)).map(entry => entry.term);
                for (const term of higher) {
                    expect(lower).toContain(term);
                }
            }
        });
    });

    describe('filterGlossary', () => {
        it('should treat entries without technicality as 3', () => {
            const entries = [{ term: 'BMC', definition: 'controller' }];
            expect(Depth.filterGlossary(entries, Depth.resolve(3))).toHaveLength(1);
            expect(Depth.filterGlossary(entries, Depth.resolve(4))).toHaveLength(0);
        });
    });

    describe('validateLevel', () => {
        it('should return valid levels unchanged', () => {
            expect(Depth.validateLevel(4)).toBe(4);
        });

        it('should reject non-numbers', () => {
            expect(() => Depth.validateLevel('3')).toThrow('understanding level must be an integer between 0 and 5, got 3');
        });
    });

    describe('describe', () => {
        it('should ask for background paragraphs only when the profile includes them', () => {
            expect(Depth.describe(Depth.resolve(0))).toContain('"background" paragraph');
            expect(Depth.describe(Depth.resolve(5))).toContain('Do not add background paragraphs.');
        });

        it('should mention the level and label', () => {
            expect(Depth.describe(Depth.resolve(5))).toContain('5/5 (expert;');
        });
    });
});
