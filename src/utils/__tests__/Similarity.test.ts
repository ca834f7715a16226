import { describe, test, expect } from 'vitest';
import { similarityRatio } from '../Similarity.ts';

describe('similarityRatio', () => {
    test('identical strings score 1', () => {
        expect(similarityRatio('HOVEDGADEN', 'HOVEDGADEN')).toBe(1);
        expect(similarityRatio('', '')).toBe(1);
    });

    test('nothing in common scores 0', () => {
        expect(similarityRatio('ABC', 'XYZ')).toBe(0);
        expect(similarityRatio('ABC', '')).toBe(0);
    });

    test('counts the longest block and the blocks either side of it', () => {
        // AB + CD matched around the differing middle
        expect(similarityRatio('ABXCD', 'ABYCD')).toBeCloseTo(0.8, 10);
        expect(similarityRatio('ABCD', 'ABCE')).toBeCloseTo(0.75, 10);
    });

    test('scores common misspellings of street names', () => {
        expect(similarityRatio('HOVEDGADEN', 'HOVEDGADE')).toBeCloseTo(18 / 19, 10);
        expect(similarityRatio('HOVEDGADN', 'HOVEDGADEN')).toBeCloseTo(18 / 19, 10);
        expect(similarityRatio('HOVEDGADEN', 'HOVEDVEJEN')).toBeCloseTo(0.7, 10);
    });

    test('is symmetric for these inputs', () => {
        expect(similarityRatio('HOVEDGAD', 'HOVEDGADEN')).toBeCloseTo(similarityRatio('HOVEDGADEN', 'HOVEDGAD'), 10);
    });
});
