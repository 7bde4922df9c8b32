import { describe, it, expect } from 'vitest';
import { PrecisionProfiler } from '../src/coder/profiler.js';
import { AricodeError, InvalidOptionError } from '../src/coder/errors.js';
import { minimumDigits, shannonEntropy } from '../src/coder/metrics.js';

describe('PrecisionProfiler', () => {
    it('derives an ascending ladder above the entropy bound', () => {
        expect(PrecisionProfiler.candidates(4, 'quick')).toEqual([6, 7, 8, 10]);
        const deep = PrecisionProfiler.candidates(100, 'deep');
        expect(deep[0]).toBe(102);
        expect(deep[deep.length - 1]).toBe(302);
    });

    it('computes the entropy lower bound', () => {
        const table = new Map([['a', 30], ['b', 10]]);
        expect(shannonEntropy(table)).toBeCloseTo(0.8113, 4);
        expect(minimumDigits(table)).toBe(10);
        expect(shannonEntropy(new Map([['a', 4]]))).toBe(0);
    });

    it('recommends the smallest precision that round-trips', async () => {
        const result = await PrecisionProfiler.profile('aaab'.repeat(10), 'quick');

        expect(result.lowerBoundDigits).toBe(10);
        expect(result.meta.sampleSize).toBe(40);
        expect(result.meta.mode).toBe('quick');
        expect(result.trials.map(t => t.precision)).toEqual(PrecisionProfiler.candidates(10, 'quick'));
        expect(result.recommendedPrecision).not.toBeNull();

        const firstOk = result.trials.find(t => t.ok);
        expect(result.recommendedPrecision).toBe(firstOk?.precision);
        for (const t of result.trials) {
            if (t.precision < (result.recommendedPrecision ?? 0)) {
                expect(t.ok).toBe(false);
                expect(t.error).toBe('PrecisionInsufficientError');
            }
        }
    });

    it('hashes a string and its UTF-8 bytes alike', async () => {
        const text = 'naïve '.repeat(8);
        const fromText = await PrecisionProfiler.profile(text, 'quick');
        const fromBytes = await PrecisionProfiler.profile(new TextEncoder().encode(text), 'quick');

        expect(fromText.meta.sampleHash).toHaveLength(16);
        expect(fromBytes.meta.sampleHash).toBe(fromText.meta.sampleHash);
    });

    it('reports bytes that are not UTF-8 as an AricodeError', async () => {
        await expect(PrecisionProfiler.profile(new Uint8Array([0x61, 0xC3]))).rejects.toThrow(
            new AricodeError('Input is not valid UTF-8; encode it with symbolMode "byte"')
        );
        const bytes = await PrecisionProfiler.profile(new Uint8Array([0x61, 0xC3]), 'quick', { symbolMode: 'byte' });
        expect(bytes.meta.sampleSize).toBe(2);
    });

    it('rejects empty input', async () => {
        await expect(PrecisionProfiler.profile('')).rejects.toBeInstanceOf(InvalidOptionError);
    });
});
