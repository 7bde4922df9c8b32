import { describe, it, expect } from 'vitest';
import { Aricode, IncompleteDataError } from '../../src/index.js';
import { SeededRNG, skewedText } from '../helpers/test-utils.js';

describe('Regression: Truncated zstd artifacts', () => {
    it('should throw IncompleteDataError at every truncation offset', async () => {
        const text = skewedText(new SeededRNG(7), 'abcdefgh', 120);
        const fullData = await Aricode.pack(text, { precision: 200, outerCodec: 'zstd' });

        for (let i = 1; i < fullData.length; i++) {
            await expect(Aricode.unpack(fullData.slice(0, i)), `Failed at offset ${i}/${fullData.length}`)
                .rejects.toBeInstanceOf(IncompleteDataError);
        }
        expect(await Aricode.unpack(fullData)).toBe(text);
    });
});
