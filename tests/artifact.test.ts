/**
 * Artifact container: exact layout, header fields, and rejection of damaged input.
 */
import { describe, it, expect } from 'vitest';
import { Aricode } from '../src/index.js';
import { AricodeDecoder } from '../src/coder/decode.js';
import { writeArtifact, readArtifact } from '../src/coder/artifact.js';
import { FixedDecimal } from '../src/coder/decimal.js';
import {
    CorruptArtifactError, IncompleteDataError, IntegrityError, LimitExceededError, PrecisionMismatchError
} from '../src/coder/errors.js';

const LIMITS = { maxBodyBytes: 1024, maxSymbols: 1024 };
const PLAIN = { precision: 4, symbolMode: 'codepoint', outerCodec: 'none', compressionLevel: 3 } as const;

describe('artifact layout', () => {
    it('writes the documented header and body for "aaab"', async () => {
        const bytes = await Aricode.pack('aaab', { precision: 10 });

        expect(bytes.length).toBe(38);
        expect(Array.from(bytes.subarray(0, 14))).toEqual([
            0x41, 0x52, 0x49, 0x43, // "ARIC"
            0x01, 0x00,             // version, flags
            10, 0, 0, 0,            // precision
            20, 0, 0, 0,            // body length
        ]);
        expect(Array.from(bytes.subarray(14, 22))).toEqual([
            2, 4,           // symbol count, N
            1, 0x61, 3,     // "a" x3
            1, 0x62, 1,     // "b" x1
        ]);
        expect(new TextDecoder().decode(bytes.subarray(23, 34))).toBe('0.369140625');
    });

    it('exposes header and content', async () => {
        const bytes = await Aricode.pack('aaab', { precision: 10 });
        expect(await Aricode.inspect(bytes)).toEqual({
            version: 1,
            flags: 0,
            precision: 10,
            bodyLength: 20,
            outerCodec: 'none',
            symbolMode: 'codepoint',
        });

        const content = await new AricodeDecoder(bytes).readContent();
        expect([...content.table.entries()]).toEqual([['a', 3], ['b', 1]]);
        expect(content.length).toBe(4);
        expect(content.value.toString()).toBe('0.369140625');
    });

    it('stores the empty input as an empty table', async () => {
        const bytes = await Aricode.pack('', { precision: 4 });
        expect(bytes.length).toBe(14 + 6 + 4);
        const content = await new AricodeDecoder(bytes).readContent();
        expect(content.table.size).toBe(0);
        expect(content.length).toBe(0);
        expect(await Aricode.unpack(bytes)).toBe('');
    });
});

describe('artifact validation', () => {
    it('reports truncation at every offset as incomplete data', async () => {
        const bytes = await Aricode.pack('aaab', { precision: 10 });
        for (let i = 1; i < bytes.length; i++) {
            await expect(Aricode.unpack(bytes.slice(0, i)), `offset ${i}`).rejects.toBeInstanceOf(IncompleteDataError);
        }
    });

    it('detects a flipped body byte', async () => {
        const bytes = await Aricode.pack('aaab', { precision: 10 });
        const damaged = bytes.slice();
        damaged[20] ^= 0x01;

        await expect(Aricode.unpack(damaged)).rejects.toBeInstanceOf(IntegrityError);
        expect(await Aricode.verify(bytes)).toBe(true);
        expect(await Aricode.verify(damaged)).toBe(false);
    });

    it('detects a tampered precision field', async () => {
        const bytes = await Aricode.pack('aaab', { precision: 10 });
        const damaged = bytes.slice();
        damaged[6] = 11;
        await expect(Aricode.unpack(damaged)).rejects.toBeInstanceOf(IntegrityError);
    });

    it('rejects bad magic and trailing bytes', async () => {
        const bytes = await Aricode.pack('aaab', { precision: 10 });

        const badMagic = bytes.slice();
        badMagic[0] = 0x00;
        await expect(Aricode.unpack(badMagic)).rejects.toThrow('Invalid magic bytes');

        const padded = new Uint8Array(bytes.length + 1);
        padded.set(bytes);
        await expect(Aricode.unpack(padded)).rejects.toThrow('Trailing bytes after artifact: 1');
    });

    it('rejects a decoder precision that differs from the artifact', async () => {
        const bytes = await Aricode.pack('aaab', { precision: 10 });
        await expect(Aricode.unpack(bytes, { precision: 11 })).rejects.toBeInstanceOf(PrecisionMismatchError);
        expect(await Aricode.unpack(bytes, { precision: 10 })).toBe('aaab');
    });

    it('rejects counts that do not add up to N', async () => {
        const bytes = await writeArtifact(
            { table: new Map([['a', 2]]), length: 3, value: FixedDecimal.parse('0.5', 4) },
            PLAIN,
        );
        await expect(readArtifact(bytes, LIMITS)).rejects.toThrow('Symbol counts sum to 2, artifact declares 3 symbols');
    });

    it('rejects an encoded value outside [0,1)', async () => {
        const bytes = await writeArtifact(
            { table: new Map([['a', 1]]), length: 1, value: FixedDecimal.one(4) },
            PLAIN,
        );
        await expect(readArtifact(bytes, LIMITS)).rejects.toBeInstanceOf(CorruptArtifactError);
    });

    it('enforces the body size limit', async () => {
        const bytes = await Aricode.pack('aaab', { precision: 10 });
        await expect(new AricodeDecoder(bytes, { maxBodyBytes: 5 }).decodeText()).rejects.toBeInstanceOf(LimitExceededError);
    });
});
