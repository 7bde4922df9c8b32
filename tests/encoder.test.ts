import { describe, it, expect, vi } from 'vitest';
import { AricodeEncoder } from '../src/coder/encode.js';
import { AricodeDecoder } from '../src/coder/decode.js';
import { AricodeError, InvalidOptionError, PrecisionInsufficientError } from '../src/coder/errors.js';
import { DEFAULT_PRECISION, MAX_PRECISION } from '../src/coder/format.js';

describe('AricodeEncoder', () => {
    it('defaults to 10000 digits', () => {
        expect(new AricodeEncoder().precision).toBe(DEFAULT_PRECISION);
        expect(DEFAULT_PRECISION).toBe(10_000);
    });

    it('validates options', () => {
        expect(() => new AricodeEncoder({ precision: 0 })).toThrow(InvalidOptionError);
        expect(() => new AricodeEncoder({ precision: 1.5 })).toThrow(InvalidOptionError);
        expect(() => new AricodeEncoder({ precision: MAX_PRECISION + 1 })).toThrow(InvalidOptionError);
        expect(() => new AricodeEncoder({ compressionLevel: 0 })).toThrow(InvalidOptionError);
        expect(() => new AricodeDecoder(new Uint8Array(0), { precision: -1 })).toThrow(InvalidOptionError);
    });

    it('rejects use after finish()', async () => {
        const encoder = new AricodeEncoder({ precision: 10 });
        await encoder.append('abc');
        await encoder.finish();
        await expect(encoder.append('d')).rejects.toThrow('Cannot append after finish()');
        await expect(encoder.finish()).rejects.toThrow('finish() already called');
    });

    it('reports telemetry through getTelemetry() and the logger', async () => {
        const info = vi.fn();
        const encoder = new AricodeEncoder({ precision: 10, runId: 'test-run', logger: { info } });
        await encoder.append('aaab');
        await encoder.finish();

        const t = encoder.getTelemetry();
        expect(t).not.toBeNull();
        expect(t?.symbols).toBe(4);
        expect(t?.distinct_symbols).toBe(2);
        expect(t?.value_digits).toBe(9);
        expect(t?.input_bytes).toBe(4);
        expect(t?.artifact_bytes).toBe(38);
        expect(t?.entropy_bits_per_symbol).toBeCloseTo(0.8113, 4);
        expect(info).toHaveBeenCalledTimes(1);
        expect(info).toHaveBeenCalledWith('[aricode] test-run: 4 symbols (2 distinct), 9/10 digits, 4 -> 38 bytes');
    });

    it('fails on collapse rather than emitting a short artifact', async () => {
        const encoder = new AricodeEncoder({ precision: 3 });
        await encoder.append('ab'.repeat(20));
        await expect(encoder.finish()).rejects.toBeInstanceOf(PrecisionInsufficientError);
        expect(encoder.getTelemetry()).toBeNull();
    });

    it('rejects invalid UTF-8 in codepoint mode', async () => {
        const run = async () => {
            const encoder = new AricodeEncoder({ precision: 10 });
            await encoder.append(new Uint8Array([0x61, 0xFF]));
            return encoder.finish();
        };
        await expect(run()).rejects.toBeInstanceOf(AricodeError);
    });
});
