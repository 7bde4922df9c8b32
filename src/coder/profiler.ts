/**
 * PrecisionProfiler: finds the smallest precision that still round-trips an input.
 *
 * The entropy of the frequency table gives a lower bound on the digits the
 * encoded value needs. The profiler trials a ladder of precisions above that
 * bound, round-trips each one, and recommends the smallest that succeeds.
 *
 * The core encoder does NOT depend on this module.
 */

import { createHash } from 'node:crypto';
import { AricodeEncoder } from './encode.js';
import { AricodeDecoder } from './decode.js';
import { InvalidOptionError, PrecisionInsufficientError } from './errors.js';
import { MAX_PRECISION } from './format.js';
import { FrequencyModel, symbolize } from './frequency.js';
import { minimumDigits } from './metrics.js';
import type { AricodeEncoderOptions } from './types.js';

export type ProfileMode = 'quick' | 'deep';

export interface PrecisionTrial {
    precision: number;
    ok: boolean;
    /** Artifact size, 0 when encoding failed. */
    outputBytes: number;
    encodeMs: number;
    /** Error name when the trial failed. */
    error: string | null;
}

export interface PrecisionProfileResult {
    /** Smallest trialled precision that round-trips, or null if none did. */
    recommendedPrecision: number | null;
    /** Entropy bound on fractional digits; no precision below it can work. */
    lowerBoundDigits: number;
    trials: PrecisionTrial[];
    meta: {
        /** SHA-256 prefix of the sampled input */
        sampleHash: string;
        sampleSize: number;
        date: string;
        mode: ProfileMode;
    };
}

const QUICK_FACTORS = [1, 1.1, 1.25, 1.5, 2];
const DEEP_FACTORS = [1, 1.02, 1.05, 1.1, 1.2, 1.35, 1.5, 1.75, 2, 3];

// Truncation costs a few digits over the entropy bound.
const SLACK_DIGITS = 2;

export class PrecisionProfiler {
    static async profile(
        input: string | Uint8Array,
        mode: ProfileMode = 'quick',
        baseOptions: Omit<AricodeEncoderOptions, 'precision' | 'runId'> = {},
    ): Promise<PrecisionProfileResult> {
        const symbolMode = baseOptions.symbolMode ?? 'codepoint';
        const symbols = symbolize(input, symbolMode);
        if (symbols.length === 0) {
            throw new InvalidOptionError('PrecisionProfiler: input must not be empty');
        }

        const lowerBound = Math.max(1, minimumDigits(FrequencyModel.build(symbols)));
        const candidates = PrecisionProfiler.candidates(lowerBound, mode);
        const trials: PrecisionTrial[] = [];

        for (const precision of candidates) {
            trials.push(await PrecisionProfiler.trial(input, precision, baseOptions));
        }

        const best = trials.find(t => t.ok);
        return {
            recommendedPrecision: best ? best.precision : null,
            lowerBoundDigits: lowerBound,
            trials,
            meta: {
                sampleHash: PrecisionProfiler.computeSampleHash(input),
                sampleSize: symbols.length,
                date: new Date().toISOString(),
                mode,
            },
        };
    }

    /**
     * Ascending, de-duplicated precisions derived from the lower bound.
     */
    static candidates(lowerBound: number, mode: ProfileMode): number[] {
        const factors = mode === 'quick' ? QUICK_FACTORS : DEEP_FACTORS;
        const out = new Set<number>();
        for (const f of factors) {
            out.add(Math.min(MAX_PRECISION, Math.ceil(lowerBound * f) + SLACK_DIGITS));
        }
        return [...out].sort((a, b) => a - b);
    }

    private static async trial(
        input: string | Uint8Array,
        precision: number,
        baseOptions: Omit<AricodeEncoderOptions, 'precision' | 'runId'>,
    ): Promise<PrecisionTrial> {
        const t0 = performance.now();
        try {
            const encoder = new AricodeEncoder({ ...baseOptions, precision, runId: `profile_P${precision}`, logger: null });
            await encoder.append(input);
            const output = await encoder.finish();
            const encodeMs = performance.now() - t0;

            const decoded = await new AricodeDecoder(output, { precision }).decodeBytes();
            const original = typeof input === 'string' ? new TextEncoder().encode(input) : input;
            const ok = Buffer.compare(Buffer.from(decoded), Buffer.from(original)) === 0;

            return { precision, ok, outputBytes: output.length, encodeMs, error: ok ? null : 'RoundTripMismatch' };
        } catch (err: unknown) {
            if (err instanceof PrecisionInsufficientError) {
                return { precision, ok: false, outputBytes: 0, encodeMs: performance.now() - t0, error: err.name };
            }
            throw err;
        }
    }

    private static computeSampleHash(input: string | Uint8Array): string {
        const hash = createHash('sha256');
        const bytes = typeof input === 'string' ? new TextEncoder().encode(input) : input;
        hash.update(bytes.subarray(0, 4096));
        return hash.digest('hex').slice(0, 16);
    }
}
