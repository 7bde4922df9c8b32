/**
 * Interval Codec.
 *
 * Encode folds `narrow` over the input, one step per symbol. Decode replays the
 * same steps, choosing at each one the band whose narrowed child still holds the
 * encoded value. Both directions go through `narrow`, so they truncate
 * identically.
 */
import { FixedDecimal } from './decimal.js';
import { CorruptArtifactError, PrecisionInsufficientError } from './errors.js';
import { FrequencyModel, type CumulativeIntervalTable, type FrequencyTable, type SymbolBand } from './frequency.js';

export interface WorkingInterval {
    readonly low: FixedDecimal;
    readonly high: FixedDecimal;
}

export interface EncodeResult {
    table: FrequencyTable;
    bands: CumulativeIntervalTable;
    /** Final working interval after all symbols. */
    interval: WorkingInterval;
    /** Midpoint of the final interval, the value written to the artifact. */
    value: FixedDecimal;
    length: number;
}

export type StepObserver = (index: number, before: WorkingInterval, after: WorkingInterval) => void;

export function initialInterval(precision: number): WorkingInterval {
    return { low: FixedDecimal.zero(precision), high: FixedDecimal.one(precision) };
}

export function width(interval: WorkingInterval): FixedDecimal {
    return interval.high.sub(interval.low);
}

/**
 * One narrowing step: [low + trunc(w * band.low), low + trunc(w * band.high)).
 */
export function narrow(interval: WorkingInterval, band: Pick<SymbolBand, 'low' | 'high'>): WorkingInterval {
    const w = width(interval);
    return {
        low: interval.low.add(w.mul(band.low)),
        high: interval.low.add(w.mul(band.high)),
    };
}

/**
 * The representative of a final interval: trunc((low + high) / 2).
 * Always satisfies low <= value < high when high > low.
 */
export function representative(interval: WorkingInterval): FixedDecimal {
    return interval.low.add(interval.high).half();
}

/**
 * Encode a symbol sequence.
 *
 * @throws PrecisionInsufficientError if the working interval collapses before the last symbol
 */
export function encodeSymbols(symbols: readonly string[], precision: number, onStep?: StepObserver): EncodeResult {
    const table = FrequencyModel.build(symbols);
    const bands = FrequencyModel.intervals(table, precision);
    const bandOf = new Map<string, SymbolBand>(bands.map(b => [b.symbol, b]));

    let interval = initialInterval(precision);
    for (let i = 0; i < symbols.length; i++) {
        const band = bandOf.get(symbols[i]);
        if (!band) throw new Error(`Symbol missing from its own frequency table at index ${i}`);

        const next = narrow(interval, band);
        if (!next.low.lt(next.high)) {
            throw new PrecisionInsufficientError(
                `Working interval collapsed at symbol ${i + 1}/${symbols.length} with precision ${precision}`,
                i,
                precision,
            );
        }
        onStep?.(i, interval, next);
        interval = next;
    }

    return { table, bands, interval, value: representative(interval), length: symbols.length };
}

/**
 * Decode `length` symbols from `value`.
 *
 * @throws CorruptArtifactError if the table cannot be banded at `precision` or the value leaves every band
 */
export function decodeSymbols(value: FixedDecimal, table: FrequencyTable, length: number, precision: number): string[] {
    let bands: CumulativeIntervalTable;
    try {
        bands = FrequencyModel.intervals(table, precision);
    } catch (err: unknown) {
        if (!(err instanceof PrecisionInsufficientError)) throw err;
        // No encoder at this precision could have written this table.
        throw new CorruptArtifactError(`Frequency table cannot be banded at precision ${precision}: ${err.message}`, err);
    }
    const out: string[] = [];

    let interval = initialInterval(precision);
    for (let i = 0; i < length; i++) {
        const next = locate(value, interval, bands);
        if (!next) {
            throw new CorruptArtifactError(`Encoded value falls outside every symbol band at symbol ${i + 1}/${length}`);
        }
        out.push(next.band.symbol);
        interval = next.interval;
    }

    return out;
}

/**
 * Binary search for the band whose child interval holds `value`.
 * Children of one step are contiguous, so the lows are ordered.
 */
function locate(
    value: FixedDecimal,
    interval: WorkingInterval,
    bands: CumulativeIntervalTable,
): { band: SymbolBand, interval: WorkingInterval } | null {
    if (bands.length === 0) return null;
    if (value.lt(interval.low) || !value.lt(interval.high)) return null;

    let lo = 0;
    let hi = bands.length - 1;
    while (lo < hi) {
        const mid = (lo + hi + 1) >>> 1;
        if (narrow(interval, bands[mid]).low.lte(value)) {
            lo = mid;
        } else {
            hi = mid - 1;
        }
    }

    const band = bands[lo];
    const child = narrow(interval, band);
    if (!child.low.lt(child.high) || value.lt(child.low) || !value.lt(child.high)) return null;
    return { band, interval: child };
}
