/**
 * Frequency Model.
 *
 * Counts symbols in first-seen order and partitions [0,1) into one band per
 * symbol, proportional to its count. The decoder rebuilds the same bands from the
 * transmitted counts, so table order is part of the format.
 */
import { FixedDecimal } from './decimal.js';
import { AricodeError, PrecisionInsufficientError } from './errors.js';
import type { SymbolMode } from './types.js';

/** Symbol → occurrence count, iterated in first-seen order. */
export type FrequencyTable = ReadonlyMap<string, number>;

export interface SymbolBand {
    symbol: string;
    count: number;
    /** Inclusive lower bound in [0,1). */
    low: FixedDecimal;
    /** Exclusive upper bound in (0,1]. */
    high: FixedDecimal;
}

export type CumulativeIntervalTable = readonly SymbolBand[];

export class FrequencyModel {
    /**
     * Count every symbol in one pass. Map insertion order gives first-seen order.
     */
    static build(symbols: Iterable<string>): FrequencyTable {
        const table = new Map<string, number>();
        for (const s of symbols) {
            table.set(s, (table.get(s) ?? 0) + 1);
        }
        return table;
    }

    static total(table: FrequencyTable): number {
        let n = 0;
        for (const count of table.values()) n += count;
        return n;
    }

    /**
     * Derive the cumulative bands: symbol i covers
     * [trunc(running / N), trunc((running + count) / N)).
     *
     * @throws PrecisionInsufficientError when truncation leaves a band with zero width
     */
    static intervals(table: FrequencyTable, precision: number): CumulativeIntervalTable {
        const total = FrequencyModel.total(table);
        const bands: SymbolBand[] = [];
        let running = 0;
        let low = FixedDecimal.zero(precision);

        for (const [symbol, count] of table) {
            running += count;
            const high = FixedDecimal.fromRatio(running, total, precision);
            if (!low.lt(high)) {
                throw new PrecisionInsufficientError(
                    `Precision ${precision} cannot represent the probability of symbol #${bands.length} (${count}/${total})`,
                    0,
                    precision,
                );
            }
            bands.push({ symbol, count, low, high });
            low = high;
        }

        return bands;
    }
}

export const INVALID_UTF8_MESSAGE = 'Input is not valid UTF-8; encode it with symbolMode "byte"';

/**
 * Split an input into symbols. In `byte` mode each byte becomes a one-char
 * latin1 string so both modes share the same string-keyed tables.
 *
 * @throws AricodeError when `codepoint` mode is given bytes that are not UTF-8
 */
export function symbolize(input: string | Uint8Array, mode: SymbolMode): string[] {
    if (mode === 'byte') {
        const bytes = typeof input === 'string' ? Buffer.from(input, 'utf8') : input;
        return Array.from(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1'));
    }
    if (typeof input === 'string') return Array.from(input);
    try {
        return Array.from(new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(input));
    } catch (err: unknown) {
        throw new AricodeError(INVALID_UTF8_MESSAGE, err);
    }
}

export function desymbolizeText(symbols: readonly string[]): string {
    return symbols.join('');
}

export function desymbolizeBytes(symbols: readonly string[]): Uint8Array {
    return new Uint8Array(Buffer.from(symbols.join(''), 'latin1'));
}
