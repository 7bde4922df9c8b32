import type { FrequencyTable } from './frequency.js';

const LOG2_10 = Math.log2(10);

export interface EncodeTelemetry {
    run_id: string;
    symbols: number;
    distinct_symbols: number;
    precision: number;
    /** Shannon entropy of the frequency table, bits per symbol. */
    entropy_bits_per_symbol: number;
    /** N × entropy: the information content the coded value has to carry. */
    ideal_bits: number;
    /** Fractional digits of the written value (trailing zeros removed). */
    value_digits: number;
    value_bits: number;
    input_bytes: number;
    artifact_bytes: number;
    ratio: number;
}

export function shannonEntropy(table: FrequencyTable): number {
    let total = 0;
    for (const count of table.values()) total += count;
    if (total === 0) return 0;

    let h = 0;
    for (const count of table.values()) {
        const p = count / total;
        h -= p * Math.log2(p);
    }
    return h;
}

/**
 * Lower bound on the fractional digits a value needs to identify the sequence.
 */
export function minimumDigits(table: FrequencyTable): number {
    let total = 0;
    for (const count of table.values()) total += count;
    return Math.ceil((total * shannonEntropy(table)) / LOG2_10);
}

export function fractionalDigits(decimalText: string): number {
    const dot = decimalText.indexOf('.');
    return dot === -1 ? 0 : decimalText.length - dot - 1;
}

export function calculateEncodeTelemetry(args: {
    runId: string;
    table: FrequencyTable;
    precision: number;
    valueText: string;
    inputBytes: number;
    artifactBytes: number;
}): EncodeTelemetry {
    let symbols = 0;
    for (const count of args.table.values()) symbols += count;
    const entropy = shannonEntropy(args.table);
    const digits = fractionalDigits(args.valueText);

    return {
        run_id: args.runId,
        symbols,
        distinct_symbols: args.table.size,
        precision: args.precision,
        entropy_bits_per_symbol: entropy,
        ideal_bits: entropy * symbols,
        value_digits: digits,
        value_bits: digits * LOG2_10,
        input_bytes: args.inputBytes,
        artifact_bytes: args.artifactBytes,
        ratio: args.inputBytes / (args.artifactBytes || 1),
    };
}
