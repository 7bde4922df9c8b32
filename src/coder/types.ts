export type AricodeLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

/**
 * - `codepoint`: each Unicode code point of a text input is one symbol.
 * - `byte`: each byte of a binary input is one symbol.
 */
export type SymbolMode = 'codepoint' | 'byte';

export type OuterCodecName = 'none' | 'zstd';

export type AricodeEncoderOptions = {
    /** Stable identifier for telemetry (useful for tests). */
    runId?: string;
    /** Fractional digits kept after every interval operation. Default 10000. */
    precision?: number;
    /** How input chunks are split into symbols. Default `codepoint`. */
    symbolMode?: SymbolMode;
    /** Optional general-purpose compression of the artifact body. Default `none`. */
    outerCodec?: OuterCodecName;
    /** Zstd compression level (1-22), used when `outerCodec` is `zstd`. Default: 3. */
    compressionLevel?: number;
    /** Optional logger hook to surface telemetry without console.* in src/. */
    logger?: AricodeLogger | null;
};

export type AricodeDecoderOptions = {
    /**
     * Precision the caller expects. When set, an artifact recorded with another
     * precision is rejected with PrecisionMismatchError. When omitted, the
     * artifact's recorded precision is used.
     */
    precision?: number;
    /** Optional logger for decode diagnostics. */
    logger?: AricodeLogger | null;
    /** Hard cap on the (decompressed) artifact body. Default 256 MiB. */
    maxBodyBytes?: number;
    /** Hard cap on the symbol count an artifact may declare. Default 64 Mi. */
    maxSymbols?: number;
};
