export const ARICODE_MAGIC = new Uint8Array([0x41, 0x52, 0x49, 0x43]); // "ARIC"
export const ARICODE_VERSION_BYTE = 0x01;

export enum ARICODE_FLAGS {
    NONE = 0,
    OUTER_ZSTD = 0x01,
    BYTE_SYMBOLS = 0x02,
}

export const KNOWN_FLAGS_MASK = ARICODE_FLAGS.OUTER_ZSTD | ARICODE_FLAGS.BYTE_SYMBOLS;

// Header layout:
// [magic (4)] [version (u8)] [flags (u8)] [precision (u32le)] [body_len (u32le)]
export const ARICODE_HEADER_SIZE = 4 + 1 + 1 + 4 + 4;

// Trailer: crc32 (u32le) over header + body as stored.
export const ARICODE_TRAILER_SIZE = 4;

export const DEFAULT_PRECISION = 10_000;
export const MAX_PRECISION = 1_000_000;

/** Upper bound for a decompressed body (bytes). */
export const DEFAULT_MAX_BODY_BYTES = 256 * 1024 * 1024;

/** Upper bound for the symbol count N an artifact may declare. */
export const DEFAULT_MAX_SYMBOLS = 64 * 1024 * 1024;
