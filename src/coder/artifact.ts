/**
 * Compressed artifact container.
 *
 * Layout:
 *   [magic "ARIC" (4)] [version (u8)] [flags (u8)] [precision (u32le)] [body_len (u32le)]
 *   [body (body_len bytes, zstd-compressed when OUTER_ZSTD is set)]
 *   [crc32 (u32le) over everything before it]
 *
 * Body:
 *   [symbol_count: varint] [length: varint]
 *   symbol_count × [utf8_len: varint] [utf8 bytes] [count: varint]
 *   [value_len: varint] [ASCII decimal]
 */
import { concatBytes, decodeVarintAt, encodeVarint, readU32LE, writeU32LE } from '../aricode-utils.js';
import { FixedDecimal } from './decimal.js';
import {
    ARICODE_FLAGS, ARICODE_HEADER_SIZE, ARICODE_MAGIC, ARICODE_TRAILER_SIZE,
    ARICODE_VERSION_BYTE, KNOWN_FLAGS_MASK, MAX_PRECISION
} from './format.js';
import {
    AricodeError, CorruptArtifactError, IncompleteDataError, IntegrityError, LimitExceededError
} from './errors.js';
import { calculateCRC32 } from './integrity.js';
import { OUTER_CODECS, outerCodecFromFlags } from './outer-codecs.js';
import type { FrequencyTable } from './frequency.js';
import type { OuterCodecName, SymbolMode } from './types.js';

export interface ArtifactHeader {
    version: number;
    flags: number;
    precision: number;
    /** Stored body size in bytes (after the outer codec). */
    bodyLength: number;
    outerCodec: OuterCodecName;
    symbolMode: SymbolMode;
}

export interface ArtifactContent {
    table: FrequencyTable;
    /** Number of symbols in the original sequence (N). */
    length: number;
    value: FixedDecimal;
}

export interface ArtifactWriteOptions {
    precision: number;
    symbolMode: SymbolMode;
    outerCodec: OuterCodecName;
    compressionLevel: number;
}

export interface ArtifactReadLimits {
    /** Largest body accepted after the outer codec. */
    maxBodyBytes: number;
    /** Largest symbol count N accepted. */
    maxSymbols: number;
}

const ERR_DATA_TOO_SHORT = 'Data too short';

export async function writeArtifact(content: ArtifactContent, options: ArtifactWriteOptions): Promise<Uint8Array> {
    const rawBody = encodeBody(content);
    const codec = OUTER_CODECS[options.outerCodec];
    const body = await codec.compress(rawBody, options.compressionLevel);

    let flags = codec.flag;
    if (options.symbolMode === 'byte') flags |= ARICODE_FLAGS.BYTE_SYMBOLS;

    const header = concatBytes([
        ARICODE_MAGIC,
        new Uint8Array([ARICODE_VERSION_BYTE, flags]),
        writeU32LE(options.precision),
        writeU32LE(body.length),
    ]);
    const framed = concatBytes([header, body]);
    return concatBytes([framed, writeU32LE(calculateCRC32(framed))]);
}

/**
 * Validate framing and checksum, and return the header. Does not touch the body.
 */
export function readArtifactHeader(data: Uint8Array): ArtifactHeader {
    if (data.length < ARICODE_HEADER_SIZE) throw new IncompleteDataError(ERR_DATA_TOO_SHORT);

    for (let i = 0; i < ARICODE_MAGIC.length; i++) {
        if (data[i] !== ARICODE_MAGIC[i]) throw new CorruptArtifactError('Invalid magic bytes');
    }

    const version = data[4];
    if (version !== ARICODE_VERSION_BYTE) {
        throw new CorruptArtifactError(`Unsupported artifact version: ${version}`);
    }

    const flags = data[5];
    if ((flags & ~KNOWN_FLAGS_MASK) !== 0) {
        throw new CorruptArtifactError(`Unknown flags: 0x${flags.toString(16)}`);
    }

    const precision = readU32LE(data, 6);
    if (precision === 0) throw new CorruptArtifactError('Precision must be positive');
    if (precision > MAX_PRECISION) {
        throw new LimitExceededError(`Precision ${precision} exceeds limit ${MAX_PRECISION}`);
    }

    const bodyLength = readU32LE(data, 10);
    const expectedSize = ARICODE_HEADER_SIZE + bodyLength + ARICODE_TRAILER_SIZE;
    if (data.length < expectedSize) {
        throw new IncompleteDataError(`Artifact truncated: expected ${expectedSize} bytes, got ${data.length}`);
    }
    if (data.length > expectedSize) {
        throw new CorruptArtifactError(`Trailing bytes after artifact: ${data.length - expectedSize}`);
    }

    const crcPos = ARICODE_HEADER_SIZE + bodyLength;
    const storedCrc = readU32LE(data, crcPos);
    const actualCrc = calculateCRC32(data.subarray(0, crcPos));
    if (storedCrc !== actualCrc) {
        throw new IntegrityError(`CRC mismatch: stored ${storedCrc}, computed ${actualCrc}`);
    }

    return {
        version,
        flags,
        precision,
        bodyLength,
        outerCodec: outerCodecFromFlags(flags),
        symbolMode: (flags & ARICODE_FLAGS.BYTE_SYMBOLS) !== 0 ? 'byte' : 'codepoint',
    };
}

/**
 * Parse a full artifact: header, checksum, body and value.
 */
export async function readArtifact(
    data: Uint8Array,
    limits: ArtifactReadLimits,
): Promise<{ header: ArtifactHeader, content: ArtifactContent }> {
    const header = readArtifactHeader(data);
    const stored = data.subarray(ARICODE_HEADER_SIZE, ARICODE_HEADER_SIZE + header.bodyLength);
    const body = await OUTER_CODECS[header.outerCodec].decompress(stored, limits.maxBodyBytes);

    return { header, content: decodeBody(body, header, limits.maxSymbols) };
}

function encodeBody(content: ArtifactContent): Uint8Array {
    const encoder = new TextEncoder();
    const decoder = new TextDecoder('utf-8', { ignoreBOM: true });
    const chunks: Uint8Array[] = [encodeVarint([content.table.size, content.length])];

    let index = 0;
    for (const [symbol, count] of content.table) {
        const bytes = encoder.encode(symbol);
        if (decoder.decode(bytes) !== symbol) {
            throw new AricodeError(`Symbol #${index} is not well-formed Unicode and cannot be stored`);
        }
        chunks.push(encodeVarint([bytes.length]), bytes, encodeVarint([count]));
        index++;
    }

    const valueBytes = encoder.encode(content.value.toString());
    chunks.push(encodeVarint([valueBytes.length]), valueBytes);
    return concatBytes(chunks);
}

function decodeBody(body: Uint8Array, header: ArtifactHeader, maxSymbols: number): ArtifactContent {
    try {
        return decodeBodyUnchecked(body, header, maxSymbols);
    } catch (err: unknown) {
        if (err instanceof AricodeError) throw err;
        throw new CorruptArtifactError(`Malformed artifact body: ${err instanceof Error ? err.message : String(err)}`, err);
    }
}

function decodeBodyUnchecked(body: Uint8Array, header: ArtifactHeader, maxSymbols: number): ArtifactContent {
    const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
    let pos = 0;

    const next = (): number => {
        const decoded = decodeVarintAt(body, pos);
        pos = decoded.nextPos;
        return decoded.value;
    };
    const take = (len: number): Uint8Array => {
        if (pos + len > body.length) throw new CorruptArtifactError('Field length exceeds artifact body');
        const slice = body.subarray(pos, pos + len);
        pos += len;
        return slice;
    };

    const symbolCount = next();
    const length = next();
    if (length > maxSymbols) {
        throw new LimitExceededError(`Artifact declares ${length} symbols, limit is ${maxSymbols}`);
    }

    // Every entry needs at least 3 bytes (length, one symbol byte, count).
    if (symbolCount * 3 > body.length - pos) {
        throw new CorruptArtifactError(`Symbol count ${symbolCount} exceeds artifact body`);
    }

    const table = new Map<string, number>();
    let total = 0;
    for (let i = 0; i < symbolCount; i++) {
        const symbol = utf8.decode(take(next()));
        const count = next();

        if (symbol.length === 0) throw new CorruptArtifactError(`Empty symbol at table entry ${i}`);
        if (header.symbolMode === 'byte' && (symbol.length !== 1 || symbol.charCodeAt(0) > 0xFF)) {
            throw new CorruptArtifactError(`Table entry ${i} is not a byte symbol`);
        }
        if (header.symbolMode === 'codepoint' && Array.from(symbol).length !== 1) {
            throw new CorruptArtifactError(`Table entry ${i} is not a single code point`);
        }
        if (table.has(symbol)) throw new CorruptArtifactError(`Duplicate symbol at table entry ${i}`);
        if (count === 0) throw new CorruptArtifactError(`Zero count at table entry ${i}`);
        if (count > length) {
            throw new CorruptArtifactError(`Count ${count} at table entry ${i} exceeds the ${length} declared symbols`);
        }

        table.set(symbol, count);
        total += count;
    }

    if (total !== length) {
        throw new CorruptArtifactError(`Symbol counts sum to ${total}, artifact declares ${length} symbols`);
    }

    const valueText = new TextDecoder().decode(take(next()));
    if (pos !== body.length) {
        throw new CorruptArtifactError(`Trailing bytes in artifact body: ${body.length - pos}`);
    }

    const value = FixedDecimal.parse(valueText, header.precision);
    if (!value.lt(FixedDecimal.one(header.precision))) {
        throw new CorruptArtifactError(`Encoded value ${valueText.slice(0, 32)} is outside [0,1)`);
    }

    return { table, length, value };
}
