/**
 * aricode utilities
 *
 * Byte-level helpers shared by the artifact writer and reader.
 */

/**
 * Encode non-negative integers as unsigned LEB128 varints.
 * Small numbers = 1 byte, larger = up to 8 bytes (safe-integer range).
 */
export function encodeVarint(values: number[]): Uint8Array {
    const buffer: number[] = [];

    for (const val of values) {
        if (!Number.isSafeInteger(val) || val < 0) {
            throw new RangeError(`Varint value out of range: ${val}`);
        }

        let n = val;
        while (n >= 0x80) {
            buffer.push((n % 128) | 0x80);
            n = Math.floor(n / 128);
        }
        buffer.push(n);
    }

    return new Uint8Array(buffer);
}

/**
 * Decode one unsigned varint starting at `start`.
 * Throws RangeError when the data ends mid-varint or the value leaves the safe-integer range.
 */
export function decodeVarintAt(data: Uint8Array, start: number): { value: number, nextPos: number } {
    let i = start;
    let value = 0;
    let p2d = 1; // Power of 2 (for shift replacement)

    while (true) {
        if (i >= data.length) throw new RangeError('Truncated varint');
        const byte = data[i++];
        value += (byte & 0x7F) * p2d;
        if ((byte & 0x80) === 0) break;
        p2d *= 128;
        if (p2d > Number.MAX_SAFE_INTEGER) throw new RangeError('Varint exceeds safe integer range');
    }

    if (!Number.isSafeInteger(value)) throw new RangeError('Varint exceeds safe integer range');
    return { value, nextPos: i };
}

/**
 * Concatenate byte chunks into one buffer.
 */
export function concatBytes(chunks: Uint8Array[]): Uint8Array {
    const total = chunks.reduce((sum, c) => sum + c.length, 0);
    const out = new Uint8Array(total);
    let offset = 0;
    for (const c of chunks) {
        out.set(c, offset);
        offset += c.length;
    }
    return out;
}

export function writeU32LE(value: number): Uint8Array {
    const out = new Uint8Array(4);
    new DataView(out.buffer).setUint32(0, value >>> 0, true);
    return out;
}

export function readU32LE(data: Uint8Array, pos: number): number {
    if (pos + 4 > data.length) throw new RangeError('Truncated u32');
    return new DataView(data.buffer, data.byteOffset, data.byteLength).getUint32(pos, true);
}
