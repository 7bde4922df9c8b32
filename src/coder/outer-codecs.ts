import { ZstdCodec, type ZstdModule } from 'zstd-codec';
import { ARICODE_FLAGS } from './format.js';
import { AricodeError, CorruptArtifactError, LimitExceededError } from './errors.js';
import type { OuterCodecName } from './types.js';

/**
 * General-purpose compression applied to the artifact body after the
 * frequency table and value are serialized.
 */
export interface OuterCodec {
    /** Header flag bit that marks a body written by this codec. */
    readonly flag: number;
    compress(body: Uint8Array, level: number): Promise<Uint8Array>;
    /** @throws LimitExceededError when the restored body exceeds `maxBytes` */
    decompress(stored: Uint8Array, maxBytes: number): Promise<Uint8Array>;
}

function checkBodyLimit(size: number, maxBytes: number): void {
    if (size > maxBytes) {
        throw new LimitExceededError(`Artifact body is ${size} bytes, limit is ${maxBytes}`);
    }
}

// The wasm module loads once per process.
let zstdModule: Promise<ZstdModule> | null = null;

function loadZstd(): Promise<ZstdModule> {
    zstdModule ??= new Promise<ZstdModule>((resolve) => ZstdCodec.run(resolve));
    return zstdModule;
}

const identity: OuterCodec = {
    flag: ARICODE_FLAGS.NONE,
    async compress(body) {
        return body;
    },
    async decompress(stored, maxBytes) {
        checkBodyLimit(stored.length, maxBytes);
        return stored;
    },
};

const zstd: OuterCodec = {
    flag: ARICODE_FLAGS.OUTER_ZSTD,
    async compress(body, level) {
        const { Simple } = await loadZstd();
        const compressed = new Simple().compress(body, level);
        if (!compressed) throw new AricodeError(`zstd could not compress a ${body.length}-byte body at level ${level}`);
        return compressed;
    },
    async decompress(stored, maxBytes) {
        const { Simple } = await loadZstd();
        let body: Uint8Array | null;
        try {
            body = new Simple().decompress(stored);
        } catch (err: unknown) {
            throw new CorruptArtifactError('Artifact body is not a valid zstd frame', err);
        }
        if (!body) throw new CorruptArtifactError('Artifact body is not a valid zstd frame');
        checkBodyLimit(body.length, maxBytes);
        return body;
    },
};

export const OUTER_CODECS: Readonly<Record<OuterCodecName, OuterCodec>> = { none: identity, zstd };

/**
 * Name of the codec a header's flags select.
 */
export function outerCodecFromFlags(flags: number): OuterCodecName {
    return (flags & ARICODE_FLAGS.OUTER_ZSTD) !== 0 ? 'zstd' : 'none';
}
