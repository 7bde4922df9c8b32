/**
 * aricode Public API
 *
 * @module aricode
 */

import { AricodeEncoder } from './coder/encode.js';
import { AricodeDecoder } from './coder/decode.js';
import type { AricodeEncoderOptions, AricodeDecoderOptions } from './coder/types.js';
import type { ArtifactHeader } from './coder/artifact.js';

// Re-export specific types and errors
export type {
    AricodeEncoderOptions as EncoderOptions,
    AricodeDecoderOptions as DecoderOptions,
    AricodeLogger as Logger,
    SymbolMode,
    OuterCodecName,
} from './coder/types.js';
export type { ArtifactHeader, ArtifactContent } from './coder/artifact.js';
export type { FrequencyTable, CumulativeIntervalTable, SymbolBand } from './coder/frequency.js';
export type { WorkingInterval, EncodeResult, StepObserver } from './coder/interval.js';
export type { EncodeTelemetry } from './coder/metrics.js';
export {
    AricodeError,
    PrecisionInsufficientError,
    CorruptArtifactError,
    IncompleteDataError,
    IntegrityError,
    PrecisionMismatchError,
    LimitExceededError,
    InvalidOptionError,
} from './coder/errors.js';
export { DEFAULT_PRECISION, MAX_PRECISION } from './coder/format.js';
export { FixedDecimal } from './coder/decimal.js';
export { FrequencyModel, symbolize } from './coder/frequency.js';
export { narrow, encodeSymbols, decodeSymbols, representative, initialInterval } from './coder/interval.js';
export { AricodeEncoder } from './coder/encode.js';
export { AricodeDecoder } from './coder/decode.js';
export { PrecisionProfiler } from './coder/profiler.js';
export type { ProfileMode, PrecisionProfileResult, PrecisionTrial } from './coder/profiler.js';

// The aricode Namespace Object
export const Aricode = {
    /**
     * Compresses text (or bytes) into an artifact.
     */
    pack: async (input: string | Uint8Array, options?: AricodeEncoderOptions): Promise<Uint8Array> => {
        const encoder = new AricodeEncoder(options);
        await encoder.append(input);
        return await encoder.finish();
    },

    /**
     * Restores the text an artifact was built from.
     */
    unpack: async (data: Uint8Array, options?: AricodeDecoderOptions): Promise<string> => {
        return await new AricodeDecoder(data, options).decodeText();
    },

    /**
     * Restores the exact bytes of a `byte`-mode artifact (UTF-8 for text artifacts).
     */
    unpackBytes: async (data: Uint8Array, options?: AricodeDecoderOptions): Promise<Uint8Array> => {
        return await new AricodeDecoder(data, options).decodeBytes();
    },

    /**
     * Reads the header (precision, symbol mode, outer codec) after validating framing and CRC.
     */
    inspect: async (data: Uint8Array): Promise<ArtifactHeader> => {
        return await new AricodeDecoder(data).readHeader();
    },

    /**
     * Verifies framing and checksum WITHOUT decoding.
     */
    verify: async (data: Uint8Array): Promise<boolean> => {
        return await new AricodeDecoder(data).verifyIntegrityOnly();
    },

    Encoder: AricodeEncoder,

    Decoder: AricodeDecoder,
};

export default Aricode;
