import { readArtifact, readArtifactHeader, type ArtifactContent, type ArtifactHeader } from './artifact.js';
import { AricodeError, PrecisionMismatchError } from './errors.js';
import { DEFAULT_MAX_BODY_BYTES, DEFAULT_MAX_SYMBOLS } from './format.js';
import { desymbolizeBytes, desymbolizeText } from './frequency.js';
import { decodeSymbols } from './interval.js';
import { validatePrecision } from './encode.js';
import type { AricodeDecoderOptions } from './types.js';

interface DecoderOptionsResolved {
    precision: number | null;
    logger: AricodeDecoderOptions['logger'];
    maxBodyBytes: number;
    maxSymbols: number;
}

export class AricodeDecoder {
    private readonly data: Uint8Array;
    private readonly options: DecoderOptionsResolved;
    private parsed: { header: ArtifactHeader, content: ArtifactContent } | null = null;

    constructor(data: Uint8Array, options: AricodeDecoderOptions = {}) {
        this.data = data;
        this.options = {
            precision: options.precision ?? null,
            logger: options.logger ?? null,
            maxBodyBytes: options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES,
            maxSymbols: options.maxSymbols ?? DEFAULT_MAX_SYMBOLS,
        };
        if (this.options.precision !== null) validatePrecision(this.options.precision);
    }

    /**
     * Header fields after framing and checksum validation. Does not decode the value.
     */
    async readHeader(): Promise<ArtifactHeader> {
        return readArtifactHeader(this.data);
    }

    /**
     * Verifies framing and CRC32 WITHOUT parsing the body or decoding.
     */
    async verifyIntegrityOnly(): Promise<boolean> {
        try {
            readArtifactHeader(this.data);
            return true;
        } catch (err: unknown) {
            if (err instanceof AricodeError) {
                this.options.logger?.warn?.(`[aricode] integrity check failed: ${err.message}`);
                return false;
            }
            throw err;
        }
    }

    /**
     * Parsed frequency table, symbol count and encoded value.
     */
    async readContent(): Promise<ArtifactContent> {
        return (await this.parse()).content;
    }

    async decodeSymbols(): Promise<string[]> {
        const { header, content } = await this.parse();
        const expected = this.options.precision;
        if (expected !== null && expected !== header.precision) {
            throw new PrecisionMismatchError(expected, header.precision);
        }

        const symbols = decodeSymbols(content.value, content.table, content.length, header.precision);
        this.options.logger?.info?.(`[aricode] decoded ${symbols.length} symbols at precision ${header.precision}`);
        return symbols;
    }

    /**
     * @throws AricodeError when a `byte`-mode artifact does not hold valid UTF-8; use decodeBytes() for those
     */
    async decodeText(): Promise<string> {
        const { header } = await this.parse();
        const symbols = await this.decodeSymbols();
        if (header.symbolMode === 'codepoint') return desymbolizeText(symbols);

        try {
            return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(desymbolizeBytes(symbols));
        } catch (err: unknown) {
            throw new AricodeError('Artifact holds bytes that are not valid UTF-8; decode it with decodeBytes()', err);
        }
    }

    async decodeBytes(): Promise<Uint8Array> {
        const { header } = await this.parse();
        const symbols = await this.decodeSymbols();
        return header.symbolMode === 'byte'
            ? desymbolizeBytes(symbols)
            : new TextEncoder().encode(desymbolizeText(symbols));
    }

    private async parse(): Promise<{ header: ArtifactHeader, content: ArtifactContent }> {
        if (!this.parsed) {
            this.parsed = await readArtifact(this.data, {
                maxBodyBytes: this.options.maxBodyBytes,
                maxSymbols: this.options.maxSymbols,
            });
        }
        return this.parsed;
    }
}
