import { concatBytes } from '../aricode-utils.js';
import { writeArtifact } from './artifact.js';
import { AricodeError, InvalidOptionError } from './errors.js';
import { DEFAULT_PRECISION, MAX_PRECISION } from './format.js';
import { INVALID_UTF8_MESSAGE, symbolize } from './frequency.js';
import { encodeSymbols } from './interval.js';
import { calculateEncodeTelemetry, type EncodeTelemetry } from './metrics.js';
import type { AricodeEncoderOptions, OuterCodecName, SymbolMode } from './types.js';

const OUTER_CODEC_NAMES: readonly OuterCodecName[] = ['none', 'zstd'];
const SYMBOL_MODES: readonly SymbolMode[] = ['codepoint', 'byte'];

export function validatePrecision(precision: number): void {
    if (!Number.isInteger(precision) || precision < 1) {
        throw new InvalidOptionError(`precision must be a positive integer, got ${precision}`);
    }
    if (precision > MAX_PRECISION) {
        throw new InvalidOptionError(`precision must not exceed ${MAX_PRECISION}, got ${precision}`);
    }
}

/**
 * Collects input chunks and, on finish(), runs the frequency scan, the
 * narrowing fold and the artifact assembly in one pass.
 */
export class AricodeEncoder {
    private readonly options: Required<AricodeEncoderOptions>;
    private readonly textParts: string[] = [];
    private readonly byteParts: Uint8Array[] = [];
    private readonly utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
    private inputBytes = 0;
    private isFinalized = false;
    private lastTelemetry: EncodeTelemetry | null = null;

    constructor(options: AricodeEncoderOptions = {}) {
        const defaults: Required<AricodeEncoderOptions> = {
            runId: `run_${Date.now()}_${Math.random().toString(36).slice(2, 7)}`,
            precision: DEFAULT_PRECISION,
            symbolMode: 'codepoint',
            outerCodec: 'none',
            compressionLevel: 3,
            logger: null,
        };
        this.options = { ...defaults, ...options };

        validatePrecision(this.options.precision);
        if (!OUTER_CODEC_NAMES.includes(this.options.outerCodec)) {
            throw new InvalidOptionError(`Unknown outer codec: ${this.options.outerCodec}`);
        }
        if (!SYMBOL_MODES.includes(this.options.symbolMode)) {
            throw new InvalidOptionError(`Unknown symbol mode: ${this.options.symbolMode}`);
        }
        const level = this.options.compressionLevel;
        if (!Number.isInteger(level) || level < 1 || level > 22) {
            throw new InvalidOptionError(`compressionLevel must be an integer in 1-22, got ${level}`);
        }
    }

    get precision(): number {
        return this.options.precision;
    }

    async append(chunk: string | Uint8Array): Promise<void> {
        if (this.isFinalized) throw new Error('AricodeEncoder: Cannot append after finish()');

        if (this.options.symbolMode === 'byte') {
            const bytes = typeof chunk === 'string' ? new TextEncoder().encode(chunk) : chunk;
            this.byteParts.push(bytes);
            this.inputBytes += bytes.length;
            return;
        }

        if (typeof chunk === 'string') {
            // Flushing throws if an earlier byte chunk ended inside a code point.
            this.textParts.push(this.decodeUtf8(new Uint8Array(0), false), chunk);
            this.inputBytes += Buffer.byteLength(chunk, 'utf8');
            return;
        }

        this.textParts.push(this.decodeUtf8(chunk, true));
        this.inputBytes += chunk.length;
    }

    /**
     * Encode everything appended so far and return the artifact.
     *
     * @throws PrecisionInsufficientError when the precision cannot hold the input
     */
    async finish(): Promise<Uint8Array> {
        if (this.isFinalized) throw new Error('AricodeEncoder: finish() already called');
        this.isFinalized = true;

        const symbols = this.options.symbolMode === 'byte'
            ? symbolize(concatBytes(this.byteParts), 'byte')
            : symbolize(this.textParts.join('') + this.decodeUtf8(new Uint8Array(0), false), 'codepoint');

        const { precision } = this.options;
        const result = encodeSymbols(symbols, precision);
        const artifact = await writeArtifact(
            { table: result.table, length: result.length, value: result.value },
            {
                precision,
                symbolMode: this.options.symbolMode,
                outerCodec: this.options.outerCodec,
                compressionLevel: this.options.compressionLevel,
            },
        );

        this.lastTelemetry = calculateEncodeTelemetry({
            runId: this.options.runId,
            table: result.table,
            precision,
            valueText: result.value.toString(),
            inputBytes: this.inputBytes,
            artifactBytes: artifact.length,
        });

        const t = this.lastTelemetry;
        this.options.logger?.info?.(
            `[aricode] ${t.run_id}: ${t.symbols} symbols (${t.distinct_symbols} distinct), ` +
            `${t.value_digits}/${precision} digits, ${t.input_bytes} -> ${t.artifact_bytes} bytes`
        );

        return artifact;
    }

    getTelemetry(): EncodeTelemetry | null {
        return this.lastTelemetry;
    }

    private decodeUtf8(bytes: Uint8Array, stream: boolean): string {
        try {
            return this.utf8.decode(bytes, { stream });
        } catch (err: unknown) {
            throw new AricodeError(INVALID_UTF8_MESSAGE, err);
        }
    }
}
