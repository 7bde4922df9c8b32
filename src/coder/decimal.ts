/**
 * Fixed-point decimal on native BigInt.
 *
 * A value is `units / 10^precision`. Every multiply and divide truncates back to
 * `precision` fractional digits, so two runs with the same precision produce the
 * same digits on every step. The codec only ever holds non-negative values, for
 * which BigInt division (toward zero) is a floor.
 */

const SCALES = new Map<number, bigint>();

function scaleOf(precision: number): bigint {
    let scale = SCALES.get(precision);
    if (scale === undefined) {
        scale = 10n ** BigInt(precision);
        SCALES.set(precision, scale);
    }
    return scale;
}

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

export class FixedDecimal {
    private constructor(
        readonly units: bigint,
        readonly precision: number,
    ) { }

    static zero(precision: number): FixedDecimal {
        return new FixedDecimal(0n, precision);
    }

    static one(precision: number): FixedDecimal {
        return new FixedDecimal(scaleOf(precision), precision);
    }

    /** trunc(numerator / denominator) to `precision` digits. */
    static fromRatio(numerator: number | bigint, denominator: number | bigint, precision: number): FixedDecimal {
        const d = BigInt(denominator);
        if (d === 0n) throw new RangeError('FixedDecimal: division by zero');
        return new FixedDecimal((BigInt(numerator) * scaleOf(precision)) / d, precision);
    }

    /**
     * Parse a plain decimal string ("0", "0.375", "1").
     * Throws RangeError on malformed input or on more fractional digits than `precision`.
     */
    static parse(text: string, precision: number): FixedDecimal {
        const match = DECIMAL_PATTERN.exec(text);
        if (!match) throw new RangeError(`Malformed decimal: "${text.slice(0, 32)}"`);

        const [, intPart, fracPart = ''] = match;
        if (fracPart.length > precision) {
            throw new RangeError(`Decimal has ${fracPart.length} fractional digits, precision is ${precision}`);
        }

        const frac = fracPart.length === 0 ? 0n : BigInt(fracPart.padEnd(precision, '0'));
        return new FixedDecimal(BigInt(intPart) * scaleOf(precision) + frac, precision);
    }

    add(other: FixedDecimal): FixedDecimal {
        this.assertSamePrecision(other);
        return new FixedDecimal(this.units + other.units, this.precision);
    }

    sub(other: FixedDecimal): FixedDecimal {
        this.assertSamePrecision(other);
        return new FixedDecimal(this.units - other.units, this.precision);
    }

    mul(other: FixedDecimal): FixedDecimal {
        this.assertSamePrecision(other);
        return new FixedDecimal((this.units * other.units) / scaleOf(this.precision), this.precision);
    }

    div(other: FixedDecimal): FixedDecimal {
        this.assertSamePrecision(other);
        if (other.units === 0n) throw new RangeError('FixedDecimal: division by zero');
        return new FixedDecimal((this.units * scaleOf(this.precision)) / other.units, this.precision);
    }

    /** trunc(this / 2) */
    half(): FixedDecimal {
        return new FixedDecimal(this.units / 2n, this.precision);
    }

    compare(other: FixedDecimal): -1 | 0 | 1 {
        this.assertSamePrecision(other);
        if (this.units < other.units) return -1;
        if (this.units > other.units) return 1;
        return 0;
    }

    lt(other: FixedDecimal): boolean {
        return this.compare(other) < 0;
    }

    lte(other: FixedDecimal): boolean {
        return this.compare(other) <= 0;
    }

    equals(other: FixedDecimal): boolean {
        return this.precision === other.precision && this.units === other.units;
    }

    isZero(): boolean {
        return this.units === 0n;
    }

    /**
     * Exact decimal text with trailing fractional zeros removed.
     */
    toString(): string {
        const negative = this.units < 0n;
        const abs = negative ? -this.units : this.units;
        const scale = scaleOf(this.precision);
        const intPart = (abs / scale).toString();
        const fracPart = this.precision === 0
            ? ''
            : (abs % scale).toString().padStart(this.precision, '0').replace(/0+$/, '');
        const body = fracPart.length > 0 ? `${intPart}.${fracPart}` : intPart;
        return negative ? `-${body}` : body;
    }

    private assertSamePrecision(other: FixedDecimal): void {
        if (other.precision !== this.precision) {
            throw new RangeError(`FixedDecimal: precision mismatch (${this.precision} vs ${other.precision})`);
        }
    }
}
