import yn from 'yn';
import { EnvVarParseError } from './errors';

/**
 * Parse boolean from various string formats
 *
 * Uses the 'yn' library (https://github.com/sindresorhus/yn). Supports
 * case-insensitive:
 * - true/false
 * - yes/no
 * - y/n
 * - 1/0
 * - on/off
 *
 * Empty string is treated as false.
 *
 * @param value - String value to parse
 * @returns Boolean value
 * @throws EnvVarParseError if value cannot be parsed as boolean
 */
export function parseBoolean(value: string): boolean {
    if (value === '') {
        return false;
    }

    const result = yn(value, { default: undefined });

    if (result === undefined) {
        throw new EnvVarParseError(
            `Cannot parse "${value}" as boolean. Expected: true/false, yes/no, 1/0, or empty string`,
            value,
            'boolean'
        );
    }

    return result;
}

/**
 * Parse number from string
 *
 * Supports:
 * - Integers: 42, -10, 0
 * - Floats: 3.14, -2.7, 0.5
 * - Scientific notation: 1e6, 1.5e3, 2e-3
 * - Hexadecimal: 0xFF, 0x10
 *
 * @param value - String value to parse
 * @returns Number value
 * @throws EnvVarParseError if value cannot be parsed as number
 */
export function parseNumber(value: string): number {
    if (value.startsWith('0x') || value.startsWith('0X')) {
        if (!/^0[xX][0-9a-fA-F]+$/.test(value)) {
            throw new EnvVarParseError(
                `Cannot parse "${value}" as hexadecimal number`,
                value,
                'number'
            );
        }
        return parseInt(value, 16);
    }

    // Number('') and Number('  ') are 0, which would hide an empty variable
    const parsed = value.trim() === '' ? NaN : Number(value);

    if (isNaN(parsed)) {
        throw new EnvVarParseError(
            `Cannot parse "${value}" as number`,
            value,
            'number'
        );
    }

    return parsed;
}

/**
 * Inclusive range and label of a fixed-width integer type
 */
export interface IntegerBounds {
    type: string;
    min: bigint;
    max: bigint;
}

/**
 * Build the bounds of a two's-complement or unsigned integer of `bits` bits.
 */
export function integerBounds(bits: number, signed: boolean): IntegerBounds {
    const width = BigInt(bits);
    return signed
        ? { type: `i${bits}`, min: -(1n << (width - 1n)), max: (1n << (width - 1n)) - 1n }
        : { type: `u${bits}`, min: 0n, max: (1n << width) - 1n };
}

/**
 * Parse a decimal integer that must fit in a fixed-width type
 *
 * Accepted form: an optional sign (`+`, or `-` for signed types) followed by
 * ASCII digits. No whitespace, no separators, no other radix.
 *
 * @param value - String value to parse
 * @param bounds - Range the result must fall in
 * @returns The value as a bigint
 * @throws EnvVarParseError if value is not an integer or falls outside the range
 */
export function parseInteger(value: string, bounds: IntegerBounds): bigint {
    const fail = (reason: string): EnvVarParseError =>
        new EnvVarParseError(reason, value, bounds.type);

    if (value === '') {
        throw fail('cannot parse integer from empty string');
    }

    const signed = bounds.min < 0n;
    const pattern = signed ? /^[+-]?[0-9]+$/ : /^\+?[0-9]+$/;
    if (!pattern.test(value)) {
        throw fail('invalid digit found in string');
    }

    const parsed = BigInt(value.startsWith('+') ? value.slice(1) : value);

    if (parsed > bounds.max) {
        throw fail('number too large to fit in target type');
    }
    if (parsed < bounds.min) {
        throw fail('number too small to fit in target type');
    }

    return parsed;
}

/**
 * Parse a filesystem path
 *
 * The text is kept as written; only a NUL character is rejected since no
 * platform accepts it in a path.
 *
 * @throws EnvVarParseError if the path contains a NUL character
 */
export function parsePath(value: string): string {
    if (value.includes('\0')) {
        throw new EnvVarParseError(
            'Path contains invalid null character',
            value,
            'path'
        );
    }
    return value;
}

/**
 * Resolve a text-encoding label (e.g. 'latin1', 'UTF8') to its canonical name
 *
 * Labels are matched case-insensitively with surrounding whitespace ignored,
 * following the WHATWG Encoding Standard label table.
 *
 * @param value - Encoding label
 * @returns Canonical encoding name (e.g. 'windows-1252', 'utf-8')
 * @throws EnvVarParseError if the label is not recognized
 */
export function parseEncodingLabel(value: string): string {
    try {
        return new TextDecoder(value).encoding;
    } catch (error) {
        if (error instanceof RangeError) {
            throw new EnvVarParseError('Unrecognized encoding', value, 'encoding');
        }
        throw error;
    }
}
