import { EnvVarParseError } from './errors';
import {
    integerBounds,
    parseBoolean,
    parseEncodingLabel,
    parseInteger,
    parseNumber,
    parsePath,
} from './parser';
import { Decoder } from './types';

/**
 * Wrap a parse function as a {@link Decoder}.
 *
 * Anything other than an {@link EnvVarParseError} thrown by `parse` is
 * reported as a parse failure carrying the thrown message.
 *
 * @example
 * ```typescript
 * const logLevel = createDecoder('log level', (text) => {
 *   if (!['debug', 'info', 'warn'].includes(text)) throw new Error(`unknown level "${text}"`);
 *   return text;
 * });
 * ```
 */
export function createDecoder<T>(type: string, parse: (text: string) => T): Decoder<T> {
    return {
        type,
        decode(text: string): T {
            try {
                return parse(text);
            } catch (error) {
                if (error instanceof EnvVarParseError) {
                    throw error;
                }
                const reason = error instanceof Error ? error.message : String(error);
                throw new EnvVarParseError(reason, text, type);
            }
        },
    };
}

const smallInteger = (bits: number, signed: boolean): Decoder<number> => {
    const bounds = integerBounds(bits, signed);
    return createDecoder(bounds.type, (text) => Number(parseInteger(text, bounds)));
};

const wideInteger = (bits: number, signed: boolean): Decoder<bigint> => {
    const bounds = integerBounds(bits, signed);
    return createDecoder(bounds.type, (text) => parseInteger(text, bounds));
};

/**
 * Built-in decoders.
 *
 * Integers up to 32 bits decode to `number`; 64 and 128 bit integers decode to
 * `bigint` so no precision is lost.
 */
export const decoders = {
    i8: smallInteger(8, true),
    i16: smallInteger(16, true),
    i32: smallInteger(32, true),
    i64: wideInteger(64, true),
    i128: wideInteger(128, true),
    u8: smallInteger(8, false),
    u16: smallInteger(16, false),
    u32: smallInteger(32, false),
    u64: wideInteger(64, false),
    u128: wideInteger(128, false),
    number: createDecoder('number', parseNumber),
    boolean: createDecoder('boolean', parseBoolean),
    string: createDecoder('string', (text) => text),
    path: createDecoder('path', parsePath),
    encoding: createDecoder('encoding', parseEncodingLabel),
} as const;
