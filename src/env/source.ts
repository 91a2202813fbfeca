import { EnvLookup, EnvSource } from './types';

/**
 * Source backed by `process.env` (or any object with the same layout).
 *
 * Node hands environment values over as strings, so this source never
 * reports an `invalid` lookup.
 */
export function processEnvSource(env: NodeJS.ProcessEnv = process.env): EnvSource {
    return {
        lookup(name: string): EnvLookup {
            const value = env[name];
            return value === undefined ? { status: 'absent' } : { status: 'present', value };
        },
    };
}

/**
 * In-memory source, mostly for hosts that assemble variables themselves and for tests.
 *
 * Byte values are decoded as strict UTF-8; malformed input is reported as `invalid`
 * rather than replaced.
 *
 * @example
 * ```typescript
 * const source = createMapSource({
 *   APP_PORT: '8080',
 *   APP_NAME: new Uint8Array([0xff, 0xfe]),
 * });
 * source.lookup('APP_NAME'); // { status: 'invalid', raw: Uint8Array [255, 254] }
 * ```
 */
export function createMapSource(entries: Record<string, string | Uint8Array>): EnvSource {
    const values = new Map(Object.entries(entries));
    const utf8 = new TextDecoder('utf-8', { fatal: true });

    return {
        lookup(name: string): EnvLookup {
            const value = values.get(name);
            if (value === undefined) {
                return { status: 'absent' };
            }
            if (typeof value === 'string') {
                return { status: 'present', value };
            }
            try {
                return { status: 'present', value: utf8.decode(value) };
            } catch (error) {
                if (error instanceof TypeError) {
                    return { status: 'invalid', raw: value };
                }
                throw error;
            }
        },
    };
}

/**
 * Called once per lookup made through a traced source
 */
export type LookupListener = (name: string, lookup: EnvLookup) => void;

/**
 * Wrap a source so every lookup is reported to `listener`.
 */
export function traceSource(source: EnvSource, listener: LookupListener): EnvSource {
    return {
        lookup(name: string): EnvLookup {
            const result = source.lookup(name);
            listener(name, result);
            return result;
        },
    };
}
