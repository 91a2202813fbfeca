import { toScreamingSnakeCase } from './naming';
import {
    Decoder,
    EnvShape,
    FieldOptions,
    NestedField,
    NestedSequenceField,
    OptionalField,
    ScalarField,
    SequenceField,
} from './types';

const base = <K extends string>(key: K, options: FieldOptions = {}) => ({
    name: key,
    variable: options.variable ?? toScreamingSnakeCase(key),
    ignored: options.ignore ?? false,
});

/**
 * Field read from a single variable: `<PREFIX><FRAGMENT>`
 *
 * @example
 * ```typescript
 * scalar('port', decoders.u16) // reads APP_PORT with prefix 'APP_'
 * ```
 */
export function scalar<K extends string, V>(
    key: K,
    decoder: Decoder<V>,
    options?: FieldOptions
): ScalarField<Record<K, V>, V> {
    return {
        kind: 'scalar',
        ...base(key, options),
        decoder,
        set(record, value) {
            record[key] = value;
        },
    };
}

/**
 * Field that is only present when its variable (or, for a record, any of its
 * variables) is set in the current pass. The record property must be declared
 * as `T | undefined`.
 */
export function optional<K extends string, V>(
    key: K,
    inner: Decoder<V> | EnvShape<V>,
    options?: FieldOptions
): OptionalField<Record<K, V | undefined>, V> {
    return {
        kind: 'optional',
        ...base(key, options),
        inner,
        set(record, value) {
            record[key] = value;
        },
    };
}

/**
 * Record bound in place under `<PREFIX><FRAGMENT>:` and `<PREFIX><FRAGMENT>__`
 */
export function nested<K extends string, C>(
    key: K,
    shape: EnvShape<C>,
    options?: FieldOptions
): NestedField<Record<K, C>, C> {
    return {
        kind: 'nested',
        ...base(key, options),
        shape,
        get(record) {
            return record[key];
        },
    };
}

/**
 * Array of scalars read from `<PREFIX><FRAGMENT>:<i>` or `<PREFIX><FRAGMENT>__<i>`,
 * for i = 0, 1, 2... up to the first index with neither variable set.
 * When any element is set, the elements found replace the array's contents.
 */
export function sequence<K extends string, V>(
    key: K,
    decoder: Decoder<V>,
    options?: FieldOptions
): SequenceField<Record<K, V[]>, V> {
    return {
        kind: 'sequence',
        ...base(key, options),
        decoder,
        get(record) {
            return record[key];
        },
    };
}

/**
 * Array of records bound under `<PREFIX><FRAGMENT>:<i>:` or `<PREFIX><FRAGMENT>__<i>__`.
 * Each element starts from `shape.create()`. When any element is set, the
 * elements found replace the array's contents.
 */
export function nestedSequence<K extends string, C>(
    key: K,
    shape: EnvShape<C>,
    options?: FieldOptions
): NestedSequenceField<Record<K, C[]>, C> {
    return {
        kind: 'nestedSequence',
        ...base(key, options),
        shape,
        get(record) {
            return record[key];
        },
    };
}

/**
 * Declare the shape of a record type.
 *
 * @example
 * ```typescript
 * interface Server { host: string; port: number; tls: boolean | undefined }
 *
 * const ServerShape = defineShape<Server>({
 *   create: () => ({ host: 'localhost', port: 8080, tls: undefined }),
 *   fields: [
 *     scalar('host', decoders.string),
 *     scalar('port', decoders.u16),
 *     optional('tls', decoders.boolean),
 *   ],
 * });
 * ```
 */
export function defineShape<R>(shape: EnvShape<R>): EnvShape<R> {
    return shape;
}
