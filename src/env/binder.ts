import { EnvVarParseError, isEnvBindError } from './errors';
import {
    nestedPrefixes,
    nestedSequencePrefixes,
    scalarVariable,
    sequenceVariables,
} from './naming';
import { readEnvVar, resolveSource } from './reader';
import {
    BindOptions,
    BindOutcome,
    Decoder,
    EnvShape,
    EnvSource,
    FieldDescriptor,
    NestedField,
    NestedSequenceField,
    OptionalField,
    SequenceField,
} from './types';

/**
 * Result of reading one scalar
 */
export type ScalarBinding<T> = { found: false } | { found: true; value: T };

/**
 * Read and decode a single variable.
 *
 * @throws EnvVarEncodingError if the variable is set but is not valid text
 * @throws EnvVarParseError (named after `envVarName`) if the decoder rejects the text
 */
export function bindScalar<T>(
    decoder: Decoder<T>,
    envVarName: string,
    source: EnvSource
): ScalarBinding<T> {
    const text = readEnvVar(envVarName, source);
    if (text === undefined) {
        return { found: false };
    }

    try {
        return { found: true, value: decoder.decode(text) };
    } catch (error) {
        if (error instanceof EnvVarParseError) {
            throw EnvVarParseError.forVariable(envVarName, error);
        }
        throw error;
    }
}

const isShape = <V>(inner: Decoder<V> | EnvShape<V>): inner is EnvShape<V> =>
    'fields' in inner;

function bindRecordUnder<C>(shape: EnvShape<C>, record: C, prefix: string, variable: string, source: EnvSource): boolean {
    // Both notations are tried; a caller may mix them across levels
    let found = false;
    for (const childPrefix of nestedPrefixes(prefix, variable)) {
        if (bindFields(shape, record, childPrefix, source)) {
            found = true;
        }
    }
    return found;
}

function bindOptional<R>(field: OptionalField<R, unknown>, record: R, prefix: string, source: EnvSource): boolean {
    const { inner } = field;

    if (isShape(inner)) {
        const fresh = inner.create();
        const found = bindRecordUnder(inner, fresh, prefix, field.variable, source);
        field.set(record, found ? fresh : undefined);
        return found;
    }

    const result = bindScalar(inner, scalarVariable(prefix, field.variable), source);
    field.set(record, result.found ? result.value : undefined);
    return result.found;
}

function bindNested<R>(field: NestedField<R, unknown>, record: R, prefix: string, source: EnvSource): boolean {
    return bindRecordUnder(field.shape, field.get(record), prefix, field.variable, source);
}

/**
 * Drop the elements that were in the array before this pass, once the pass
 * has bound at least one element of its own.
 */
function replaceEarlier<V>(items: V[], earlier: number, found: boolean): boolean {
    if (found) {
        items.splice(0, earlier);
    }
    return found;
}

function bindSequence<R>(field: SequenceField<R, unknown>, record: R, prefix: string, source: EnvSource): boolean {
    const items = field.get(record);
    const earlier = items.length;

    for (let index = 0; ; index++) {
        const [colon, underscore] = sequenceVariables(prefix, field.variable, index);

        let result = bindScalar(field.decoder, colon, source);
        if (!result.found) {
            result = bindScalar(field.decoder, underscore, source);
        }
        if (!result.found) {
            return replaceEarlier(items, earlier, index > 0);
        }

        items.push(result.value);
    }
}

function bindNestedSequence<R>(field: NestedSequenceField<R, unknown>, record: R, prefix: string, source: EnvSource): boolean {
    const items = field.get(record);
    const earlier = items.length;

    for (let index = 0; ; index++) {
        const [colon, underscore] = nestedSequencePrefixes(prefix, field.variable, index);

        // Speculative element, removed again when neither notation has data for it
        const element = field.shape.create();
        items.push(element);

        const found =
            bindFields(field.shape, element, colon, source) ||
            bindFields(field.shape, element, underscore, source);

        if (!found) {
            items.pop();
            return replaceEarlier(items, earlier, index > 0);
        }
    }
}

function bindField<R>(field: FieldDescriptor<R>, record: R, prefix: string, source: EnvSource): boolean {
    switch (field.kind) {
        case 'scalar': {
            const result = bindScalar(field.decoder, scalarVariable(prefix, field.variable), source);
            if (result.found) {
                field.set(record, result.value);
            }
            return result.found;
        }
        case 'optional':
            return bindOptional(field, record, prefix, source);
        case 'nested':
            return bindNested(field, record, prefix, source);
        case 'sequence':
            return bindSequence(field, record, prefix, source);
        case 'nestedSequence':
            return bindNestedSequence(field, record, prefix, source);
    }
}

function bindFields<R>(shape: EnvShape<R>, record: R, prefix: string, source: EnvSource): boolean {
    let found = false;
    for (const field of shape.fields) {
        if (field.ignored) {
            continue;
        }
        if (bindField(field, record, prefix, source)) {
            found = true;
        }
    }
    return found;
}

/**
 * Overwrite the fields of `record` whose variables are set, reading names under `prefix`.
 *
 * Fields whose variables are absent keep their value, except optional fields,
 * which are cleared. Arrays with at least one element set are replaced by the
 * elements found. The first error aborts the pass; fields bound before it
 * stay bound.
 *
 * @example
 * ```typescript
 * // APP_SERVER__PORT=9000 APP_HOSTS__0=a APP_HOSTS__1=b
 * const found = bindWithPrefix(AppShape, config, 'APP_');
 * ```
 *
 * @returns Whether at least one variable was read
 * @throws EnvVarParseError if a value cannot be decoded
 * @throws EnvVarEncodingError if a value is not valid text
 */
export function bindWithPrefix<R>(shape: EnvShape<R>, record: R, prefix: string, options: BindOptions = {}): boolean {
    return bindFields(shape, record, prefix, resolveSource(options.source));
}

/**
 * {@link bindWithPrefix} using the shape's own prefix (empty when it has none).
 */
export function bind<R>(shape: EnvShape<R>, record: R, options: BindOptions = {}): boolean {
    return bindWithPrefix(shape, record, shape.prefix ?? '', options);
}

/**
 * Like {@link bindWithPrefix}, reporting errors as an outcome instead of throwing.
 */
export function tryBindWithPrefix<R>(shape: EnvShape<R>, record: R, prefix: string, options: BindOptions = {}): BindOutcome {
    try {
        return { status: 'done', found: bindWithPrefix(shape, record, prefix, options) };
    } catch (error) {
        if (isEnvBindError(error)) {
            return { status: 'failed', envVarName: error.envVarName ?? '', message: error.message, error };
        }
        throw error;
    }
}

/**
 * Like {@link bind}, reporting errors as an outcome instead of throwing.
 */
export function tryBind<R>(shape: EnvShape<R>, record: R, options: BindOptions = {}): BindOutcome {
    return tryBindWithPrefix(shape, record, shape.prefix ?? '', options);
}

/**
 * Create a record from the shape's defaults and bind it with the shape's prefix.
 *
 * @throws EnvVarParseError if a value cannot be decoded
 * @throws EnvVarEncodingError if a value is not valid text
 */
export function fromEnv<R>(shape: EnvShape<R>, options: BindOptions = {}): R {
    const record = shape.create();
    bind(shape, record, options);
    return record;
}
