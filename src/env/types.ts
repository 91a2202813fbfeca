import type { EnvBindError } from './errors';

/**
 * Result of looking up a single environment variable
 */
export type EnvLookup =
    | { status: 'absent' }
    | { status: 'present'; value: string }
    /** Set, but the raw bytes are not valid UTF-8 */
    | { status: 'invalid'; raw: Uint8Array };

/**
 * Read-only key/value view of the environment.
 *
 * Lookups are exact and case-sensitive.
 */
export interface EnvSource {
    lookup(name: string): EnvLookup;
}

/**
 * Turns the text of one variable into a value.
 *
 * `decode` throws {@link EnvVarParseError} when the text is not acceptable.
 */
export interface Decoder<T> {
    /** Short type label used in error messages (e.g. 'u16') */
    readonly type: string;
    decode(text: string): T;
}

/**
 * Options shared by every field builder
 */
export interface FieldOptions {
    /** Variable fragment to use instead of the SCREAMING_SNAKE_CASE key */
    variable?: string;
    /** Leave the field out of traversal entirely */
    ignore?: boolean;
}

interface FieldBase {
    /** Field key, used in listings and diagnostics */
    name: string;
    /** Environment variable fragment appended to the prefix */
    variable: string;
    ignored: boolean;
}

/*
 * Accessors use method syntax, so their parameters compare bivariantly: a field
 * typed against `Record<'port', number>` fits the descriptor list of any record
 * with a numeric `port`.
 */

export interface ScalarField<R, V> extends FieldBase {
    kind: 'scalar';
    decoder: Decoder<V>;
    set(record: R, value: V): void;
}

export interface OptionalField<R, V> extends FieldBase {
    kind: 'optional';
    /** A decoder for optional scalars, a shape for optional records */
    inner: Decoder<V> | EnvShape<V>;
    set(record: R, value: V | undefined): void;
}

export interface NestedField<R, C> extends FieldBase {
    kind: 'nested';
    shape: EnvShape<C>;
    get(record: R): C;
}

export interface SequenceField<R, V> extends FieldBase {
    kind: 'sequence';
    decoder: Decoder<V>;
    get(record: R): V[];
}

export interface NestedSequenceField<R, C> extends FieldBase {
    kind: 'nestedSequence';
    shape: EnvShape<C>;
    get(record: R): C[];
}

/**
 * One declared field of a record. The set of kinds is closed.
 */
export type FieldDescriptor<R> =
    | ScalarField<R, unknown>
    | OptionalField<R, unknown>
    | NestedField<R, unknown>
    | SequenceField<R, unknown>
    | NestedSequenceField<R, unknown>;

export type FieldKind = FieldDescriptor<unknown>['kind'];

/**
 * Declared shape of a composite record
 */
export interface EnvShape<R> {
    /** Produces a record holding its defaults */
    create(): R;
    fields: readonly FieldDescriptor<R>[];
    /** Prefix used by `bind` when the caller supplies none */
    prefix?: string;
}

export interface BindOptions {
    /** Where variables are read from. Defaults to `process.env`. */
    source?: EnvSource;
}

/**
 * Outcome of a binding pass, for callers that prefer a value to an exception
 */
export type BindOutcome =
    | { status: 'done'; found: boolean }
    | { status: 'failed'; envVarName: string; message: string; error: EnvBindError };

/**
 * Options for resolving a Zod schema from the environment
 */
export interface EnvResolveOptions extends BindOptions {
    /** Prepended to every variable name (e.g. 'APP_') */
    prefix: string;
    /** Variable fragment overrides keyed by dotted field path */
    envVarMap?: Record<string, string>;
}

/**
 * Source information for env var config
 */
export interface EnvConfigSource {
    type: 'env';
    prefix: string;
    /** Whether any variable was read */
    found: boolean;
    /** When the env vars were read */
    readAt: Date;
}
