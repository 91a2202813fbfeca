import { z } from 'zod';
import { decoders } from './decoders';
import { nested, nestedSequence, optional, scalar, sequence } from './fields';
import { Decoder, EnvShape, FieldDescriptor, FieldOptions } from './types';

/**
 * Options for deriving a shape from a Zod schema
 */
export interface SchemaShapeOptions {
    /** Variable fragment overrides keyed by dotted field path (e.g. `{ 'server.port': 'HTTP_PORT' }`) */
    envVarMap?: Record<string, string>;
}

/** Values of a record bound from a schema-derived shape */
export type SchemaRecord = Record<string, unknown>;

interface UnwrappedSchema {
    schema: unknown;
    optional: boolean;
    /** The outermost ZodDefault, if any */
    withDefault?: z.ZodDefault;
}

/**
 * Recursively unwraps Zod wrapper types (Optional, Nullable, Default) to get the inner schema.
 * This handles multiple layers of wrappers like z.optional(z.nullable(z.default(z.object({...})))).
 */
function unwrapSchema(schema: unknown): UnwrappedSchema {
    let current = schema;
    let isOptional = false;
    let withDefault: z.ZodDefault | undefined;

    while (
        current instanceof z.ZodOptional ||
        current instanceof z.ZodNullable ||
        current instanceof z.ZodDefault
    ) {
        if (current instanceof z.ZodDefault) {
            withDefault = withDefault ?? current;
        } else {
            isOptional = true;
        }
        current = current.unwrap();
    }

    return { schema: current, optional: isOptional, withDefault };
}

/**
 * Pick the decoder for a scalar schema.
 *
 * Strings, enums, literals and anything else not listed decode to text and
 * are left for Zod to validate.
 */
function decoderFor(schema: unknown): Decoder<unknown> {
    if (schema instanceof z.ZodBoolean) {
        return decoders.boolean;
    }
    if (schema instanceof z.ZodNumber) {
        return decoders.number;
    }
    if (schema instanceof z.ZodBigInt) {
        return decoders.i128;
    }
    return decoders.string;
}

function describeField(
    key: string,
    fieldSchema: unknown,
    path: string[],
    options: SchemaShapeOptions
): FieldDescriptor<SchemaRecord> {
    const fieldPath = [...path, key];
    const override = options.envVarMap?.[fieldPath.join('.')];
    const fieldOptions: FieldOptions = override === undefined ? {} : { variable: override };
    const unwrapped = unwrapSchema(fieldSchema);
    const inner = unwrapped.schema;

    if (inner instanceof z.ZodObject) {
        const child = buildShape(inner, fieldPath, options);
        return unwrapped.optional
            ? optional(key, child, fieldOptions)
            : nested(key, child, fieldOptions);
    }

    if (inner instanceof z.ZodArray) {
        const element = unwrapSchema(inner.element).schema;
        return element instanceof z.ZodObject
            ? nestedSequence(key, buildShape(element, fieldPath, options), fieldOptions)
            : sequence(key, decoderFor(element), fieldOptions);
    }

    return unwrapped.optional
        ? optional(key, decoderFor(inner), fieldOptions)
        : scalar(key, decoderFor(inner), fieldOptions);
}

/**
 * Initial value of one field: the schema default when there is one, otherwise
 * a fresh record, an empty array, or nothing.
 */
function initialValue(field: FieldDescriptor<SchemaRecord>, fieldSchema: unknown): unknown {
    const { withDefault } = unwrapSchema(fieldSchema);

    if (withDefault) {
        // Zod hands back its stored default; binding writes into the record
        return structuredClone(withDefault.parse(undefined));
    }

    switch (field.kind) {
        case 'nested':
            return field.shape.create();
        case 'sequence':
        case 'nestedSequence':
            return [];
        case 'scalar':
        case 'optional':
            return undefined;
    }
}

function buildShape(schema: z.ZodObject, path: string[], options: SchemaShapeOptions): EnvShape<SchemaRecord> {
    const entries: [string, unknown][] = Object.entries(schema.shape);
    const fields = entries.map(([key, fieldSchema]) => ({
        key,
        fieldSchema,
        descriptor: describeField(key, fieldSchema, path, options),
    }));

    return {
        create() {
            const record: SchemaRecord = {};
            for (const { key, fieldSchema, descriptor } of fields) {
                const value = initialValue(descriptor, fieldSchema);
                if (value !== undefined) {
                    record[key] = value;
                }
            }
            return record;
        },
        fields: fields.map(({ descriptor }) => descriptor),
    };
}

/**
 * Derive a binding shape from a Zod object schema
 *
 * Each property becomes a field whose kind follows its schema:
 * - `z.object(...)` is a nested record (optional record when wrapped in optional/nullable)
 * - `z.array(z.object(...))` is a sequence of records
 * - any other `z.array(...)` is a sequence of scalars
 * - `.optional()` / `.nullable()` scalars are optional fields
 * - everything else is a scalar
 *
 * The shape's records start out holding the schema defaults. The bound record
 * is meant to be checked with the same schema afterwards.
 *
 * Example:
 *   schema = z.object({ server: z.object({ port: z.number() }) })
 *   shapeFromSchema(schema) binds `server.port` from APP_SERVER:PORT or APP_SERVER__PORT
 *
 * @param schema - Zod object schema
 * @param options - Fragment overrides
 * @returns Shape binding plain objects with the schema's layout
 */
export function shapeFromSchema(schema: z.ZodObject, options: SchemaShapeOptions = {}): EnvShape<SchemaRecord> {
    return buildShape(schema, [], options);
}
