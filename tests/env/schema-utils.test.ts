import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { bindWithPrefix } from '../../src/env/binder';
import { shapeFromSchema } from '../../src/env/schema-utils';
import { createMapSource } from '../../src/env/source';

const schema = z.object({
    name: z.string().default('app'),
    port: z.number().default(8080),
    debug: z.boolean().optional(),
    server: z.object({
        host: z.string().default('localhost'),
        port: z.number().default(80),
    }),
    tls: z.object({ cert: z.string() }).optional(),
    tags: z.array(z.string()),
    upstreams: z.array(z.object({
        url: z.string(),
        weight: z.number().default(1),
    })),
    big: z.bigint().optional(),
});

describe('shapeFromSchema', () => {
    it('derives a field kind from each property schema', () => {
        const shape = shapeFromSchema(schema);

        expect(shape.fields.map((field) => [field.name, field.kind])).toEqual([
            ['name', 'scalar'],
            ['port', 'scalar'],
            ['debug', 'optional'],
            ['server', 'nested'],
            ['tls', 'optional'],
            ['tags', 'sequence'],
            ['upstreams', 'nestedSequence'],
            ['big', 'optional'],
        ]);
    });

    it('picks decoders from scalar schemas', () => {
        const shape = shapeFromSchema(z.object({
            flag: z.boolean(),
            ratio: z.number(),
            total: z.bigint(),
            mode: z.enum(['fast', 'slow']),
            label: z.string(),
        }));

        const types = shape.fields.map((field) => field.kind === 'scalar' ? field.decoder.type : field.kind);

        expect(types).toEqual(['boolean', 'number', 'i128', 'string', 'string']);
    });

    it('treats nullable scalars as optional', () => {
        const shape = shapeFromSchema(z.object({ timeout: z.number().nullable() }));

        expect(shape.fields[0].kind).toBe('optional');
    });

    it('names variables in SCREAMING_SNAKE_CASE', () => {
        const shape = shapeFromSchema(z.object({ maxRetries: z.number() }));

        expect(shape.fields[0].variable).toBe('MAX_RETRIES');
    });

    it('applies envVarMap overrides by dotted path', () => {
        const shape = shapeFromSchema(schema, {
            envVarMap: { port: 'LISTEN', 'server.port': 'HTTP_PORT' },
        });
        const record = shape.create();

        bindWithPrefix(shape, record, 'APP_', {
            source: createMapSource({ APP_LISTEN: '9000', APP_SERVER__HTTP_PORT: '9001', APP_PORT: '1' }),
        });

        expect(record.port).toBe(9000);
        expect(record.server).toEqual({ host: 'localhost', port: 9001 });
    });

    it('creates records holding the schema defaults', () => {
        const shape = shapeFromSchema(schema);

        expect(shape.create()).toEqual({
            name: 'app',
            port: 8080,
            server: { host: 'localhost', port: 80 },
            tags: [],
            upstreams: [],
        });
    });

    it('creates a fresh record on every call', () => {
        const shape = shapeFromSchema(schema);

        expect(shape.create().server).not.toBe(shape.create().server);
    });

    it('uses array defaults when the schema gives one', () => {
        const shape = shapeFromSchema(z.object({ tags: z.array(z.string()).default(['a']) }));

        expect(shape.create()).toEqual({ tags: ['a'] });
    });

    it('binds every field kind', () => {
        const shape = shapeFromSchema(schema);
        const record = shape.create();

        const found = bindWithPrefix(shape, record, 'APP_', {
            source: createMapSource({
                APP_DEBUG: 'yes',
                APP_SERVER__PORT: '9000',
                'APP_TLS:CERT': '/etc/app/cert.pem',
                'APP_TAGS:0': 'a',
                APP_TAGS__1: 'b',
                APP_UPSTREAMS__0__URL: 'http://upstream.test',
                APP_BIG: '12345678901234567890',
            }),
        });

        expect(found).toBe(true);
        expect(record).toEqual({
            name: 'app',
            port: 8080,
            debug: true,
            server: { host: 'localhost', port: 9000 },
            tls: { cert: '/etc/app/cert.pem' },
            tags: ['a', 'b'],
            upstreams: [{ url: 'http://upstream.test', weight: 1 }],
            big: 12345678901234567890n,
        });
    });
});
