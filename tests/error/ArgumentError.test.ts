import { describe, expect, it } from 'vitest';
import { ArgumentError } from '../../src/error/ArgumentError';

describe('ArgumentError', () => {
    it('should carry the argument name and message', () => {
        const error = new ArgumentError('prefix', 'Environment prefix cannot contain "="');

        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('ArgumentError');
        expect(error.argument).toBe('prefix');
        expect(error.message).toBe('Environment prefix cannot contain "="');
    });

    it('should be catchable as an Error', () => {
        expect(() => {
            throw new ArgumentError('command', 'Command instance is required');
        }).toThrow('Command instance is required');
    });
});
