import { describe, it, expect } from 'vitest';
import {
    FALSE,
    NULL,
    TRUE,
    createInteger,
    inspect,
    isBoolean,
    isInteger,
    nativeBoolToBoolean,
    typeOf
} from '../../src/core/value/types.js';

describe('values', () => {
    it('inspects integers in decimal', () => {
        expect(inspect(createInteger(-42n))).toBe('-42');
        expect(inspect(createInteger(9223372036854775807n))).toBe('9223372036854775807');
    });

    it('inspects booleans and null', () => {
        expect(inspect(TRUE)).toBe('true');
        expect(inspect(FALSE)).toBe('false');
        expect(inspect(NULL)).toBe('null');
    });

    it('reports type tags', () => {
        expect(typeOf(createInteger(1n))).toBe('INTEGER');
        expect(typeOf(TRUE)).toBe('BOOLEAN');
        expect(typeOf(NULL)).toBe('NULL');
        expect(isInteger(createInteger(1n))).toBe(true);
        expect(isBoolean(createInteger(1n))).toBe(false);
    });

    it('maps native booleans onto the shared instances', () => {
        expect(nativeBoolToBoolean(true)).toBe(TRUE);
        expect(nativeBoolToBoolean(false)).toBe(FALSE);
    });

    it('freezes values after construction', () => {
        expect(Object.isFrozen(TRUE)).toBe(true);
        expect(Object.isFrozen(NULL)).toBe(true);
        expect(Object.isFrozen(createInteger(3n))).toBe(true);
    });
});
