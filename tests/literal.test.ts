/**
 * Tests for literal parsing and ordering
 */

import {
    createLiteral,
    negateLiteral,
    literalsEqual,
    compareLiterals,
    literalToString,
    parseLiteral,
} from '../src/logic/literal.js';
import { captureError, expectCode } from './fixtures.js';

describe('parseLiteral', () => {
    test('parses positive and negated tokens', () => {
        expect(parseLiteral('3')).toEqual({ variable: 3, negated: false });
        expect(parseLiteral('-3')).toEqual({ variable: 3, negated: true });
        expect(parseLiteral(' 7 ')).toEqual({ variable: 7, negated: false });
    });

    test('keeps negative zero distinct from zero', () => {
        const zero = parseLiteral('0');
        const negZero = parseLiteral('-0');

        expect(zero).toEqual({ variable: 0, negated: false });
        expect(negZero).toEqual({ variable: 0, negated: true });
        expect(literalsEqual(zero, negZero)).toBe(false);
        expect(literalToString(negZero)).toBe('-0');
    });

    test('accepts integers, including the number -0', () => {
        expect(parseLiteral(5)).toEqual({ variable: 5, negated: false });
        expect(parseLiteral(-5)).toEqual({ variable: 5, negated: true });
        expect(parseLiteral(0)).toEqual({ variable: 0, negated: false });
        expect(parseLiteral(-0)).toEqual({ variable: 0, negated: true });
    });

    test('accepts literal objects', () => {
        expect(parseLiteral({ variable: 2, negated: true })).toEqual({ variable: 2, negated: true });
    });

    test('textual form round-trips', () => {
        for (const token of ['0', '-0', '12', '-12']) {
            expect(literalToString(parseLiteral(token))).toBe(token);
        }
    });

    test('rejects empty tokens', () => {
        const err = captureError(() => parseLiteral('  '));
        expect(err.code).toBe('INVALID_LITERAL');
        expect(err.message).toBe('Empty literal token');
    });

    test('rejects malformed tokens with suggestions', () => {
        const plus = captureError(() => parseLiteral('+1'));
        expect(plus.code).toBe('INVALID_LITERAL');
        expect(plus.message).toBe("Invalid literal token: '+1'");
        expect(plus.error.suggestion).toBe("Positive literals take no sign - write '3' instead of '+3'");

        expect(captureError(() => parseLiteral('--1')).error.suggestion).toBe("Use a single '-' to negate a literal");
        expect(captureError(() => parseLiteral('-')).error.suggestion)
            .toBe("Negation marker must be followed by a variable id, e.g. '-0'");
        expect(captureError(() => parseLiteral('x1')).error.suggestion)
            .toBe('Variables are numbered - names are not supported');
        expectCode(() => parseLiteral('1a'), 'INVALID_LITERAL');
    });

    test('rejects fractional numbers', () => {
        const err = captureError(() => parseLiteral(1.5));
        expect(err.code).toBe('INVALID_LITERAL');
        expect(err.message).toBe('Literal must be an integer, got 1.5');
        expect(err.error.suggestion).toBe('Variable ids are whole numbers');
    });

    test('rejects values of other types', () => {
        // Literals arriving from JSON are not checked by the compiler
        const types = ['true', 'null', '[1]'].map(json => captureError(() => parseLiteral(JSON.parse(json))).error.details);
        expect(types).toEqual([{ type: 'boolean' }, { type: 'null' }, { type: 'array' }]);
    });
});

describe('createLiteral', () => {
    test('validates the variable id', () => {
        expectCode(() => createLiteral(-1), 'INVALID_VARIABLE');
        expectCode(() => createLiteral(1.5), 'INVALID_VARIABLE');
        expect(createLiteral(4)).toEqual({ variable: 4, negated: false });
    });

    test('negation flips only the sign', () => {
        expect(negateLiteral(createLiteral(0))).toEqual({ variable: 0, negated: true });
        expect(negateLiteral(negateLiteral(createLiteral(3, true)))).toEqual({ variable: 3, negated: true });
    });
});

describe('compareLiterals', () => {
    test('orders by variable, then positive before negated', () => {
        const sorted = ['-1', '0', '-0', '1'].map(parseLiteral).sort(compareLiterals);
        expect(sorted.map(literalToString)).toEqual(['0', '-0', '1', '-1']);
    });
});
