/**
 * Literal construction and ordering.
 */

import { Literal, LiteralLike, Var } from '../types/clause.js';
import {
    createInvalidLiteralError,
    createInvalidVariableError,
    createUnsupportedTypeError,
} from '../types/errors.js';

const DIGITS = /^[0-9]+$/;

/**
 * Create a literal, validating the variable id.
 */
export function createLiteral(variable: Var, negated: boolean = false): Literal {
    if (typeof variable !== 'number' || !Number.isSafeInteger(variable) || variable < 0) {
        throw createInvalidVariableError(variable);
    }
    return { variable, negated };
}

export function negateLiteral(lit: Literal): Literal {
    return { variable: lit.variable, negated: !lit.negated };
}

export function literalsEqual(a: Literal, b: Literal): boolean {
    return a.variable === b.variable && a.negated === b.negated;
}

/**
 * Total order on literals: variable id first, then positive before negated.
 */
export function compareLiterals(a: Literal, b: Literal): number {
    if (a.variable !== b.variable) {
        return a.variable - b.variable;
    }
    if (a.negated === b.negated) return 0;
    return a.negated ? 1 : -1;
}

/**
 * Textual form: "3", "-3", "-0".
 */
export function literalToString(lit: Literal): string {
    return lit.negated ? `-${lit.variable}` : String(lit.variable);
}

/**
 * Unique key of a literal, used for set membership.
 */
export const literalKey = literalToString;

function isLiteral(x: object): x is Literal {
    return 'variable' in x && 'negated' in x;
}

/**
 * Parse a literal from a Literal, an integer, or a token string.
 *
 * Negative zero needs either the token "-0" or the number -0;
 * a computed `-x` with `x === 0` yields the latter.
 */
export function parseLiteral(x: LiteralLike): Literal {
    if (typeof x === 'string') {
        return parseLiteralToken(x);
    }

    if (typeof x === 'number') {
        if (!Number.isSafeInteger(x)) {
            throw createInvalidLiteralError(String(x), `Literal must be an integer, got ${x}`);
        }
        if (x < 0 || Object.is(x, -0)) {
            return createLiteral(-x, true);
        }
        return createLiteral(x, false);
    }

    if (typeof x === 'object' && x !== null && isLiteral(x)) {
        if (typeof x.negated !== 'boolean') {
            throw createUnsupportedTypeError(x.negated);
        }
        return createLiteral(x.variable, x.negated);
    }

    throw createUnsupportedTypeError(x);
}

function parseLiteralToken(token: string): Literal {
    const s = token.trim();
    if (!s) {
        throw createInvalidLiteralError(token, 'Empty literal token');
    }

    const negated = s[0] === '-';
    const digits = negated ? s.slice(1) : s;
    if (!DIGITS.test(digits)) {
        throw createInvalidLiteralError(token);
    }

    const variable = Number(digits);
    if (!Number.isSafeInteger(variable)) {
        throw createInvalidVariableError(digits);
    }
    return { variable, negated };
}
