/**
 * Tests for model evaluation and brute-force enumeration
 */

import { evaluate, evaluateLiteral, unsatisfiedClauses } from '../src/utils/evaluation.js';
import { allAssignments, bruteForceSolve, bruteForceSatisfiable } from '../src/utils/enumerate.js';
import { parseLiteral } from '../src/logic/literal.js';
import { FORMULAS, captureError } from './fixtures.js';

describe('evaluate', () => {
    test('empty formula holds under any model', () => {
        expect(evaluate([], new Map())).toBe(true);
    });

    test('empty clause never holds', () => {
        expect(evaluate([[]], new Map([[0, true]]))).toBe(false);
    });

    test('a clause needs one true literal', () => {
        expect(evaluate([[1, -2]], new Map([[1, true]]))).toBe(true);
        expect(evaluate([[1, -2]], new Map([[2, false]]))).toBe(true);
        expect(evaluate([[1, -2]], new Map([[1, false], [2, true]]))).toBe(false);
    });

    test('unassigned variables are unknown, not false', () => {
        expect(evaluate([[1, -2]], new Map())).toBe(false);
    });

    test('literal values', () => {
        expect(evaluateLiteral(parseLiteral('-0'), new Map([[0, false]]))).toBe(true);
        expect(evaluateLiteral(parseLiteral('0'), new Map([[0, false]]))).toBe(false);
        expect(evaluateLiteral(parseLiteral('3'), new Map())).toBeUndefined();
    });

    test('unsatisfiedClauses lists failing indices', () => {
        expect(unsatisfiedClauses([[0], [1], ['-0']], new Map([[0, true]]))).toEqual([1, 2]);
        expect(unsatisfiedClauses(FORMULAS.negativeZero, new Map([[0, false], [1, true]]))).toEqual([]);
    });
});

describe('allAssignments', () => {
    test('all-false first, first variable slowest', () => {
        const models = [...allAssignments([3, 7])].map(m => [m.get(3), m.get(7)]);
        expect(models).toEqual([
            [false, false],
            [false, true],
            [true, false],
            [true, true],
        ]);
    });

    test('one empty assignment for no variables', () => {
        expect([...allAssignments([])]).toEqual([new Map()]);
    });
});

describe('bruteForceSolve', () => {
    test('first satisfying assignment in enumeration order', () => {
        expect(bruteForceSolve(FORMULAS.xor)).toEqual(new Map([[0, false], [1, true]]));
    });

    test('unsatisfiable formulas', () => {
        expect(bruteForceSolve(FORMULAS.allFourExcluded)).toBeNull();
        expect(bruteForceSatisfiable(FORMULAS.emptyClause)).toBe(false);
        expect(bruteForceSatisfiable([])).toBe(true);
    });

    test('refuses formulas over the variable limit', () => {
        const err = captureError(() => bruteForceSolve([[0, 1, 2]], 2));
        expect(err.code).toBe('INVALID_ARGUMENTS');
        expect(err.message).toBe('Too many variables for brute force: 3 (limit 2)');
    });
});
