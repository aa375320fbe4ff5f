/**
 * Tests for response building and model conversion
 */

import { buildSolveResponse, modelToObject, modelFromObject, formatModel } from '../src/utils/response.js';
import { SatResult } from '../src/engines/interface.js';
import { expectCode } from './fixtures.js';

const satResult: SatResult = {
    sat: true,
    model: new Map([[1, true], [0, false]]),
    statistics: { timeMs: 3, variables: 2, clauses: 2, decisions: 1 },
    trace: ['decide 1'],
};

const unsatResult: SatResult = {
    sat: false,
    statistics: { timeMs: 1, variables: 1, clauses: 2 },
};

describe('buildSolveResponse', () => {
    test('minimal', () => {
        expect(buildSolveResponse(satResult, 'minimal')).toEqual({ sat: true, result: 'satisfiable' });
    });

    test('standard is the default', () => {
        expect(buildSolveResponse(satResult, undefined, 'dpll/native')).toEqual({
            sat: true,
            result: 'satisfiable',
            message: 'Satisfiable (2 variables assigned)',
            model: { '0': false, '1': true },
            engineUsed: 'dpll/native',
        });
    });

    test('standard unsatisfiable has no model', () => {
        expect(buildSolveResponse(unsatResult)).toEqual({
            sat: false,
            result: 'unsatisfiable',
            message: 'Unsatisfiable',
        });
    });

    test('detailed adds statistics and trace', () => {
        expect(buildSolveResponse(satResult, 'detailed')).toEqual({
            sat: true,
            result: 'satisfiable',
            message: 'Satisfiable (2 variables assigned)',
            model: { '0': false, '1': true },
            statistics: { timeMs: 3, variables: 2, clauses: 2, decisions: 1 },
            trace: ['decide 1'],
        });
    });
});

describe('model conversion', () => {
    test('modelToObject orders keys by variable id', () => {
        expect(Object.keys(modelToObject(new Map([[10, true], [2, false]])))).toEqual(['2', '10']);
    });

    test('modelFromObject inverts modelToObject', () => {
        const model = new Map([[0, false], [3, true]]);
        expect(modelFromObject(modelToObject(model))).toEqual(model);
    });

    test('modelFromObject rejects non-numeric keys', () => {
        expectCode(() => modelFromObject({ x: true }), 'INVALID_VARIABLE');
        expectCode(() => modelFromObject({ '-1': true }), 'INVALID_VARIABLE');
    });

    test('formatModel', () => {
        expect(formatModel(new Map([[10, true], [2, false]]))).toBe('2=false 10=true');
        expect(formatModel(new Map())).toBe('(empty)');
    });
});
