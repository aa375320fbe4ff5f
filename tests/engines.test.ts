/**
 * Tests for the engine registry and the two engines
 */

import { EngineRegistry, isEngineName, ENGINE_NAMES } from '../src/engines/registry.js';
import { DPLLEngine } from '../src/engines/dpll/index.js';
import { MiniSatEngine, variableName } from '../src/engines/sat/index.js';
import { makeCnf } from '../src/logic/clause.js';
import { createRng, generateRandomCnf } from '../src/utils/random.js';
import { FORMULAS, captureAsyncError, expectSatisfies } from './fixtures.js';

describe('EngineRegistry', () => {
    const registry = new EngineRegistry();

    test('resolves names and aliases', async () => {
        expect((await registry.getEngine('dpll')).name).toBe('dpll/native');
        expect((await registry.getEngine('dpll/native')).name).toBe('dpll/native');
        expect((await registry.getEngine('minisat')).name).toBe('sat/minisat');
        expect((await registry.getEngine('sat/minisat')).name).toBe('sat/minisat');
    });

    test('caches engine instances', async () => {
        expect(await registry.getEngine('dpll')).toBe(await registry.getEngine('dpll'));
    });

    test('unknown engines are rejected', async () => {
        const err = await captureAsyncError(() => registry.getEngine('z3'));
        expect(err.code).toBe('ENGINE_ERROR');
        expect(err.message).toBe('Engine error: Engine z3 not registered');
        expect(err.error.details).toEqual({ available: ['dpll', 'minisat'] });
    });

    test('lists entries', () => {
        expect(registry.getEntries().map(([name, entry]) => [name, entry.actualName])).toEqual([
            ['dpll', 'dpll/native'],
            ['minisat', 'sat/minisat'],
        ]);
    });

    test('isEngineName', () => {
        expect(ENGINE_NAMES).toEqual(['dpll', 'minisat']);
        expect(isEngineName('minisat')).toBe(true);
        expect(isEngineName('sat/minisat')).toBe(false);
    });
});

describe('DPLLEngine', () => {
    const engine = new DPLLEngine();

    test('reports size and search counters', async () => {
        const result = await engine.checkSat(makeCnf(FORMULAS.negativeZero));
        expect(result.sat).toBe(true);
        expect(result.model).toEqual(new Map([[0, false], [1, true]]));
        expect(result.statistics).toMatchObject({ variables: 2, clauses: 2, propagations: 2, decisions: 0 });
        expect(result.trace).toBeUndefined();
    });

    test('unsatisfiable result carries no model', async () => {
        const result = await engine.checkSat(makeCnf(FORMULAS.contradiction), { includeTrace: true });
        expect(result.sat).toBe(false);
        expect(result.model).toBeUndefined();
        expect(result.trace).toEqual(['propagate 1', 'conflict after 1']);
    });

    test('honours a partial model', async () => {
        const result = await engine.checkSat(makeCnf(FORMULAS.xor), { partialModel: new Map([[1, true]]) });
        expect(result.model).toEqual(new Map([[1, true], [0, false]]));
    });
});

describe('MiniSatEngine', () => {
    const engine = new MiniSatEngine();

    test('names solver variables', () => {
        expect(variableName(0)).toBe('x0');
    });

    test('returns a total model over the formula variables', async () => {
        const result = await engine.checkSat(makeCnf(FORMULAS.negativeZero));
        expect(result.sat).toBe(true);
        expect(result.model).toEqual(new Map([[0, false], [1, true]]));
        expect(result.statistics).toMatchObject({ variables: 2, clauses: 2 });
    });

    test('empty formula and empty clause', async () => {
        expect((await engine.checkSat([])).model).toEqual(new Map());
        expect((await engine.checkSat(makeCnf(FORMULAS.emptyClause))).sat).toBe(false);
    });

    test('unsatisfiable formulas', async () => {
        expect((await engine.checkSat(makeCnf(FORMULAS.allFourExcluded))).sat).toBe(false);
    });

    test('honours a partial model', async () => {
        const result = await engine.checkSat(makeCnf([[1, 2]]), { partialModel: new Map([[1, false]]) });
        expect(result.model).toEqual(new Map([[1, false], [2, true]]));
    });

    test('agrees with the native engine on random formulas', async () => {
        const dpll = new DPLLEngine();
        for (let seed = 1; seed <= 100; seed++) {
            const cnf = generateRandomCnf(createRng(seed));
            const [native, reference] = await Promise.all([dpll.checkSat(cnf), engine.checkSat(cnf)]);
            expect(native.sat).toBe(reference.sat);
            if (reference.model) {
                expectSatisfies(cnf, reference.model);
            }
        }
    });
});
