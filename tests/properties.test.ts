/**
 * Seeded randomized checks of the solver against exhaustive search
 */

import { solve, isSatisfiable } from '../src/engines/dpll/index.js';
import { bruteForceSatisfiable } from '../src/utils/enumerate.js';
import { evaluate } from '../src/utils/evaluation.js';
import { makeCnf } from '../src/logic/clause.js';
import {
    createRng,
    randomInt,
    generateRandomCnf,
    generateSatisfiableCnf,
    generateUnsatisfiableCnf,
} from '../src/utils/random.js';
import { CNF } from '../src/types/index.js';
import { expectSatisfies } from './fixtures.js';

const SEEDS = Array.from({ length: 200 }, (_, i) => i + 1);

function reversed(cnf: CNF): CNF {
    return makeCnf([...cnf].reverse().map(c => [...c.literals].reverse()));
}

describe('createRng', () => {
    test('same seed, same sequence', () => {
        const a = createRng(42);
        const b = createRng(42);
        const first = [a(), a(), a()];
        expect([b(), b(), b()]).toEqual(first);
    });

    test('values stay in range', () => {
        const rng = createRng(7);
        for (let i = 0; i < 1000; i++) {
            const n = randomInt(rng, 2, 5);
            expect(n).toBeGreaterThanOrEqual(2);
            expect(n).toBeLessThanOrEqual(5);
        }
    });
});

describe('random formulas', () => {
    test('soundness: every model satisfies its formula', () => {
        for (const seed of SEEDS) {
            const cnf = generateRandomCnf(createRng(seed));
            const model = solve(cnf);
            if (model) {
                expect(evaluate(cnf, model)).toBe(true);
            }
        }
    });

    test('completeness: unsatisfiable exactly when exhaustive search finds nothing', () => {
        for (const seed of SEEDS) {
            const cnf = generateRandomCnf(createRng(seed), { maxVariables: 10, maxClauses: 30, maxClauseSize: 3 });
            expect(isSatisfiable(cnf)).toBe(bruteForceSatisfiable(cnf));
        }
    });

    test('clause and literal order do not change satisfiability', () => {
        for (const seed of SEEDS) {
            const cnf = generateRandomCnf(createRng(seed));
            expect(isSatisfiable(reversed(cnf))).toBe(isSatisfiable(cnf));
        }
    });

    test('solving is repeatable', () => {
        for (const seed of SEEDS.slice(0, 50)) {
            const cnf = generateRandomCnf(createRng(seed));
            expect(solve(cnf)).toEqual(solve(cnf));
        }
    });
});

describe('generated instances', () => {
    test('satisfiable generator: witness holds and the solver finds a model', () => {
        for (const seed of SEEDS) {
            const { cnf, witness } = generateSatisfiableCnf(createRng(seed));
            expect(evaluate(cnf, witness)).toBe(true);
            expectSatisfies(cnf, solve(cnf));
        }
    });

    test('unsatisfiable generator: no model', () => {
        for (const seed of SEEDS) {
            const cnf = generateUnsatisfiableCnf(createRng(seed));
            expect(solve(cnf)).toBeNull();
        }
    });
});
