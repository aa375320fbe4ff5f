/**
 * Shared test fixtures for consistent, DRY testing.
 */
import * as path from 'path';
import { CNF, DpllErrorCode, DpllException, Model } from '../src/types/index.js';
import { literalToString } from '../src/logic/literal.js';
import { evaluate } from '../src/utils/evaluation.js';

// === Common Formulas ===
export const FORMULAS = {
    // Satisfiable by pure literals alone
    pureOnly: [[1, -2]],
    contradiction: [[1], [-1]],
    empty: [],
    emptyClause: [[]],
    // Needs the unit -0 before 1 becomes a unit
    negativeZero: [['0', '1'], ['-0']],
    // Exactly one of 0, 1; no units or pure literals
    xor: [[0, 1], ['-0', -1]],
    // Every assignment of 0 and 1 is excluded
    allFourExcluded: [[0, 1], ['-0', -1], [0, -1], ['-0', 1]],
} as const;

export const SMALL_INSTANCES = path.join(__dirname, 'fixtures', 'small_instances.txt');

// === Assertion Helpers ===

/**
 * Clause literals as tokens, e.g. [["0", "-1"], ["2"]]
 */
export function clauseTokens(cnf: CNF): string[][] {
    return cnf.map(c => c.literals.map(literalToString));
}

export function expectSatisfies(cnf: CNF, model: Model | null) {
    expect(model).not.toBeNull();
    if (model) {
        expect(evaluate(cnf, model)).toBe(true);
    }
}

/**
 * Run `fn` and return the DpllException it throws.
 */
export function captureError(fn: () => unknown): DpllException {
    try {
        fn();
    } catch (e) {
        if (e instanceof DpllException) return e;
        throw e;
    }
    throw new Error('Expected a DpllException');
}

export async function captureAsyncError(fn: () => Promise<unknown>): Promise<DpllException> {
    try {
        await fn();
    } catch (e) {
        if (e instanceof DpllException) return e;
        throw e;
    }
    throw new Error('Expected a DpllException');
}

export function expectCode(fn: () => unknown, code: DpllErrorCode) {
    expect(captureError(fn).code).toBe(code);
}
