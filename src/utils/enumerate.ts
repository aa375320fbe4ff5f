/**
 * Exhaustive enumeration over assignments.
 * Used as the reference oracle for small formulas.
 */

import type { FormulaInput, Model, Var } from '../types/clause.js';
import { DEFAULTS } from '../types/options.js';
import { createInvalidArgumentsError } from '../types/errors.js';
import { hasEmptyClause, makeCnf, variablesOf } from '../logic/clause.js';
import { evaluate } from './evaluation.js';

/**
 * Generate every total assignment of `vars`.
 * All-false first; the first variable changes slowest.
 */
export function* allAssignments(vars: readonly Var[]): Generator<Model> {
    const n = vars.length;
    const total = 2 ** n;
    for (let mask = 0; mask < total; mask++) {
        const model: Model = new Map();
        vars.forEach((v, i) => {
            model.set(v, Math.floor(mask / 2 ** (n - 1 - i)) % 2 === 1);
        });
        yield model;
    }
}

/**
 * First satisfying total assignment in enumeration order, or null.
 */
export function bruteForceSolve(
    formula: FormulaInput,
    maxVariables: number = DEFAULTS.bruteForceMaxVariables
): Model | null {
    const cnf = makeCnf(formula);
    if (hasEmptyClause(cnf)) return null;

    const vars = variablesOf(cnf);
    if (vars.length > maxVariables) {
        throw createInvalidArgumentsError(
            `Too many variables for brute force: ${vars.length} (limit ${maxVariables})`,
            { variables: vars.length, limit: maxVariables }
        );
    }

    for (const model of allAssignments(vars)) {
        if (evaluate(cnf, model)) {
            return model;
        }
    }
    return null;
}

export function bruteForceSatisfiable(formula: FormulaInput, maxVariables?: number): boolean {
    return bruteForceSolve(formula, maxVariables) !== null;
}
