/**
 * Model Evaluation Utilities
 *
 * Checks a formula against a (possibly partial) assignment.
 * Unassigned variables are unknown: they never satisfy a clause.
 */

import type { Clause, FormulaInput, Literal, Var } from '../types/clause.js';
import { makeCnf } from '../logic/clause.js';

/**
 * Value of a literal under a model; undefined when its variable is unassigned.
 */
export function evaluateLiteral(lit: Literal, model: ReadonlyMap<Var, boolean>): boolean | undefined {
    const value = model.get(lit.variable);
    if (value === undefined) return undefined;
    return lit.negated ? !value : value;
}

export function isClauseSatisfied(clause: Clause, model: ReadonlyMap<Var, boolean>): boolean {
    return clause.literals.some(lit => evaluateLiteral(lit, model) === true);
}

/**
 * Indices of the clauses the model does not satisfy
 */
export function unsatisfiedClauses(formula: FormulaInput, model: ReadonlyMap<Var, boolean>): number[] {
    const failing: number[] = [];
    makeCnf(formula).forEach((clause, i) => {
        if (!isClauseSatisfied(clause, model)) {
            failing.push(i);
        }
    });
    return failing;
}

/**
 * Check if every clause is satisfied by the model
 */
export function evaluate(formula: FormulaInput, model: ReadonlyMap<Var, boolean>): boolean {
    for (const clause of makeCnf(formula)) {
        if (!isClauseSatisfied(clause, model)) {
            return false;
        }
    }
    return true;
}
