/**
 * DPLL simplification rules: unit propagation and pure-literal elimination.
 *
 * Every function returns a new formula and leaves its input untouched.
 * `null` means conflict; it is an ordinary result, not an error.
 */

import { Clause, CNF, Literal, Model, Var } from '../../types/clause.js';
import { createLiteral, literalToString, negateLiteral } from '../../logic/literal.js';
import { clauseContains } from '../../logic/clause.js';
import { SearchContext, traceStep } from './context.js';

/**
 * Simplify a formula given that `litTrue` holds.
 *
 * - Clauses containing `litTrue` are dropped
 * - Its complement is removed from the remaining clauses
 * - A clause left empty is a conflict (null)
 */
export function applyLiteral(cnf: CNF, litTrue: Literal): CNF | null {
    const litFalse = negateLiteral(litTrue);
    const result: Clause[] = [];

    for (const clause of cnf) {
        if (clauseContains(clause, litTrue)) {
            continue;
        }
        if (clauseContains(clause, litFalse)) {
            const reduced = clause.literals.filter(
                l => !(l.variable === litFalse.variable && l.negated === litFalse.negated)
            );
            if (reduced.length === 0) {
                return null;
            }
            result.push({ literals: reduced });
        } else {
            result.push(clause);
        }
    }

    return result;
}

/**
 * Record the assignment implied by `litTrue`.
 * Returns false if the variable already holds the opposite value.
 */
export function assignLiteral(model: Model, litTrue: Literal): boolean {
    const value = !litTrue.negated;
    const existing = model.get(litTrue.variable);
    if (existing === undefined) {
        model.set(litTrue.variable, value);
        return true;
    }
    return existing === value;
}

/**
 * The literal of the first unit clause, if any.
 */
export function findUnitLiteral(cnf: CNF): Literal | undefined {
    for (const clause of cnf) {
        if (clause.literals.length === 1) {
            return clause.literals[0];
        }
    }
    return undefined;
}

/**
 * Assign unit clauses until none remain.
 */
export function unitPropagate(cnf: CNF, model: Model, ctx?: SearchContext): CNF | null {
    let formula = cnf;
    for (;;) {
        const unit = findUnitLiteral(formula);
        if (!unit) {
            return formula;
        }
        if (!assignLiteral(model, unit)) {
            traceStep(ctx, `conflict on unit ${literalToString(unit)}`);
            return null;
        }
        if (ctx) ctx.stats.propagations++;
        traceStep(ctx, `propagate ${literalToString(unit)}`);

        const next = applyLiteral(formula, unit);
        if (!next) {
            traceStep(ctx, `conflict after ${literalToString(unit)}`);
            return null;
        }
        formula = next;
    }
}

/**
 * Literals of unassigned variables that occur with a single polarity.
 * Ordered by first occurrence.
 */
export function findPureLiterals(cnf: CNF, model: ReadonlyMap<Var, boolean>): Literal[] {
    const polarity = new Map<Var, Set<boolean>>();
    for (const clause of cnf) {
        for (const lit of clause.literals) {
            if (model.has(lit.variable)) continue;
            let seen = polarity.get(lit.variable);
            if (!seen) {
                seen = new Set();
                polarity.set(lit.variable, seen);
            }
            seen.add(lit.negated);
        }
    }

    const pures: Literal[] = [];
    for (const [variable, negs] of polarity) {
        if (negs.size === 1) {
            const [negated] = negs;
            pures.push(createLiteral(variable, negated));
        }
    }
    return pures;
}

/**
 * Assign every pure literal, repeating until none remain.
 */
export function eliminatePureLiterals(cnf: CNF, model: Model, ctx?: SearchContext): CNF | null {
    let formula = cnf;
    for (;;) {
        const pures = findPureLiterals(formula, model);
        if (pures.length === 0) {
            return formula;
        }
        for (const lit of pures) {
            if (!assignLiteral(model, lit)) {
                return null;
            }
            if (ctx) ctx.stats.pureLiterals++;
            traceStep(ctx, `pure ${literalToString(lit)}`);

            const next = applyLiteral(formula, lit);
            if (!next) {
                return null;
            }
            formula = next;
        }
    }
}

/**
 * Alternate both rules until a full round changes nothing.
 */
export function simplify(cnf: CNF, model: Model, ctx?: SearchContext): CNF | null {
    let formula = cnf;
    for (;;) {
        const before = formula;

        const propagated = unitPropagate(formula, model, ctx);
        if (!propagated) return null;

        const purified = eliminatePureLiterals(propagated, model, ctx);
        if (!purified) return null;

        formula = purified;
        if (formula.length === 0 || formula === before) {
            return formula;
        }
    }
}
