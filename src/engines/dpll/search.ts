/**
 * DPLL search.
 *
 * Depth-first backtracking over branch literals with simplification to a
 * fixed point before every decision. Each level owns its formula and model
 * copies, so backtracking is just discarding them.
 */

import { Clause, CNF, FormulaInput, Literal, Model, Var } from '../../types/clause.js';
import { compareLiterals, createLiteral, literalToString, negateLiteral } from '../../logic/literal.js';
import { hasEmptyClause, makeCnf } from '../../logic/clause.js';
import { applyLiteral, assignLiteral, simplify } from './simplify.js';
import { SearchContext, createSearchContext, traceStep } from './context.js';

function smallestLiteral(literals: readonly Literal[]): Literal {
    return literals.reduce((min, l) => (compareLiterals(l, min) < 0 ? l : min));
}

function firstSmallestClause(clauses: readonly Clause[]): Clause {
    return clauses.reduce((min, c) => (c.literals.length < min.literals.length ? c : min));
}

/**
 * Pick the literal to branch on.
 *
 * The first of the shortest clauses that still mention an unassigned
 * variable, and within it the smallest unassigned literal.
 */
export function chooseBranchLiteral(cnf: CNF, model: ReadonlyMap<Var, boolean>): Literal {
    const candidates = cnf.filter(c => c.literals.some(l => !model.has(l.variable)));
    if (candidates.length === 0) {
        return smallestLiteral(firstSmallestClause(cnf).literals);
    }

    const clause = firstSmallestClause(candidates);
    return smallestLiteral(clause.literals.filter(l => !model.has(l.variable)));
}

/**
 * Solve a normalized formula. Returns a satisfying (possibly partial)
 * model, or null when the formula is unsatisfiable.
 */
export function search(
    cnf: CNF,
    partialModel: ReadonlyMap<Var, boolean> | undefined,
    ctx: SearchContext
): Model | null {
    const model: Model = new Map(partialModel ?? []);
    ctx.stats.maxDepth = Math.max(ctx.stats.maxDepth, ctx.depth);

    let formula: CNF | null = cnf;
    for (const [variable, value] of model) {
        formula = applyLiteral(formula, createLiteral(variable, !value));
        if (!formula) {
            ctx.stats.conflicts++;
            return null;
        }
    }

    if (formula.length === 0) {
        return model;
    }
    if (hasEmptyClause(formula)) {
        ctx.stats.conflicts++;
        return null;
    }

    formula = simplify(formula, model, ctx);
    if (!formula) {
        ctx.stats.conflicts++;
        return null;
    }
    if (formula.length === 0) {
        return model;
    }

    const lit = chooseBranchLiteral(formula, model);

    // Literal true first, then its negation.
    const branches = [lit, negateLiteral(lit)];
    for (let i = 0; i < branches.length; i++) {
        const branchLit = branches[i];
        if (i > 0) {
            ctx.stats.backtracks++;
            traceStep(ctx, `backtrack ${literalToString(lit)}`);
        }

        const branchModel: Model = new Map(model);
        if (!assignLiteral(branchModel, branchLit)) {
            continue;
        }
        ctx.stats.decisions++;
        traceStep(ctx, `decide ${literalToString(branchLit)}`);

        const branchCnf = applyLiteral(formula, branchLit);
        if (!branchCnf) {
            ctx.stats.conflicts++;
            traceStep(ctx, `conflict after ${literalToString(branchLit)}`);
            continue;
        }

        ctx.depth++;
        try {
            const result = search(branchCnf, branchModel, ctx);
            if (result) {
                return result;
            }
        } finally {
            ctx.depth--;
        }
    }

    return null;
}

/**
 * Solve a CNF formula with the DPLL algorithm.
 *
 * @param formula - normalized or convenience form, e.g. [["-0", 1], [0]]
 * @param partialModel - assignments to start from
 * @param ctx - counters and trace for this call
 * @returns a satisfying assignment, or null if unsatisfiable
 */
export function dpll(
    formula: FormulaInput,
    partialModel?: ReadonlyMap<Var, boolean>,
    ctx: SearchContext = createSearchContext()
): Model | null {
    return search(makeCnf(formula), partialModel, ctx);
}
