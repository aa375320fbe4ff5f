/**
 * CNF Clause Utilities
 *
 * Construction and inspection of clauses and formulas.
 */

import { Clause, CNF, DIMACSResult, FormulaInput, Literal, LiteralLike, Var } from '../types/clause.js';
import { compareLiterals, literalKey, literalToString, parseLiteral } from './literal.js';

function isClause(x: Clause | Iterable<LiteralLike>): x is Clause {
    return typeof x === 'object' && x !== null && 'literals' in x && Array.isArray(x.literals);
}

/**
 * Build a clause: parse every literal, drop duplicates, sort.
 */
export function makeClause(lits: Iterable<LiteralLike>): Clause {
    const seen = new Map<string, Literal>();
    for (const raw of lits) {
        const lit = parseLiteral(raw);
        const key = literalKey(lit);
        if (!seen.has(key)) {
            seen.set(key, lit);
        }
    }
    return { literals: [...seen.values()].sort(compareLiterals) };
}

/**
 * Build a CNF formula. Clause order is kept and equal clauses are not merged.
 */
export function makeCnf(clauses: FormulaInput): CNF {
    const normalized: Clause[] = [];
    for (const c of clauses) {
        normalized.push(makeClause(isClause(c) ? c.literals : c));
    }
    return normalized;
}

export function clauseContains(clause: Clause, lit: Literal): boolean {
    return clause.literals.some(l => l.variable === lit.variable && l.negated === lit.negated);
}

export function isEmptyClause(clause: Clause): boolean {
    return clause.literals.length === 0;
}

export function hasEmptyClause(cnf: CNF): boolean {
    return cnf.some(isEmptyClause);
}

/**
 * Distinct variable ids of a formula, ascending.
 */
export function variablesOf(cnf: CNF): Var[] {
    const vars = new Set<Var>();
    for (const clause of cnf) {
        for (const lit of clause.literals) {
            vars.add(lit.variable);
        }
    }
    return [...vars].sort((a, b) => a - b);
}

export function clauseToString(clause: Clause): string {
    return `{${clause.literals.map(literalToString).join(', ')}}`;
}

export function cnfToString(cnf: CNF): string {
    return `[${cnf.map(clauseToString).join(', ')}]`;
}

/**
 * Convert a formula to DIMACS CNF format.
 *
 * DIMACS variables start at 1 and 0 ends a clause, so variable `v`
 * is written as `v + 1`.
 */
export function clausesToDIMACS(cnf: CNF): DIMACSResult {
    const varMap = new Map<Var, number>();
    for (const v of variablesOf(cnf)) {
        varMap.set(v, v + 1);
    }

    const clauseLines = cnf.map(clause => {
        const literals = clause.literals.map(lit => {
            const n = lit.variable + 1;
            return lit.negated ? -n : n;
        });
        return [...literals, 0].join(' ');
    });

    const maxVar = varMap.size === 0 ? 0 : Math.max(...varMap.values());
    const header = `p cnf ${maxVar} ${cnf.length}`;

    return {
        dimacs: [header, ...clauseLines].join('\n'),
        varMap,
        stats: {
            variables: varMap.size,
            clauses: cnf.length,
        },
    };
}
