/**
 * CNF Types
 *
 * Types for propositional formulas in Conjunctive Normal Form (CNF).
 */

/** Variable identifier (non-negative integer) */
export type Var = number;

/**
 * A literal is a variable or its negation.
 * The sign is kept apart from the id so that `-0` stays distinct from `0`.
 */
export interface Literal {
    /** Variable id, >= 0 */
    readonly variable: Var;
    /** Whether this literal is negated */
    readonly negated: boolean;
}

/**
 * Source forms accepted when building a literal:
 * a Literal, an integer, or a token such as "3", "-3" or "-0".
 */
export type LiteralLike = Literal | string | number;

/**
 * A clause is a disjunction of literals.
 * Literals are deduplicated and sorted (variable id, then negation).
 */
export interface Clause {
    readonly literals: readonly Literal[];
}

/**
 * A CNF formula is a conjunction of clauses, in order.
 */
export type CNF = readonly Clause[];

/**
 * Anything `makeCnf` can normalize.
 */
export type FormulaInput = Iterable<Clause | Iterable<LiteralLike>>;

/**
 * Assignment of truth values to variables, possibly partial.
 */
export type Model = Map<Var, boolean>;

/**
 * Result of converting a formula to DIMACS format.
 */
export interface DIMACSResult {
    /** DIMACS CNF format string: "p cnf <vars> <clauses>\n<clause lines>" */
    dimacs: string;
    /** Mapping from variable ids to positive DIMACS variable numbers */
    varMap: Map<Var, number>;
    /** Statistics about the DIMACS output */
    stats: { variables: number; clauses: number };
}
