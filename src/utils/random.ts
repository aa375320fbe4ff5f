/**
 * Seeded instance generators.
 *
 * Satisfiable formulas are built witness-first: every clause gets one
 * literal made true by a random assignment. Unsatisfiable ones carry an
 * `(x) & (-x)` kernel that extra clauses cannot repair.
 */

import type { CNF, Literal, Model, Var } from '../types/clause.js';
import { createLiteral } from '../logic/literal.js';
import { makeCnf } from '../logic/clause.js';

export type Rng = () => number;

/**
 * Deterministic PRNG (mulberry32) returning floats in [0, 1).
 */
export function createRng(seed: number): Rng {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/** Integer in [min, max] */
export function randomInt(rng: Rng, min: number, max: number): number {
    return min + Math.floor(rng() * (max - min + 1));
}

function randomBool(rng: Rng): boolean {
    return rng() < 0.5;
}

/**
 * `k` distinct elements of `items` in random order.
 */
function sample<T>(rng: Rng, items: readonly T[], k: number): T[] {
    const pool = [...items];
    for (let i = pool.length - 1; i > 0; i--) {
        const j = randomInt(rng, 0, i);
        [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, k);
}

function range(n: number): Var[] {
    return Array.from({ length: n }, (_, i) => i);
}

export interface GeneratorOptions {
    maxVariables?: number;
    maxClauses?: number;
    maxClauseSize?: number;
}

export interface SatisfiableInstance {
    cnf: CNF;
    /** Assignment the formula was built to satisfy */
    witness: Model;
}

export function generateSatisfiableCnf(rng: Rng, options: GeneratorOptions = {}): SatisfiableInstance {
    const vars = range(randomInt(rng, 1, options.maxVariables ?? 8));
    const witness: Model = new Map(vars.map(v => [v, randomBool(rng)]));

    const clauses: Literal[][] = [];
    const clauseCount = randomInt(rng, 1, options.maxClauses ?? 12);
    for (let c = 0; c < clauseCount; c++) {
        const k = randomInt(rng, 1, Math.min(options.maxClauseSize ?? 4, vars.length));
        const lits = sample(rng, vars, k).map(v => createLiteral(v, randomBool(rng)));

        const forced = randomInt(rng, 0, lits.length - 1);
        const v = lits[forced].variable;
        lits[forced] = createLiteral(v, !witness.get(v));

        clauses.push(lits);
    }

    return { cnf: makeCnf(clauses), witness };
}

export function generateUnsatisfiableCnf(rng: Rng, options: GeneratorOptions = {}): CNF {
    const vars = range(randomInt(rng, 1, options.maxVariables ?? 8));
    const [kernel] = sample(rng, vars, 1);
    const clauses: Literal[][] = [[createLiteral(kernel, false)], [createLiteral(kernel, true)]];

    const extra = randomInt(rng, 0, options.maxClauses ?? 8);
    for (let c = 0; c < extra; c++) {
        const k = randomInt(rng, 1, Math.min(options.maxClauseSize ?? 4, vars.length));
        clauses.push(sample(rng, vars, k).map(v => createLiteral(v, randomBool(rng))));
    }

    // Shuffle so the kernel is not always first.
    return makeCnf(sample(rng, clauses, clauses.length));
}

/**
 * Small unconstrained formulas; may contain empty clauses and repeated literals.
 */
export function generateRandomCnf(rng: Rng, options: GeneratorOptions = {}): CNF {
    const vars = range(randomInt(rng, 0, options.maxVariables ?? 6));
    const clauseCount = randomInt(rng, 0, options.maxClauses ?? 10);

    const clauses: Literal[][] = [];
    for (let c = 0; c < clauseCount; c++) {
        const k = randomInt(rng, 0, options.maxClauseSize ?? 4);
        const lits: Literal[] = [];
        for (let i = 0; i < k && vars.length > 0; i++) {
            lits.push(createLiteral(vars[randomInt(rng, 0, vars.length - 1)], randomBool(rng)));
        }
        clauses.push(lits);
    }
    return makeCnf(clauses);
}
