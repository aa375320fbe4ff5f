/**
 * DPLL Engine
 *
 * Native backtracking solver with unit propagation and pure-literal
 * elimination. Deterministic: equal input gives a bit-identical result.
 */

import { CNF, FormulaInput, Model, Var } from '../../types/clause.js';
import { SearchStatistics } from '../../types/responses.js';
import { DEFAULTS } from '../../types/options.js';
import { createEngineError } from '../../types/errors.js';
import { makeCnf, variablesOf, cnfToString } from '../../logic/clause.js';
import { evaluate } from '../../utils/evaluation.js';
import { EngineCapabilities, EngineCheckOptions, SatEngine, SatResult } from '../interface.js';
import { createSearchContext } from './context.js';
import { search } from './search.js';

export { dpll, chooseBranchLiteral } from './search.js';
export {
    applyLiteral,
    assignLiteral,
    findUnitLiteral,
    unitPropagate,
    findPureLiterals,
    eliminatePureLiterals,
    simplify,
} from './simplify.js';

export interface SolveOutcome {
    model: Model | null;
    statistics: SearchStatistics;
    trace?: string[];
}

/**
 * Solve and report the search counters alongside the model.
 */
export function solveWithStatistics(
    formula: FormulaInput,
    options: EngineCheckOptions = {}
): SolveOutcome {
    const cnf = makeCnf(formula);
    const ctx = createSearchContext(options.includeTrace, options.maxTraceLines);
    const model = search(cnf, options.partialModel, ctx);
    return { model, statistics: ctx.stats, trace: ctx.trace };
}

/**
 * Find a satisfying assignment, or null if the formula is unsatisfiable.
 */
export function solve(formula: FormulaInput, partialModel?: ReadonlyMap<Var, boolean>): Model | null {
    return solveWithStatistics(formula, { partialModel }).model;
}

export function isSatisfiable(formula: FormulaInput): boolean {
    return solve(formula) !== null;
}

export class DPLLEngine implements SatEngine {
    readonly name = 'dpll/native';
    readonly capabilities: EngineCapabilities = {
        deterministic: true,
        trace: true,
        partialModels: true,
    };

    constructor(private readonly verifyModels: boolean = DEFAULTS.verifyModels) { }

    async checkSat(cnf: CNF, options: EngineCheckOptions = {}): Promise<SatResult> {
        const startTime = Date.now();
        const outcome = solveWithStatistics(cnf, options);

        const verify = options.verifyModels ?? this.verifyModels;
        if (outcome.model && verify && !evaluate(cnf, outcome.model)) {
            throw createEngineError('DPLL returned a model that does not satisfy the formula', {
                formula: cnfToString(cnf),
            });
        }

        return {
            sat: outcome.model !== null,
            ...(outcome.model && { model: outcome.model }),
            statistics: {
                timeMs: Date.now() - startTime,
                variables: variablesOf(cnf).length,
                clauses: cnf.length,
                ...outcome.statistics,
            },
            ...(outcome.trace && { trace: outcome.trace }),
        };
    }
}

/**
 * Factory function to create a DPLLEngine
 */
export function createDPLLEngine(verifyModels?: boolean): DPLLEngine {
    return new DPLLEngine(verifyModels);
}
