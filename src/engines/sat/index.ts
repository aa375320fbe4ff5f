/// <reference path="../../types/logic-solver.d.ts" />
/**
 * MiniSat Engine
 *
 * Reference backend using the logic-solver package (MiniSat compiled to JS).
 * Used to cross-check the native DPLL engine.
 */

import Logic from 'logic-solver';
import { CNF, Model, Var } from '../../types/clause.js';
import { variablesOf } from '../../logic/clause.js';
import { EngineCapabilities, EngineCheckOptions, SatEngine, SatResult } from '../interface.js';

/**
 * Solver variable name for a variable id.
 * logic-solver rejects purely numeric names.
 */
export function variableName(variable: Var): string {
    return `x${variable}`;
}

export class MiniSatEngine implements SatEngine {
    readonly name = 'sat/minisat';
    readonly capabilities: EngineCapabilities = {
        deterministic: true,
        trace: false,
        partialModels: true,
    };

    async checkSat(cnf: CNF, options: EngineCheckOptions = {}): Promise<SatResult> {
        const startTime = Date.now();
        const vars = variablesOf(cnf);
        const statistics = () => ({
            timeMs: Date.now() - startTime,
            variables: vars.length,
            clauses: cnf.length,
        });

        const partial = options.partialModel ?? new Map<Var, boolean>();

        if (cnf.length === 0) {
            return { sat: true, model: new Map(partial), statistics: statistics() };
        }

        const solver = new Logic.Solver();

        for (const clause of cnf) {
            if (clause.literals.length === 0) {
                // Empty clause = unsatisfiable
                return { sat: false, statistics: statistics() };
            }

            const disjuncts = clause.literals.map(lit => {
                const name = variableName(lit.variable);
                return lit.negated ? Logic.not(name) : name;
            });
            solver.require(Logic.or(...disjuncts));
        }

        for (const [variable, value] of partial) {
            const name = variableName(variable);
            solver.require(value ? name : Logic.not(name));
        }

        const solution = solver.solve();
        if (!solution) {
            return { sat: false, statistics: statistics() };
        }

        const trueVars = new Set(solution.getTrueVars());
        const model: Model = new Map(partial);
        for (const v of vars) {
            model.set(v, trueVars.has(variableName(v)));
        }

        return { sat: true, model, statistics: statistics() };
    }
}

/**
 * Factory function to create a MiniSatEngine
 */
export function createMiniSatEngine(): MiniSatEngine {
    return new MiniSatEngine();
}
