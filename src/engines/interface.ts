/**
 * SAT Engine Interface
 *
 * Abstract interface for pluggable satisfiability backends.
 * The native DPLL engine and the MiniSat reference engine implement it.
 */

import { CNF, Model } from '../types/clause.js';
import { SatStatistics } from '../types/responses.js';
import { SolveOptions } from '../types/options.js';

/**
 * Capabilities of an engine
 */
export interface EngineCapabilities {
    /** Same input always yields the same model */
    deterministic: boolean;
    /** Can report a search trace */
    trace: boolean;
    /** Honors a starting partial model */
    partialModels: boolean;
}

/**
 * Result of a satisfiability check
 */
export interface SatResult {
    /** Whether the formula is satisfiable */
    sat: boolean;
    /** Satisfying assignment, if any */
    model?: Model;
    /** Statistics about the computation */
    statistics: SatStatistics;
    /** Steps taken, when requested and supported */
    trace?: string[];
}

export type EngineCheckOptions = Omit<SolveOptions, 'verbosity'>;

/**
 * Abstract SAT engine interface.
 */
export interface SatEngine {
    /** Unique name of the engine */
    readonly name: string;
    /** Capabilities of this engine */
    readonly capabilities: EngineCapabilities;

    /**
     * Decide satisfiability of a normalized formula.
     * Unsatisfiable is a normal result; only input faults reject.
     */
    checkSat(cnf: CNF, options?: EngineCheckOptions): Promise<SatResult>;
}
