import type { Verbosity } from './responses.js';
import type { Var } from './clause.js';

export type EngineName = 'dpll' | 'minisat';

export interface SolveOptions {
    /** Assignments applied before the search starts */
    partialModel?: ReadonlyMap<Var, boolean>;
    /** Record the decisions and propagations taken */
    includeTrace?: boolean;
    /** Trace is truncated after this many lines */
    maxTraceLines?: number;
    /** Check every returned model with the evaluator */
    verifyModels?: boolean;
    verbosity?: Verbosity;
}

export const DEFAULTS = {
    engine: 'dpll',
    verbosity: 'standard',
    verifyModels: true,
    maxTraceLines: 1000,
    bruteForceMaxVariables: 20,
} as const;
