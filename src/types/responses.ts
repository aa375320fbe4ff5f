/**
 * Response types for the solver tools
 */

/**
 * Verbosity level for responses
 */
export type Verbosity = 'minimal' | 'standard' | 'detailed';

/**
 * Counters collected by one DPLL search call
 */
export interface SearchStatistics {
    /** Branch literals tried (both polarities count) */
    decisions: number;
    /** Branches abandoned after their first polarity failed */
    backtracks: number;
    /** Dead ends: contradicting assignment or emptied clause */
    conflicts: number;
    /** Literals forced by unit propagation */
    propagations: number;
    /** Literals assigned by pure-literal elimination */
    pureLiterals: number;
    /** Deepest recursion level reached */
    maxDepth: number;
}

/**
 * Statistics reported with a satisfiability check
 */
export interface SatStatistics extends Partial<SearchStatistics> {
    timeMs: number;
    variables: number;
    clauses: number;
}

/**
 * Minimal response - just the verdict
 */
export interface MinimalSolveResponse {
    sat: boolean;
    result: 'satisfiable' | 'unsatisfiable';
}

/**
 * Standard response - includes message and model
 */
export interface StandardSolveResponse extends MinimalSolveResponse {
    message: string;
    /** Assignment keyed by variable id */
    model?: Record<string, boolean>;
    engineUsed?: string;
}

/**
 * Detailed response - includes debug info
 */
export interface DetailedSolveResponse extends StandardSolveResponse {
    statistics?: SatStatistics;
    trace?: string[];
}

/**
 * Union type for solve responses
 */
export type SolveResponse = MinimalSolveResponse | StandardSolveResponse | DetailedSolveResponse;

/**
 * Response of the evaluate tool
 */
export interface EvaluateResponse {
    satisfied: boolean;
    /** Zero-based indices of clauses the model does not satisfy */
    unsatisfiedClauses: number[];
}

/**
 * Response of the parse-instances tool
 */
export interface ParseInstancesResponse {
    count: number;
    formulas: Array<{
        clauses: number;
        variables: number;
        text: string;
    }>;
}
