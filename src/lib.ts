/**
 * DPLL - Library Entry Point
 *
 * Exports the solver for use in other projects.
 * This file should NOT import @modelcontextprotocol/sdk or any other
 * server-specific dependencies.
 */

// Literals, clauses, formulas
export * from './logic/index.js';

// Solver
export {
    solve,
    isSatisfiable,
    solveWithStatistics,
    dpll,
    chooseBranchLiteral,
    simplify,
    unitPropagate,
    eliminatePureLiterals,
    DPLLEngine,
    createDPLLEngine,
} from './engines/dpll/index.js';
export type { SolveOutcome } from './engines/dpll/index.js';
export { MiniSatEngine, createMiniSatEngine } from './engines/sat/index.js';
export { EngineRegistry, ENGINE_NAMES, isEngineName } from './engines/registry.js';
export type { SatEngine, SatResult, EngineCapabilities, EngineCheckOptions } from './engines/interface.js';

// Evaluation
export { evaluate, evaluateLiteral, isClauseSatisfied, unsatisfiedClauses } from './utils/evaluation.js';
export { allAssignments, bruteForceSolve, bruteForceSatisfiable } from './utils/enumerate.js';

// Instance text
export { parseInstancesText, loadInstances, formatInstancesText } from './parser/index.js';

// Generators
export {
    createRng,
    generateSatisfiableCnf,
    generateUnsatisfiableCnf,
    generateRandomCnf,
} from './utils/random.js';
export type { Rng, GeneratorOptions, SatisfiableInstance } from './utils/random.js';

// Responses and configuration
export { buildSolveResponse, modelToObject, modelFromObject, formatModel } from './utils/response.js';
export { loadConfig } from './config.js';
export type { Config } from './config.js';

// Types and Interfaces
export * from './types/index.js';
