/**
 * Shared type definitions
 */

// Re-export error types
export {
    DpllException,
    getSuggestion,
    createInvalidLiteralError,
    createInvalidVariableError,
    createUnsupportedTypeError,
    createParseError,
    createInvalidArgumentsError,
    createEngineError,
    serializeDpllError,
} from './errors.js';

export type {
    DpllErrorCode,
    ErrorSpan,
    DpllError,
} from './errors.js';

// Re-export CNF types
export type {
    Var,
    Literal,
    LiteralLike,
    Clause,
    CNF,
    FormulaInput,
    Model,
    DIMACSResult,
} from './clause.js';

// Re-export response types
export type {
    Verbosity,
    SearchStatistics,
    SatStatistics,
    MinimalSolveResponse,
    StandardSolveResponse,
    DetailedSolveResponse,
    SolveResponse,
    EvaluateResponse,
    ParseInstancesResponse,
} from './responses.js';

// Re-export options
export {
    DEFAULTS
} from './options.js';

export type {
    EngineName,
    SolveOptions,
} from './options.js';
