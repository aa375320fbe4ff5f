import {
    Model,
    Var,
    Verbosity,
    SolveResponse,
    MinimalSolveResponse,
    StandardSolveResponse,
    DetailedSolveResponse,
    createInvalidVariableError,
} from '../types/index.js';
import { SatResult } from '../engines/interface.js';

/**
 * Model as a JSON object keyed by variable id, ascending.
 */
export function modelToObject(model: ReadonlyMap<Var, boolean>): Record<string, boolean> {
    const entries = [...model.entries()].sort(([a], [b]) => a - b);
    return Object.fromEntries(entries.map(([v, value]) => [String(v), value]));
}

/**
 * Inverse of modelToObject; keys must be variable ids.
 */
export function modelFromObject(obj: Record<string, boolean>): Model {
    const model: Model = new Map();
    for (const [key, value] of Object.entries(obj)) {
        if (!/^[0-9]+$/.test(key)) {
            throw createInvalidVariableError(key);
        }
        model.set(Number(key), value);
    }
    return model;
}

/**
 * Format model as "0=false 1=true"
 */
export function formatModel(model: ReadonlyMap<Var, boolean>): string {
    const entries = Object.entries(modelToObject(model));
    if (entries.length === 0) return '(empty)';
    return entries.map(([v, value]) => `${v}=${value}`).join(' ');
}

/**
 * Build response based on verbosity level
 */
export function buildSolveResponse(
    result: SatResult,
    verbosity: Verbosity = 'standard',
    engineUsed?: string
): SolveResponse {
    const minimal: MinimalSolveResponse = {
        sat: result.sat,
        result: result.sat ? 'satisfiable' : 'unsatisfiable',
    };
    if (verbosity === 'minimal') {
        return minimal;
    }

    const standard: StandardSolveResponse = {
        ...minimal,
        message: result.sat
            ? `Satisfiable (${result.model?.size ?? 0} variables assigned)`
            : 'Unsatisfiable',
        ...(result.model && { model: modelToObject(result.model) }),
        ...(engineUsed ? { engineUsed } : {}),
    };
    if (verbosity === 'standard') {
        return standard;
    }

    // detailed
    const detailed: DetailedSolveResponse = {
        ...standard,
        statistics: result.statistics,
        ...(result.trace && { trace: result.trace }),
    };
    return detailed;
}
