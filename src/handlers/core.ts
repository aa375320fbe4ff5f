import { z } from 'zod';
import {
    SolveResponse,
    EvaluateResponse,
    ParseInstancesResponse,
    createInvalidArgumentsError,
} from '../types/index.js';
import { makeCnf, variablesOf } from '../logic/clause.js';
import { parseInstancesText, formatInstancesText } from '../parser/instances.js';
import { unsatisfiedClauses } from '../utils/evaluation.js';
import { buildSolveResponse, modelFromObject } from '../utils/response.js';
import { ServerContainer } from '../container.js';

const literalSchema = z.union([z.string(), z.number().int()]);
const clausesSchema = z.array(z.array(literalSchema));
const engineSchema = z.enum(['dpll', 'minisat']);
const verbositySchema = z.enum(['minimal', 'standard', 'detailed']);

const solveArgsSchema = z.object({
    clauses: clausesSchema,
    partial_model: z.record(z.string(), z.boolean()).optional(),
    engine: engineSchema.optional(),
    include_trace: z.boolean().optional(),
    verbosity: verbositySchema.optional(),
});

const checkSatisfiableArgsSchema = z.object({
    clauses: clausesSchema,
    engine: engineSchema.optional(),
});

const evaluateArgsSchema = z.object({
    clauses: clausesSchema,
    model: z.record(z.string(), z.boolean()),
});

const parseInstancesArgsSchema = z.object({
    text: z.string(),
});

/**
 * Validate tool arguments, reporting every issue at once.
 */
export function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown): z.infer<S> {
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw createInvalidArgumentsError(`Invalid arguments: ${issues.join('; ')}`, { issues });
    }
    return parsed.data;
}

export async function solveHandler(args: unknown, container: ServerContainer): Promise<SolveResponse> {
    const { clauses, partial_model, engine, include_trace, verbosity } = parseArgs(solveArgsSchema, args);
    const cnf = makeCnf(clauses);
    const partialModel = partial_model ? modelFromObject(partial_model) : undefined;

    const selected = await container.engines.getEngine(engine ?? container.config.engine);
    const result = await selected.checkSat(cnf, {
        partialModel,
        includeTrace: include_trace,
        maxTraceLines: container.config.maxTraceLines,
    });

    return buildSolveResponse(result, verbosity ?? container.config.verbosity, selected.name);
}

export async function checkSatisfiableHandler(
    args: unknown,
    container: ServerContainer
): Promise<{ satisfiable: boolean; engineUsed: string }> {
    const { clauses, engine } = parseArgs(checkSatisfiableArgsSchema, args);
    const selected = await container.engines.getEngine(engine ?? container.config.engine);
    const result = await selected.checkSat(makeCnf(clauses));
    return { satisfiable: result.sat, engineUsed: selected.name };
}

export function evaluateHandler(args: unknown): EvaluateResponse {
    const { clauses, model } = parseArgs(evaluateArgsSchema, args);
    const failing = unsatisfiedClauses(makeCnf(clauses), modelFromObject(model));
    return { satisfied: failing.length === 0, unsatisfiedClauses: failing };
}

export function parseInstancesHandler(args: unknown): ParseInstancesResponse {
    const { text } = parseArgs(parseInstancesArgsSchema, args);
    const formulas = parseInstancesText(text);
    return {
        count: formulas.length,
        formulas: formulas.map(cnf => ({
            clauses: cnf.length,
            variables: variablesOf(cnf).length,
            text: formatInstancesText([cnf]),
        })),
    };
}
