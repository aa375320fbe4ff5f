/**
 * Runtime configuration from environment variables.
 *
 *   DPLL_ENGINE            dpll | minisat
 *   DPLL_VERBOSITY         minimal | standard | detailed
 *   DPLL_VERIFY_MODELS     true | false | 1 | 0
 *   DPLL_MAX_TRACE_LINES   positive integer
 */

import { z } from 'zod';
import { DEFAULTS, EngineName } from './types/options.js';
import { Verbosity } from './types/responses.js';
import { createInvalidArgumentsError } from './types/errors.js';

export interface Config {
    engine: EngineName;
    verbosity: Verbosity;
    verifyModels: boolean;
    maxTraceLines: number;
}

const envSchema = z.object({
    DPLL_ENGINE: z.enum(['dpll', 'minisat']).default(DEFAULTS.engine),
    DPLL_VERBOSITY: z.enum(['minimal', 'standard', 'detailed']).default(DEFAULTS.verbosity),
    DPLL_VERIFY_MODELS: z
        .enum(['true', 'false', '1', '0'])
        .optional()
        .transform(v => (v === undefined ? DEFAULTS.verifyModels : v === 'true' || v === '1')),
    DPLL_MAX_TRACE_LINES: z.coerce.number().int().positive().default(DEFAULTS.maxTraceLines),
});

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        throw createInvalidArgumentsError(`Invalid configuration: ${issues.join('; ')}`, { issues });
    }

    return {
        engine: parsed.data.DPLL_ENGINE,
        verbosity: parsed.data.DPLL_VERBOSITY,
        verifyModels: parsed.data.DPLL_VERIFY_MODELS,
        maxTraceLines: parsed.data.DPLL_MAX_TRACE_LINES,
    };
}
