import { SearchStatistics } from '../../types/responses.js';
import { DEFAULTS } from '../../types/options.js';

/**
 * Per-call bookkeeping shared by every level of one search.
 * Holds counters and the optional trace; never any formula or model state.
 */
export interface SearchContext {
    stats: SearchStatistics;
    trace?: string[];
    maxTraceLines: number;
    depth: number;
}

export function createSearchContext(includeTrace = false, maxTraceLines: number = DEFAULTS.maxTraceLines): SearchContext {
    return {
        stats: {
            decisions: 0,
            backtracks: 0,
            conflicts: 0,
            propagations: 0,
            pureLiterals: 0,
            maxDepth: 0,
        },
        trace: includeTrace ? [] : undefined,
        maxTraceLines,
        depth: 0,
    };
}

/**
 * Append a trace line, indented by the current depth.
 */
export function traceStep(ctx: SearchContext | undefined, message: string): void {
    if (!ctx?.trace) return;
    if (ctx.trace.length < ctx.maxTraceLines) {
        ctx.trace.push(`${'  '.repeat(ctx.depth)}${message}`);
    } else if (ctx.trace.length === ctx.maxTraceLines) {
        ctx.trace.push('... (trace truncated)');
    }
}
