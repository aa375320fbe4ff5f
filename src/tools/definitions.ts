import { Tool } from '@modelcontextprotocol/sdk/types.js';

/**
 * Verbosity parameter schema for tools
 */
const verbositySchema = {
    type: 'string',
    enum: ['minimal', 'standard', 'detailed'],
    description: "Response verbosity: 'minimal' (verdict only), 'standard' (default, adds the model), 'detailed' (adds statistics and trace)",
};

const clausesSchema = {
    type: 'array',
    items: {
        type: 'array',
        items: { type: ['string', 'integer'] },
    },
    description: 'CNF as a list of clauses, each a list of literals. Literals are integers or tokens such as "3", "-3", "-0". Use the string "-0" for the negation of variable 0.',
};

const engineSchema = {
    type: 'string',
    enum: ['dpll', 'minisat'],
    description: "Solver: 'dpll' (native, deterministic, supports trace) or 'minisat' (reference). Default: 'dpll'.",
};

const modelSchema = {
    type: 'object',
    additionalProperties: { type: 'boolean' },
    description: 'Assignment keyed by variable id, e.g. {"0": false, "1": true}',
};

export const TOOLS: Tool[] = [
    {
        name: 'solve',
        description: `Decide satisfiability of a CNF formula and return a satisfying assignment.

**When to use:** You need a model, or want to know why a formula is unsatisfiable (use verbosity 'detailed' with include_trace).

**Example:**
  clauses: [["0", "1"], ["-0"]]
  → Returns: { sat: true, result: "satisfiable", model: { "0": false, "1": true } }

**Notes:**
- Unsatisfiable is a normal answer, not an error
- The model may be partial: variables left out are free`,
        inputSchema: {
            type: 'object',
            properties: {
                clauses: clausesSchema,
                partial_model: { ...modelSchema, description: 'Assignments to start the search from' },
                engine: engineSchema,
                include_trace: {
                    type: 'boolean',
                    description: 'Record decisions, propagations and backtracks (dpll only). Default: false.',
                },
                verbosity: verbositySchema,
            },
            required: ['clauses'],
        },
    },
    {
        name: 'check-satisfiable',
        description: 'Return only whether a CNF formula is satisfiable.',
        inputSchema: {
            type: 'object',
            properties: {
                clauses: clausesSchema,
                engine: engineSchema,
            },
            required: ['clauses'],
        },
    },
    {
        name: 'evaluate',
        description: `Check an assignment against a CNF formula.

Unassigned variables are unknown and never satisfy a clause. Returns the indices of unsatisfied clauses.`,
        inputSchema: {
            type: 'object',
            properties: {
                clauses: clausesSchema,
                model: modelSchema,
            },
            required: ['clauses', 'model'],
        },
    },
    {
        name: 'parse-instances',
        description: `Parse instance text: one clause per line, whitespace-separated literals, blank lines between formulas.

**Example:**
  text: "0 1\\n-0\\n\\n2 -3"
  → Returns two formulas`,
        inputSchema: {
            type: 'object',
            properties: {
                text: {
                    type: 'string',
                    description: 'Instance file contents',
                },
            },
            required: ['text'],
        },
    },
];
