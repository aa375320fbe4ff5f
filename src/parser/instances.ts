/**
 * Instance text format
 *
 * - Each non-blank line is a clause
 * - Literals are whitespace-separated tokens like "2 -0 4"
 * - Blank lines separate independent formulas
 */

import { readFileSync } from 'fs';
import type { CNF, Clause, Literal } from '../types/clause.js';
import { DpllException, createParseError } from '../types/errors.js';
import { parseLiteral, literalToString } from '../logic/literal.js';
import { makeClause } from '../logic/clause.js';

const TOKEN = /\S+/g;

/**
 * Parse every formula in an instance file's text.
 * Malformed tokens raise PARSE_ERROR with their line and column.
 */
export function parseInstancesText(text: string): CNF[] {
    const problems: CNF[] = [];
    let current: Clause[] = [];
    let offset = 0;

    for (const rawLine of text.split('\n')) {
        const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;

        if (!line.trim()) {
            if (current.length > 0) {
                problems.push(current);
                current = [];
            }
        } else {
            const literals: Literal[] = [];
            for (const match of line.matchAll(TOKEN)) {
                literals.push(parseToken(match[0], text, offset + (match.index ?? 0)));
            }
            current.push(makeClause(literals));
        }

        offset += rawLine.length + 1;
    }

    if (current.length > 0) {
        problems.push(current);
    }

    return problems;
}

function parseToken(token: string, text: string, position: number): Literal {
    try {
        return parseLiteral(token);
    } catch (e) {
        if (e instanceof DpllException) {
            throw createParseError(e.message, text, position, {
                token,
                cause: e.code,
                ...(e.error.suggestion ? { suggestion: e.error.suggestion } : {}),
            });
        }
        throw e;
    }
}

/**
 * Read and parse an instance file (UTF-8).
 */
export function loadInstances(path: string): CNF[] {
    return parseInstancesText(readFileSync(path, 'utf-8'));
}

/**
 * Render formulas in the instance format: one clause per line,
 * one blank line between formulas.
 * Empty clauses and empty formulas have no textual form and are lost.
 */
export function formatInstancesText(cnfs: readonly CNF[]): string {
    return cnfs
        .map(cnf => cnf.map(clause => clause.literals.map(literalToString).join(' ')).join('\n'))
        .join('\n\n') + (cnfs.length > 0 ? '\n' : '');
}
