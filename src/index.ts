#!/usr/bin/env node
/**
 * DPLL Server - Entry Point
 */

import { runServer, SERVER_NAME, VERSION } from './server.js';

async function main(): Promise<void> {
    const args = process.argv.slice(2);

    if (args.includes('--help') || args.includes('-h')) {
        console.log(`
DPLL Server - propositional satisfiability over MCP

Usage: dpll-server [options]

Options:
  --help, -h     Show this help message
  --version, -v  Show version information

Tools:
  - solve              Find a satisfying assignment for a CNF formula
  - check-satisfiable  Decide satisfiability only
  - evaluate           Check an assignment against a formula
  - parse-instances    Parse instance text into formulas

Environment:
  DPLL_ENGINE, DPLL_VERBOSITY, DPLL_VERIFY_MODELS, DPLL_MAX_TRACE_LINES

The server communicates via stdio using the Model Context Protocol.
`);
        process.exit(0);
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(`${SERVER_NAME} version ${VERSION}`);
        process.exit(0);
    }

    try {
        await runServer();
    } catch (error) {
        console.error('Failed to start server:', error);
        process.exit(1);
    }
}

void main();
