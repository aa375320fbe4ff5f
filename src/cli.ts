#!/usr/bin/env node
import chalk from 'chalk';
import { loadInstances, formatInstancesText } from './parser/index.js';
import { cnfToString, clausesToDIMACS } from './logic/clause.js';
import { EngineRegistry, isEngineName, ENGINE_NAMES } from './engines/registry.js';
import { unsatisfiedClauses } from './utils/evaluation.js';
import { formatModel } from './utils/response.js';
import {
    createRng,
    generateSatisfiableCnf,
    generateUnsatisfiableCnf,
    generateRandomCnf,
} from './utils/random.js';
import { loadConfig } from './config.js';
import { DpllException, CNF } from './types/index.js';
import { VERSION } from './version.js';

const HELP = `
DPLL CLI v${VERSION}

Usage:
  dpll solve <file>      Solve every formula in an instance file
  dpll validate <file>   Check that every literal token parses
  dpll dimacs <file>     Print each formula in DIMACS CNF format
  dpll generate          Print random instances

Options:
  --engine=<name>    Solver engine (${ENGINE_NAMES.join(', ')})
  --trace            Print the decisions and propagations (dpll engine)
  --no-verify        Skip the evaluator check of returned models
  --seed=<n>         Generator seed (default: 1)
  --count=<n>        Number of generated formulas (default: 5)
  --kind=<kind>      Generated formulas: sat, unsat or random (default: random)
  --help, -h         Show this help
  --version, -v      Show version

Instance format:
  One clause per line, literals separated by spaces ("2 -0 4"),
  a blank line between formulas.
`;

const args = process.argv.slice(2);
const flags = new Map<string, string>();
const cleanArgs: string[] = [];

for (const arg of args) {
    if (arg.startsWith('--')) {
        const [key, value] = arg.slice(2).split('=', 2);
        flags.set(key, value ?? 'true');
    } else if (!arg.startsWith('-')) {
        cleanArgs.push(arg);
    }
}

const commandName = cleanArgs[0];
const fileName = cleanArgs[1];

function fail(message: string): never {
    console.error(chalk.red(`Error: ${message}`));
    process.exit(1);
}

function intFlag(name: string, fallback: number): number {
    const raw = flags.get(name);
    if (raw === undefined) return fallback;
    const n = Number(raw);
    if (!Number.isSafeInteger(n) || n < 0) {
        fail(`--${name} must be a non-negative integer, got '${raw}'`);
    }
    return n;
}

function readFormulas(): CNF[] {
    if (!fileName) {
        fail('file argument required');
    }
    return loadInstances(fileName);
}

async function runSolve(): Promise<void> {
    const config = loadConfig();
    const engineName = flags.get('engine') ?? config.engine;
    if (!isEngineName(engineName)) {
        fail(`Invalid engine '${engineName}'. Valid options are: ${ENGINE_NAMES.join(', ')}`);
    }

    const verify = flags.has('no-verify') ? false : config.verifyModels;
    const registry = new EngineRegistry(verify);
    const engine = await registry.getEngine(engineName);
    const includeTrace = flags.has('trace');

    const formulas = readFormulas();
    console.log(chalk.dim(`Engine: ${engine.name}, ${formulas.length} formula(s)`));

    let index = 0;
    for (const cnf of formulas) {
        index++;
        const result = await engine.checkSat(cnf, { includeTrace, maxTraceLines: config.maxTraceLines });
        const label = `#${index} (${cnf.length} clauses, ${result.statistics.variables} variables, ${result.statistics.timeMs}ms)`;

        if (result.sat && result.model) {
            console.log(`${chalk.green('✓ SAT')}   ${label}`);
            console.log(`  ${formatModel(result.model)}`);
            const failing = unsatisfiedClauses(cnf, result.model);
            if (failing.length > 0) {
                console.log(chalk.yellow(`  model leaves clauses ${failing.join(', ')} unsatisfied`));
            }
        } else {
            console.log(`${chalk.red('✗ UNSAT')} ${label}`);
        }

        if (result.trace) {
            console.log(chalk.gray(result.trace.map(l => `    ${l}`).join('\n')));
        }
    }
}

function runValidate(): void {
    const formulas = readFormulas();
    formulas.forEach((cnf, i) => {
        console.log(`${chalk.green('✓')} #${i + 1} ${cnfToString(cnf)}`);
    });
}

function runDimacs(): void {
    const formulas = readFormulas();
    formulas.forEach((cnf, i) => {
        const { dimacs } = clausesToDIMACS(cnf);
        console.log(`c formula ${i + 1} (variable v is written as v+1)`);
        console.log(dimacs);
    });
}

function runGenerate(): void {
    const rng = createRng(intFlag('seed', 1));
    const count = intFlag('count', 5);
    const kind = flags.get('kind') ?? 'random';

    const formulas: CNF[] = [];
    for (let i = 0; i < count; i++) {
        switch (kind) {
            case 'sat':
                formulas.push(generateSatisfiableCnf(rng).cnf);
                break;
            case 'unsat':
                formulas.push(generateUnsatisfiableCnf(rng));
                break;
            case 'random':
                // Empty clauses and formulas have no textual form
                formulas.push(generateRandomCnf(rng).filter(c => c.literals.length > 0));
                break;
            default:
                fail(`Unknown kind '${kind}'. Valid options are: sat, unsat, random`);
        }
    }

    process.stdout.write(formatInstancesText(formulas.filter(cnf => cnf.length > 0)));
}

async function main(): Promise<void> {
    if (flags.has('help') || args.includes('-h') || !commandName) {
        console.log(HELP);
        return;
    }

    if (flags.has('version') || args.includes('-v')) {
        console.log(VERSION);
        return;
    }

    switch (commandName) {
        case 'solve':
            await runSolve();
            break;
        case 'validate':
            runValidate();
            break;
        case 'dimacs':
            runDimacs();
            break;
        case 'generate':
            runGenerate();
            break;
        default:
            console.error(chalk.red(`Unknown command: ${commandName}`));
            console.log(HELP);
            process.exit(1);
    }
}

main().catch((e: unknown) => {
    if (e instanceof DpllException) {
        console.error(chalk.red(`✗ ${e.message}`));
        if (e.error.suggestion) {
            console.error(chalk.dim(`  ${e.error.suggestion}`));
        }
        process.exit(1);
    }
    console.error(e);
    process.exit(1);
});
