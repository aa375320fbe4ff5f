/**
 * Type declarations for logic-solver package
 *
 * logic-solver is a MiniSat-based SAT solver compiled to JavaScript.
 * https://www.npmjs.com/package/logic-solver
 */

declare module 'logic-solver' {
    interface Solver {
        /**
         * Require a formula to be true.
         */
        require(formula: Formula): void;

        /**
         * Solve the constraints and return a solution, or null if unsatisfiable.
         */
        solve(): Solution | null;
    }

    interface Solution {
        /**
         * Get the assignment map from variable names to booleans.
         */
        getMap(): Record<string, boolean>;

        /**
         * Get the list of variables that are true.
         */
        getTrueVars(): string[];
    }

    type Formula = string | FormulaObject;

    interface FormulaObject {
        type: string;
        operands?: Formula[];
    }

    interface Logic {
        /**
         * Create a new solver.
         */
        Solver: new () => Solver;

        /**
         * Create a disjunction (OR) formula.
         */
        or(...operands: Formula[]): Formula;

        /**
         * Create a negation (NOT) formula.
         */
        not(operand: Formula): Formula;
    }

    const Logic: Logic;
    export = Logic;
}
