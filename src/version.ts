export const SERVER_NAME = 'dpll-logic';
export const VERSION = '0.1.0';
