export {
    createLiteral,
    negateLiteral,
    literalsEqual,
    compareLiterals,
    literalToString,
    literalKey,
    parseLiteral,
} from './literal.js';

export {
    makeClause,
    makeCnf,
    clauseContains,
    isEmptyClause,
    hasEmptyClause,
    variablesOf,
    clauseToString,
    cnfToString,
    clausesToDIMACS,
} from './clause.js';
