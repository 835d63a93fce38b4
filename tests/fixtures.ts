/**
 * Shared test fixtures: sample formulas and truth-table helpers.
 */
import { collectClauses, hasComplementaryPair } from '../src/logic/clause.js';
import { extractTerms } from '../src/ast/analysis.js';
import { toNNF } from '../src/logic/transform/nnf.js';
import { LogicException } from '../src/types/errors.js';
import type {
    Expression,
    Literal,
    NormalForm,
    NormalizeResult,
    NormalizeSuccess,
} from '../src/types/index.js';

// === Common Formulas ===
export const SAMPLE_FORMULAS = [
    'a',
    '~a',
    'a && b',
    'a || b',
    'a => b',
    'a => b && c',
    'a => b && ~c',
    '~(a && b) || c',
    '(a || b) && (c || d)',
    '(a && b) || (c && d)',
    'a => b => c',
    '(a => b) => c',
    '~(a => b)',
    '~(a || ~b) && (c => ~d)',
    'a && ~a',
    'a || ~a',
    '(p || q) && (p || ~q)',
    'x1 && (x2 || ~x3) => ~(x1 || x4)',
    '~~a && ~~~b',
    'a && (a || b)',
    '(a => b) && (b => c) && (c => a)',
    'rain && ~umbrella => wet',
];

export const FORMS: NormalForm[] = ['cnf', 'dnf'];

// === Truth tables ===

export function evaluate(node: Expression, assignment: Map<string, boolean>): boolean {
    switch (node.type) {
        case 'term':
            return assignment.get(node.name) ?? false;
        case 'constant':
            return node.value;
        case 'not':
            return !evaluate(node.operand, assignment);
        case 'and':
            return evaluate(node.left, assignment) && evaluate(node.right, assignment);
        case 'or':
            return evaluate(node.left, assignment) || evaluate(node.right, assignment);
        case 'implies':
            return !evaluate(node.left, assignment) || evaluate(node.right, assignment);
    }
}

/**
 * Every assignment of the given terms (2^n rows).
 */
export function assignments(terms: string[]): Map<string, boolean>[] {
    const rows: Map<string, boolean>[] = [];
    for (let row = 0; row < 2 ** terms.length; row++) {
        rows.push(new Map(terms.map((t, i) => [t, ((row >> i) & 1) === 1])));
    }
    return rows;
}

export function equivalent(a: Expression, b: Expression): boolean {
    const terms = [...new Set([...extractTerms(a), ...extractTerms(b)])];
    return assignments(terms).every(row => evaluate(a, row) === evaluate(b, row));
}

// === Shape checks ===

export function isNNF(node: Expression): boolean {
    switch (node.type) {
        case 'term':
        case 'constant':
            return true;
        case 'not':
            return node.operand.type === 'term';
        case 'and':
        case 'or':
            return isNNF(node.left) && isNNF(node.right);
        case 'implies':
            return false;
    }
}

function isLiteral(node: Expression): boolean {
    return node.type === 'term' || node.type === 'constant' ||
        (node.type === 'not' && node.operand.type === 'term');
}

/**
 * Outer connective over clauses, inner connective over literals, nothing deeper.
 */
export function isTwoLevel(node: Expression, form: NormalForm): boolean {
    const outer = form === 'cnf' ? 'and' : 'or';
    const inner = form === 'cnf' ? 'or' : 'and';

    const isClause = (n: Expression): boolean =>
        isLiteral(n) || ((n.type === 'and' || n.type === 'or') && n.type === inner && isClause(n.left) && isClause(n.right));

    const isFormula = (n: Expression): boolean =>
        isClause(n) || ((n.type === 'and' || n.type === 'or') && n.type === outer && isFormula(n.left) && isFormula(n.right));

    return isFormula(node);
}

/**
 * Whether any clause of a simplified formula holds a term and its negation.
 */
export function hasComplementaryClause(node: Expression, form: NormalForm): boolean {
    return collectClauses(toNNF(node), form).some(items =>
        hasComplementaryPair({
            literals: items.filter((item): item is Literal => typeof item !== 'boolean'),
        })
    );
}

// === Results and errors ===

export function expectSuccess(result: NormalizeResult): NormalizeSuccess {
    if (!result.success) {
        throw new Error(`Expected success but got ${result.error.code}: ${result.error.message}`);
    }
    return result;
}

export function captureError(fn: () => unknown): LogicException {
    try {
        fn();
    } catch (e) {
        if (e instanceof LogicException) return e;
        throw e;
    }
    throw new Error('Expected a LogicException to be thrown');
}
