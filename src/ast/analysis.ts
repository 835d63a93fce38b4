import type { Expression } from '../types/index.js';
import { traverse } from './visitor.js';

/**
 * Distinct term names, in order of first appearance
 */
export function extractTerms(ast: Expression): string[] {
    const terms = new Set<string>();
    traverse(ast, node => {
        if (node.type === 'term') {
            terms.add(node.name);
        }
    });
    return [...terms];
}

/**
 * Count nodes in an expression (for complexity estimation)
 */
export function countNodes(ast: Expression): number {
    let count = 0;
    traverse(ast, () => { count++; });
    return count;
}

/**
 * Structural equality. Term names compare exactly (case-sensitive).
 */
export function expressionsEqual(a: Expression, b: Expression): boolean {
    switch (a.type) {
        case 'term':
            return b.type === 'term' && a.name === b.name;
        case 'constant':
            return b.type === 'constant' && a.value === b.value;
        case 'not':
            return b.type === 'not' && expressionsEqual(a.operand, b.operand);
        case 'and':
        case 'or':
        case 'implies':
            return (
                (b.type === 'and' || b.type === 'or' || b.type === 'implies') &&
                b.type === a.type &&
                expressionsEqual(a.left, b.left) &&
                expressionsEqual(a.right, b.right)
            );
    }
}
