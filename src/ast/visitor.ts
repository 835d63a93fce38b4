import type { Expression } from '../types/index.js';

/**
 * Generic expression visitor (pre-order, left to right)
 */
export function traverse(node: Expression, visitor: (node: Expression) => void): void {
    visitor(node);

    switch (node.type) {
        case 'not':
            traverse(node.operand, visitor);
            break;
        case 'and':
        case 'or':
        case 'implies':
            traverse(node.left, visitor);
            traverse(node.right, visitor);
            break;
    }
}
