import type { BinaryOperator, Expression } from '../types/index.js';
import type { RenderOptions, RenderStyle } from '../types/options.js';

/** Binding strength, loosest first: => || && ~ atom */
const PRECEDENCE = {
    implies: 1,
    or: 2,
    and: 3,
    not: 4,
    atom: 5,
} as const;

const SYMBOLS: Record<BinaryOperator, string> = {
    implies: '=>',
    or: '||',
    and: '&&',
};

function precedenceOf(node: Expression): number {
    switch (node.type) {
        case 'term':
        case 'constant':
            return PRECEDENCE.atom;
        default:
            return PRECEDENCE[node.type];
    }
}

/**
 * Render an expression back to the textual grammar.
 *
 * A sub-expression is parenthesized when it binds looser than the position it
 * sits in. The right operand of `&&`/`||` and the left operand of `=>` sit one
 * level tighter, so parsing the output gives back the same tree.
 */
export function render(node: Expression, options: RenderOptions = {}): string {
    return renderAt(node, 0, undefined, options.style ?? 'minimal');
}

function renderAt(
    node: Expression,
    context: number,
    parent: BinaryOperator | undefined,
    style: RenderStyle
): string {
    const text = renderBare(node, style);
    const mixed = style === 'grouped' &&
        parent !== undefined &&
        (node.type === 'and' || node.type === 'or' || node.type === 'implies') &&
        node.type !== parent;

    return precedenceOf(node) < context || mixed ? `(${text})` : text;
}

function renderBare(node: Expression, style: RenderStyle): string {
    switch (node.type) {
        case 'term':
            return node.name;
        case 'constant':
            return node.value ? 'true' : 'false';
        case 'not':
            return `~${renderAt(node.operand, PRECEDENCE.not, undefined, style)}`;
        case 'and':
        case 'or':
        case 'implies': {
            const level = PRECEDENCE[node.type];
            const rightAssociative = node.type === 'implies';
            const left = renderAt(node.left, rightAssociative ? level + 1 : level, node.type, style);
            const right = renderAt(node.right, rightAssociative ? level : level + 1, node.type, style);
            return `${left} ${SYMBOLS[node.type]} ${right}`;
        }
    }
}
