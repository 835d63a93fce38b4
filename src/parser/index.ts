import type { Expression } from '../types/index.js';
import { Tokenizer } from './tokenizer.js';
import { Parser } from './parser.js';

export { Tokenizer, tokenize } from './tokenizer.js';
export { Parser } from './parser.js';

/**
 * Parse a propositional formula string into an expression tree
 */
export function parse(input: string): Expression {
    const tokenizer = new Tokenizer(input);
    const tokens = tokenizer.tokenize();
    const parser = new Parser(tokens, input);
    return parser.parse();
}
