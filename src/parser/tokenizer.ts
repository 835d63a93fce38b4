import type { Token, TokenType } from '../types/parser.js';
import { createLexError } from '../types/errors.js';

/** Recognized symbols, longest first so '=>' is never split */
const SYMBOLS: ReadonlyArray<readonly [string, TokenType]> = [
    ['&&', 'AND'],
    ['||', 'OR'],
    ['=>', 'IMPLIES'],
    ['~', 'NOT'],
    ['(', 'LPAREN'],
    [')', 'RPAREN'],
];

/**
 * Tokenizer for propositional formulas.
 *
 * Everything that is neither whitespace nor the start of a symbol belongs to a term,
 * so `a-1`, `x.y` and a lone `&` are all term text.
 */
export class Tokenizer {
    private input: string;
    private pos: number = 0;
    private tokens: Token[] = [];

    constructor(input: string) {
        this.input = input;
    }

    tokenize(): Token[] {
        if (this.input.trim().length === 0) {
            throw createLexError('Empty input', this.input, 0);
        }

        while (this.pos < this.input.length) {
            this.skipWhitespace();
            if (this.pos >= this.input.length) break;

            const symbol = this.matchSymbol();
            if (symbol) {
                const [value, type] = symbol;
                this.tokens.push({ type, value, position: this.pos });
                this.pos += value.length;
                continue;
            }

            this.readTerm();
        }

        this.tokens.push({ type: 'EOF', value: '', position: this.input.length });
        return this.tokens;
    }

    private skipWhitespace(): void {
        while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
            this.pos++;
        }
    }

    private matchSymbol(): readonly [string, TokenType] | undefined {
        return SYMBOLS.find(([value]) => this.input.startsWith(value, this.pos));
    }

    private readTerm(): void {
        const start = this.pos;
        while (
            this.pos < this.input.length &&
            !/\s/.test(this.input[this.pos]) &&
            !this.matchSymbol()
        ) {
            this.pos++;
        }
        this.tokens.push({ type: 'TERM', value: this.input.slice(start, this.pos), position: start });
    }
}

/**
 * Split a formula into tokens. The result always ends with an EOF token.
 */
export function tokenize(input: string): Token[] {
    return new Tokenizer(input).tokenize();
}
