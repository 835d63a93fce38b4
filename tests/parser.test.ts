/**
 * Tokenizer and parser tests
 */

import { parse, tokenize, Tokenizer, Parser } from '../src/parser/index.js';
import { LogicException } from '../src/types/errors.js';
import { captureError } from './fixtures.js';

describe('Tokenizer', () => {
    test('tokenizes all operator types with positions', () => {
        const tokens = tokenize('a => b && ~c');

        expect(tokens.map(t => t.type)).toEqual(['TERM', 'IMPLIES', 'TERM', 'AND', 'NOT', 'TERM', 'EOF']);
        expect(tokens.map(t => t.value)).toEqual(['a', '=>', 'b', '&&', '~', 'c', '']);
        expect(tokens.map(t => t.position)).toEqual([0, 2, 5, 7, 10, 11, 12]);
    });

    test('splits symbols without surrounding whitespace', () => {
        const tokens = new Tokenizer('a&&b||~(c=>d)').tokenize();

        expect(tokens.map(t => t.value)).toEqual(['a', '&&', 'b', '||', '~', '(', 'c', '=>', 'd', ')', '']);
    });

    test('keeps punctuation that is not a symbol inside terms', () => {
        const tokens = tokenize('x.1 & y-z = w');

        expect(tokens.filter(t => t.type === 'TERM').map(t => t.value)).toEqual(['x.1', '&', 'y-z', '=', 'w']);
    });

    test('ends a term at the first symbol', () => {
        expect(tokenize('rain=>wet').map(t => t.value)).toEqual(['rain', '=>', 'wet', '']);
        expect(tokenize('a=b').map(t => t.value)).toEqual(['a=b', '']);
    });

    test('terms are case-sensitive', () => {
        expect(tokenize('A && a').map(t => t.value)).toEqual(['A', '&&', 'a', '']);
    });

    test('throws a lex error on empty input', () => {
        const error = captureError(() => tokenize('   '));

        expect(error.code).toBe('LEX_ERROR');
        expect(error.message).toBe('Empty input');
        expect(error.position).toBe(0);
    });
});

describe('Parser - Precedence and Associativity', () => {
    test('parses a single term', () => {
        expect(parse('rain')).toEqual({ type: 'term', name: 'rain' });
    });

    test('=> binds loosest', () => {
        expect(parse('a => b && c')).toEqual(parse('a => (b && c)'));
        expect(parse('a => b && c')).not.toEqual(parse('(a => b) && c'));
    });

    test('&& binds tighter than ||', () => {
        expect(parse('a || b && c')).toEqual({
            type: 'or',
            left: { type: 'term', name: 'a' },
            right: {
                type: 'and',
                left: { type: 'term', name: 'b' },
                right: { type: 'term', name: 'c' },
            },
        });
    });

    test('~ binds tightest', () => {
        expect(parse('~a && b')).toEqual({
            type: 'and',
            left: { type: 'not', operand: { type: 'term', name: 'a' } },
            right: { type: 'term', name: 'b' },
        });
    });

    test('&& and || are left associative', () => {
        expect(parse('a && b && c')).toEqual(parse('(a && b) && c'));
        expect(parse('a || b || c')).toEqual(parse('(a || b) || c'));
    });

    test('=> is right associative', () => {
        expect(parse('a => b => c')).toEqual({
            type: 'implies',
            left: { type: 'term', name: 'a' },
            right: {
                type: 'implies',
                left: { type: 'term', name: 'b' },
                right: { type: 'term', name: 'c' },
            },
        });
        expect(parse('a => b => c')).not.toEqual(parse('(a => b) => c'));
    });

    test('parses double negation', () => {
        const ast = parse('~~a');
        expect(ast).toEqual({ type: 'not', operand: { type: 'not', operand: { type: 'term', name: 'a' } } });
    });

    test('parentheses re-enter at the loosest level', () => {
        expect(parse('~(a || b)')).toEqual({
            type: 'not',
            operand: {
                type: 'or',
                left: { type: 'term', name: 'a' },
                right: { type: 'term', name: 'b' },
            },
        });
        expect(parse('((a))')).toEqual({ type: 'term', name: 'a' });
    });
});

describe('Parser - Error Handling', () => {
    const cases: Array<[string, string, number]> = [
        ['a &&', "Missing operand after '&&'", 4],
        ['&& a', "Missing operand before '&&'", 0],
        ['a && || b', "Missing operand before '||'", 5],
        ['(a && b', "Missing closing ')' for '(' at position 0", 7],
        ['a)', "Unmatched ')'", 1],
        ['a b', "Missing operator before 'b'", 2],
        ['a (b)', "Missing operator before '('", 2],
        ['()', 'Empty parentheses', 1],
        ['~', "Missing operand after '~'", 1],
        ['a && )', "Unexpected ')'", 5],
    ];

    test.each(cases)('rejects %p', (input, message, position) => {
        const error = captureError(() => parse(input));

        expect(error).toBeInstanceOf(LogicException);
        expect(error.code).toBe('PARSE_ERROR');
        expect(error.message).toBe(message);
        expect(error.position).toBe(position);
        expect(error.error.context).toBe(input);
    });

    test('rejects an empty token stream', () => {
        const parser = new Parser([{ type: 'EOF', value: '', position: 0 }], '');
        const error = captureError(() => parser.parse());

        expect(error.code).toBe('PARSE_ERROR');
        expect(error.message).toBe('Empty expression');
    });

    test('whitespace-only input is a lex error', () => {
        expect(captureError(() => parse(' \t ')).code).toBe('LEX_ERROR');
    });
});
