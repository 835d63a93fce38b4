/**
 * Normalizer - CNF / DNF Transformation
 *
 * Converts propositional formulas to a simplified normal form:
 * 1. Parse the input
 * 2. Eliminate implications and push negations inward (NNF)
 * 3. Distribute to a two-level CNF or DNF tree
 * 4. Simplify clauses
 * 5. Render
 */

import { parse } from '../parser/index.js';
import type {
    Clause,
    Expression,
    NormalForm,
    NormalizeResult,
    NormalizeStatistics,
    TraceStage,
    TraceStep,
} from '../types/index.js';
import {
    LogicException,
    createOptionsError,
    isLogicException,
} from '../types/errors.js';
import {
    normalizeOptionsSchema,
    NormalizeOptions,
    ResolvedNormalizeOptions,
    SimplifyOptions,
} from '../types/options.js';
import { countNodes, createConstant, extractTerms, render } from '../ast/index.js';
import { toNNF, distribute, simplify, reduceClauses } from './transform/index.js';
import { clausesToExpression } from './clause.js';

/**
 * Rewrite an expression tree into simplified `form`.
 */
export function convert(
    expr: Expression,
    form: NormalForm,
    options: SimplifyOptions = {}
): Expression {
    return simplify(expr, form, options);
}

/**
 * Validate options and fill in defaults.
 */
export function resolveOptions(options: unknown = {}): ResolvedNormalizeOptions {
    const parsed = normalizeOptionsSchema.safeParse(options);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i =>
            i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message
        );
        throw createOptionsError(issues.join('; '), { issues });
    }
    return parsed.data;
}

/**
 * Normalize a formula string or expression tree.
 *
 * Syntax and option errors are reported in the result rather than thrown.
 */
export function normalize(input: string | Expression, options: NormalizeOptions = {}): NormalizeResult {
    const startTime = Date.now();

    try {
        const opts = resolveOptions(options);
        const ast = typeof input === 'string' ? parse(input) : input;
        const originalSize = countNodes(ast);

        const steps: TraceStep[] = [];
        const record = (stage: TraceStage, expr: Expression): void => {
            if (opts.includeTrace) {
                steps.push({ stage, formula: render(expr, { style: opts.style }) });
            }
        };

        record('parse', ast);
        const nnf = toNNF(ast);
        record('nnf', nnf);
        const distributed = distribute(nnf, opts.form);
        record('distribute', distributed);

        const simplified = reduceClauses(distributed, opts.form, { subsume: opts.subsume });
        const clauses: Clause[] = typeof simplified === 'boolean' ? [] : simplified;
        const expression = typeof simplified === 'boolean'
            ? createConstant(simplified)
            : clausesToExpression(simplified, opts.form);
        record('simplify', expression);

        return {
            success: true,
            form: opts.form,
            output: render(expression, { style: opts.style }),
            expression,
            clauses,
            ...(typeof simplified === 'boolean' && { constant: simplified }),
            terms: extractTerms(ast),
            statistics: {
                originalSize,
                clauseCount: clauses.length,
                maxClauseSize: clauses.reduce((max, c) => Math.max(max, c.literals.length), 0),
                timeMs: Date.now() - startTime,
            },
            ...(opts.includeTrace && { steps }),
        };
    } catch (e) {
        if (isLogicException(e)) {
            return {
                success: false,
                error: e.error,
                statistics: emptyStatistics(Date.now() - startTime),
            };
        }
        throw e;
    }
}

/**
 * Normalize a formula string and return the rendered result.
 * Throws LogicException on invalid input.
 */
export function toNormalForm(input: string, form: NormalForm = 'cnf'): string {
    const result = normalize(input, { form });
    if (!result.success) {
        throw new LogicException(result.error);
    }
    return result.output;
}

function emptyStatistics(timeMs: number): NormalizeStatistics {
    return {
        originalSize: 0,
        clauseCount: 0,
        maxClauseSize: 0,
        timeMs,
    };
}
