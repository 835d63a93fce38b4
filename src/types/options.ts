import { z } from 'zod';

export type RenderStyle = 'minimal' | 'grouped';

export interface RenderOptions {
    /**
     * 'minimal' parenthesizes only where precedence requires it.
     * 'grouped' also wraps every operand whose connective differs from its parent's.
     */
    style?: RenderStyle;
}

export interface SimplifyOptions {
    /** Drop clauses that are strict supersets of another clause */
    subsume?: boolean;
}

export const DEFAULTS = {
    form: 'cnf',
    subsume: true,
    style: 'grouped',
    includeTrace: false,
} as const;

export const normalizeOptionsSchema = z.object({
    form: z.enum(['cnf', 'dnf']).default(DEFAULTS.form)
        .describe("Target normal form: 'cnf' (conjunction of disjunctions) or 'dnf'"),
    subsume: z.boolean().default(DEFAULTS.subsume)
        .describe('Remove clauses subsumed by a smaller clause'),
    style: z.enum(['minimal', 'grouped']).default(DEFAULTS.style)
        .describe('Parenthesization of the rendered output'),
    includeTrace: z.boolean().default(DEFAULTS.includeTrace)
        .describe('Record the formula after each pipeline stage'),
}).strict();

/** Options as accepted by `normalize` */
export type NormalizeOptions = z.input<typeof normalizeOptionsSchema>;

/** Options after defaults are applied */
export type ResolvedNormalizeOptions = z.output<typeof normalizeOptionsSchema>;
