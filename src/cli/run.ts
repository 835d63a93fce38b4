import chalk from 'chalk';
import { normalize } from '../logic/normalizer.js';
import type { NormalForm, NormalizeFailure, TraceStep } from '../types/index.js';
import type { RenderStyle } from '../types/options.js';

export const VERSION = '1.0.0';

export const HELP = `
propnorm v${VERSION} - rewrite propositional formulas into simplified CNF or DNF

Usage:
  propnorm <sentence> [cnf|dnf] [options]

Grammar (tightest binding first):
  ~  not     &&  and     ||  or     =>  implies (right associative)
  ( )  grouping; anything else is a term

Output:
  'true' and 'false' in the output are constants (the formula collapsed).
  In a sentence they are ordinary terms.

Options:
  --trace         Print the formula after each pipeline stage
  --json          Print the full result as JSON
  --minimal       Only parenthesize where precedence requires it
  --no-subsume    Keep clauses subsumed by smaller ones
  --help, -h      Show this help
  --version, -v   Show version (-h and -v only when given alone;
                  otherwise they are read as terms)

Examples:
  propnorm 'a => b && ~c'
  propnorm 'a => b && c' dnf
`;

export interface CliIO {
    stdout: (line: string) => void;
    stderr: (line: string) => void;
    /** Colour diagnostics (default: auto-detected) */
    color?: boolean;
}

interface CliArgs {
    help: boolean;
    version: boolean;
    trace: boolean;
    json: boolean;
    style: RenderStyle;
    subsume: boolean;
    positional: string[];
    unknown: string[];
}

const FLAGS = new Set(['--help', '--version', '--trace', '--json', '--minimal', '--no-subsume']);

/**
 * Flags are '--long' options; everything else is positional, so a sentence
 * such as '-a' or '~a' is never mistaken for a flag. The short forms -h and -v
 * count only when they are the sole positional argument.
 */
function parseArgs(args: string[]): CliArgs {
    const positional: string[] = [];
    const unknown: string[] = [];

    for (const arg of args) {
        if (FLAGS.has(arg)) continue;
        if (arg.startsWith('--')) {
            unknown.push(arg);
        } else {
            positional.push(arg);
        }
    }

    const short = positional.length === 1 ? positional[0] : undefined;

    return {
        help: args.includes('--help') || short === '-h',
        version: args.includes('--version') || short === '-v',
        trace: args.includes('--trace'),
        json: args.includes('--json'),
        style: args.includes('--minimal') ? 'minimal' : 'grouped',
        subsume: !args.includes('--no-subsume'),
        positional,
        unknown,
    };
}

function parseForm(arg: string | undefined): NormalForm | undefined {
    if (arg === undefined) return 'cnf';
    const lowered = arg.toLowerCase();
    if (lowered === 'cnf' || lowered === 'dnf') return lowered;
    return undefined;
}

/**
 * Run the command line tool. Returns the process exit code:
 * 0 on success, 1 on a syntax error in the sentence, 2 on usage errors.
 */
export function runCli(args: string[], io: CliIO): number {
    const paint = io.color === false ? new chalk.Instance({ level: 0 }) : chalk;
    const parsed = parseArgs(args);

    if (parsed.help) {
        io.stdout(HELP);
        return 0;
    }

    if (parsed.version) {
        io.stdout(VERSION);
        return 0;
    }

    const usageError = (message: string): number => {
        io.stderr(`${paint.red('Error:')} ${message}`);
        io.stderr('Run with --help for usage.');
        return 2;
    };

    if (parsed.unknown.length > 0) {
        return usageError(`Unknown option '${parsed.unknown[0]}'`);
    }

    if (parsed.positional.length === 0) {
        return usageError('A sentence is required');
    }
    if (parsed.positional.length > 2) {
        return usageError(`Unexpected argument '${parsed.positional[2]}'`);
    }

    const [sentence, formArg] = parsed.positional;
    const form = parseForm(parsed.positional.length > 1 ? formArg : undefined);
    if (form === undefined) {
        return usageError(`Invalid form '${formArg}'. Valid options are: cnf, dnf`);
    }

    const result = normalize(sentence, {
        form,
        style: parsed.style,
        subsume: parsed.subsume,
        includeTrace: parsed.trace,
    });

    if (parsed.json) {
        io.stdout(JSON.stringify(result, null, 2));
        return result.success ? 0 : 1;
    }

    if (!result.success) {
        reportFailure(result, sentence, io, paint);
        return 1;
    }

    if (result.steps) {
        printTrace(result.steps, io, paint);
    }
    io.stdout(result.output);
    return 0;
}

type Painter = Pick<typeof chalk, 'red' | 'dim' | 'yellow'>;

function printTrace(steps: TraceStep[], io: CliIO, paint: Painter): void {
    for (const step of steps) {
        io.stdout(`${paint.dim(`${step.stage}:`.padEnd(12))}${step.formula}`);
    }
}

function reportFailure(result: NormalizeFailure, sentence: string, io: CliIO, paint: Painter): void {
    const { error } = result;
    const where = error.span ? ` (position ${error.span.start})` : '';
    io.stderr(`${paint.red('Error:')} ${error.message}${where}`);

    if (error.span) {
        const line = sentence.split('\n')[(error.span.line ?? 1) - 1] ?? sentence;
        const col = error.span.col ?? error.span.start + 1;
        io.stderr(`  ${line}`);
        io.stderr(`  ${' '.repeat(col - 1)}${paint.red('^')}`);
    }

    if (error.suggestion) {
        io.stderr(paint.yellow(`Suggestion: ${error.suggestion}`));
    }
}
