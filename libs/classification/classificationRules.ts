/**
 * Ordered classification rules. First match wins.
 *
 * A rule matches when the diagnostic code matches `codes` or any of its
 * text `patterns` matches the raw failure text. Patterns must not carry the
 * g or y flag: a stateful RegExp would make classification order-dependent.
 */

import type { ErrorKind } from './errorTypes.js';

export interface FailureDetails {
    readonly symbol?: string;
    readonly code?: string;
    /** Replacement offered by the compiler ("did you mean ...") */
    readonly hint?: string;
    readonly expectedType?: string;
    readonly actualType?: string;
}

export interface ClassificationRule {
    readonly kind: ErrorKind;
    readonly codes?: RegExp;
    readonly patterns: readonly RegExp[];
    /** Tried in order; the first capture group is the symbol */
    readonly symbolPatterns?: readonly RegExp[];
    /** Fall back to the source text under the compiler's caret marker */
    readonly useCaretSpan?: boolean;
    readonly suggestFix: (details: FailureDetails) => string;
}

/**
 * Undefined names that are control-flow keywords of other languages,
 * mapped to the remap language's own keyword.
 */
export const CONTROL_FLOW_REPLACEMENTS: ReadonlyMap<string, string> = new Map([
    ['exit', 'return'],
    ['quit', 'return'],
    ['die', 'return'],
    ['stop', 'return'],
    ['break', 'return'],
    ['continue', 'return'],
    ['elif', 'else if'],
    ['elsif', 'else if'],
    ['elseif', 'else if']
]);

function quoted(symbol: string | undefined): string {
    return symbol ? `\`${symbol}\`` : 'the reported name';
}

function fallibilityFix({ code, symbol }: FailureDetails): string {
    const target = symbol ? ` ${quoted(symbol)}` : '';
    if (code === 'E104') {
        return `The expression${target} cannot fail; remove its \`, err\` assignment or \`??\` default and keep the rest of the script.`;
    }
    return `Handle the fallible expression${target}: abort on failure with \`!\`, fall back with \`?? default\`, or capture the error with \`value, err = ...\`.`;
}

export const DEFAULT_RULES: readonly ClassificationRule[] = [
    {
        kind: 'UndefinedSymbol',
        codes: /^E(?:701|105)$/,
        patterns: [
            /call to undefined (?:variable|function)/i,
            /undefined (?:variable|function|symbol)/i,
            /is not defined/i
        ],
        symbolPatterns: [
            /undefined (?:variable|function|symbol)\s+[`"']([^`"'\s]+)[`"']/i,
            /[`"']([^`"'\s]+)[`"'] is not defined/i
        ],
        useCaretSpan: true,
        suggestFix: ({ symbol, hint }) => {
            const keyword = symbol ? CONTROL_FLOW_REPLACEMENTS.get(symbol) : undefined;
            if (keyword) {
                return `Replace ${quoted(symbol)} with the control-flow keyword \`${keyword}\`.`;
            }
            if (hint) {
                return `${quoted(symbol)} is not defined; use \`${hint}\` if that was intended, otherwise define ${quoted(symbol)} before its first use.`;
            }
            return `Define ${quoted(symbol)} before its first use, or replace it with the nearest valid keyword or function.`;
        }
    },
    {
        kind: 'MissingArgument',
        codes: /^E107$/,
        patterns: [
            /required argument missing/i,
            /missing (?:function |required )?argument/i,
            /too few arguments/i
        ],
        symbolPatterns: [
            /argument missing:\s*[`"']?([A-Za-z_]\w*)/i,
            /argument missing\s+[`"']([A-Za-z_]\w*)[`"']/i,
            /missing (?:function |required )?argument:?\s+[`"']([A-Za-z_]\w*)[`"']/i,
            /argument [`"']([A-Za-z_]\w*)[`"'] is required/i
        ],
        suggestFix: ({ symbol }) => symbol
            ? `Supply the required argument \`${symbol}\` as declared by the function signature.`
            : 'Supply every required argument as declared by the function signature.'
    },
    {
        // Fallibility errors: E100, E103, E104
        kind: 'TypeMismatch',
        codes: /^E10[034]$/,
        patterns: [
            /unhandled fallible assignment/i,
            /unhandled (?:root )?runtime error/i,
            /unhandled error/i,
            /unnecessary error (?:assignment|coalesce)/i
        ],
        useCaretSpan: true,
        suggestFix: fallibilityFix
    },
    {
        kind: 'TypeMismatch',
        codes: /^E(?:110|102|652|660)$/,
        patterns: [
            /invalid argument type/i,
            /type mismatch/i,
            /expected\s+[^,\n]+?,?\s+(?:but\s+)?(?:got|found|received)\s+/i,
            /can(?:'t|not) (?:be )?(?:convert|coerce)/i,
            /only objects can be merged/i,
            /non-boolean/i
        ],
        symbolPatterns: [
            /parameter [`"']([A-Za-z_]\w*)[`"']/i,
            /argument [`"']([A-Za-z_]\w*)[`"']/i
        ],
        useCaretSpan: true,
        suggestFix: ({ symbol, expectedType, actualType }) => {
            const target = symbol ? ` for ${quoted(symbol)}` : '';
            if (expectedType && actualType) {
                return `Convert the value${target} from ${actualType} to ${expectedType} explicitly before use.`;
            }
            return `Insert an explicit type conversion${target} before the value is used.`;
        }
    },
    {
        kind: 'PatternNoMatch',
        patterns: [
            /unable to parse input with grok pattern/i,
            /grok pattern[^\n]*?(?:failed|did not match|no match)/i,
            /could not find any pattern matches/i,
            /(?:pattern|regex) (?:did not|does not|failed to) match/i,
            /no (?:grok )?pattern matched/i
        ],
        symbolPatterns: [
            /function call error for [`"']([A-Za-z_]\w*)[`"']/i
        ],
        suggestFix: ({ symbol }) => {
            const where = symbol ? ` used by ${quoted(symbol)}` : '';
            return `Re-derive the extraction pattern${where} from a structural re-analysis of the sample lines, and add a catch-all fallback branch for lines it does not match.`;
        }
    },
    {
        kind: 'SyntaxError',
        codes: /^E(?:101|2\d\d)$/,
        patterns: [
            /syntax error/i,
            /unexpected (?:syntax )?token/i,
            /unexpected end of (?:file|input|program)/i,
            /invalid escape/i,
            /unbalanced/i,
            /unterminated/i,
            /^preflight:/m
        ],
        symbolPatterns: [
            /unexpected (?:syntax )?token:?\s+[`"']([^`"']+)[`"']/i
        ],
        useCaretSpan: true,
        suggestFix: () =>
            'Regenerate the script from scratch honoring the basic grammar: balanced delimiters, terminated string literals and one statement per line.'
    }
];

export function unclassifiedFix(timedOut: boolean): string {
    return timedOut
        ? 'Execution exceeded the sandbox time limit; avoid backtracking-heavy patterns and regenerate.'
        : 'No known failure pattern matched; use the raw sandbox output verbatim as context and regenerate.';
}
