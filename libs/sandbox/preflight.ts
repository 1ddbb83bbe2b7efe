/**
 * Static preflight for candidate scripts.
 *
 * Rejects programs that cannot compile before a sandbox slot is spent on
 * them: an empty program, an unterminated string literal, or unbalanced
 * delimiters outside strings and comments.
 */

export type PreflightResult =
    | { readonly ok: true }
    | { readonly ok: false; readonly problem: string };

const CLOSERS: Readonly<Record<string, string>> = { '}': '{', ')': '(', ']': '[' };
const OPENERS = new Set(['{', '(', '[']);
// Prefixes of single-quoted literals: regex, raw string, timestamp.
const QUOTE_PREFIXES = new Set(['r', 's', 't']);

interface Opened {
    readonly char: string;
    readonly line: number;
    readonly column: number;
}

export function preflightCheck(script: string): PreflightResult {
    const body = script.split('\n').filter(l => !/^\s*(#.*)?$/.test(l));
    if (body.length === 0) {
        return { ok: false, problem: 'empty program' };
    }

    const stack: Opened[] = [];
    let line = 1;
    let column = 0;
    let quote: { readonly char: string; readonly line: number; readonly column: number } | null = null;
    let inComment = false;

    for (let i = 0; i < script.length; i++) {
        const ch = script.charAt(i);
        column += 1;

        if (ch === '\n') {
            line += 1;
            column = 0;
            inComment = false;
            continue;
        }
        if (inComment) continue;

        if (quote) {
            if (ch === '\\') {
                if (script.charAt(i + 1) !== '\n') {
                    i += 1;
                    column += 1;
                }
            } else if (ch === quote.char) {
                quote = null;
            }
            continue;
        }

        if (ch === '#') {
            inComment = true;
        } else if (ch === '"') {
            quote = { char: '"', line, column };
        } else if (ch === "'" && QUOTE_PREFIXES.has(script.charAt(i - 1))) {
            quote = { char: "'", line, column };
        } else if (OPENERS.has(ch)) {
            stack.push({ char: ch, line, column });
        } else {
            const expected = CLOSERS[ch];
            if (expected !== undefined) {
                const top = stack.pop();
                if (!top) {
                    return { ok: false, problem: `unexpected '${ch}' at line ${line}, column ${column}` };
                }
                if (top.char !== expected) {
                    return {
                        ok: false,
                        problem: `mismatched '${ch}' at line ${line}, column ${column} closes '${top.char}' opened at line ${top.line}, column ${top.column}`
                    };
                }
            }
        }
    }

    if (quote) {
        return { ok: false, problem: `unterminated string literal starting at line ${quote.line}, column ${quote.column}` };
    }

    const unclosed = stack.pop();
    if (unclosed) {
        return { ok: false, problem: `unclosed '${unclosed.char}' opened at line ${unclosed.line}, column ${unclosed.column}` };
    }

    return { ok: true };
}
