/**
 * Error Classifier
 *
 * Deterministic classification of failed validation outcomes.
 *
 * GUARANTEE:
 * Every non-success outcome maps to exactly one ErrorKind. The same outcome
 * text always yields the same record; no clock, no I/O.
 */

import type { ExecutionOutcome } from '../sandbox/types.js';
import {
    DEFAULT_RULES,
    unclassifiedFix,
    type ClassificationRule,
    type FailureDetails
} from './classificationRules.js';
import type { ErrorKind, ErrorRecord, SourceLocation, SourceSpan } from './errorTypes.js';

const CODE_PATTERN = /error\[(E\d{3})\]/;
const ARROW_LOCATION = /(?:┌─|-->)\s*([^\s:]*):(\d+):(\d+)/;
const PROSE_LOCATION = /\bline\s+(\d+)(?:,?\s*col(?:umn)?\s+(\d+))?/i;
const RUNTIME_SPAN = /\bat \((\d+):(\d+)\)/;
const HINT_PATTERN = /did you mean [`"']([^`"'\s]+)[`"']/i;
const EXPECTED_GOT = /expected\s+([^,\n]+?),?\s+(?:but\s+)?(?:got|found|received)\s+(\w+(?:\s+or\s+\w+)*)/i;
const SOURCE_LINE = /^\s*\d+\s*│ ?(.*)$/;
const CARET_LINE = /^\s*│ ?( *)(\^+)/;

/**
 * Text the classifier reads: stderr verbatim, else stdout, else the exit code.
 */
export function rawMessageOf(outcome: ExecutionOutcome): string {
    if (outcome.stderr.trim() !== '') return outcome.stderr;
    if (outcome.stdout.trim() !== '') return outcome.stdout;
    return outcome.status === 'TIMEOUT'
        ? 'sandbox execution timed out'
        : `sandbox exited with code ${outcome.exitCode ?? 'unknown'}`;
}

export function extractCode(text: string): string | undefined {
    return CODE_PATTERN.exec(text)?.[1];
}

export function extractLocation(text: string): SourceLocation | undefined {
    const arrow = ARROW_LOCATION.exec(text);
    if (arrow) {
        const file = arrow[1];
        return {
            ...(file ? { file } : {}),
            line: Number(arrow[2]),
            column: Number(arrow[3])
        };
    }

    const prose = PROSE_LOCATION.exec(text);
    if (prose) {
        const column = prose[2];
        return {
            line: Number(prose[1]),
            ...(column !== undefined ? { column: Number(column) } : {})
        };
    }
    return undefined;
}

/**
 * Byte span of a runtime failure: `... at (9:71): unable to parse ...`.
 */
export function extractSpan(text: string): SourceSpan | undefined {
    const runtime = RUNTIME_SPAN.exec(text);
    if (!runtime) return undefined;
    return { start: Number(runtime[1]), end: Number(runtime[2]) };
}

/**
 * Source text underlined by the compiler's caret marker:
 *
 *     3 │ exit
 *       │ ^^^^
 */
export function extractCaretSpan(text: string): string | undefined {
    const lines = text.split('\n');
    for (let i = 0; i + 1 < lines.length; i++) {
        const source = SOURCE_LINE.exec(lines[i] ?? '');
        const caret = CARET_LINE.exec(lines[i + 1] ?? '');
        if (!source || !caret) continue;

        const start = (caret[1] ?? '').length;
        const width = (caret[2] ?? '').length;
        const span = (source[1] ?? '').slice(start, start + width).trim();
        if (span) return span;
    }
    return undefined;
}

function firstCapture(patterns: readonly RegExp[], text: string): string | undefined {
    for (const pattern of patterns) {
        const captured = pattern.exec(text)?.[1];
        if (captured) return captured;
    }
    return undefined;
}

function ruleMatches(rule: ClassificationRule, text: string, code: string | undefined): boolean {
    if (code && rule.codes?.test(code)) return true;
    return rule.patterns.some(p => p.test(text));
}

/**
 * Ordered rule classifier. Extra rules are consulted before the built-ins.
 */
export class ErrorClassifier {
    private readonly rules: readonly ClassificationRule[];

    constructor(extraRules: readonly ClassificationRule[] = []) {
        for (const rule of extraRules) {
            for (const pattern of [...rule.patterns, ...(rule.symbolPatterns ?? []), ...(rule.codes ? [rule.codes] : [])]) {
                if (pattern.global || pattern.sticky) {
                    throw new Error(`Classification pattern ${pattern} for ${rule.kind} must not be global or sticky`);
                }
            }
        }
        this.rules = [...extraRules, ...DEFAULT_RULES];
    }

    /**
     * Returns null for SUCCESS, exactly one record otherwise. Timeouts are
     * always Unclassified: their text carries no compiler diagnostic.
     */
    classify(outcome: ExecutionOutcome): ErrorRecord | null {
        if (outcome.status === 'SUCCESS') return null;

        const rawMessage = rawMessageOf(outcome);
        const code = extractCode(rawMessage);
        const position: Position = { location: extractLocation(rawMessage), span: extractSpan(rawMessage) };
        const timedOut = outcome.status === 'TIMEOUT';

        const rule = timedOut
            ? undefined
            : this.rules.find(r => ruleMatches(r, rawMessage, code));

        if (!rule) {
            return buildRecord('Unclassified', rawMessage, code, undefined, position, unclassifiedFix(timedOut));
        }

        const symbol = firstCapture(rule.symbolPatterns ?? [], rawMessage)
            ?? (rule.useCaretSpan ? extractCaretSpan(rawMessage) : undefined);
        const hint = HINT_PATTERN.exec(rawMessage)?.[1];
        const typeCapture = rule.kind === 'TypeMismatch' ? EXPECTED_GOT.exec(rawMessage) : null;

        const details: FailureDetails = {
            ...(symbol ? { symbol } : {}),
            ...(code ? { code } : {}),
            ...(hint ? { hint } : {}),
            ...(typeCapture?.[1] ? { expectedType: typeCapture[1].trim() } : {}),
            ...(typeCapture?.[2] ? { actualType: typeCapture[2].trim() } : {})
        };

        let suggestedFix: string;
        try {
            suggestedFix = rule.suggestFix(details);
        } catch {
            // Template faults fall back to the generic fix.
            suggestedFix = unclassifiedFix(false);
        }

        return buildRecord(rule.kind, rawMessage, code, symbol, position, suggestedFix);
    }
}

interface Position {
    readonly location: SourceLocation | undefined;
    readonly span: SourceSpan | undefined;
}

function buildRecord(
    kind: ErrorKind,
    rawMessage: string,
    code: string | undefined,
    symbol: string | undefined,
    { location, span }: Position,
    suggestedFix: string
): ErrorRecord {
    return Object.freeze<ErrorRecord>({
        kind,
        rawMessage,
        ...(code ? { code } : {}),
        ...(symbol ? { symbol } : {}),
        ...(location ? { location: Object.freeze(location) } : {}),
        ...(span ? { span: Object.freeze(span) } : {}),
        suggestedFix
    });
}

export const defaultClassifier = new ErrorClassifier();

export function classify(outcome: ExecutionOutcome): ErrorRecord | null {
    return defaultClassifier.classify(outcome);
}
