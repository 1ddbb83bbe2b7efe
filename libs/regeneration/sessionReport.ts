/**
 * Plain-text rendering of a session result for operators.
 */

import type { Attempt, CandidateProvenance, SessionResult } from './attempt.js';

function describeProvenance(provenance: CandidateProvenance): string {
    return provenance.kind === 'initial'
        ? `initial (${provenance.source})`
        : `repair of #${provenance.repairOf}`;
}

function describeAttempt(attempt: Attempt): string[] {
    const { candidate, outcome, errorRecord } = attempt;
    const head = `  #${candidate.attemptIndex} ${describeProvenance(candidate.provenance)}: ${outcome.status} in ${outcome.durationMs}ms`;

    if (!errorRecord) {
        return [`${head}, ${outcome.extractedFieldCount} field(s)`];
    }

    const parts: string[] = [errorRecord.kind];
    if (errorRecord.code) parts.push(errorRecord.code);
    if (errorRecord.location) {
        const { line, column } = errorRecord.location;
        parts.push(column !== undefined ? `at ${line}:${column}` : `at line ${line}`);
    }
    if (errorRecord.symbol) parts.push(`symbol ${errorRecord.symbol}`);

    const lines = [`${head}, ${parts.join(' ')}`];
    if (errorRecord.suggestedFix) {
        lines.push(`     fix: ${errorRecord.suggestedFix}`);
    }
    return lines;
}

export function formatSessionReport(result: SessionResult): string {
    const lines: string[] = [
        `Session ${result.sessionId}: ${result.status} after ${result.attempts.length} attempt(s)`
    ];

    for (const attempt of result.attempts) {
        lines.push(...describeAttempt(attempt));
    }

    switch (result.status) {
        case 'SUCCEEDED':
            lines.push(`Result: ${result.extractedFieldCount ?? 0} extracted field(s)`);
            break;
        case 'EXHAUSTED':
            lines.push(`Result: retry budget exhausted${result.lastError ? `, last error ${result.lastError.kind}` : ''}`);
            break;
        case 'CANCELLED':
            lines.push('Result: cancelled by caller');
            break;
        case 'INFRASTRUCTURE_ERROR':
            lines.push(`Result: infrastructure fault${result.infrastructureError
                ? ` (${result.infrastructureError.source} ${result.infrastructureError.code}): ${result.infrastructureError.message}`
                : ''}`);
            break;
    }

    return lines.join('\n');
}
