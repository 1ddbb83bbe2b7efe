/**
 * Repair Context Builder
 *
 * Turns the classified failure of the previous attempt into the directive
 * list handed to the proposer for the next candidate.
 */

import { ERROR_KIND_METADATA, type ErrorKind, type ErrorRecord } from '../classification/errorTypes.js';

export interface RepairContext {
    readonly kind: ErrorKind;
    readonly regenerateFromScratch: boolean;
    readonly directives: readonly string[];
    /** Verbatim failure text of the previous attempt */
    readonly rawMessage: string;
}

function describeLocation(record: ErrorRecord): string {
    const loc = record.location;
    if (!loc) {
        return record.span ? ` in source bytes ${record.span.start}-${record.span.end}` : '';
    }
    const column = loc.column !== undefined ? `, column ${loc.column}` : '';
    return ` at line ${loc.line}${column}`;
}

export function buildRepairContext(record: ErrorRecord): RepairContext {
    const { regenerateFromScratch } = ERROR_KIND_METADATA[record.kind];
    const code = record.code ? ` (${record.code})` : '';

    const directives: string[] = [
        `The previous script failed with ${record.kind}${code}${describeLocation(record)}.`
    ];

    if (record.symbol) {
        directives.push(`Offending symbol: ${record.symbol}`);
    }
    if (record.suggestedFix) {
        directives.push(record.suggestedFix);
    }
    if (record.kind === 'Unclassified') {
        directives.push('The raw sandbox output is attached verbatim; read it before changing the script.');
    }

    directives.push(regenerateFromScratch
        ? 'Discard the previous script and write a new one from scratch.'
        : 'Change only what the fix requires and keep every extraction that already works.');

    return Object.freeze<RepairContext>({
        kind: record.kind,
        regenerateFromScratch,
        directives: Object.freeze(directives),
        rawMessage: record.rawMessage
    });
}
