/**
 * Script Error Taxonomy
 *
 * Closed set of validation failure kinds. Every non-success outcome maps to
 * exactly one kind; Unclassified is the total fallback.
 */

export type ErrorKind =
    | 'UndefinedSymbol'   // reference to a name not defined in scope
    | 'MissingArgument'   // built-in called with too few arguments
    | 'TypeMismatch'      // value used where another type is required
    | 'PatternNoMatch'    // extraction pattern matched no sample
    | 'SyntaxError'       // parser-level or other non-semantic compile failure
    | 'Unclassified';     // nothing above matched

/**
 * Kinds in rule priority order.
 */
export const ERROR_KINDS: readonly ErrorKind[] = [
    'UndefinedSymbol',
    'MissingArgument',
    'TypeMismatch',
    'PatternNoMatch',
    'SyntaxError',
    'Unclassified'
];

export interface SourceLocation {
    readonly file?: string;
    readonly line: number;
    readonly column?: number;
}

/**
 * Byte offsets into the program source, as reported by the remap runtime's
 * `at (start:end)` suffix. Not a line and column.
 */
export interface SourceSpan {
    readonly start: number;
    readonly end: number;
}

/**
 * Classified failure of one attempt.
 * A field whose capture group found nothing is left unset.
 */
export interface ErrorRecord {
    readonly kind: ErrorKind;
    /** Verbatim sandbox failure text */
    readonly rawMessage: string;
    /** Diagnostic code reported by the remap compiler, e.g. E701 */
    readonly code?: string;
    readonly symbol?: string;
    readonly location?: SourceLocation;
    readonly span?: SourceSpan;
    readonly suggestedFix?: string;
}

export interface ErrorKindMetadata {
    readonly description: string;
    /** Whether the repair should discard the prior script instead of patching it */
    readonly regenerateFromScratch: boolean;
}

export const ERROR_KIND_METADATA: Record<ErrorKind, ErrorKindMetadata> = {
    UndefinedSymbol: {
        description: 'Reference to a variable or function that is not defined',
        regenerateFromScratch: false
    },
    MissingArgument: {
        description: 'Built-in function invoked with too few arguments',
        regenerateFromScratch: false
    },
    TypeMismatch: {
        description: 'Value used in a context that requires another type',
        regenerateFromScratch: false
    },
    PatternNoMatch: {
        description: 'Extraction pattern did not match the sample input',
        regenerateFromScratch: false
    },
    SyntaxError: {
        description: 'Program could not be parsed',
        regenerateFromScratch: true
    },
    Unclassified: {
        description: 'Failure did not match any known pattern',
        regenerateFromScratch: false
    }
};
