import type { JsonValue } from './types.js';

function isJsonObject(value: JsonValue): value is { readonly [key: string]: JsonValue } {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flatten a document into its leaf field paths.
 * Nested objects are walked; arrays, scalars and null are leaves; an empty
 * object contributes nothing. A non-object document is a single leaf ".".
 */
export function flattenFieldPaths(value: JsonValue, prefix = ''): string[] {
    if (!isJsonObject(value)) {
        return [prefix === '' ? '.' : prefix];
    }

    const paths: string[] = [];
    for (const [key, child] of Object.entries(value)) {
        const path = prefix === '' ? key : `${prefix}.${key}`;
        if (isJsonObject(child)) {
            paths.push(...flattenFieldPaths(child, path));
        } else {
            paths.push(path);
        }
    }
    return paths;
}

/**
 * Number of distinct leaf field paths across all output documents.
 * A quality signal only: it says how much was extracted, not whether it is right.
 */
export function countExtractedFields(documents: readonly JsonValue[]): number {
    const seen = new Set<string>();
    for (const doc of documents) {
        for (const path of flattenFieldPaths(doc)) {
            seen.add(path);
        }
    }
    return seen.size;
}
