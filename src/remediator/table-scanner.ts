import { MappingTableError, errorMessage } from '../utils/errors.js';
import type { MappingTable } from './mapping-table.js';
import type { Finding } from './types.js';

// Letters, digits and underscore. A key flanked by one of these is part of a longer identifier.
const WORD_CHAR = '[\\p{L}\\p{N}_]';

export function escapeRegExp(literal: string): string {
    // Only syntax characters and '/' may be escaped under the `u` flag
    return literal.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * Builds the whole-word alternation for a set of keys. Longer keys come first so
 * that MARCH is preferred over MARC at the same position.
 */
export function buildTablePattern(keys: Iterable<string>): RegExp | null {
    const sorted = Array.from(keys).sort((a, b) => b.length - a.length || a.localeCompare(b));
    if (sorted.length === 0) {
        return null;
    }
    const alternation = sorted.map(escapeRegExp).join('|');
    try {
        return new RegExp(`(?<!${WORD_CHAR})(?:${alternation})(?!${WORD_CHAR})`, 'giu');
    } catch (error: unknown) {
        throw new MappingTableError(`Cannot compile table pattern: ${errorMessage(error)}`, { cause: error });
    }
}

/**
 * Number of code points in text[from, to), where from and to are UTF-16 indexes.
 */
function countCodePoints(text: string, from: number, to: number): number {
    let count = 0;
    for (let i = from; i < to; i++) {
        const unit = text.charCodeAt(i);
        const isTrailSurrogate = unit >= 0xdc00 && unit <= 0xdfff;
        const prev = i > 0 ? text.charCodeAt(i - 1) : 0;
        const followsLead = prev >= 0xd800 && prev <= 0xdbff;
        if (!(isTrailSurrogate && followsLead)) {
            count++;
        }
    }
    return count;
}

/**
 * Finds whole-word, case-insensitive references to the tables of a
 * {@link MappingTable} in free text.
 */
export class TableScanner {
    private readonly table: MappingTable;
    private readonly pattern: RegExp | null;

    constructor(table: MappingTable) {
        this.table = table;
        this.pattern = buildTablePattern(table.allKeys());
    }

    /**
     * Scans the text left to right and returns one finding per occurrence, ordered
     * by start offset. Empty or missing text yields no findings.
     */
    scan(text: string | null | undefined): Finding[] {
        if (!text || !this.pattern) {
            return [];
        }

        const findings: Finding[] = [];
        let unitIndex = 0;
        let codePointIndex = 0;

        // matchAll works on a clone of the pattern, so the shared lastIndex is never touched
        for (const match of text.matchAll(this.pattern)) {
            const index = match.index ?? 0;
            const entry = this.table.lookup(match[0]);
            // Unicode case folding can accept text whose uppercase form is not a key
            // (KELVIN SIGN for K); such matches have no entry and are skipped.
            if (!entry) {
                continue;
            }

            codePointIndex += countCodePoints(text, unitIndex, index);
            unitIndex = index;
            const length = countCodePoints(text, index, index + match[0].length);

            findings.push({
                matchedName: entry.deprecatedName,
                startOffset: codePointIndex,
                endOffset: codePointIndex + length,
                suggestedStatement: `Use ${entry.replacement} instead of ${entry.deprecatedName}.`,
                ...(entry.note ? { note: entry.note } : {}),
                isAmbiguous: false,
                usedFields: [],
                suggestedFields: null,
            });
        }

        return findings;
    }
}
