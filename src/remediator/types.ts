/**
 * Shared types for the MM-IM table remediator.
 */

/**
 * Replacement metadata for one deprecated table, as stored in a group.
 */
export interface MappingDefinition {
    /** One or more replacement objects, alternatives separated by ` / ` */
    replacement: string;
    note?: string;
}

/**
 * A named set of mapping definitions. Groups are merged in array order.
 */
export interface MappingGroup {
    name: string;
    description?: string;
    entries: Record<string, MappingDefinition>;
}

/**
 * One row of the built mapping table.
 */
export interface MappingEntry {
    /** Canonical (uppercase) table name, unique across the table */
    readonly deprecatedName: string;
    readonly replacement: string;
    readonly note?: string;
    /** Name of the group that defined the entry */
    readonly group: string;
}

/**
 * One occurrence of a deprecated table name in scanned text.
 * Offsets count Unicode code points; `endOffset` is exclusive.
 */
export interface Finding {
    matchedName: string;
    startOffset: number;
    endOffset: number;
    suggestedStatement: string;
    note?: string;
    /** Reserved for semantic disambiguation, always false */
    isAmbiguous: false;
    /** Reserved, always empty */
    usedFields: string[];
    /** Reserved, always null */
    suggestedFields: null;
}

export const TARGET_TYPE_TABLE = 'Table';

/**
 * Wire representation of a {@link Finding}.
 */
export interface TableUsage {
    table: string;
    target_type: typeof TARGET_TYPE_TABLE;
    target_name: string;
    start_char_in_unit: number;
    end_char_in_unit: number;
    used_fields: string[];
    ambiguous: false;
    suggested_statement: string;
    suggested_fields: null;
    note?: string;
}

/**
 * An ABAP source unit (program include, method, form, ...) sent for remediation.
 */
export interface Unit {
    pgm_name: string;
    inc_name: string;
    type: string;
    name: string | null;
    class_implementation: string | null;
    start_line: number | null;
    end_line: number | null;
    /** Defaults to an empty string when absent; an explicit null is echoed back */
    code: string | null;
}

export interface RemediatedUnit extends Unit {
    mb_txn_usage: TableUsage[];
}
