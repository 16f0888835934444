import { readFile } from 'fs/promises';
import { MappingTableError, errorMessage } from '../utils/errors.js';
import { createContextLogger } from '../utils/logger.js';
import type { MappingDefinition, MappingEntry, MappingGroup } from './types.js';

const logger = createContextLogger('MappingTable');

export function canonicalName(name: string): string {
    return name.trim().toUpperCase();
}

/**
 * Immutable dictionary from deprecated table name to replacement metadata.
 */
export class MappingTable {
    private readonly byName: ReadonlyMap<string, MappingEntry>;
    readonly groupNames: readonly string[];

    private constructor(byName: Map<string, MappingEntry>, groupNames: string[]) {
        this.byName = byName;
        this.groupNames = Object.freeze(groupNames);
    }

    /**
     * Merges the groups, in order, into one table. The bundled data lists them as
     * core-document, hybrid, aggregation, split-hybrid, history; their keys are
     * disjoint and any collision is rejected rather than overridden.
     * @throws MappingTableError on an empty key or replacement, or on a key
     * defined more than once after canonicalization.
     */
    static build(groups: readonly MappingGroup[]): MappingTable {
        const byName = new Map<string, MappingEntry>();
        const groupNames: string[] = [];

        for (const group of groups) {
            if (groupNames.includes(group.name)) {
                throw new MappingTableError(`Duplicate mapping group: ${group.name}`);
            }
            groupNames.push(group.name);

            for (const [rawName, definition] of Object.entries(group.entries)) {
                const deprecatedName = canonicalName(rawName);
                if (!deprecatedName) {
                    throw new MappingTableError(`Empty table name in group ${group.name}`);
                }
                const replacement = definition.replacement.trim();
                if (!replacement) {
                    throw new MappingTableError(`Empty replacement for ${deprecatedName} in group ${group.name}`);
                }

                const existing = byName.get(deprecatedName);
                if (existing) {
                    throw new MappingTableError(
                        `Table ${deprecatedName} defined in both ${existing.group} and ${group.name}`
                    );
                }

                const note = definition.note?.trim();
                byName.set(deprecatedName, Object.freeze({
                    deprecatedName,
                    replacement,
                    ...(note ? { note } : {}),
                    group: group.name,
                }));
            }
        }

        logger.debug(`Built mapping table with ${byName.size} entries from ${groupNames.length} groups`);
        return new MappingTable(byName, groupNames);
    }

    get size(): number {
        return this.byName.size;
    }

    lookup(name: string): MappingEntry | undefined {
        return this.byName.get(canonicalName(name));
    }

    allKeys(): ReadonlySet<string> {
        return new Set(this.byName.keys());
    }

    /** Entries in insertion (group precedence) order. */
    entries(): MappingEntry[] {
        return Array.from(this.byName.values());
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseDefinition(value: unknown, where: string): MappingDefinition {
    if (!isRecord(value)) {
        throw new MappingTableError(`${where}: expected an object`);
    }
    const { replacement, note } = value;
    if (typeof replacement !== 'string') {
        throw new MappingTableError(`${where}.replacement: expected string`);
    }
    if (note !== undefined && note !== null && typeof note !== 'string') {
        throw new MappingTableError(`${where}.note: expected string`);
    }
    return typeof note === 'string' ? { replacement, note } : { replacement };
}

/**
 * Validates the parsed content of a mapping data file.
 */
export function parseMappingGroups(data: unknown): MappingGroup[] {
    const groups = isRecord(data) ? data.groups : undefined;
    if (!Array.isArray(groups)) {
        throw new MappingTableError('Mapping data must be an object with a "groups" array');
    }

    return groups.map((group: unknown, index: number): MappingGroup => {
        const where = `groups[${index}]`;
        if (!isRecord(group) || typeof group.name !== 'string' || !isRecord(group.entries)) {
            throw new MappingTableError(`${where}: expected { name: string, entries: object }`);
        }
        const entries: Record<string, MappingDefinition> = {};
        for (const [name, definition] of Object.entries(group.entries)) {
            entries[name] = parseDefinition(definition, `${where}.entries.${name}`);
        }
        return {
            name: group.name,
            ...(typeof group.description === 'string' ? { description: group.description } : {}),
            entries,
        };
    });
}

/**
 * Reads the mapping groups from a JSON data file.
 */
export async function loadMappingGroups(filePath: string): Promise<MappingGroup[]> {
    let raw: string;
    try {
        raw = await readFile(filePath, 'utf-8');
    } catch (error: unknown) {
        throw new MappingTableError(`Cannot read mapping data ${filePath}: ${errorMessage(error)}`, { cause: error });
    }

    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch (error: unknown) {
        throw new MappingTableError(`Invalid JSON in ${filePath}: ${errorMessage(error)}`, { cause: error });
    }

    const groups = parseMappingGroups(data);
    logger.info(`Loaded ${groups.length} mapping groups from ${filePath}`);
    return groups;
}

/**
 * Loads and builds the table in one step.
 */
export async function loadMappingTable(filePath: string): Promise<MappingTable> {
    return MappingTable.build(await loadMappingGroups(filePath));
}
