import { ValidationError } from '../utils/errors.js';
import { createContextLogger } from '../utils/logger.js';
import { TableScanner } from './table-scanner.js';
import { TARGET_TYPE_TABLE } from './types.js';
import type { Finding, RemediatedUnit, TableUsage, Unit } from './types.js';

const logger = createContextLogger('RemediationService');

type FieldReader<T> = (value: unknown) => T | undefined;

const readString: FieldReader<string> = (value) => (typeof value === 'string' ? value : undefined);
const readInteger: FieldReader<number> = (value) =>
    typeof value === 'number' && Number.isInteger(value) ? value : undefined;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates one unit and fills defaults. Unknown properties are dropped.
 * Problems are appended to `errors` as `path: message`.
 */
function parseUnit(value: unknown, path: string, errors: string[]): Unit | undefined {
    if (!isRecord(value)) {
        errors.push(`${path}: expected object`);
        return undefined;
    }
    const record = value;

    const required = (field: 'pgm_name' | 'inc_name' | 'type'): string => {
        const result = readString(record[field]);
        if (result === undefined) {
            errors.push(record[field] === undefined
                ? `${path}.${field}: field required`
                : `${path}.${field}: expected string`);
        }
        return result ?? '';
    };

    const optional = <T>(field: string, read: FieldReader<T>, expected: string): T | null => {
        const raw = record[field];
        if (raw === undefined || raw === null) {
            return null;
        }
        const result = read(raw);
        if (result === undefined) {
            errors.push(`${path}.${field}: expected ${expected}`);
            return null;
        }
        return result;
    };

    const before = errors.length;
    const unit: Unit = {
        pgm_name: required('pgm_name'),
        inc_name: required('inc_name'),
        type: required('type'),
        name: optional('name', readString, 'string'),
        class_implementation: optional('class_implementation', readString, 'string'),
        start_line: optional('start_line', readInteger, 'integer'),
        end_line: optional('end_line', readInteger, 'integer'),
        code: record.code === undefined ? '' : optional('code', readString, 'string'),
    };
    return errors.length === before ? unit : undefined;
}

/**
 * Validates a request body as a list of units.
 * @throws ValidationError listing every problem found.
 */
export function parseUnits(body: unknown): Unit[] {
    if (!Array.isArray(body)) {
        throw new ValidationError('Request body must be an array of units', ['body: expected array']);
    }

    const errors: string[] = [];
    const units: Unit[] = [];
    body.forEach((item: unknown, index: number) => {
        const unit = parseUnit(item, `[${index}]`, errors);
        if (unit) {
            units.push(unit);
        }
    });

    if (errors.length > 0) {
        throw new ValidationError(`Invalid units: ${errors.length} problem(s)`, errors);
    }
    return units;
}

export function toTableUsage(finding: Finding): TableUsage {
    const usage: TableUsage = {
        table: finding.matchedName,
        target_type: TARGET_TYPE_TABLE,
        target_name: finding.matchedName,
        start_char_in_unit: finding.startOffset,
        end_char_in_unit: finding.endOffset,
        used_fields: [...finding.usedFields],
        ambiguous: finding.isAmbiguous,
        suggested_statement: finding.suggestedStatement,
        suggested_fields: finding.suggestedFields,
    };
    if (finding.note) {
        usage.note = finding.note;
    }
    return usage;
}

/**
 * Attaches deprecated table usages to ABAP units.
 */
export class RemediationService {
    private readonly scanner: TableScanner;

    constructor(scanner: TableScanner) {
        this.scanner = scanner;
    }

    findUsages(code: string | null | undefined): TableUsage[] {
        return this.scanner.scan(code).map(toTableUsage);
    }

    remediateUnit(unit: Unit): RemediatedUnit {
        return {
            ...unit,
            mb_txn_usage: this.findUsages(unit.code),
        };
    }

    remediateUnits(units: readonly Unit[]): RemediatedUnit[] {
        const results = units.map(unit => this.remediateUnit(unit));
        const total = results.reduce((sum, unit) => sum + unit.mb_txn_usage.length, 0);
        logger.debug(`Remediated ${units.length} units, ${total} table usages found`);
        return results;
    }
}
