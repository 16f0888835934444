// src/remediator/remediation-service.spec.ts
import { describe, it, expect, beforeAll } from 'vitest';
import { RemediationService, parseUnits, toTableUsage } from './remediation-service.js';
import { TableScanner } from './table-scanner.js';
import { MappingTable, loadMappingTable } from './mapping-table.js';
import { ValidationError } from '../utils/errors.js';
import type { Finding, Unit } from './types.js';
import config from '../config/index.js';

const baseUnit: Unit = {
    pgm_name: 'ZMM_STOCK_REPORT',
    inc_name: 'ZMM_STOCK_REPORT_F01',
    type: 'FORM',
    name: 'READ_DOCUMENTS',
    class_implementation: null,
    start_line: 10,
    end_line: 12,
    code: '',
};

describe('parseUnits', () => {
    it('should fill defaults and drop unknown properties', () => {
        const units = parseUnits([{ pgm_name: 'ZPROG', inc_name: 'ZPROG_TOP', type: 'PROG', extra: true }]);

        expect(units).toEqual([{
            pgm_name: 'ZPROG',
            inc_name: 'ZPROG_TOP',
            type: 'PROG',
            name: null,
            class_implementation: null,
            start_line: null,
            end_line: null,
            code: '',
        }]);
    });

    it('should keep an explicit null code', () => {
        const [unit] = parseUnits([{ pgm_name: 'ZPROG', inc_name: 'ZPROG', type: 'PROG', code: null }]);

        expect(unit?.code).toBeNull();
    });

    it('should accept a complete unit', () => {
        expect(parseUnits([baseUnit])).toEqual([baseUnit]);
    });

    it('should reject a body that is not an array', () => {
        try {
            parseUnits({ pgm_name: 'ZPROG' });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ValidationError);
            expect(error).toMatchObject({
                message: 'Request body must be an array of units',
                details: ['body: expected array'],
            });
        }
    });

    it('should report every problem with its path', () => {
        const body = [
            baseUnit,
            { inc_name: 1, type: 'FORM', start_line: 1.5 },
            'not a unit',
        ];

        try {
            parseUnits(body);
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ValidationError);
            expect(error).toMatchObject({
                message: 'Invalid units: 4 problem(s)',
                details: [
                    '[1].pgm_name: field required',
                    '[1].inc_name: expected string',
                    '[1].start_line: expected integer',
                    '[2]: expected object',
                ],
            });
        }
    });

    it('should accept an empty batch', () => {
        expect(parseUnits([])).toEqual([]);
    });
});

describe('toTableUsage', () => {
    const finding: Finding = {
        matchedName: 'MKPF',
        startOffset: 3,
        endOffset: 7,
        suggestedStatement: 'Use MATDOC instead of MKPF.',
        isAmbiguous: false,
        usedFields: [],
        suggestedFields: null,
    };

    it('should omit the note when there is none', () => {
        expect(toTableUsage(finding)).toEqual({
            table: 'MKPF',
            target_type: 'Table',
            target_name: 'MKPF',
            start_char_in_unit: 3,
            end_char_in_unit: 7,
            used_fields: [],
            ambiguous: false,
            suggested_statement: 'Use MATDOC instead of MKPF.',
            suggested_fields: null,
        });
    });

    it('should copy the note', () => {
        expect(toTableUsage({ ...finding, note: 'Header merged.' }).note).toBe('Header merged.');
    });
});

describe('RemediationService', () => {
    let table: MappingTable;
    let service: RemediationService;

    beforeAll(async () => {
        table = await loadMappingTable(config.mappingsFile);
        service = new RemediationService(new TableScanner(table));
    });

    it('should attach usages to each unit', () => {
        const results = service.remediateUnits([
            { ...baseUnit, code: 'SELECT * FROM MSEG WHERE ...' },
            { ...baseUnit, name: 'NOTHING', code: 'DATA: lv_foo TYPE string.' },
        ]);

        expect(results).toEqual([
            {
                ...baseUnit,
                code: 'SELECT * FROM MSEG WHERE ...',
                mb_txn_usage: [{
                    table: 'MSEG',
                    target_type: 'Table',
                    target_name: 'MSEG',
                    start_char_in_unit: 14,
                    end_char_in_unit: 18,
                    used_fields: [],
                    ambiguous: false,
                    suggested_statement: 'Use MATDOC instead of MSEG.',
                    suggested_fields: null,
                    note: 'Item + header + attributes merged. Proxy CDS: NSDM_DDL_MSEG.',
                }],
            },
            { ...baseUnit, name: 'NOTHING', code: 'DATA: lv_foo TYPE string.', mb_txn_usage: [] },
        ]);
    });

    it('should treat a null code as empty', () => {
        expect(service.remediateUnit({ ...baseUnit, code: null }).mb_txn_usage).toEqual([]);
    });

    it('should not modify the input unit', () => {
        const unit = { ...baseUnit, code: 'SELECT * FROM mkpf.' };

        service.remediateUnit(unit);

        expect(unit).not.toHaveProperty('mb_txn_usage');
    });

    it('should list usages for a snippet', () => {
        expect(service.findUsages('MSSA MSSAH').map(usage => usage.suggested_statement)).toEqual([
            'Use NSDM_DDL_MSSA instead of MSSA.',
            'Use NSDM_DDL_MSSAH instead of MSSAH.',
        ]);
    });
});
