import type { Command } from 'commander';
import { readFile } from 'fs/promises';
import path from 'path';
import { createContextLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { loadMappingTable } from '../remediator/mapping-table.js';
import { TableScanner } from '../remediator/table-scanner.js';
import { toTableUsage } from '../remediator/remediation-service.js';
import type { Finding } from '../remediator/types.js';
import config from '../config/index.js';

const logger = createContextLogger('ScanCmd');

export const EXIT_CLEAN = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_ERROR = 2;

interface ScanOptions {
    json?: boolean;
    mappings?: string;
}

export interface FileFindings {
    file: string;
    text: string;
    findings: Finding[];
}

/**
 * 1-based line and column of a code point offset.
 */
export function locate(text: string, offset: number): { line: number; column: number } {
    let line = 1;
    let column = 1;
    let index = 0;
    for (const char of text) {
        if (index === offset) {
            break;
        }
        if (char === '\n') {
            line++;
            column = 1;
        } else {
            column++;
        }
        index++;
    }
    return { line, column };
}

export function formatFindings(results: FileFindings[]): string[] {
    const total = results.reduce((sum, result) => sum + result.findings.length, 0);
    if (total === 0) {
        return ['✅ No deprecated MM-IM table usage found!'];
    }

    const lines = [`\n⚠️  Found ${total} deprecated table usages:\n`];
    let counter = 0;
    for (const { file, text, findings } of results) {
        for (const finding of findings) {
            const { line, column } = locate(text, finding.startOffset);
            counter++;
            lines.push(`${counter}. TABLE: \x1b[33m${finding.matchedName}\x1b[0m`);
            lines.push(`   File: \x1b[34;4m${path.resolve(file)}:${line}:${column}\x1b[0m`);
            lines.push(`   Suggestion: \x1b[32m${finding.suggestedStatement}\x1b[0m`);
            if (finding.note) {
                lines.push(`   Note: ${finding.note}`);
            }
            lines.push('---');
        }
    }
    return lines;
}

export function formatJson(results: FileFindings[]): string {
    return JSON.stringify(
        results.map(({ file, findings }) => ({ file, mb_txn_usage: findings.map(toTableUsage) })),
        null,
        2
    );
}

export async function scanFiles(scanner: TableScanner, files: string[]): Promise<FileFindings[]> {
    const results: FileFindings[] = [];
    for (const file of files) {
        const text = await readFile(file, 'utf-8');
        results.push({ file, text, findings: scanner.scan(text) });
    }
    return results;
}

export function registerScanCommand(program: Command, write: (line: string) => void = line => console.log(line)): void {
    program
        .command('scan <files...>')
        .description('Scan ABAP source files for deprecated MM-IM tables')
        .option('--json', 'Print usages as JSON', false)
        .option('-m, --mappings <file>', 'Mapping data file', config.mappingsFile)
        .action(async (files: string[], options: ScanOptions) => {
            try {
                const table = await loadMappingTable(options.mappings ?? config.mappingsFile);
                const results = await scanFiles(new TableScanner(table), files);

                if (options.json) {
                    write(formatJson(results));
                } else {
                    formatFindings(results).forEach(line => write(line));
                }

                const found = results.some(result => result.findings.length > 0);
                process.exitCode = found ? EXIT_FINDINGS : EXIT_CLEAN;
            } catch (error: unknown) {
                logger.error(`Scan failed: ${errorMessage(error)}`);
                process.exitCode = EXIT_ERROR;
            }
        });
}
