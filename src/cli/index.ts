#!/usr/bin/env node
import { Command } from 'commander';
import { registerServeCommand } from './serve.js';
import { registerScanCommand } from './scan.js';
import { SERVICE_VERSION } from '../api/server.js';

export function createProgram(): Command {
    const program = new Command();
    program
        .name('mm-im-remediator')
        .description('Detects S/4HANA deprecated material document and stock tables in ABAP code')
        .version(SERVICE_VERSION);

    registerServeCommand(program);
    registerScanCommand(program);
    return program;
}

createProgram().parseAsync(process.argv).catch((error: unknown) => {
    console.error('CLI error:', error);
    process.exit(2);
});
