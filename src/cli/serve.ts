import type { Command } from 'commander';
import { createContextLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { startServer } from '../api/server.js';
import config from '../config/index.js';

const logger = createContextLogger('ServeCmd');

interface ServeOptions {
    port?: string;
    host?: string;
    mappings?: string;
}

export function registerServeCommand(program: Command): void {
    program
        .command('serve')
        .description('Start the MM-IM Remediator API server')
        .option('-p, --port <port>', 'Port to run the server on', String(config.port))
        .option('-H, --host <host>', 'Address to bind', config.host)
        .option('-m, --mappings <file>', 'Mapping data file', config.mappingsFile)
        .action(async (options: ServeOptions) => {
            const port = options.port ? parseInt(options.port, 10) : config.port;
            if (Number.isNaN(port)) {
                logger.error(`Invalid port: ${options.port}`);
                process.exitCode = 2;
                return;
            }

            logger.info(`Starting API server on port ${port}...`);

            try {
                await startServer({ port, host: options.host, mappingsFile: options.mappings });
            } catch (error: unknown) {
                logger.error(`Failed to start server: ${errorMessage(error)}`);
                process.exitCode = 1;
            }
        });
}
