import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import { createContextLogger } from '../utils/logger.js';
import { ValidationError, errorMessage } from '../utils/errors.js';
import { type MappingTable, loadMappingTable } from '../remediator/mapping-table.js';
import { TableScanner } from '../remediator/table-scanner.js';
import { RemediationService, parseUnits } from '../remediator/remediation-service.js';
import config from '../config/index.js';

const logger = createContextLogger('RemediatorAPI');

export const SERVICE_NAME = 'MM-IM Remediator (S4HANA Material Document & Stock Tables)';
export const SERVICE_VERSION = '1.0.0';

export interface AppOptions {
    table: MappingTable;
    /** JSON body size limit; defaults to the configured limit */
    bodyLimit?: string;
}

/** Errors raised by the JSON body parser carry a `type` and an HTTP `status`. */
interface BodyParserError {
    type: string;
    status: number;
    message: string;
}

function isBodyParserError(error: unknown): error is BodyParserError {
    return error instanceof Error
        && 'type' in error && typeof error.type === 'string'
        && 'status' in error && typeof error.status === 'number';
}

export function createApp(options: AppOptions): express.Application {
    const { table } = options;
    const service = new RemediationService(new TableScanner(table));
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json({ limit: options.bodyLimit ?? config.requestBodyLimit }));

    // Request logging middleware
    app.use((req: Request, _res: Response, next: NextFunction) => {
        logger.info(`${req.method} ${req.path}`, {
            units: req.method === 'POST' && Array.isArray(req.body) ? req.body.length : undefined
        });
        next();
    });

    // Health check endpoint
    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'healthy',
            tables: table.size,
            timestamp: new Date().toISOString()
        });
    });

    // Get API info
    app.get('/', (_req: Request, res: Response) => {
        res.json({
            name: SERVICE_NAME,
            version: SERVICE_VERSION,
            description: 'Flags MKPF/MSEG and stock tables no longer persisted in S/4HANA and suggests replacements',
            endpoints: {
                'GET /health': 'Health check',
                'GET /mappings': 'List deprecated tables and their replacements',
                'POST /remediate-mm-im': 'Annotate ABAP units with deprecated table usages'
            }
        });
    });

    app.get('/mappings', (_req: Request, res: Response) => {
        res.json({
            groups: table.groupNames,
            tables: table.entries().map(entry => ({
                table: entry.deprecatedName,
                group: entry.group,
                replacement: entry.replacement,
                ...(entry.note ? { note: entry.note } : {})
            }))
        });
    });

    // Input: list of ABAP units. Output: the same units, each with an `mb_txn_usage` list.
    app.post('/remediate-mm-im', (req: Request, res: Response, next: NextFunction) => {
        try {
            const units = parseUnits(req.body);
            res.json(service.remediateUnits(units));
        } catch (error: unknown) {
            next(error);
        }
    });

    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (error instanceof ValidationError) {
            logger.warn(`Rejected ${req.method} ${req.path}: ${error.message}`, { details: error.details });
            res.status(422).json({ error: error.message, details: error.details });
            return;
        }
        if (isBodyParserError(error) && error.status < 500) {
            logger.warn(`Rejected ${req.method} ${req.path}: ${error.message}`, { type: error.type });
            res.status(error.status).json({ error: error.message });
            return;
        }
        logger.error(`Request ${req.method} ${req.path} failed`, { error: errorMessage(error) });
        res.status(500).json({ error: 'Internal server error' });
    });

    return app;
}

/**
 * Resolves once the server is listening. Port 0 picks a free port.
 */
export function listen(app: express.Application, port: number, host: string): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port, host);
        server.once('listening', () => resolve(server));
        server.once('error', reject);
    });
}

export interface StartServerOptions {
    port?: number;
    host?: string;
    mappingsFile?: string;
}

export async function startServer(options: StartServerOptions = {}): Promise<Server> {
    const port = options.port ?? config.port;
    const host = options.host ?? config.host;

    // A broken mapping table aborts startup
    const table = await loadMappingTable(options.mappingsFile ?? config.mappingsFile);
    logger.info(`Mapping table ready: ${table.size} tables in ${table.groupNames.length} groups`);

    const server = await listen(createApp({ table }), port, host);
    const address = server.address();
    const boundPort = typeof address === 'object' && address !== null ? address.port : port;
    logger.info(`MM-IM Remediator API running on http://${host}:${boundPort}`);

    // Graceful shutdown
    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down...`);
        server.close(error => {
            if (error) {
                logger.error('Error while closing server', { error: error.message });
                process.exitCode = 1;
            }
        });
    };
    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));

    return server;
}
