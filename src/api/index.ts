#!/usr/bin/env node

/**
 * MM-IM Remediator API Server Entry Point
 *
 * Environment Variables:
 *   PORT               - Server port (default: 8001)
 *   HOST               - Bind address (default: 0.0.0.0)
 *   LOG_LEVEL          - winston log level (default: info)
 *   REQUEST_BODY_LIMIT - Maximum JSON body size (default: 5mb)
 *   MAPPINGS_FILE      - Mapping data file (default: bundled data/mm-im-mappings.json)
 */

import { startServer } from './server.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

startServer().catch((error: unknown) => {
    logger.error(`Failed to start server: ${errorMessage(error)}`);
    process.exit(1);
});
