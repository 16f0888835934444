import winston from 'winston';
import config from '../config/index.js';

const { combine, timestamp, colorize, printf, splat } = winston.format;

const consoleFormat = printf(({ level, message, timestamp: ts, context, ...meta }) => {
    const scope = typeof context === 'string' ? ` [${context}]` : '';
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(ts)} ${level}${scope}: ${String(message)}${extra}`;
});

/**
 * Root logger. Modules should use {@link createContextLogger} instead of
 * logging through this instance directly.
 */
export const logger = winston.createLogger({
    level: config.logLevel,
    format: combine(timestamp(), splat()),
    transports: [
        new winston.transports.Console({
            format: combine(colorize(), consoleFormat),
            // Keep stdout free for CLI output (e.g. `scan --json`).
            stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
        }),
    ],
});

/**
 * Creates a child logger tagged with the given context name.
 */
export function createContextLogger(context: string): winston.Logger {
    return logger.child({ context });
}

export default logger;
