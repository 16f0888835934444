/**
 * Base class for all errors raised by the remediator.
 */
export class RemediatorError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Raised while loading or building the mapping table. Always fatal at startup.
 */
export class MappingTableError extends RemediatorError {}

/**
 * Raised when a request body does not describe a list of ABAP units.
 */
export class ValidationError extends RemediatorError {
    readonly details: string[];

    constructor(message: string, details: string[] = []) {
        super(message);
        this.details = details;
    }
}

/**
 * Returns the message of anything thrown.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
