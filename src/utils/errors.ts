/**
 * 🚨 ERROR HANDLING UTILITIES
 * Standardized error classes for the matching pipeline.
 */

export class CompanyMatcherError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ConfigurationError extends CompanyMatcherError {
    constructor(message: string) {
        super(message, 'CONFIG_ERROR', { fatal: true });
    }
}

export class OracleUnavailableError extends CompanyMatcherError {
    constructor(message: string) {
        super(message, 'ORACLE_UNAVAILABLE', { fatal: false });
    }
}

/** The oracle answered, but not with a verdict we can trust. */
export class OracleResponseError extends CompanyMatcherError {
    constructor(message: string, public response: string) {
        super(message, 'ORACLE_RESPONSE_ERROR', { fatal: false });
    }
}

export class PersistenceError extends CompanyMatcherError {
    constructor(message: string, public cause?: unknown) {
        super(message, 'PERSISTENCE_ERROR', { fatal: true });
    }
}
