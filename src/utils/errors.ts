/**
 * Error classes shared by the collaborator layers.
 * The extraction core never throws; these cover setup and input problems.
 */

export class ContactFinderError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ConfigurationError extends ContactFinderError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'CONFIG_ERROR', { fatal: true, ...context });
    }
}

export class InputError extends ContactFinderError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'INPUT_ERROR', { fatal: true, ...context });
    }
}

export class AuthenticationError extends ContactFinderError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'AUTH_ERROR', { fatal: false, ...context });
    }
}

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
