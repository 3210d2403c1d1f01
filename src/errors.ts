export interface GraphQLErrorItem {
    message: string;
    data?: unknown;
}

export class SecuritasError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;

        // restore prototype chain
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * The request never produced a usable answer: connection failure, HTTP error or an undecodable body.
 * Safe to retry.
 */
export class TransportError extends SecuritasError {
    readonly statusCode?: number;

    constructor(message: string, options: { statusCode?: number; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.statusCode = options.statusCode;
    }
}

/**
 * The backend answered with a GraphQL `errors` array.
 */
export class ApiError extends SecuritasError {
    readonly errors: GraphQLErrorItem[];
    readonly data: unknown;

    constructor(message: string, errors: GraphQLErrorItem[], data: unknown) {
        super(message);
        this.errors = errors;
        this.data = data;
    }
}

export class MalformedResponseError extends SecuritasError {
    readonly operation: string;

    constructor(operation: string, detail: string) {
        super(`Unexpected response to ${operation}: ${detail}`);
        this.operation = operation;
    }
}

/**
 * Bad credentials, rejected OTP, expired challenge or a session the backend no longer accepts.
 * The caller has to log in again.
 */
export class AuthError extends SecuritasError {}

/**
 * An arm/disarm mutation failed before the backend issued a reference id. No command exists.
 */
export class DispatchError extends SecuritasError {}

export class CommandInProgressError extends SecuritasError {
    readonly installation: string;

    constructor(installation: string) {
        super(`A command is already in progress for installation ${installation}`);
        this.installation = installation;
    }
}

export class CapabilityError extends SecuritasError {
    readonly installation: string;
    readonly request: string;

    constructor(installation: string, request: string, reason: string) {
        super(`Request ${request} is not supported by installation ${installation}: ${reason}`);
        this.installation = installation;
        this.request = request;
    }
}

export class ResolutionError extends SecuritasError {
    readonly installation?: string;

    constructor(message: string, options: { installation?: string; cause?: unknown } = {}) {
        super(options.installation ? `[${options.installation}] ${message}` : message, { cause: options.cause });
        this.installation = options.installation;
    }
}

/**
 * The caller stopped waiting for a command. The outcome of the command is unknown.
 */
export class CommandAbortedError extends SecuritasError {
    readonly referenceId: string;

    constructor(referenceId: string, reason: string) {
        super(`Stopped polling ${referenceId}: ${reason}`);
        this.referenceId = referenceId;
    }
}

export class InvalidCodeError extends SecuritasError {
    constructor() {
        super('The alarm code does not match the configured code');
    }
}

export class ConfigError extends SecuritasError {}
