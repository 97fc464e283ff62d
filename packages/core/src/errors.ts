export type ConfigErrorToken =
    | "E_VALIDATION"
    | "E_NOT_FOUND"
    | "E_FORBIDDEN"
    | "E_TRANSIENT"
    | "E_CACHE"
    | "E_DECRYPT"
    | "E_PROTOCOL"
    | "E_INIT";

export class ConfigClientError extends Error {
    public readonly token: ConfigErrorToken;

    constructor(token: ConfigErrorToken, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ConfigClientError";
        this.token = token;
    }
}

export class ValidationError extends ConfigClientError {
    constructor(message: string) {
        super("E_VALIDATION", message);
        this.name = "ValidationError";
    }
}

export class NotFoundError extends ConfigClientError {
    constructor(message = "config not found") {
        super("E_NOT_FOUND", message);
        this.name = "NotFoundError";
    }
}

export class ForbiddenError extends ConfigClientError {
    constructor(message = "config access forbidden") {
        super("E_FORBIDDEN", message);
        this.name = "ForbiddenError";
    }
}

/**
 * Network failure, timeout, or a server status other than 403/404.
 * When the server did answer, `statusCode` and the raw response `payload` are kept:
 * a long-poll answered with an error status may still carry a changed-config list.
 */
export class TransientError extends ConfigClientError {
    public readonly statusCode?: number;
    public readonly payload?: string;

    constructor(message: string, details: { statusCode?: number; payload?: string; cause?: unknown } = {}) {
        super("E_TRANSIENT", message, { cause: details.cause });
        this.name = "TransientError";
        this.statusCode = details.statusCode;
        this.payload = details.payload;
    }
}

export class CacheError extends ConfigClientError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("E_CACHE", message, options);
        this.name = "CacheError";
    }
}

export class DecryptError extends ConfigClientError {
    constructor(message = "kms decrypt failed", options?: { cause?: unknown }) {
        super("E_DECRYPT", message, options);
        this.name = "DecryptError";
    }
}

export class ProtocolError extends ConfigClientError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("E_PROTOCOL", message, options);
        this.name = "ProtocolError";
    }
}

export class InitializationError extends ConfigClientError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("E_INIT", message, options);
        this.name = "InitializationError";
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
