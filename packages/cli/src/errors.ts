import { ConfigClientError } from "@liveconf/core";

export class CliError extends Error {
    public readonly token: string;
    public readonly exitCode: number;

    constructor(token: string, message: string, exitCode: number) {
        super(message);
        this.name = "CliError";
        this.token = token;
        this.exitCode = exitCode;
    }
}

function exitCodeForToken(token: ConfigClientError["token"]): number {
    switch (token) {
        case "E_VALIDATION":
            return 2;
        case "E_NOT_FOUND":
        case "E_FORBIDDEN":
            return 1;
        default:
            return 3;
    }
}

export function asCliError(error: unknown): CliError {
    if (error instanceof CliError) {
        return error;
    }
    if (error instanceof ConfigClientError) {
        return new CliError(error.token, error.message, exitCodeForToken(error.token));
    }
    if (error instanceof Error) {
        return new CliError("E_INTERNAL", error.message, 3);
    }
    return new CliError("E_INTERNAL", String(error), 3);
}
