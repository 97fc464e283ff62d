#!/usr/bin/env -S node --import tsx

import fs from "node:fs";
import path from "node:path";
import { format } from "node:util";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import {
    ConfigClient,
    EnvManager,
    createClientSettingsFromEnv,
    errorMessage,
    logConfigurationSummary,
} from "@liveconf/core";
import type { EnvSource } from "@liveconf/core";
import { parseCliArgs, resolveContent } from "./args.js";
import type { GlobalOptions, ParsedCommand } from "./args.js";
import { asCliError } from "./errors.js";
import { emitError, emitJson, emitJsonLine, summarizeSearchPage } from "./format.js";
import type { CliWriters } from "./format.js";

export interface ClientRequest {
    globals: GlobalOptions;
    /** Only `watch` starts background listening. */
    autoStart: boolean;
}

export type ClientFactory = (request: ClientRequest) => ConfigClient;

export interface RunCliOptions {
    writeStdout?: (text: string) => void;
    writeStderr?: (text: string) => void;
    env?: EnvSource;
    createClient?: ClientFactory;
    /** Ends `watch`; defaults to SIGINT/SIGTERM. */
    signal?: AbortSignal;
}

const packageJsonSchema = z.object({ version: z.string() });

function readPackageVersion(): string {
    const currentFile = fileURLToPath(import.meta.url);
    const packagePath = path.resolve(path.dirname(currentFile), "..", "package.json");
    try {
        const parsed = packageJsonSchema.safeParse(JSON.parse(fs.readFileSync(packagePath, "utf8")));
        return parsed.success ? parsed.data.version : "unknown";
    } catch (error) {
        console.warn(`[CLI] Could not read ${packagePath}: ${errorMessage(error)}`);
        return "unknown";
    }
}

function buildHelpPayload() {
    return {
        usage: "liveconf [global flags] <command> [flags]",
        commands: [
            "get --data-id <id> [--group <g>]",
            "publish --data-id <id> [--group <g>] (--content <text> | --content-file <path>) [--type <t>] [--app-name <n>]",
            "delete --data-id <id> [--group <g>]",
            "search [--data-id <id>] [--group <g>] [--mode accurate|blur] [--page <n>] [--page-size <n>]",
            "watch --data-id <id> [--group <g>]",
            "help",
            "version"
        ],
        globalFlags: [
            "--format json|text",
            "--debug",
            "--namespace <ns>",
            "--server <host:port[,host:port]>"
        ]
    };
}

function createEnvClientFactory(source: EnvSource): ClientFactory {
    return ({ globals, autoStart }) => {
        const overrides: EnvSource = {};
        if (globals.server) {
            overrides.LIVECONF_SERVER_ADDR = globals.server;
        }
        if (globals.namespace !== undefined) {
            overrides.LIVECONF_NAMESPACE = globals.namespace;
        }
        if (globals.debug) {
            overrides.LIVECONF_DEBUG = "true";
        }
        const settings = createClientSettingsFromEnv(new EnvManager({ ...source, ...overrides }));
        if (globals.debug) {
            logConfigurationSummary(settings);
        }
        return new ConfigClient({
            clientConfig: settings.clientConfig,
            serverConfigs: settings.serverConfigs,
            autoStart,
        });
    };
}

function waitForStop(signal?: AbortSignal): Promise<void> {
    if (signal) {
        if (signal.aborted) {
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            signal.addEventListener("abort", () => resolve(), { once: true });
        });
    }
    return new Promise((resolve) => {
        const stop = () => {
            process.off("SIGINT", stop);
            process.off("SIGTERM", stop);
            resolve();
        };
        process.once("SIGINT", stop);
        process.once("SIGTERM", stop);
    });
}

async function runWatch(
    client: ConfigClient,
    command: Extract<ParsedCommand, { kind: "watch" }>,
    writers: CliWriters,
    globals: GlobalOptions,
    signal?: AbortSignal
): Promise<number> {
    await client.listenConfig({
        dataId: command.dataId,
        group: command.group,
        onChange: (namespace, group, dataId, content) => {
            emitJsonLine(writers, { event: "changed", namespace, group, dataId, content });
        },
    });
    if (globals.format === "text") {
        writers.writeStderr(`Watching ${command.dataId}@${command.group}; interrupt to stop.\n`);
    }
    await waitForStop(signal);
    return 0;
}

async function runCommand(
    client: ConfigClient,
    command: Exclude<ParsedCommand, { kind: "help" } | { kind: "version" }>,
    writers: CliWriters,
    globals: GlobalOptions,
    signal?: AbortSignal
): Promise<number> {
    const namespace = client.clientConfig.namespaceId;
    switch (command.kind) {
        case "get": {
            const content = await client.getConfig({ dataId: command.dataId, group: command.group });
            emitJson(writers, { dataId: command.dataId, group: command.group, namespace, content });
            if (globals.format === "text") {
                writers.writeStderr(`${content}\n`);
            }
            return 0;
        }
        case "publish": {
            const published = await client.publishConfig({
                dataId: command.dataId,
                group: command.group,
                content: resolveContent(command.content),
                type: command.type,
                appName: command.appName,
            });
            emitJson(writers, { dataId: command.dataId, group: command.group, namespace, published });
            if (!published) {
                emitError(writers, "E_REJECTED", `server did not accept ${command.dataId}@${command.group}`);
                return 1;
            }
            return 0;
        }
        case "delete": {
            const deleted = await client.deleteConfig({ dataId: command.dataId, group: command.group });
            emitJson(writers, { dataId: command.dataId, group: command.group, namespace, deleted });
            if (!deleted) {
                emitError(writers, "E_REJECTED", `server did not delete ${command.dataId}@${command.group}`);
                return 1;
            }
            return 0;
        }
        case "search": {
            const page = await client.searchConfig({
                search: command.mode,
                dataId: command.dataId,
                group: command.group,
                pageNo: command.pageNo,
                pageSize: command.pageSize,
            });
            emitJson(writers, page);
            if (globals.format === "text") {
                writers.writeStderr(`${summarizeSearchPage(page)}\n`);
            }
            return 0;
        }
        case "watch":
            return runWatch(client, command, writers, globals, signal);
    }
}

export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
    const writers: CliWriters = {
        writeStdout: options.writeStdout || ((text: string) => process.stdout.write(text)),
        writeStderr: options.writeStderr || ((text: string) => process.stderr.write(text)),
    };

    try {
        const parsed = parseCliArgs(argv);
        const command = parsed.command;

        if (command.kind === "help") {
            emitJson(writers, buildHelpPayload());
            if (parsed.globals.format === "text") {
                writers.writeStderr("liveconf help requested.\n");
            }
            return 0;
        }

        if (command.kind === "version") {
            emitJson(writers, {
                name: "@liveconf/cli",
                cli: "liveconf",
                version: readPackageVersion(),
            });
            return 0;
        }

        const createClient = options.createClient || createEnvClientFactory(options.env || process.env);
        const client = createClient({ globals: parsed.globals, autoStart: command.kind === "watch" });
        try {
            return await runCommand(client, command, writers, parsed.globals, options.signal);
        } finally {
            await client.shutdown();
        }
    } catch (error) {
        const cliError = asCliError(error);
        emitError(writers, cliError.token, cliError.message);
        return cliError.exitCode;
    }
}

/** Keeps stdout for command output; library logging goes to stderr. */
function redirectConsoleToStderr(): void {
    for (const method of ["log", "info", "warn", "debug"] as const) {
        console[method] = (...args: unknown[]) => {
            process.stderr.write(`${format(...args)}\n`);
        };
    }
}

async function main(): Promise<void> {
    redirectConsoleToStderr();
    const exitCode = await runCli(process.argv.slice(2));
    process.exit(exitCode);
}

function isExecutedDirectly(): boolean {
    return isExecutedDirectlyForPaths(import.meta.url, process.argv[1]);
}

export function isExecutedDirectlyForPaths(moduleUrl: string, entryPath: string | undefined): boolean {
    if (!entryPath) {
        return false;
    }
    const modulePath = fileURLToPath(moduleUrl);
    const invokedPath = path.resolve(entryPath);
    try {
        return fs.realpathSync(modulePath) === fs.realpathSync(invokedPath);
    } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
            return path.resolve(modulePath) === invokedPath;
        }
        throw error;
    }
}

if (isExecutedDirectly()) {
    main().catch((error: unknown) => {
        const cliError = asCliError(error);
        process.stderr.write(`${cliError.token} ${cliError.message}\n`);
        process.exit(cliError.exitCode);
    });
}
