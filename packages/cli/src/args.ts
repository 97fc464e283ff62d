import fs from "node:fs";
import { DEFAULT_GROUP } from "@liveconf/core";
import type { SearchMode } from "@liveconf/core";
import { CliError } from "./errors.js";

export interface GlobalOptions {
    format: "json" | "text";
    debug: boolean;
    namespace?: string;
    server?: string;
}

export type ContentSource =
    | { kind: "inline"; value: string }
    | { kind: "file"; path: string };

export interface ConfigTarget {
    dataId: string;
    group: string;
}

export type ParsedCommand =
    | { kind: "help" }
    | { kind: "version" }
    | ({ kind: "get" } & ConfigTarget)
    | ({ kind: "publish"; content: ContentSource; type?: string; appName?: string } & ConfigTarget)
    | ({ kind: "delete" } & ConfigTarget)
    | { kind: "search"; mode: SearchMode; dataId?: string; group?: string; pageNo?: number; pageSize?: number }
    | ({ kind: "watch" } & ConfigTarget);

export interface ParsedCliInput {
    globals: GlobalOptions;
    command: ParsedCommand;
}

const TARGET_FLAGS = ["data-id", "group"] as const;
const PUBLISH_FLAGS = [...TARGET_FLAGS, "content", "content-file", "type", "app-name"] as const;
const SEARCH_FLAGS = [...TARGET_FLAGS, "mode", "page", "page-size"] as const;

function parsePositiveInteger(value: string, flagName: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed) || parsed <= 0) {
        throw new CliError("E_USAGE", `${flagName} must be a positive integer.`, 2);
    }
    return parsed;
}

function requireValue(argv: string[], index: number, flagName: string): string {
    const next = argv[index + 1];
    if (next === undefined || next.startsWith("--")) {
        throw new CliError("E_USAGE", `Missing value for ${flagName}.`, 2);
    }
    return next;
}

function parseGlobalOptions(argv: string[]): { globals: GlobalOptions; rest: string[] } {
    const globals: GlobalOptions = {
        format: "json",
        debug: false,
    };

    let i = 0;
    while (i < argv.length) {
        const token = argv[i];
        switch (token) {
            case "--format": {
                const next = argv[i + 1];
                if (!next || (next !== "json" && next !== "text")) {
                    throw new CliError("E_USAGE", "--format must be one of: json, text.", 2);
                }
                globals.format = next;
                i += 2;
                break;
            }
            case "--debug": {
                globals.debug = true;
                i += 1;
                break;
            }
            case "--namespace": {
                globals.namespace = requireValue(argv, i, "--namespace");
                i += 2;
                break;
            }
            case "--server": {
                globals.server = requireValue(argv, i, "--server");
                i += 2;
                break;
            }
            default: {
                return {
                    globals,
                    rest: argv.slice(i),
                };
            }
        }
    }

    return { globals, rest: [] };
}

function parseCommandFlags(command: string, args: string[], allowed: readonly string[]): Map<string, string> {
    const flags = new Map<string, string>();
    for (let i = 0; i < args.length; i += 1) {
        const token = args[i];
        if (!token.startsWith("--")) {
            throw new CliError("E_USAGE", `Unexpected positional argument '${token}'.`, 2);
        }
        const name = token.slice(2);
        if (!allowed.includes(name)) {
            throw new CliError("E_USAGE", `Unknown flag '${token}' for '${command}'.`, 2);
        }
        if (flags.has(name)) {
            throw new CliError("E_USAGE", `Flag '${token}' was given more than once.`, 2);
        }
        flags.set(name, requireValue(args, i, token));
        i += 1;
    }
    return flags;
}

function parseTarget(command: string, flags: Map<string, string>): ConfigTarget {
    const dataId = flags.get("data-id");
    if (!dataId) {
        throw new CliError("E_USAGE", `Missing required flag for '${command}': --data-id.`, 2);
    }
    return { dataId, group: flags.get("group") ?? DEFAULT_GROUP };
}

function parseContentSource(flags: Map<string, string>): ContentSource {
    const inline = flags.get("content");
    const file = flags.get("content-file");
    if (inline !== undefined && file !== undefined) {
        throw new CliError("E_USAGE", "Use only one of --content or --content-file.", 2);
    }
    if (inline !== undefined) {
        return { kind: "inline", value: inline };
    }
    if (file !== undefined) {
        return { kind: "file", path: file };
    }
    throw new CliError("E_USAGE", "Missing required flag for 'publish': --content or --content-file.", 2);
}

function parseSearchMode(raw: string | undefined): SearchMode {
    if (raw === undefined) {
        return "blur";
    }
    if (raw !== "accurate" && raw !== "blur") {
        throw new CliError("E_USAGE", "--mode must be one of: accurate, blur.", 2);
    }
    return raw;
}

export function parseCliArgs(argv: string[]): ParsedCliInput {
    const { globals, rest } = parseGlobalOptions(argv);
    if (rest.length === 0 || rest[0] === "help" || rest.includes("--help") || rest.includes("-h")) {
        return {
            globals,
            command: { kind: "help" }
        };
    }

    if (rest[0] === "version" || rest.includes("--version") || rest.includes("-v")) {
        return {
            globals,
            command: { kind: "version" }
        };
    }

    const [name, ...args] = rest;
    switch (name) {
        case "get":
        case "delete":
        case "watch": {
            const target = parseTarget(name, parseCommandFlags(name, args, TARGET_FLAGS));
            return { globals, command: { kind: name, ...target } };
        }
        case "publish": {
            const flags = parseCommandFlags(name, args, PUBLISH_FLAGS);
            return {
                globals,
                command: {
                    kind: "publish",
                    ...parseTarget(name, flags),
                    content: parseContentSource(flags),
                    type: flags.get("type"),
                    appName: flags.get("app-name"),
                }
            };
        }
        case "search": {
            const flags = parseCommandFlags(name, args, SEARCH_FLAGS);
            const page = flags.get("page");
            const pageSize = flags.get("page-size");
            return {
                globals,
                command: {
                    kind: "search",
                    mode: parseSearchMode(flags.get("mode")),
                    dataId: flags.get("data-id"),
                    group: flags.get("group"),
                    pageNo: page === undefined ? undefined : parsePositiveInteger(page, "--page"),
                    pageSize: pageSize === undefined ? undefined : parsePositiveInteger(pageSize, "--page-size"),
                }
            };
        }
        default:
            throw new CliError("E_USAGE", `Unsupported command '${name}'.`, 2);
    }
}

export function resolveContent(source: ContentSource): string {
    switch (source.kind) {
        case "inline":
            return source.value;
        case "file": {
            if (!fs.existsSync(source.path)) {
                throw new CliError("E_USAGE", `Content file not found: ${source.path}`, 2);
            }
            return fs.readFileSync(source.path, "utf8");
        }
    }
}
