import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import {
    DEFAULT_CONTEXT_PATH,
    DEFAULT_LISTEN_TIMEOUT_MS,
    DEFAULT_SHARD_CAPACITY,
    DEFAULT_TIMEOUT_MS,
} from './defaults.js';
import { InitializationError } from '../errors.js';
import { EnvManager, envManager } from '../utils/env-manager.js';

export const DEFAULT_SERVER_PORT = 8848;

export function defaultCacheDir(): string {
    return path.join(os.homedir(), '.liveconf', 'cache');
}

export const serverConfigSchema = z.object({
    scheme: z.enum(['http', 'https']).default('http'),
    ipAddr: z.string().min(1),
    port: z.number().int().min(1).max(65535).default(DEFAULT_SERVER_PORT),
    contextPath: z.string().default(DEFAULT_CONTEXT_PATH),
});

export const clientConfigSchema = z.object({
    // Tenant applied to every call; empty means the default namespace.
    namespaceId: z.string().default(''),
    timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    listenTimeoutMs: z.number().int().positive().default(DEFAULT_LISTEN_TIMEOUT_MS),
    cacheDir: z.string().min(1).default(defaultCacheDir),
    accessKey: z.string().default(''),
    secretKey: z.string().default(''),
    openKms: z.boolean().default(false),
    shardCapacity: z.number().int().positive().default(DEFAULT_SHARD_CAPACITY),
    debug: z.boolean().default(false),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;
export type ServerConfigInput = z.input<typeof serverConfigSchema>;
export type ClientConfig = z.infer<typeof clientConfigSchema>;
export type ClientConfigInput = z.input<typeof clientConfigSchema>;

export interface ClientSettings {
    clientConfig: ClientConfig;
    serverConfigs: ServerConfig[];
}

export function parseClientConfig(input: ClientConfigInput = {}): ClientConfig {
    const parsed = clientConfigSchema.safeParse(input);
    if (!parsed.success) {
        throw new InitializationError(`invalid client config: ${parsed.error.message}`);
    }
    return parsed.data;
}

export function parseServerConfigs(input: ServerConfigInput[]): ServerConfig[] {
    if (input.length === 0) {
        throw new InitializationError('no server configured; set at least one server address');
    }
    const parsed = z.array(serverConfigSchema).safeParse(input);
    if (!parsed.success) {
        throw new InitializationError(`invalid server config: ${parsed.error.message}`);
    }
    return parsed.data;
}

/** Parses `host[:port]` into a server entry. */
export function parseServerAddress(address: string, scheme: 'http' | 'https' = 'http', contextPath: string = DEFAULT_CONTEXT_PATH): ServerConfigInput {
    const trimmed = address.trim();
    const separator = trimmed.lastIndexOf(':');
    if (separator <= 0) {
        return { scheme, ipAddr: trimmed, port: DEFAULT_SERVER_PORT, contextPath };
    }
    const port = Number.parseInt(trimmed.slice(separator + 1), 10);
    if (!Number.isFinite(port)) {
        throw new InitializationError(`invalid server address '${address}'`);
    }
    return { scheme, ipAddr: trimmed.slice(0, separator), port, contextPath };
}

function readPositiveInt(env: EnvManager, name: string, fallback: number): number {
    const raw = env.get(name);
    if (!raw) {
        return fallback;
    }
    const parsed = Number.parseInt(raw, 10);
    if (Number.isFinite(parsed) && parsed > 0) {
        return parsed;
    }
    console.warn(`[WARN] Invalid ${name} value: ${raw}. Using default ${fallback}.`);
    return fallback;
}

function readBoolean(env: EnvManager, name: string): boolean {
    return (env.get(name) || '').toLowerCase() === 'true';
}

export function createClientSettingsFromEnv(env: EnvManager = envManager): ClientSettings {
    const schemeRaw = (env.get('LIVECONF_SERVER_SCHEME') || 'http').toLowerCase();
    let scheme: 'http' | 'https' = 'http';
    if (schemeRaw === 'https') {
        scheme = 'https';
    } else if (schemeRaw !== 'http') {
        console.warn(`[WARN] Invalid LIVECONF_SERVER_SCHEME value: ${schemeRaw}. Using default http.`);
    }
    const contextPath = env.get('LIVECONF_CONTEXT_PATH') || DEFAULT_CONTEXT_PATH;

    const addresses = (env.get('LIVECONF_SERVER_ADDR') || '')
        .split(',')
        .map((address) => address.trim())
        .filter((address) => address.length > 0);

    const serverConfigs = parseServerConfigs(addresses.map((address) => parseServerAddress(address, scheme, contextPath)));
    const clientConfig = parseClientConfig({
        namespaceId: env.get('LIVECONF_NAMESPACE') || '',
        timeoutMs: readPositiveInt(env, 'LIVECONF_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
        listenTimeoutMs: readPositiveInt(env, 'LIVECONF_LISTEN_TIMEOUT_MS', DEFAULT_LISTEN_TIMEOUT_MS),
        cacheDir: env.get('LIVECONF_CACHE_DIR') || defaultCacheDir(),
        accessKey: env.get('LIVECONF_ACCESS_KEY') || '',
        secretKey: env.get('LIVECONF_SECRET_KEY') || '',
        openKms: readBoolean(env, 'LIVECONF_OPEN_KMS'),
        debug: readBoolean(env, 'LIVECONF_DEBUG'),
    });

    return { clientConfig, serverConfigs };
}

export function logConfigurationSummary(settings: ClientSettings): void {
    const { clientConfig, serverConfigs } = settings;
    console.log(`[CONFIG-CLIENT] Configuration Summary:`);
    console.log(`[CONFIG-CLIENT]   Servers: ${serverConfigs.map((server) => `${server.scheme}://${server.ipAddr}:${server.port}${server.contextPath}`).join(', ')}`);
    console.log(`[CONFIG-CLIENT]   Namespace: ${clientConfig.namespaceId || '[default]'}`);
    console.log(`[CONFIG-CLIENT]   Cache Dir: ${clientConfig.cacheDir}`);
    console.log(`[CONFIG-CLIENT]   Timeouts: request ${clientConfig.timeoutMs}ms, long-poll ${clientConfig.listenTimeoutMs}ms`);
    console.log(`[CONFIG-CLIENT]   Access Key: ${clientConfig.accessKey ? '✅ Configured' : '❌ Not set'}`);
    console.log(`[CONFIG-CLIENT]   KMS Decryption: ${clientConfig.openKms ? 'enabled' : 'disabled'}`);
}
