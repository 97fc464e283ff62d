import * as crypto from 'crypto';
import { z } from 'zod';
import {
    CONFIG_LISTENER_PATH,
    CONFIG_PATH,
    DEFAULT_LISTEN_TIMEOUT_MS,
    DEFAULT_TIMEOUT_MS,
    LISTENING_CONFIGS_KEY,
} from '../config/defaults.js';
import { ServerConfig } from '../config/client-config.js';
import {
    ForbiddenError,
    NotFoundError,
    ProtocolError,
    TransientError,
    errorMessage,
} from '../errors.js';
import type {
    ConfigPage,
    ConfigService,
    Credentials,
    PublishOptions,
    SearchMode,
    SearchQuery,
} from './config-service.js';

export interface HttpConfigServiceConfig {
    servers: ServerConfig[];
    timeoutMs?: number;
    /** Long-poll window the server is asked to hold a listen request for. */
    listenTimeoutMs?: number;
    fetch?: typeof fetch;
    now?: () => number;
}

interface HttpRequest {
    method: 'GET' | 'POST' | 'DELETE';
    path: string;
    query?: Record<string, string>;
    form?: Record<string, string>;
    headers?: Record<string, string>;
    timeoutMs: number;
    signal?: AbortSignal;
    /** Move on to the next server after a network failure. Set for reads only. */
    failover: boolean;
}

interface HttpResult {
    status: number;
    body: string;
}

const configItemSchema = z.object({
    id: z.union([z.string(), z.number()]).transform((value) => String(value)),
    dataId: z.string(),
    group: z.string(),
    content: z.string().default(''),
    md5: z.string().nullish().transform((value) => value ?? undefined),
    tenant: z.string().default(''),
    appName: z.string().nullish().transform((value) => value ?? ''),
    type: z.string().nullish().transform((value) => value ?? undefined),
});

const configPageSchema = z.object({
    totalCount: z.number().int().nonnegative(),
    pageNumber: z.number().int(),
    pagesAvailable: z.number().int().nonnegative(),
    pageItems: z.array(configItemSchema),
});

/**
 * Signature headers for access-key authentication: HMAC-SHA1 over
 * `tenant+group+timestamp` (or the parts that are present), base64 encoded.
 */
export function buildSignatureHeaders(
    credentials: Credentials,
    tenant: string,
    group: string,
    timestamp: number
): Record<string, string> {
    if (!credentials.accessKey || !credentials.secretKey) {
        return {};
    }
    let resource = '';
    if (tenant && group) {
        resource = `${tenant}+${group}`;
    } else if (group) {
        resource = group;
    }
    const signed = resource ? `${resource}+${timestamp}` : String(timestamp);
    const signature = crypto.createHmac('sha1', credentials.secretKey).update(signed, 'utf8').digest('base64');
    return {
        'Spas-AccessKey': credentials.accessKey,
        'Timestamp': String(timestamp),
        'Spas-Signature': signature,
    };
}

function createRequestSignal(timeoutMs: number, parent?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const timer = setTimeout(() => {
        const timeoutError = new Error(`request timed out after ${timeoutMs}ms`);
        timeoutError.name = 'TimeoutError';
        controller.abort(timeoutError);
    }, timeoutMs);
    timer.unref();

    const onParentAbort = () => controller.abort(parent?.reason);
    if (parent) {
        if (parent.aborted) {
            controller.abort(parent.reason);
        } else {
            parent.addEventListener('abort', onParentAbort, { once: true });
        }
    }

    return {
        signal: controller.signal,
        dispose: () => {
            clearTimeout(timer);
            parent?.removeEventListener('abort', onParentAbort);
        },
    };
}

function classifyStatus(result: HttpResult, action: string): void {
    if (result.status >= 200 && result.status < 300) {
        return;
    }
    if (result.status === 404) {
        throw new NotFoundError(`${action}: config not found`);
    }
    if (result.status === 403) {
        throw new ForbiddenError(`${action}: forbidden`);
    }
    throw new TransientError(`${action} failed with status ${result.status}`, {
        statusCode: result.status,
        payload: result.body,
    });
}

export class HttpConfigService implements ConfigService {
    private readonly servers: ServerConfig[];
    private readonly timeoutMs: number;
    private readonly listenTimeoutMs: number;
    private readonly fetchImpl: typeof fetch;
    private readonly now: () => number;
    private nextServer = 0;

    constructor(config: HttpConfigServiceConfig) {
        if (config.servers.length === 0) {
            throw new RangeError('HttpConfigService needs at least one server');
        }
        this.servers = config.servers.slice();
        this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.listenTimeoutMs = config.listenTimeoutMs ?? DEFAULT_LISTEN_TIMEOUT_MS;
        this.fetchImpl = config.fetch ?? fetch;
        this.now = config.now || (() => Date.now());
    }

    async get(dataId: string, group: string, tenant: string, credentials: Credentials): Promise<string> {
        const result = await this.request({
            method: 'GET',
            path: CONFIG_PATH,
            query: { dataId, group, tenant },
            headers: buildSignatureHeaders(credentials, tenant, group, this.now()),
            timeoutMs: this.timeoutMs,
            failover: true,
        });
        classifyStatus(result, `get config ${dataId}@${group}`);
        return result.body;
    }

    async publish(
        dataId: string,
        group: string,
        tenant: string,
        content: string,
        credentials: Credentials,
        options: PublishOptions = {}
    ): Promise<boolean> {
        const form: Record<string, string> = { dataId, group, tenant, content };
        if (options.appName) {
            form.appName = options.appName;
        }
        if (options.type) {
            form.type = options.type;
        }
        const result = await this.request({
            method: 'POST',
            path: CONFIG_PATH,
            form,
            headers: buildSignatureHeaders(credentials, tenant, group, this.now()),
            timeoutMs: this.timeoutMs,
            failover: false,
        });
        classifyStatus(result, `publish config ${dataId}@${group}`);
        return result.body.trim() === 'true';
    }

    async delete(dataId: string, group: string, tenant: string, credentials: Credentials): Promise<boolean> {
        const result = await this.request({
            method: 'DELETE',
            path: CONFIG_PATH,
            query: { dataId, group, tenant },
            headers: buildSignatureHeaders(credentials, tenant, group, this.now()),
            timeoutMs: this.timeoutMs,
            failover: false,
        });
        classifyStatus(result, `delete config ${dataId}@${group}`);
        return result.body.trim() === 'true';
    }

    async search(
        query: SearchQuery,
        pageNo: number,
        pageSize: number,
        mode: SearchMode,
        tenant: string,
        credentials: Credentials
    ): Promise<ConfigPage> {
        const result = await this.request({
            method: 'GET',
            path: CONFIG_PATH,
            query: {
                search: mode,
                dataId: query.dataId,
                group: query.group,
                pageNo: String(pageNo),
                pageSize: String(pageSize),
                tenant,
            },
            headers: buildSignatureHeaders(credentials, tenant, query.group, this.now()),
            timeoutMs: this.timeoutMs,
            failover: true,
        });
        classifyStatus(result, 'search config');

        let raw: unknown;
        try {
            raw = JSON.parse(result.body);
        } catch (error) {
            throw new ProtocolError(`search config returned invalid JSON: ${errorMessage(error)}`, { cause: error });
        }
        const parsed = configPageSchema.safeParse(raw);
        if (!parsed.success) {
            throw new ProtocolError(`search config returned an unexpected page: ${parsed.error.message}`);
        }
        return parsed.data;
    }

    async listen(payload: string, initializing: boolean, credentials: Credentials, signal?: AbortSignal): Promise<string> {
        const headers: Record<string, string> = {
            ...buildSignatureHeaders(credentials, '', '', this.now()),
            'Long-Pulling-Timeout': String(this.listenTimeoutMs),
        };
        if (initializing) {
            headers['Long-Pulling-Timeout-No-Hangup'] = 'true';
        }
        const result = await this.request({
            method: 'POST',
            path: CONFIG_LISTENER_PATH,
            form: { [LISTENING_CONFIGS_KEY]: payload },
            headers,
            // The server holds the request for listenTimeoutMs; leave room for the answer.
            timeoutMs: this.listenTimeoutMs + this.timeoutMs,
            signal,
            failover: true,
        });
        classifyStatus(result, 'listen config');
        return result.body;
    }

    private buildUrl(server: ServerConfig, path: string, query?: Record<string, string>): string {
        const url = new URL(`${server.scheme}://${server.ipAddr}:${server.port}${server.contextPath}${path}`);
        if (query) {
            for (const [key, value] of Object.entries(query)) {
                url.searchParams.set(key, value);
            }
        }
        return url.toString();
    }

    /** Round-robin over the servers; a network failure moves a read on to the next one. */
    private async request(request: HttpRequest): Promise<HttpResult> {
        const start = this.nextServer;
        this.nextServer = (this.nextServer + 1) % this.servers.length;
        let lastError: unknown;

        for (let attempt = 0; attempt < this.servers.length; attempt += 1) {
            const server = this.servers[(start + attempt) % this.servers.length];
            const url = this.buildUrl(server, request.path, request.query);
            const { signal, dispose } = createRequestSignal(request.timeoutMs, request.signal);
            try {
                const response = await this.fetchImpl(url, {
                    method: request.method,
                    headers: request.headers,
                    body: request.form ? new URLSearchParams(request.form) : undefined,
                    signal,
                });
                const body = await response.text();
                return { status: response.status, body };
            } catch (error) {
                if (request.signal?.aborted) {
                    throw error;
                }
                lastError = error;
                console.warn(`[HTTP] ${request.method} ${url} failed: ${errorMessage(error)}`);
                if (!request.failover) {
                    throw new TransientError(`${request.method} ${request.path} failed: ${errorMessage(error)}`, { cause: error });
                }
            } finally {
                dispose();
            }
        }

        throw new TransientError(`${request.method} ${request.path} failed on all servers: ${errorMessage(lastError)}`, {
            cause: lastError,
        });
    }
}
