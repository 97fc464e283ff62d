import { getConfigCacheKey } from '../cache/cache-key.js';
import {
    ENCODED_SPLIT_CONFIG,
    ENCODED_SPLIT_CONFIG_INNER,
    SPLIT_CONFIG,
    SPLIT_CONFIG_INNER,
} from '../config/defaults.js';
import { ForbiddenError, NotFoundError, TransientError } from '../errors.js';
import { computeDigest } from '../utils/digest.js';
import type {
    ConfigItem,
    ConfigPage,
    ConfigService,
    Credentials,
    PublishOptions,
    SearchMode,
    SearchQuery,
} from './config-service.js';

interface StoredConfig {
    id: number;
    dataId: string;
    group: string;
    tenant: string;
    content: string;
    md5: string;
    appName: string;
    type?: string;
}

interface ListenedConfig {
    dataId: string;
    group: string;
    md5: string;
    tenant: string;
}

export interface ListenCall {
    payload: string;
    initializing: boolean;
}

export interface InMemoryConfigServiceOptions {
    /** How long a listen request is held when nothing has changed. */
    holdMs?: number;
}

const EMPTY_DIGEST = computeDigest('');

function parseListeningConfigs(payload: string): ListenedConfig[] {
    const configs: ListenedConfig[] = [];
    for (const segment of payload.split(SPLIT_CONFIG)) {
        if (!segment) {
            continue;
        }
        const [dataId = '', group = '', md5 = '', tenant = ''] = segment.split(SPLIT_CONFIG_INNER);
        configs.push({ dataId, group, md5, tenant });
    }
    return configs;
}

function encodeChanged(configs: readonly ListenedConfig[]): string {
    return configs
        .map((config) => {
            const fields = [config.dataId, config.group];
            if (config.tenant) {
                fields.push(config.tenant);
            }
            return fields.map((field) => encodeURIComponent(field)).join(ENCODED_SPLIT_CONFIG_INNER) + ENCODED_SPLIT_CONFIG;
        })
        .join('');
}

function abortReason(signal: AbortSignal): Error {
    if (signal.reason instanceof Error) {
        return signal.reason;
    }
    const error = new Error('listen aborted');
    error.name = 'AbortError';
    return error;
}

/**
 * In-process stand-in for the configuration server, with the same error
 * classification and long-poll behavior as the HTTP service.
 */
export class InMemoryConfigService implements ConfigService {
    private readonly configs: Map<string, StoredConfig> = new Map();
    private readonly forbidden: Set<string> = new Set();
    private readonly waiters: Set<() => void> = new Set();
    private readonly holdMs: number;
    private nextId = 1;
    private unreachable = false;
    public readonly listenCalls: ListenCall[] = [];
    public getCalls = 0;

    constructor(options: InMemoryConfigServiceOptions = {}) {
        this.holdMs = options.holdMs ?? 50;
    }

    /** Every operation fails with a TransientError while set. */
    public setUnreachable(unreachable: boolean): void {
        this.unreachable = unreachable;
    }

    public forbid(dataId: string, group: string, tenant: string): void {
        this.forbidden.add(getConfigCacheKey(dataId, group, tenant));
    }

    async get(dataId: string, group: string, tenant: string, _credentials: Credentials): Promise<string> {
        this.getCalls += 1;
        const key = this.guard(dataId, group, tenant);
        const stored = this.configs.get(key);
        if (!stored) {
            throw new NotFoundError(`get config ${dataId}@${group}: config not found`);
        }
        return stored.content;
    }

    async publish(
        dataId: string,
        group: string,
        tenant: string,
        content: string,
        _credentials: Credentials,
        options: PublishOptions = {}
    ): Promise<boolean> {
        const key = this.guard(dataId, group, tenant);
        const existing = this.configs.get(key);
        this.configs.set(key, {
            id: existing?.id ?? this.nextId++,
            dataId,
            group,
            tenant,
            content,
            md5: computeDigest(content),
            appName: options.appName ?? existing?.appName ?? '',
            type: options.type ?? existing?.type,
        });
        this.wakeListeners();
        return true;
    }

    async delete(dataId: string, group: string, tenant: string, _credentials: Credentials): Promise<boolean> {
        const key = this.guard(dataId, group, tenant);
        this.configs.delete(key);
        this.wakeListeners();
        return true;
    }

    async search(
        query: SearchQuery,
        pageNo: number,
        pageSize: number,
        mode: SearchMode,
        tenant: string,
        _credentials: Credentials
    ): Promise<ConfigPage> {
        if (this.unreachable) {
            throw new TransientError('server unreachable');
        }
        const matches = (value: string, pattern: string): boolean => {
            if (!pattern) {
                return true;
            }
            return mode === 'accurate' ? value === pattern : value.includes(pattern.replace(/\*/g, ''));
        };
        const items: ConfigItem[] = Array.from(this.configs.values())
            .filter((config) => config.tenant === tenant && matches(config.dataId, query.dataId) && matches(config.group, query.group))
            .sort((a, b) => a.id - b.id)
            .map((config) => ({
                id: String(config.id),
                dataId: config.dataId,
                group: config.group,
                content: config.content,
                md5: config.md5,
                tenant: config.tenant,
                appName: config.appName,
                type: config.type,
            }));
        const start = (pageNo - 1) * pageSize;
        return {
            totalCount: items.length,
            pageNumber: pageNo,
            pagesAvailable: Math.ceil(items.length / pageSize),
            pageItems: items.slice(start, start + pageSize),
        };
    }

    async listen(payload: string, initializing: boolean, _credentials: Credentials, signal?: AbortSignal): Promise<string> {
        this.listenCalls.push({ payload, initializing });
        if (this.unreachable) {
            throw new TransientError('server unreachable');
        }
        const listened = parseListeningConfigs(payload);

        let changed = this.changedAmong(listened);
        if (changed.length > 0 || initializing) {
            return encodeChanged(changed);
        }

        await this.waitForChange(signal);
        changed = this.changedAmong(listened);
        return encodeChanged(changed);
    }

    private guard(dataId: string, group: string, tenant: string): string {
        if (this.unreachable) {
            throw new TransientError('server unreachable');
        }
        const key = getConfigCacheKey(dataId, group, tenant);
        if (this.forbidden.has(key)) {
            throw new ForbiddenError(`${dataId}@${group}: forbidden`);
        }
        return key;
    }

    private changedAmong(listened: readonly ListenedConfig[]): ListenedConfig[] {
        return listened.filter((config) => {
            const stored = this.configs.get(getConfigCacheKey(config.dataId, config.group, config.tenant));
            return (stored?.md5 ?? EMPTY_DIGEST) !== config.md5;
        });
    }

    private wakeListeners(): void {
        const waiters = Array.from(this.waiters);
        this.waiters.clear();
        for (const wake of waiters) {
            wake();
        }
    }

    private waitForChange(signal?: AbortSignal): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            if (signal?.aborted) {
                reject(abortReason(signal));
                return;
            }
            const finish = () => {
                clearTimeout(timer);
                this.waiters.delete(finish);
                signal?.removeEventListener('abort', onAbort);
                resolve();
            };
            const onAbort = () => {
                clearTimeout(timer);
                this.waiters.delete(finish);
                if (signal) {
                    reject(abortReason(signal));
                }
            };
            const timer = setTimeout(finish, this.holdMs);
            this.waiters.add(finish);
            signal?.addEventListener('abort', onAbort, { once: true });
        });
    }
}
