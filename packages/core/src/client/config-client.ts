import * as path from 'path';
import { getConfigCacheKey } from '../cache/cache-key.js';
import { DiskCache, FileDiskCache } from '../cache/disk-cache.js';
import {
    ClientConfig,
    ClientConfigInput,
    ServerConfigInput,
    parseClientConfig,
    parseServerConfigs,
} from '../config/client-config.js';
import {
    DEFAULT_SEARCH_PAGE_NO,
    DEFAULT_SEARCH_PAGE_SIZE,
    SCHEDULER_GAP_MS,
    SCHEDULER_INITIAL_DELAY_MS,
} from '../config/defaults.js';
import { InitializationError, ValidationError, errorMessage } from '../errors.js';
import { KeyManagement } from '../kms/key-management.js';
import { ShardPoller } from '../listen/poller.js';
import { Reconciler } from '../listen/reconciler.js';
import { ShardManager } from '../listen/shard-manager.js';
import { encodeListeningConfigs } from '../listen/wire.js';
import type { ConfigService, ConfigPage, Credentials, SearchMode } from '../remote/config-service.js';
import { HttpConfigService } from '../remote/http-config-service.js';
import { ConfigChangeListener, WatchEntry, WatchRegistry } from '../registry/watch-registry.js';
import { TaskGroup } from '../scheduler/task-group.js';
import { computeDigest } from '../utils/digest.js';
import { ConfigReader } from './config-reader.js';

export interface ConfigParam {
    dataId: string;
    group: string;
}

export interface PublishConfigParam extends ConfigParam {
    content: string;
    appName?: string;
    type?: string;
}

export interface ListenConfigParam extends ConfigParam {
    appName?: string;
    onChange: ConfigChangeListener;
}

export interface SearchConfigParam {
    search: SearchMode;
    dataId?: string;
    group?: string;
    pageNo?: number;
    pageSize?: number;
}

export interface ConfigClientOptions {
    clientConfig?: ClientConfigInput;
    /** Required unless `service` is supplied. */
    serverConfigs?: ServerConfigInput[];
    service?: ConfigService;
    diskCache?: DiskCache;
    keyManagement?: KeyManagement;
    /** Start the shard manager right away (default true). */
    autoStart?: boolean;
    schedulerInitialDelayMs?: number;
    schedulerGapMs?: number;
}

const SHARD_MANAGER_TASK = 'shard-manager';

function validateIdentity(action: string, param: ConfigParam): void {
    if (!param.dataId) {
        throw new ValidationError(`[client.${action}] param.dataId can not be empty`);
    }
    if (!param.group) {
        throw new ValidationError(`[client.${action}] param.group can not be empty`);
    }
}

export class ConfigClient {
    public readonly clientConfig: ClientConfig;
    public readonly registry: WatchRegistry;
    private readonly service: ConfigService;
    private readonly diskCache: DiskCache;
    private readonly configCacheDir: string;
    private readonly credentials: Credentials;
    private readonly reader: ConfigReader;
    private readonly tasks = new TaskGroup();
    private readonly shardManager: ShardManager;
    private readonly schedulerInitialDelayMs: number;
    private readonly schedulerGapMs: number;
    private shutdownPromise: Promise<void> | null = null;

    constructor(options: ConfigClientOptions = {}) {
        this.clientConfig = parseClientConfig(options.clientConfig);
        if (this.clientConfig.openKms && !options.keyManagement) {
            throw new InitializationError('openKms is enabled but no key management client was provided');
        }

        if (options.service) {
            this.service = options.service;
        } else {
            if (!options.serverConfigs) {
                throw new InitializationError('serverConfigs are required when no config service is provided');
            }
            this.service = new HttpConfigService({
                servers: parseServerConfigs(options.serverConfigs),
                timeoutMs: this.clientConfig.timeoutMs,
                listenTimeoutMs: this.clientConfig.listenTimeoutMs,
            });
        }

        this.diskCache = options.diskCache ?? new FileDiskCache();
        this.configCacheDir = path.join(this.clientConfig.cacheDir, 'config');
        this.credentials = {
            accessKey: this.clientConfig.accessKey,
            secretKey: this.clientConfig.secretKey,
        };
        this.reader = new ConfigReader({
            service: this.service,
            diskCache: this.diskCache,
            cacheDir: this.configCacheDir,
            credentials: this.credentials,
            keyManagement: options.keyManagement,
        });
        this.registry = new WatchRegistry(this.clientConfig.shardCapacity);
        this.schedulerInitialDelayMs = options.schedulerInitialDelayMs ?? SCHEDULER_INITIAL_DELAY_MS;
        this.schedulerGapMs = options.schedulerGapMs ?? SCHEDULER_GAP_MS;

        const reconciler = new Reconciler(this.registry, this.reader);
        this.shardManager = new ShardManager({
            registry: this.registry,
            tasks: this.tasks,
            initialDelayMs: this.schedulerInitialDelayMs,
            gapMs: this.schedulerGapMs,
            createShardRound: (shardIndex) => {
                const poller = new ShardPoller({
                    shardIndex,
                    registry: this.registry,
                    service: this.service,
                    reconciler,
                    credentials: this.credentials,
                    tenant: this.clientConfig.namespaceId,
                    debug: this.clientConfig.debug,
                });
                return async (signal) => {
                    await poller.poll(signal);
                };
            },
        });

        if (options.autoStart !== false) {
            this.start();
        }
    }

    public get spawnedShards(): number {
        return this.shardManager.spawnedShards;
    }

    public get isShutdown(): boolean {
        return this.shutdownPromise !== null;
    }

    /** Starts background listening; a no-op once started or after shutdown. */
    public start(): void {
        if (this.isShutdown) {
            return;
        }
        this.tasks.spawn(SHARD_MANAGER_TASK, () => this.shardManager.tick(), {
            initialDelayMs: this.schedulerInitialDelayMs,
            gapMs: this.schedulerGapMs,
        });
    }

    public async getConfig(param: ConfigParam): Promise<string> {
        validateIdentity('GetConfig', param);
        return this.reader.read({
            dataId: param.dataId,
            group: param.group,
            tenant: this.clientConfig.namespaceId,
        });
    }

    public async publishConfig(param: PublishConfigParam): Promise<boolean> {
        validateIdentity('PublishConfig', param);
        if (!param.content) {
            throw new ValidationError('[client.PublishConfig] param.content can not be empty');
        }
        return this.service.publish(
            param.dataId,
            param.group,
            this.clientConfig.namespaceId,
            param.content,
            this.credentials,
            { appName: param.appName, type: param.type }
        );
    }

    public async deleteConfig(param: ConfigParam): Promise<boolean> {
        validateIdentity('DeleteConfig', param);
        return this.service.delete(param.dataId, param.group, this.clientConfig.namespaceId, this.credentials);
    }

    public async searchConfig(param: SearchConfigParam): Promise<ConfigPage> {
        if (param.search !== 'accurate' && param.search !== 'blur') {
            throw new ValidationError('[client.SearchConfig] param.search must be accurate or blur');
        }
        const pageNo = param.pageNo !== undefined && param.pageNo > 0 ? param.pageNo : DEFAULT_SEARCH_PAGE_NO;
        const pageSize = param.pageSize !== undefined && param.pageSize > 0 ? param.pageSize : DEFAULT_SEARCH_PAGE_SIZE;
        try {
            return await this.service.search(
                { dataId: param.dataId ?? '', group: param.group ?? '' },
                pageNo,
                pageSize,
                param.search,
                this.clientConfig.namespaceId,
                this.credentials
            );
        } catch (error) {
            console.error(`[CONFIG-CLIENT] Search config from server failed: ${errorMessage(error)}`);
            throw error;
        }
    }

    /**
     * Watches a config. The first registration of an identity binds its listener;
     * repeating the call only re-arms the initializing flag.
     */
    public async listenConfig(param: ListenConfigParam): Promise<void> {
        validateIdentity('ListenConfig', param);
        if (this.isShutdown) {
            throw new ValidationError('[client.ListenConfig] client has been shut down');
        }
        const tenant = this.clientConfig.namespaceId;
        const key = getConfigCacheKey(param.dataId, param.group, tenant);

        if (this.registry.has(key)) {
            this.reRegister(key);
            return;
        }

        let content = '';
        try {
            content = await this.diskCache.read(key, this.configCacheDir);
        } catch (error) {
            console.log(`[CONFIG-CLIENT] No cached content for '${key}', starting empty: ${errorMessage(error)}`);
        }
        const digest = computeDigest(content);
        // Rejects identities the listen protocol cannot carry before they reach a poller.
        encodeListeningConfigs([{ dataId: param.dataId, group: param.group, digest, tenant }]);

        const outcome = this.registry.register(
            key,
            (shardIndex): WatchEntry => ({
                dataId: param.dataId,
                group: param.group,
                tenant,
                appName: param.appName,
                content,
                digest,
                lastNotifiedDigest: digest,
                listener: param.onChange,
                shardIndex,
                initializing: true,
            }),
            (existing) => ({ ...existing, initializing: true })
        );
        if (outcome === 're-registered') {
            this.warnListenerDiscarded(key);
        }
    }

    public cancelListenConfig(param: ConfigParam): void {
        validateIdentity('CancelListenConfig', param);
        const key = getConfigCacheKey(param.dataId, param.group, this.clientConfig.namespaceId);
        this.registry.remove(key);
        console.log(`[CONFIG-CLIENT] Cancel listen config DataId:${param.dataId} Group:${param.group}`);
    }

    /** Stops the shard manager and every poller; in-flight long polls are aborted. */
    public shutdown(): Promise<void> {
        if (!this.shutdownPromise) {
            this.shutdownPromise = this.tasks.stopAll().then(() => {
                console.log(`[CONFIG-CLIENT] Shut down (${this.shardManager.spawnedShards} shard worker(s) stopped)`);
            });
        }
        return this.shutdownPromise;
    }

    private reRegister(key: string): void {
        this.registry.update(key, (existing) => ({ ...existing, initializing: true }));
        this.warnListenerDiscarded(key);
    }

    private warnListenerDiscarded(key: string): void {
        // TODO: decide whether repeat registrations should replace or add listeners; first one wins for now.
        console.warn(`[CONFIG-CLIENT] '${key}' is already watched; keeping the first listener`);
    }
}
