import { cacheKeyOf } from '../cache/cache-key.js';
import { DiskCache } from '../cache/disk-cache.js';
import {
    ForbiddenError,
    NotFoundError,
    TransientError,
    ValidationError,
    errorMessage,
} from '../errors.js';
import { KeyManagement, decryptIfNeeded } from '../kms/key-management.js';
import type { ConfigService, Credentials } from '../remote/config-service.js';

export interface ConfigReaderOptions {
    service: ConfigService;
    diskCache: DiskCache;
    cacheDir: string;
    credentials: Credentials;
    keyManagement?: KeyManagement;
}

export interface ReadRequest {
    dataId: string;
    group: string;
    tenant: string;
}

export interface ConfigSnapshot {
    /** Content as the server stores it; digests are computed from this. */
    raw: string;
    /** What the application sees: `raw`, decrypted for `cipher-` configs. */
    content: string;
}

/**
 * Fetch-with-fallback: remote first with write-through to the disk cache; on a
 * transient failure the cached copy is served. Not-found and forbidden are
 * terminal and never fall back.
 */
export class ConfigReader {
    private readonly service: ConfigService;
    private readonly diskCache: DiskCache;
    private readonly cacheDir: string;
    private readonly credentials: Credentials;
    private readonly keyManagement?: KeyManagement;

    constructor(options: ConfigReaderOptions) {
        this.service = options.service;
        this.diskCache = options.diskCache;
        this.cacheDir = options.cacheDir;
        this.credentials = options.credentials;
        this.keyManagement = options.keyManagement;
    }

    public async read(request: ReadRequest): Promise<string> {
        const snapshot = await this.readSnapshot(request);
        return snapshot.content;
    }

    public async readSnapshot(request: ReadRequest): Promise<ConfigSnapshot> {
        const { dataId, group, tenant } = request;
        if (!dataId) {
            throw new ValidationError('dataId can not be empty');
        }
        if (!group) {
            throw new ValidationError('group can not be empty');
        }

        const cacheKey = cacheKeyOf(request);
        let raw: string;
        try {
            raw = await this.service.get(dataId, group, tenant, this.credentials);
        } catch (error) {
            console.error(`[CONFIG-CLIENT] Get config '${cacheKey}' from server failed: ${errorMessage(error)}`);
            if (error instanceof NotFoundError) {
                // Absence on the server invalidates the local copy.
                await this.writeThrough(cacheKey, '');
                throw error;
            }
            if (error instanceof ForbiddenError) {
                throw error;
            }
            raw = await this.readFallback(cacheKey, error);
            return { raw, content: await decryptIfNeeded(dataId, raw, this.keyManagement) };
        }

        await this.writeThrough(cacheKey, raw);
        return { raw, content: await decryptIfNeeded(dataId, raw, this.keyManagement) };
    }

    private async readFallback(cacheKey: string, remoteError: unknown): Promise<string> {
        try {
            const cached = await this.diskCache.read(cacheKey, this.cacheDir);
            console.warn(`[CACHE] Serving '${cacheKey}' from local cache after server failure`);
            return cached;
        } catch (cacheError) {
            console.error(`[CACHE] Get config '${cacheKey}' from cache failed: ${errorMessage(cacheError)}`);
            throw new TransientError('read config from both server and cache failed', {
                cause: new AggregateError([remoteError, cacheError], `server: ${errorMessage(remoteError)}; cache: ${errorMessage(cacheError)}`),
            });
        }
    }

    private async writeThrough(cacheKey: string, content: string): Promise<void> {
        try {
            await this.diskCache.write(cacheKey, this.cacheDir, content);
        } catch (error) {
            console.warn(`[CACHE] Write-through for '${cacheKey}' failed: ${errorMessage(error)}`);
        }
    }
}
