import * as fsp from 'fs/promises';
import * as path from 'path';
import * as crypto from 'crypto';
import { CacheError, errorMessage } from '../errors.js';

/**
 * Local persistence for config content, keyed by the composite cache key.
 * Used as write-through cache on successful reads and as the only source
 * while the server is unreachable.
 */
export interface DiskCache {
    write(key: string, dir: string, content: string): Promise<void>;
    /** Throws CacheError when the key was never written or cannot be read. */
    read(key: string, dir: string): Promise<string>;
}

function isMissingFileError(error: unknown): boolean {
    return typeof error === 'object'
        && error !== null
        && 'code' in error
        && error.code === 'ENOENT';
}

export class FileDiskCache implements DiskCache {
    public static fileNameForKey(key: string): string {
        // dataIds may contain path separators; keep every key in one flat directory.
        return encodeURIComponent(key);
    }

    public async write(key: string, dir: string, content: string): Promise<void> {
        const filePath = path.join(dir, FileDiskCache.fileNameForKey(key));
        const tempPath = `${filePath}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`;
        try {
            await fsp.mkdir(dir, { recursive: true });
            await fsp.writeFile(tempPath, content, 'utf8');
            await fsp.rename(tempPath, filePath);
        } catch (error) {
            await fsp.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
                console.warn(`[CACHE] Failed to remove temp file '${tempPath}': ${errorMessage(cleanupError)}`);
            });
            throw new CacheError(`failed to write config cache for '${key}': ${errorMessage(error)}`, { cause: error });
        }
    }

    public async read(key: string, dir: string): Promise<string> {
        const filePath = path.join(dir, FileDiskCache.fileNameForKey(key));
        try {
            return await fsp.readFile(filePath, 'utf8');
        } catch (error) {
            if (isMissingFileError(error)) {
                throw new CacheError(`no cached config for '${key}'`, { cause: error });
            }
            throw new CacheError(`failed to read config cache for '${key}': ${errorMessage(error)}`, { cause: error });
        }
    }
}
