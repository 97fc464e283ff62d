import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export type EnvSource = Record<string, string | undefined>;

/**
 * Environment lookup: process environment first, then `~/.liveconf/.env`.
 * The file is read lazily and cached for the lifetime of the manager.
 */
export class EnvManager {
    private readonly source: EnvSource;
    private readonly envFilePath: string;
    private fileValues: Map<string, string> | null = null;

    constructor(source: EnvSource = process.env, envFilePath: string = path.join(os.homedir(), '.liveconf', '.env')) {
        this.source = source;
        this.envFilePath = envFilePath;
    }

    get(name: string): string | undefined {
        const fromSource = this.source[name];
        if (fromSource !== undefined && fromSource !== '') {
            return fromSource;
        }
        return this.readFileValues().get(name);
    }

    private readFileValues(): Map<string, string> {
        if (this.fileValues) {
            return this.fileValues;
        }
        const values = new Map<string, string>();
        try {
            const content = fs.readFileSync(this.envFilePath, 'utf8');
            for (const rawLine of content.split(/\r?\n/)) {
                const line = rawLine.trim();
                if (!line || line.startsWith('#')) {
                    continue;
                }
                const separator = line.indexOf('=');
                if (separator <= 0) {
                    continue;
                }
                const key = line.slice(0, separator).trim();
                const value = line.slice(separator + 1).trim().replace(/^(['"])(.*)\1$/, '$2');
                values.set(key, value);
            }
        } catch (error) {
            const code = typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
            if (code !== 'ENOENT') {
                console.warn(`[WARN] Could not read env file '${this.envFilePath}': ${error instanceof Error ? error.message : String(error)}`);
            }
        }
        this.fileValues = values;
        return values;
    }
}

export const envManager = new EnvManager();
