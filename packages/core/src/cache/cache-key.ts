import { CACHE_KEY_SEPARATOR } from '../config/defaults.js';

export interface ConfigIdentity {
    dataId: string;
    group: string;
    tenant: string;
}

export function getConfigCacheKey(dataId: string, group: string, tenant: string): string {
    return `${dataId}${CACHE_KEY_SEPARATOR}${group}${CACHE_KEY_SEPARATOR}${tenant}`;
}

export function cacheKeyOf(identity: ConfigIdentity): string {
    return getConfigCacheKey(identity.dataId, identity.group, identity.tenant);
}
