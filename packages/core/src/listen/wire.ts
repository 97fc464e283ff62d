import {
    ENCODED_SPLIT_CONFIG,
    ENCODED_SPLIT_CONFIG_INNER,
    SPLIT_CONFIG,
    SPLIT_CONFIG_INNER,
} from '../config/defaults.js';
import { ProtocolError, ValidationError } from '../errors.js';

export interface ListeningConfig {
    dataId: string;
    group: string;
    digest: string;
    tenant: string;
}

export interface ChangedConfig {
    dataId: string;
    group: string;
    tenant?: string;
}

function assertEncodable(field: string, value: string): void {
    if (value.includes(SPLIT_CONFIG) || value.includes(SPLIT_CONFIG_INNER)) {
        throw new ValidationError(`${field} contains a reserved listen separator character`);
    }
}

/**
 * Request payload: `dataId ^B group ^B digest [^B tenant] ^A` per entry, concatenated.
 * The protocol has no escape sequence, so fields carrying ^A or ^B are rejected.
 * The payload travels form-encoded, which protects the control bytes in transit.
 */
export function encodeListeningConfigs(configs: readonly ListeningConfig[]): string {
    let payload = '';
    for (const config of configs) {
        assertEncodable('dataId', config.dataId);
        assertEncodable('group', config.group);
        assertEncodable('digest', config.digest);
        assertEncodable('tenant', config.tenant);

        payload += config.dataId + SPLIT_CONFIG_INNER + config.group + SPLIT_CONFIG_INNER + config.digest;
        if (config.tenant.length > 0) {
            payload += SPLIT_CONFIG_INNER + config.tenant;
        }
        payload += SPLIT_CONFIG;
    }
    return payload;
}

function decodeField(value: string): string {
    try {
        return decodeURIComponent(value);
    } catch (error) {
        throw new ProtocolError(`malformed escape in listen response field '${value}'`, { cause: error });
    }
}

/**
 * Response payload: the URL-encoded form of `dataId ^B group [^B tenant] ^A` entries,
 * i.e. literal `%02` / `%01` separators. Raw control separators are accepted too.
 */
export function decodeChangedConfigs(payload: string): ChangedConfig[] {
    const normalized = payload
        .trim()
        .split(ENCODED_SPLIT_CONFIG).join(SPLIT_CONFIG)
        .split(ENCODED_SPLIT_CONFIG_INNER).join(SPLIT_CONFIG_INNER);

    const changed: ChangedConfig[] = [];
    for (const segment of normalized.split(SPLIT_CONFIG)) {
        if (segment.trim().length === 0) {
            continue;
        }
        const fields = segment.split(SPLIT_CONFIG_INNER);
        if (fields.length < 2 || fields[0].length === 0 || fields[1].length === 0) {
            throw new ProtocolError(`malformed changed-config entry '${segment}'`);
        }
        const entry: ChangedConfig = {
            dataId: decodeField(fields[0]),
            group: decodeField(fields[1]),
        };
        if (fields.length >= 3 && fields[2].length > 0) {
            entry.tenant = decodeField(fields[2]);
        }
        changed.push(entry);
    }
    return changed;
}
