/** Watched entries served by one long-poll worker. */
export const DEFAULT_SHARD_CAPACITY = 3000;

export const DEFAULT_GROUP = 'DEFAULT_GROUP';

/** dataId prefix marking content stored encrypted by the key-management service. */
export const CIPHER_DATA_ID_PREFIX = 'cipher-';

// Listen protocol separators. Fixed by the server, not tunable.
export const SPLIT_CONFIG = String.fromCharCode(1);
export const SPLIT_CONFIG_INNER = String.fromCharCode(2);
export const ENCODED_SPLIT_CONFIG = '%01';
export const ENCODED_SPLIT_CONFIG_INNER = '%02';
export const LISTENING_CONFIGS_KEY = 'Listening-Configs';

export const CACHE_KEY_SEPARATOR = '@@';

export const DEFAULT_CONTEXT_PATH = '/nacos';
export const CONFIG_PATH = '/v1/cs/configs';
export const CONFIG_LISTENER_PATH = '/v1/cs/configs/listener';

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_LISTEN_TIMEOUT_MS = 30_000;

// Shard manager and per-shard poller cadence.
export const SCHEDULER_INITIAL_DELAY_MS = 1;
export const SCHEDULER_GAP_MS = 10;

export const DEFAULT_SEARCH_PAGE_NO = 1;
export const DEFAULT_SEARCH_PAGE_SIZE = 10;
