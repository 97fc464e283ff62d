export * from './errors.js';
export * from './config/defaults.js';
export type {
    ClientConfig,
    ClientConfigInput,
    ClientSettings,
    ServerConfig,
    ServerConfigInput,
} from './config/client-config.js';
export {
    clientConfigSchema,
    createClientSettingsFromEnv,
    defaultCacheDir,
    logConfigurationSummary,
    parseClientConfig,
    parseServerAddress,
    parseServerConfigs,
    serverConfigSchema,
} from './config/client-config.js';
export type { EnvSource } from './utils/env-manager.js';
export { EnvManager, envManager } from './utils/env-manager.js';
export { computeDigest } from './utils/digest.js';
export type { ConfigIdentity } from './cache/cache-key.js';
export { cacheKeyOf, getConfigCacheKey } from './cache/cache-key.js';
export type { DiskCache } from './cache/disk-cache.js';
export { FileDiskCache } from './cache/disk-cache.js';
export type { KeyManagement } from './kms/key-management.js';
export { decryptIfNeeded, isCipherDataId } from './kms/key-management.js';
export type {
    ConfigItem,
    ConfigPage,
    ConfigService,
    Credentials,
    PublishOptions,
    SearchMode,
    SearchQuery,
} from './remote/config-service.js';
export type { HttpConfigServiceConfig } from './remote/http-config-service.js';
export { HttpConfigService, buildSignatureHeaders } from './remote/http-config-service.js';
export type { InMemoryConfigServiceOptions, ListenCall } from './remote/in-memory-config-service.js';
export { InMemoryConfigService } from './remote/in-memory-config-service.js';
export type { ConfigChangeListener, RegisterOutcome, WatchEntry } from './registry/watch-registry.js';
export { WatchRegistry } from './registry/watch-registry.js';
export type { RepeatingTaskFn, RepeatingTaskOptions } from './scheduler/repeating-task.js';
export { RepeatingTask } from './scheduler/repeating-task.js';
export { TaskGroup } from './scheduler/task-group.js';
export type { ChangedConfig, ListeningConfig } from './listen/wire.js';
export { decodeChangedConfigs, encodeListeningConfigs } from './listen/wire.js';
export type { ShardManagerOptions } from './listen/shard-manager.js';
export { ShardManager, shardTaskName } from './listen/shard-manager.js';
export type { PollOutcome, ShardPollerOptions } from './listen/poller.js';
export { ShardPoller } from './listen/poller.js';
export type { ReconcileStats } from './listen/reconciler.js';
export { Reconciler } from './listen/reconciler.js';
export type { ConfigReaderOptions, ConfigSnapshot, ReadRequest } from './client/config-reader.js';
export { ConfigReader } from './client/config-reader.js';
export type {
    ConfigClientOptions,
    ConfigParam,
    ListenConfigParam,
    PublishConfigParam,
    SearchConfigParam,
} from './client/config-client.js';
export { ConfigClient } from './client/config-client.js';
