export type SearchMode = 'accurate' | 'blur';

export interface Credentials {
    accessKey: string;
    secretKey: string;
}

export interface PublishOptions {
    appName?: string;
    type?: string;
}

export interface SearchQuery {
    dataId: string;
    group: string;
}

export interface ConfigItem {
    id: string;
    dataId: string;
    group: string;
    content: string;
    md5?: string;
    tenant: string;
    appName: string;
    type?: string;
}

export interface ConfigPage {
    totalCount: number;
    pageNumber: number;
    pagesAvailable: number;
    pageItems: ConfigItem[];
}

/**
 * Remote surface of the configuration server. Implementations classify failures:
 * NotFoundError for 404, ForbiddenError for 403, TransientError for everything else.
 */
export interface ConfigService {
    get(dataId: string, group: string, tenant: string, credentials: Credentials): Promise<string>;
    publish(
        dataId: string,
        group: string,
        tenant: string,
        content: string,
        credentials: Credentials,
        options?: PublishOptions
    ): Promise<boolean>;
    delete(dataId: string, group: string, tenant: string, credentials: Credentials): Promise<boolean>;
    search(
        query: SearchQuery,
        pageNo: number,
        pageSize: number,
        mode: SearchMode,
        tenant: string,
        credentials: Credentials
    ): Promise<ConfigPage>;
    /**
     * Long-poll: the server may hold the request until a listed config changes or its
     * window elapses. Resolves with the encoded changed list, or an empty string.
     */
    listen(payload: string, initializing: boolean, credentials: Credentials, signal?: AbortSignal): Promise<string>;
}
