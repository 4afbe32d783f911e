export type ErrorCode = 'CONFIG' | 'SOURCE_FETCH' | 'NO_ITEMS' | 'TRANSLATION' | 'PUBLISH';

export class DigestError extends Error {
    constructor(readonly code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** 缺少必需的环境变量或配置文件不合法；在任何网络请求之前抛出 */
export class ConfigError extends DigestError {
    constructor(message: string) {
        super('CONFIG', message);
    }
}

export class SourceFetchError extends DigestError {
    constructor(readonly source: string, readonly url: string, cause: unknown) {
        super('SOURCE_FETCH', `${source}: ${errorMessage(cause)}`, { cause });
    }
}

export class NoItemsError extends DigestError {
    constructor() {
        super('NO_ITEMS', 'no news items could be fetched from any source');
    }
}

export class TranslationError extends DigestError {
    constructor(message: string, readonly status?: number, readonly body?: string) {
        super('TRANSLATION', message);
    }
}

export class PublishError extends DigestError {
    constructor(message: string, readonly status?: number, readonly body?: string, options?: { cause?: unknown }) {
        super('PUBLISH', message, options);
    }
}

export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
