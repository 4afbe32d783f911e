import fs from 'node:fs';
import path from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import type { SourceDescriptor, TrendSource } from './types.js';

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
export const DEFAULT_DEEPL_URL = 'https://api-free.deepl.com/v2/translate';
export const DEFAULT_CONFIG_PATH = './configs/sources.yaml';

export type PayloadMode = 'text' | 'json';

export type DigestLayout = {
    title: string;
    trendsTitle: string;
    timeZone: string;
    descriptionLength: number;
    trendDisplayLimit: number;
};

export type TranslationConfig =
    | { enabled: false }
    | { enabled: true; apiKey: string; apiUrl: string; sourceLang: string; targetLang: string };

export type AppConfig = {
    webhookUrl: string;
    payloadMode: PayloadMode;
    userAgent: string;
    requestTimeoutMs: number;
    maxItems: number;
    freshnessHours: number;
    keywords: string[];
    sources: SourceDescriptor[];
    trendSources: TrendSource[];
    translation: TranslationConfig;
    digest: DigestLayout;
};

const selectorList = z.union([z.string().min(1), z.array(z.string().min(1)).nonempty()])
    .transform((v) => (typeof v === 'string' ? [v] : [...v]));

const ruleSchema = z.object({
    item: z.string().min(1).default('article'),
    title: selectorList,
    link: selectorList.default(['a']),
    description: selectorList.default(['p']),
    limit: z.number().int().positive().default(10)
});

const feedSchema = z.object({ kind: z.literal('feed'), label: z.string().min(1), url: z.string().url() });
const pageSchema = z.object({
    kind: z.literal('page'),
    label: z.string().min(1),
    url: z.string().url(),
    origin: z.string().url().optional(),
    rule: ruleSchema
});
// 回退源本身不再声明回退：YAML 中两级已覆盖 RSS→抓取、选择器 A→B 等场景
const baseSource = z.discriminatedUnion('kind', [feedSchema, pageSchema]);
const sourceSchema = z.discriminatedUnion('kind', [
    feedSchema.extend({ fallback: baseSource.optional() }),
    pageSchema.extend({ fallback: baseSource.optional() })
]);

const trendSchema = z.object({
    label: z.string().min(1),
    url: z.string().url(),
    limit: z.number().int().positive().max(10).default(10),
    strategies: z.array(z.object({
        selector: z.string().min(1),
        exclude: z.array(z.string()).default([]),
        minLength: z.number().int().nonnegative().default(1)
    })).nonempty()
});

const fileSchema = z.object({
    keywords: z.array(z.string().min(1)).nonempty(),
    maxItems: z.number().int().positive().default(5),
    freshnessHours: z.number().positive().default(24),
    requestTimeoutMs: z.number().int().positive().default(30_000),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
    payloadMode: z.enum(['text', 'json']).default('text'),
    sources: z.array(sourceSchema).nonempty(),
    trends: z.array(trendSchema).default([]),
    translation: z.object({
        enabled: z.boolean().default(false),
        sourceLang: z.string().min(2).default('ES'),
        targetLang: z.string().min(2).default('RU')
    }).default({}),
    digest: z.object({
        title: z.string().default('TOP NEWS'),
        trendsTitle: z.string().default('TRENDING'),
        timeZone: z.string().default('UTC'),
        descriptionLength: z.number().int().positive().default(150),
        trendDisplayLimit: z.number().int().positive().default(10)
    }).default({})
});

function requiredEnv(env: NodeJS.ProcessEnv, key: string): string {
    const value = env[key];
    if (!value) throw new ConfigError(`${key} environment variable is not set`);
    return value;
}

/**
 * 由已解析的 YAML 文档与环境变量构建运行配置
 * 环境变量先于文件校验，缺失 WEBHOOK_URL 时直接失败
 */
export function parseConfig(doc: unknown, env: NodeJS.ProcessEnv): AppConfig {
    const webhookUrl = requiredEnv(env, 'WEBHOOK_URL');
    const parsed = fileSchema.safeParse(doc);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
        throw new ConfigError(`invalid sources config: ${issues.join('; ')}`);
    }
    const file = parsed.data;
    const translation: TranslationConfig = file.translation.enabled
        ? {
            enabled: true,
            apiKey: requiredEnv(env, 'DEEPL_API_KEY'),
            apiUrl: env.DEEPL_API_URL || DEFAULT_DEEPL_URL,
            sourceLang: file.translation.sourceLang,
            targetLang: file.translation.targetLang
        }
        : { enabled: false };

    return {
        webhookUrl,
        payloadMode: file.payloadMode,
        userAgent: file.userAgent,
        requestTimeoutMs: file.requestTimeoutMs,
        maxItems: file.maxItems,
        freshnessHours: file.freshnessHours,
        keywords: file.keywords.map((k) => k.toLowerCase()),
        sources: file.sources,
        trendSources: file.trends,
        translation,
        digest: file.digest
    };
}

export function loadConfig(options: { env?: NodeJS.ProcessEnv; configPath?: string } = {}): AppConfig {
    const env = options.env ?? process.env;
    const cfgPath = path.resolve(options.configPath || env.SOURCES_CONFIG || DEFAULT_CONFIG_PATH);
    let doc: unknown;
    try {
        doc = yaml.load(fs.readFileSync(cfgPath, 'utf-8'));
    } catch (e) {
        throw new ConfigError(`cannot read sources config ${cfgPath}: ${errorMessage(e)}`);
    }
    return parseConfig(doc, env);
}
