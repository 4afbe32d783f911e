#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig, type AppConfig } from './config.js';
import { DigestError, errorMessage } from './errors.js';
import { createHttpClient } from './http.js';
import { createLogger } from './logger.js';
import { runDigest } from './pipeline.js';
import { WebhookPublisher } from './publish.js';
import { DeepLTranslator } from './translate.js';

const logger = createLogger('main');

/**
 * 单次运行：读取配置 → 聚合 → 推送 → 退出
 * 配置在任何网络请求之前完成校验；客户端与配置随本次运行创建、结束即丢弃
 */
async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
    const config: AppConfig = loadConfig({ configPath: argv[0] });
    const http = createHttpClient(config);
    const translator = config.translation.enabled
        ? new DeepLTranslator(http, config.translation.apiKey, config.translation.apiUrl)
        : undefined;

    logger.info('run.start', { sources: config.sources.length, trends: config.trendSources.length, translation: config.translation.enabled, mode: config.payloadMode });
    const { result, state } = await runDigest({ config, http, translator, publisher: new WebhookPublisher(http, config.webhookUrl) });
    logger.info('run.sources', { status: [...state.sourceStatus.values()] });
    logger.info('run.done', { items: result.topItems.length, trends: result.trends.length });
}

main().then(() => {
    process.exit(0);
}, (e: unknown) => {
    // error 级别经 Console transport 写入 stderr
    logger.error('fatal', { err: errorMessage(e), code: e instanceof DigestError ? e.code : undefined });
    process.exit(1);
});
