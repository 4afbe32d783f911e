import winston from 'winston';

const { combine, timestamp, printf, colorize, json } = winston.format;

type LogInfo = Parameters<Parameters<typeof printf>[0]>[0];

function metaSuffix(info: LogInfo): string {
	const { level: _level, message: _message, timestamp: _ts, module: _module, ...meta } = info;
	return Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
}

/**
 * 创建 Winston 日志器
 * 开发态彩色单行输出，生产态 JSON；注入模块名
 * error 级别写到 stderr，其余写 stdout；LOG_SILENT=true 时静默（测试用）
 */
export function createLogger(moduleName: string) {
	const devFmt = combine(
		colorize(),
		timestamp(),
		printf((info) => `[${String(info.timestamp)}] ${info.level} ${moduleName}: ${String(info.message)}${metaSuffix(info)}`)
	);
	return winston.createLogger({
		level: process.env.LOG_LEVEL || 'info',
		format: process.env.NODE_ENV === 'production' ? combine(timestamp(), json()) : devFmt,
		defaultMeta: { module: moduleName },
		silent: process.env.LOG_SILENT === 'true',
		transports: [new winston.transports.Console({ stderrLevels: ['error'] })]
	});
}

export type Logger = winston.Logger;
