import process from 'node:process';
import { inspect } from 'node:util';
import config from 'config';
import * as winston from 'winston';

// rawOutput is logged as a line count.
const summarizeValue = (key: string, value: unknown): unknown => {
	if (key === 'rawOutput' && typeof value === 'string') {
		return `<${value.split('\n').length} lines>`;
	}

	return value;
};

const objectFormatter = (object: object): string => {
	const entries = Object.entries(object).map(([ key, value ]) => [ key, summarizeValue(key, value) ]);
	return inspect(Object.fromEntries(entries));
};

export const getWinstonMessageContent = (info: Partial<winston.Logform.TransformableInfo>): string => {
	const { timestamp, level, scope, message, stack, ...otherFields } = info;
	let result = typeof message === 'object' && message !== null ? objectFormatter(message) : String(message);

	if (Object.keys(otherFields).length > 0) {
		result += `\n${objectFormatter(otherFields)}`;
	}

	if (typeof stack === 'string') {
		result += `\n${stack}`;
	}

	return result;
};

const getLogLevel = (): string => {
	const logLevel = process.env['LOG_LEVEL']?.toLowerCase() ?? (config.has('log.level') ? config.get<string>('log.level') : 'info');

	if (Object.keys(winston.config.npm.levels).includes(logLevel)) {
		return logLevel;
	}

	return 'info';
};

const logger = winston.createLogger({
	level: getLogLevel(),
	format: winston.format.combine(
		winston.format.errors({ stack: true }),
		winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss Z' }),
		winston.format.printf((info: winston.Logform.TransformableInfo) => {
			const { timestamp, level, scope } = info;
			const message = getWinstonMessageContent(info);

			return `[${String(timestamp)}] [${level.toUpperCase()}] [${String(scope)}] ${message}`;
		}),
	),
	transports: [
		// All levels to stderr.
		new winston.transports.Console({
			stderrLevels: Object.keys(winston.config.npm.levels),
			silent: config.has('log.silent') && config.get<boolean>('log.silent'),
		}),
	],
});

export const scopedLogger = (scope: string): winston.Logger => logger.child({ scope });
