import pino from 'pino';
import { z } from 'zod';

const LogLevelSchema = z
	.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
	.catch('info');

export function resolveLogLevel(level: string | undefined) {
	return LogLevelSchema.parse(level);
}

const logger = pino({
	name: 'room-freeze',
	level: resolveLogLevel(process.env.LOG_LEVEL),
	transport:
		process.env.NODE_ENV === 'development'
			? {
					target: 'pino-pretty',
					options: { colorize: true },
				}
			: undefined,
});

export default logger;

export type Logger = pino.Logger;

// one child per service, tagged with the service name
export function createLogger(name: string): Logger {
	return logger.child({ name });
}
