export {
	default as logger,
	createLogger,
	resolveLogLevel,
	type Logger,
} from './utils/logger';
